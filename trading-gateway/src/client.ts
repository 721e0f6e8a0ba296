import { z } from "zod";
import { buildAuthHeaders } from "./services/signer";

const Meta = z.object({ requestId: z.string(), timestamp: z.string() });
const Envelope = z.discriminatedUnion("success", [
  z.object({ success: z.literal(true), data: z.record(z.unknown()), meta: Meta }),
  z.object({
    success: z.literal(false),
    error: z.object({ code: z.string(), message: z.string(), details: z.record(z.unknown()).optional(), retryable: z.boolean().optional() }),
    meta: Meta,
  }),
]);

export interface GatewayClientOptions {
  baseUrl: string;
  secret: string;
  now?: () => number;
  fetchImpl?: typeof fetch;
}

export interface GatewayReply {
  status: number;
  body: z.infer<typeof Envelope>;
}

/** Reads a gateway response into its envelope. */
export async function readReply(resp: Response): Promise<GatewayReply> {
  return { status: resp.status, body: Envelope.parse(await resp.json()) };
}

/** Signs and sends `/v1` calls the way the gateway expects them. */
export class GatewayClient {
  private readonly baseUrl: string;
  private readonly secret: string;
  private readonly now: () => number;
  private readonly fetchImpl: typeof fetch;

  constructor({ baseUrl, secret, now = Date.now, fetchImpl = fetch }: GatewayClientOptions) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.secret = secret;
    this.now = now;
    this.fetchImpl = fetchImpl;
  }

  /** Signed headers plus the exact body string, for callers that send the request themselves. */
  prepare(path: string, payload: unknown = {}): { headers: Record<string, string>; body: string } {
    const body = JSON.stringify(payload);
    return { headers: { "content-type": "application/json", ...buildAuthHeaders(this.secret, "POST", path, body, this.now()) }, body };
  }

  async call(path: string, payload: unknown = {}): Promise<GatewayReply> {
    const { headers, body } = this.prepare(path, payload);
    const resp = await this.fetchImpl(`${this.baseUrl}${path}`, { method: "POST", headers, body });
    return readReply(resp);
  }
}
