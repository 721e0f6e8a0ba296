import { z } from "zod";
import type {
  BalanceReq,
  FaucetReq,
  HistoryReq,
  MarketDetailsReq,
  MarketRateReq,
  MarketsListReq,
  Network,
  OrderCancelReq,
  OrderTrackReq,
  OrderUpdateReq,
  PositionCloseReq,
  PositionMetricsReq,
  PositionOpenReq,
  PositionUpdateSlReq,
  PositionUpdateTpReq,
  PriceReq,
  TraderReq,
} from "../schemas";
import type { CallContext, JsonObject, TradingCapability } from "./capability";

/** ---------- Error Types ---------- */
export class BackendError extends Error {
  constructor(
    message: string,
    public readonly code: "rejected" | "timeout" | "unreachable" | "server_error" | "bad_response",
    public readonly status?: number,
    public readonly upstreamCode?: string,
  ) {
    super(message);
    this.name = "BackendError";
  }
}

const BackendFailure = z.union([
  z.object({ error: z.object({ code: z.string().optional(), message: z.string() }) }),
  z.object({ code: z.string().optional(), message: z.string() }),
]);
const BackendPayload = z.record(z.unknown());

/** ---------- Fetch utils (timeout + retry) ---------- */
const DEFAULT_ATTEMPT_TIMEOUT_MS = 10_000;
const MAX_RETRIES = 2; // total attempts for reads = 1 + MAX_RETRIES
const JITTER_MS = 150;

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const id = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
    function done() {
      clearTimeout(id);
      signal.removeEventListener("abort", done);
      resolve();
    }
  });
}

function backoffDelay(attempt: number): number {
  // attempt: 0,1 -> 200, 400 (+ jitter)
  return 200 * Math.pow(2, attempt) + Math.floor(Math.random() * JITTER_MS);
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

function isRetriable(err: unknown): boolean {
  if (!(err instanceof BackendError)) return true;
  return err.code === "timeout" || err.code === "unreachable" || err.code === "server_error";
}

function parseFailure(text: string): { code?: string; message?: string } {
  try {
    const parsed = BackendFailure.safeParse(JSON.parse(text));
    if (!parsed.success) return {};
    return "error" in parsed.data ? parsed.data.error : parsed.data;
  } catch {
    return { message: text.slice(0, 300) || undefined };
  }
}

/** ---------- Client ---------- */
export interface TradingBackendOptions {
  baseUrls: Partial<Record<Network, string>>;
  apiKey?: string;
  attemptTimeoutMs?: number;
  maxRetries?: number;
  fetchImpl?: typeof fetch;
}

interface PostOptions {
  /** Reads may be retried; mutations go out exactly once. */
  retry: boolean;
}

/**
 * TradingCapability over the trading backend's HTTP API: one base URL per
 * network, `POST {base}/{operation}` with a JSON body and bearer credentials.
 */
export class HttpTradingBackend implements TradingCapability {
  private readonly baseUrls: Partial<Record<Network, string>>;
  private readonly apiKey?: string;
  private readonly attemptTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly fetchImpl: typeof fetch;

  constructor({ baseUrls, apiKey, attemptTimeoutMs = DEFAULT_ATTEMPT_TIMEOUT_MS, maxRetries = MAX_RETRIES, fetchImpl = fetch }: TradingBackendOptions) {
    this.baseUrls = baseUrls;
    this.apiKey = apiKey;
    this.attemptTimeoutMs = attemptTimeoutMs;
    this.maxRetries = maxRetries;
    this.fetchImpl = fetchImpl;
  }

  private baseUrl(network: Network): string {
    const url = this.baseUrls[network];
    if (!url) throw new BackendError(`${network} backend is not configured`, "rejected", 400, "NETWORK_NOT_CONFIGURED");
    return url.replace(/\/+$/, "");
  }

  private headers(requestId?: string): Record<string, string> {
    if (!this.apiKey) throw new BackendError("Trading backend credentials are not configured", "rejected", undefined, "CREDENTIALS_MISSING");
    const headers: Record<string, string> = { "content-type": "application/json", authorization: `Bearer ${this.apiKey}` };
    if (requestId) headers["x-request-id"] = requestId;
    return headers;
  }

  private async attempt(url: string, init: RequestInit, signal: AbortSignal): Promise<Response> {
    try {
      return await this.fetchImpl(url, { ...init, signal: AbortSignal.any([signal, AbortSignal.timeout(this.attemptTimeoutMs)]) });
    } catch (err) {
      if (isAbort(err)) throw new BackendError(`Trading backend timed out: ${url}`, "timeout");
      throw new BackendError(`Trading backend unreachable: ${err instanceof Error ? err.message : String(err)}`, "unreachable");
    }
  }

  private async once(network: Network, operation: string, body: unknown, ctx: CallContext): Promise<JsonObject> {
    const url = `${this.baseUrl(network)}/${operation}`;
    const resp = await this.attempt(url, { method: "POST", headers: this.headers(ctx.requestId), body: JSON.stringify(body) }, ctx.signal);

    if (!resp.ok) {
      const failure = parseFailure(await resp.text().catch(() => ""));
      const message = failure.message ?? `Trading backend HTTP ${resp.status}`;
      throw resp.status >= 500 || resp.status === 429
        ? new BackendError(message, "server_error", resp.status, failure.code)
        : new BackendError(message, "rejected", resp.status, failure.code);
    }

    const json: unknown = await resp.json().catch(() => undefined);
    const out = BackendPayload.safeParse(json);
    if (!out.success) throw new BackendError(`Trading backend returned a non-object payload for ${operation}`, "bad_response", resp.status);
    return out.data;
  }

  private async post(network: Network, operation: string, body: unknown, ctx: CallContext, { retry }: PostOptions): Promise<JsonObject> {
    const attempts = retry ? 1 + this.maxRetries : 1;
    let lastError: unknown;
    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        return await this.once(network, operation, body, ctx);
      } catch (err) {
        lastError = err;
        if (!isRetriable(err) || ctx.signal.aborted || attempt + 1 >= attempts) break;
        await sleep(backoffDelay(attempt), ctx.signal);
      }
    }
    throw lastError;
  }

  async ping(ctx: CallContext): Promise<void> {
    const headers = this.headers(ctx.requestId);
    const networks = (["testnet", "mainnet"] as const).filter((n) => this.baseUrls[n]);
    if (networks.length === 0) throw new BackendError("No trading backend is configured", "rejected", undefined, "NETWORK_NOT_CONFIGURED");
    for (const network of networks) {
      const resp = await this.attempt(`${this.baseUrl(network)}/status`, { method: "GET", headers }, ctx.signal);
      const text = await resp.text().catch(() => "");
      if (!resp.ok) {
        const failure = parseFailure(text);
        throw new BackendError(failure.message ?? `${network} backend status HTTP ${resp.status}`, resp.status >= 500 ? "server_error" : "rejected", resp.status, failure.code);
      }
    }
  }

  listMarkets(input: MarketsListReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "markets/list", input, ctx, { retry: true });
  }
  getPrice(input: PriceReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "prices/get", input, ctx, { retry: true });
  }
  getFundingRate(input: MarketRateReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "markets/funding-rate", input, ctx, { retry: true });
  }
  getRolloverRate(input: MarketRateReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "markets/rollover-rate", input, ctx, { retry: true });
  }
  getMarketDetails(input: MarketDetailsReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "markets/details", input, ctx, { retry: true });
  }
  getBalance(input: BalanceReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "accounts/balance", input, ctx, { retry: true });
  }
  getHistory(input: HistoryReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "accounts/history", input, ctx, { retry: true });
  }
  requestFaucet(input: FaucetReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "faucet/request", input, ctx, { retry: false });
  }
  listPositions(input: TraderReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "positions/list", input, ctx, { retry: true });
  }
  getPositionMetrics(input: PositionMetricsReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "positions/metrics", input, ctx, { retry: true });
  }
  openPosition(input: PositionOpenReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "positions/open", input, ctx, { retry: false });
  }
  closePosition(input: PositionCloseReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "positions/close", input, ctx, { retry: false });
  }
  updateStopLoss(input: PositionUpdateSlReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "positions/update-sl", input, ctx, { retry: false });
  }
  updateTakeProfit(input: PositionUpdateTpReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "positions/update-tp", input, ctx, { retry: false });
  }
  listOrders(input: TraderReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "orders/list", input, ctx, { retry: true });
  }
  trackOrder(input: OrderTrackReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "orders/track", input, ctx, { retry: true });
  }
  cancelOrder(input: OrderCancelReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "orders/cancel", input, ctx, { retry: false });
  }
  updateOrder(input: OrderUpdateReq, ctx: CallContext): Promise<JsonObject> {
    return this.post(input.network, "orders/update", input, ctx, { retry: false });
  }
}
