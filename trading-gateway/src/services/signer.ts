import { createHmac, timingSafeEqual } from "node:crypto";

export const TIMESTAMP_HEADER = "x-timestamp";
export const SIGNATURE_HEADER = "x-signature";

const SIGNATURE_RE = /^[0-9a-f]{64}$/i;

/**
 * Everything before the body in the signed message,
 * `"{timestamp}:{METHOD}:{path}:"`. The body is appended as raw bytes.
 */
function canonicalPrefix(timestamp: number | string, method: string, path: string): string {
  return `${timestamp}:${method}:${path}:`;
}

/** `"{timestamp}:{METHOD}:{path}:{rawBody}"` as a single string. */
export function canonicalString(timestamp: number | string, method: string, path: string, rawBody: string | Buffer): string {
  return canonicalPrefix(timestamp, method, path) + (typeof rawBody === "string" ? rawBody : rawBody.toString("utf8"));
}

function digest(secret: string, timestamp: number | string, method: string, path: string, rawBody: string | Buffer): Buffer {
  return createHmac("sha256", secret).update(canonicalPrefix(timestamp, method, path)).update(rawBody).digest();
}

/**
 * Hex HMAC-SHA256 of the canonical string, keyed with the shared secret.
 * `method` must already be uppercase and `rawBody` exactly what goes on the wire
 * (`""` when there is no body).
 */
export function sign(secret: string, timestamp: number | string, method: string, path: string, rawBody: string | Buffer = ""): string {
  return digest(secret, timestamp, method, path, rawBody).toString("hex");
}

/** Constant-time check of `providedSignature`. Returns false on any malformed input. */
export function verify(
  secret: string,
  timestamp: number | string,
  method: string,
  path: string,
  rawBody: string | Buffer,
  providedSignature: string | undefined,
): boolean {
  if (!secret || !method || !path.startsWith("/")) return false;
  if (typeof providedSignature !== "string" || !SIGNATURE_RE.test(providedSignature)) return false;
  if (typeof timestamp === "number" ? !Number.isSafeInteger(timestamp) : timestamp.length === 0) return false;
  const expected = digest(secret, timestamp, method, path, rawBody);
  const provided = Buffer.from(providedSignature, "hex");
  return provided.length === expected.length && timingSafeEqual(provided, expected);
}

/** Headers a caller attaches to a signed `/v1/*` request. */
export function buildAuthHeaders(secret: string, method: string, path: string, rawBody = "", now: number = Date.now()): Record<string, string> {
  const timestamp = String(Math.trunc(now));
  return {
    [TIMESTAMP_HEADER]: timestamp,
    [SIGNATURE_HEADER]: sign(secret, timestamp, method.toUpperCase(), path, rawBody),
  };
}
