import type { Request, Response, NextFunction } from "express";
import { GatewayError } from "../errors";
import { requestIdOf, sendError } from "../envelope";
import type { Logger } from "../logger";
import type { ReplayGuard } from "../services/replayGuard";
import { SIGNATURE_HEADER, TIMESTAMP_HEADER, verify } from "../services/signer";

export interface HmacAuthOptions {
  secret: string;
  guard: ReplayGuard;
  logger: Logger;
  now?: () => number;
}

const TIMESTAMP_RE = /^\d{1,16}$/;

/** Bytes exactly as received. Requires a raw body parser in front of this middleware. */
export function rawBodyOf(req: Request): Buffer | string {
  const body: unknown = req.body;
  return Buffer.isBuffer(body) ? body : "";
}

/** Path the client signed: the request path without its query string. */
export function signedPathOf(req: Request): string {
  const url = req.originalUrl;
  const q = url.indexOf("?");
  return q === -1 ? url : url.slice(0, q);
}

/**
 * Admits a request only when `x-signature` is the HMAC of
 * `"{x-timestamp}:{METHOD}:{path}:{raw body}"`, the timestamp is inside the
 * freshness window and the signature has not been admitted before.
 */
export const hmacAuth = ({ secret, guard, logger, now = Date.now }: HmacAuthOptions) => {
  const log = logger.child({ component: "hmac-auth" });
  return (req: Request, res: Response, next: NextFunction) => {
    const path = signedPathOf(req);
    const reject = (reason: string, err: GatewayError) => {
      log.warn({ reason, method: req.method, path, requestId: requestIdOf(res), ip: req.ip }, "request rejected");
      sendError(res, err);
    };

    if (!secret) return reject("secret_missing", new GatewayError("SERVER_MISCONFIGURED", "HMAC secret is not configured"));

    const timestamp = req.header(TIMESTAMP_HEADER);
    const signature = req.header(SIGNATURE_HEADER);
    if (!timestamp || !signature) {
      return reject("missing_header", new GatewayError("AUTHENTICATION_FAILED", "Missing required authentication headers"));
    }
    if (!TIMESTAMP_RE.test(timestamp)) {
      return reject("invalid_timestamp", new GatewayError("AUTHENTICATION_FAILED", "Invalid timestamp format"));
    }

    const ts = Number(timestamp);
    const at = now();
    if (!guard.isFresh(ts, at)) {
      return reject("stale", new GatewayError("REQUEST_STALE", "Request expired or timestamp too far in future", { details: { reason: "STALE" } }));
    }
    if (!verify(secret, timestamp, req.method.toUpperCase(), path, rawBodyOf(req), signature)) {
      return reject("bad_signature", new GatewayError("AUTHENTICATION_FAILED", "Invalid signature"));
    }

    const verdict = guard.admit(signature, ts, at);
    if (!verdict.admitted) {
      return verdict.reason === "STALE"
        ? reject("stale", new GatewayError("REQUEST_STALE", "Request expired or timestamp too far in future", { details: { reason: "STALE" } }))
        : reject("replayed", new GatewayError("REQUEST_REPLAYED", "Request signature was already used", { details: { reason: "REPLAYED" } }));
    }
    next();
  };
};

/** Replaces the raw body with its parsed JSON once the request is authenticated. */
export function parseJsonBody(req: Request, res: Response, next: NextFunction) {
  const raw = rawBodyOf(req);
  const text = typeof raw === "string" ? raw : raw.toString("utf8");
  if (text.trim() === "") {
    req.body = {};
    return next();
  }
  try {
    req.body = JSON.parse(text);
    next();
  } catch {
    sendError(res, new GatewayError("BAD_REQUEST", "Request body is not valid JSON"));
  }
}
