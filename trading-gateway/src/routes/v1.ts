import { Router } from "express";
import type { Request, Response } from "express";
import { GatewayError } from "../errors";
import { requestIdOf, sendError, sendSuccess } from "../envelope";
import type { Logger } from "../logger";
import { requireReadiness } from "../middleware/readinessGate";
import { boundCallOf, validate } from "../middleware/validate";
import type { TradingCapability } from "../services/capability";
import { withDeadline } from "../services/deadline";
import type { IdempotencyCache } from "../services/idempotency";
import type { ReadinessGate } from "../services/readiness";
import { classifyUpstreamError, isConnectivityFault } from "../services/upstreamErrors";
import { OPERATIONS, type Operation } from "./operations";

export interface V1Deps {
  capability: TradingCapability;
  gate: ReadinessGate;
  idempotency: IdempotencyCache;
  requestTimeoutMs: number;
  logger: Logger;
}

// a keyed mutation that timed out or lost the backend may have executed; its key must not run it again
const outcomeUnknown = (err: unknown) => err instanceof GatewayError && isConnectivityFault(err);

/** Forwards one validated call to the capability, at most once, and translates the outcome. */
const dispatch = (op: Operation, { capability, gate, idempotency, requestTimeoutMs, logger }: V1Deps) => async (req: Request, res: Response) => {
  const call = boundCallOf(req);
  if (!call) return sendError(res, new GatewayError("INTERNAL_ERROR", "Request reached dispatch without validation"));
  const requestId = requestIdOf(res);
  const operation = op.route.slice(1);
  const started = Date.now();
  const run = () =>
    withDeadline(requestTimeoutMs, (signal) => call.invoke(capability, { signal, requestId })).catch((err: unknown) => {
      throw classifyUpstreamError(operation, err, op.isMutating);
    });
  try {
    const { hit, result } = call.idempotencyKey
      ? idempotency.run(`${op.route}:${call.idempotencyKey}`, run, outcomeUnknown)
      : { hit: false, result: run() };
    const data = await result;
    logger.info({ requestId, operation, ms: Date.now() - started, idempotentReplay: hit || undefined }, "dispatched");
    sendSuccess(res, data);
  } catch (err) {
    const failure = classifyUpstreamError(operation, err, op.isMutating);
    if (isConnectivityFault(failure)) gate.refresh();
    logger.warn({ requestId, operation, ms: Date.now() - started, kind: failure.kind, details: failure.details }, "dispatch failed");
    sendError(res, failure);
  }
};

export default function buildV1Router(deps: V1Deps): Router {
  const r = Router();
  const log = deps.logger.child({ component: "dispatch" });
  const seen = new Set<string>();
  for (const op of OPERATIONS) {
    if (seen.has(op.route)) throw new Error(`duplicate operation route ${op.route}`);
    seen.add(op.route);
    r.post(op.route, requireReadiness(deps.gate, op.isMutating), validate(op), dispatch(op, { ...deps, logger: log }));
  }
  return r;
}
