import type { Request, Response, NextFunction } from "express";
import { GatewayError } from "../errors";
import { sendError } from "../envelope";
import type { ReadinessGate } from "../services/readiness";
export const requireReadiness =
(gate: ReadinessGate, isMutating: boolean) =>
(_req: Request, res: Response, next: NextFunction) => {
if (gate.current === "DEGRADED") gate.refresh();
if (gate.admits(isMutating)) return next();
const message = isMutating ? "Mutating operations require a READY gateway" : "Gateway is not ready";
sendError(res, new GatewayError("SERVICE_NOT_READY", message, { retryable: true, details: { state: gate.current } }));
};
