import type { Request, Response, NextFunction } from "express";
import { GatewayError } from "../errors";
import { sendError } from "../envelope";
import type { BoundCall, Operation } from "../routes/operations";
const bound = new WeakMap<Request, BoundCall>();
export const validate =
(op: Operation) =>
(req: Request, res: Response, next: NextFunction) => {
const parsed = op.bind(req.body);
if (!parsed.success) return sendError(res, new GatewayError("BAD_REQUEST", "Invalid request payload", { details: { ...parsed.error.flatten() } }));
bound.set(req, parsed.call); next();
};
/** The validated call `validate` attached to this request. */
export const boundCallOf = (req: Request): BoundCall | undefined => bound.get(req);
