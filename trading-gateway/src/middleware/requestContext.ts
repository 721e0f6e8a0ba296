import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "node:crypto";
export const REQUEST_ID_HEADER = "x-request-id";
export function requestContext(req: Request, res: Response, next: NextFunction) {
const incoming = req.header(REQUEST_ID_HEADER);
const requestId = incoming && incoming.length <= 128 ? incoming : randomUUID();
res.locals.requestId = requestId; res.setHeader(REQUEST_ID_HEADER, requestId); next();
}
