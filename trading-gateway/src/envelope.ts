import type { Response } from "express";
import type { GatewayError } from "./errors";

export interface Meta {
  requestId: string;
  timestamp: string;
}

export interface SuccessEnvelope<T> {
  success: true;
  data: T;
  meta: Meta;
}

export interface ErrorEnvelope {
  success: false;
  error: { code: string; message: string; details?: Record<string, unknown>; retryable?: boolean };
  meta: Meta;
}

export function requestIdOf(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === "string" ? id : "unknown";
}

function meta(res: Response): Meta {
  return { requestId: requestIdOf(res), timestamp: new Date().toISOString() };
}

export function sendSuccess<T>(res: Response, data: T): void {
  const body: SuccessEnvelope<T> = { success: true, data, meta: meta(res) };
  res.status(200).json(body);
}

export function sendError(res: Response, err: GatewayError): void {
  const body: ErrorEnvelope = {
    success: false,
    error: {
      code: err.kind,
      message: err.message,
      ...(err.details ? { details: err.details } : {}),
      ...(err.retryable !== undefined ? { retryable: err.retryable } : {}),
    },
    meta: meta(res),
  };
  res.status(err.status).json(body);
}
