export type ErrorKind =
  | "AUTHENTICATION_FAILED"
  | "REQUEST_STALE"
  | "REQUEST_REPLAYED"
  | "SERVER_MISCONFIGURED"
  | "BAD_REQUEST"
  | "NOT_FOUND"
  | "RATE_LIMITED"
  | "SERVICE_NOT_READY"
  | "UPSTREAM_ERROR"
  | "UPSTREAM_TIMEOUT"
  | "UPSTREAM_UNAVAILABLE"
  | "INTERNAL_ERROR";

const DEFAULT_STATUS: Record<ErrorKind, number> = {
  AUTHENTICATION_FAILED: 401,
  REQUEST_STALE: 401,
  REQUEST_REPLAYED: 401,
  SERVER_MISCONFIGURED: 500,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  RATE_LIMITED: 429,
  SERVICE_NOT_READY: 503,
  UPSTREAM_ERROR: 502,
  UPSTREAM_TIMEOUT: 504,
  UPSTREAM_UNAVAILABLE: 502,
  INTERNAL_ERROR: 500,
};

export interface GatewayErrorOptions {
  status?: number;
  retryable?: boolean;
  details?: Record<string, unknown>;
}

/** The only error shape that leaves the gateway. */
export class GatewayError extends Error {
  readonly status: number;
  readonly retryable?: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    public readonly kind: ErrorKind,
    message: string,
    { status, retryable, details }: GatewayErrorOptions = {},
  ) {
    super(message);
    this.name = "GatewayError";
    this.status = status ?? DEFAULT_STATUS[kind];
    this.retryable = retryable;
    this.details = details;
  }
}
