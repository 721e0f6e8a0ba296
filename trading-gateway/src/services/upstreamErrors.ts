import { GatewayError } from "../errors";
import { BackendError } from "./tradingBackend";

export type UpstreamReason =
  | "INVALID_MARKET"
  | "INSUFFICIENT_BALANCE"
  | "SLIPPAGE_EXCEEDED"
  | "ALLOWANCE_MISSING"
  | "DELEGATION_NOT_ACTIVE"
  | "GAS_LOW"
  | "ORDER_NOT_FOUND";

// order matters: "insufficient funds for gas" is a gas problem, not a balance one
const REASONS: Array<{ reason: UpstreamReason; pattern: RegExp; message: string }> = [
  { reason: "GAS_LOW", pattern: /gas is low|insufficient funds for gas/i, message: "Delegate wallet gas is low. Fund it with the native token." },
  { reason: "ALLOWANCE_MISSING", pattern: /allowance/i, message: "Sufficient allowance not present. Approve the trading contract to spend collateral." },
  { reason: "DELEGATION_NOT_ACTIVE", pattern: /delegation (is )?not active/i, message: "Delegation is not active. Approve delegation before write actions." },
  { reason: "INSUFFICIENT_BALANCE", pattern: /insufficient (balance|funds|collateral)/i, message: "Insufficient balance for this operation." },
  { reason: "SLIPPAGE_EXCEEDED", pattern: /slippage/i, message: "Price moved beyond the allowed slippage." },
  { reason: "INVALID_MARKET", pattern: /invalid market|unknown market|pair not found|market .* not (available|found)/i, message: "Market is not available on the selected network." },
  { reason: "ORDER_NOT_FOUND", pattern: /(order|trade) not found|no such (order|trade)/i, message: "Order or trade was not found." },
];

const TIMEOUT_RE = /timeout|timed out/i;
const NETWORK_RE = /ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN|fetch failed|socket hang up|network/i;

function failedCode(operation: string): string {
  return `${operation.replace(/[^a-z0-9]+/gi, "_").toUpperCase()}_FAILED`;
}

function unknownOutcome(operation: string): string {
  return `Outcome of ${operation} is unknown; reconcile via list or history before retrying`;
}

function timeoutError(operation: string, isMutating: boolean): GatewayError {
  return new GatewayError("UPSTREAM_TIMEOUT", isMutating ? `Trading backend timed out. ${unknownOutcome(operation)}` : "Trading backend timed out", {
    retryable: !isMutating,
    details: { operation },
  });
}

function unavailableError(operation: string, isMutating: boolean): GatewayError {
  return new GatewayError("UPSTREAM_UNAVAILABLE", isMutating ? `Trading backend unavailable. ${unknownOutcome(operation)}` : "Trading backend unavailable", {
    retryable: !isMutating,
    details: { operation },
  });
}

function domainError(operation: string, message: string, upstreamCode: string | undefined, clientFault: boolean): GatewayError {
  const match = REASONS.find((r) => r.reason === upstreamCode) ?? REASONS.find((r) => r.pattern.test(message));
  const reason = match?.reason ?? upstreamCode ?? failedCode(operation);
  return new GatewayError("UPSTREAM_ERROR", match?.message ?? message, {
    status: match || clientFault ? 400 : 502,
    retryable: false,
    details: { operation, reason, upstreamMessage: message },
  });
}

/**
 * Maps anything a capability call rejected with onto a GatewayError.
 * The raw error never leaves this function; only its message survives, as
 * `details.upstreamMessage` on domain failures.
 */
export function classifyUpstreamError(operation: string, err: unknown, isMutating: boolean): GatewayError {
  if (err instanceof GatewayError) return err;

  if (err instanceof BackendError) {
    switch (err.code) {
      case "timeout":
        return timeoutError(operation, isMutating);
      case "unreachable":
      case "server_error":
      case "bad_response":
        return unavailableError(operation, isMutating);
      case "rejected":
        return domainError(operation, err.message, err.upstreamCode, err.status !== undefined && err.status < 500);
    }
  }

  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) return timeoutError(operation, isMutating);
  if (TIMEOUT_RE.test(message)) return timeoutError(operation, isMutating);
  if (NETWORK_RE.test(message)) return unavailableError(operation, isMutating);
  return domainError(operation, message, undefined, false);
}

/** Failures that say something about the backend's health rather than the request. */
export function isConnectivityFault(err: GatewayError): boolean {
  return err.kind === "UPSTREAM_TIMEOUT" || err.kind === "UPSTREAM_UNAVAILABLE";
}
