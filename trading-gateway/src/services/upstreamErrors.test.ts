import { describe, expect, it } from "vitest";
import { GatewayError } from "../errors";
import { BackendError } from "./tradingBackend";
import { DeadlineExceeded } from "./deadline";
import { classifyUpstreamError, isConnectivityFault } from "./upstreamErrors";

describe("classifyUpstreamError", () => {
  it("passes gateway errors through untouched", () => {
    const err = new GatewayError("BAD_REQUEST", "nope");
    expect(classifyUpstreamError("prices/get", err, false)).toBe(err);
  });

  it("marks a timed-out read as retryable", () => {
    const out = classifyUpstreamError("prices/get", new BackendError("slow", "timeout"), false);
    expect(out.kind).toBe("UPSTREAM_TIMEOUT");
    expect(out.status).toBe(504);
    expect(out.retryable).toBe(true);
    expect(out.message).toBe("Trading backend timed out");
  });

  it("tells the caller a timed-out mutation has an unknown outcome", () => {
    const out = classifyUpstreamError("positions/open", new DeadlineExceeded(30_000), true);
    expect(out.kind).toBe("UPSTREAM_TIMEOUT");
    expect(out.retryable).toBe(false);
    expect(out.message).toBe("Trading backend timed out. Outcome of positions/open is unknown; reconcile via list or history before retrying");
    expect(out.details).toEqual({ operation: "positions/open" });
  });

  it("maps connection failures to UPSTREAM_UNAVAILABLE", () => {
    for (const err of [
      new BackendError("down", "unreachable"),
      new BackendError("HTTP 503", "server_error", 503),
      new BackendError("garbage", "bad_response", 200),
      new Error("connect ECONNREFUSED 127.0.0.1:9100"),
    ]) {
      const out = classifyUpstreamError("markets/list", err, false);
      expect(out.kind).toBe("UPSTREAM_UNAVAILABLE");
      expect(out.status).toBe(502);
    }
  });

  it("treats AbortError as a timeout", () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    expect(classifyUpstreamError("orders/list", abort, false).kind).toBe("UPSTREAM_TIMEOUT");
  });

  it("uses a known upstream code as the reason", () => {
    const out = classifyUpstreamError("positions/open", new BackendError("price moved", "rejected", 400, "SLIPPAGE_EXCEEDED"), true);
    expect(out.kind).toBe("UPSTREAM_ERROR");
    expect(out.status).toBe(400);
    expect(out.retryable).toBe(false);
    expect(out.message).toBe("Price moved beyond the allowed slippage.");
    expect(out.details).toEqual({ operation: "positions/open", reason: "SLIPPAGE_EXCEEDED", upstreamMessage: "price moved" });
  });

  it("recognises the reason from the message when no code is given", () => {
    const out = classifyUpstreamError("positions/open", new BackendError("insufficient funds for gas * price + value", "rejected", 400), true);
    expect(out.details?.reason).toBe("GAS_LOW");
  });

  it("keeps an unrecognised upstream code", () => {
    const out = classifyUpstreamError("prices/get", new BackendError("mainnet backend is not configured", "rejected", 400, "NETWORK_NOT_CONFIGURED"), false);
    expect(out.status).toBe(400);
    expect(out.message).toBe("mainnet backend is not configured");
    expect(out.details?.reason).toBe("NETWORK_NOT_CONFIGURED");
  });

  it("falls back to an operation-specific reason", () => {
    const rejected = classifyUpstreamError("positions/open", new BackendError("computer says no", "rejected", 422), true);
    expect(rejected.status).toBe(400);
    expect(rejected.details?.reason).toBe("POSITIONS_OPEN_FAILED");

    const unknown = classifyUpstreamError("positions/open", new Error("kaput"), true);
    expect(unknown.kind).toBe("UPSTREAM_ERROR");
    expect(unknown.status).toBe(502);
    expect(unknown.details).toEqual({ operation: "positions/open", reason: "POSITIONS_OPEN_FAILED", upstreamMessage: "kaput" });
  });
});

describe("isConnectivityFault", () => {
  it("is true only for timeouts and unavailability", () => {
    expect(isConnectivityFault(new GatewayError("UPSTREAM_TIMEOUT", "x"))).toBe(true);
    expect(isConnectivityFault(new GatewayError("UPSTREAM_UNAVAILABLE", "x"))).toBe(true);
    expect(isConnectivityFault(new GatewayError("UPSTREAM_ERROR", "x"))).toBe(false);
  });
});
