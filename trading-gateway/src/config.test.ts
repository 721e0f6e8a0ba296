import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("fills in defaults", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(5002);
    expect(config.HMAC_SECRET).toBe("");
    expect(config.HMAC_WINDOW_MS).toBe(30_000);
    expect(config.HMAC_FUTURE_TOLERANCE_MS).toBe(5_000);
    expect(config.ALLOW_DEGRADED_READS).toBe(false);
    expect(config.TRADING_ENABLED).toBe(true);
    expect(config.TRADING_MAINNET_URL).toBeUndefined();
  });

  it("reads flags and numbers from strings", () => {
    const config = loadConfig({ PORT: "8080", ALLOW_DEGRADED_READS: "yes", TRADING_ENABLED: "0", HMAC_WINDOW_MS: "60000" });
    expect(config.PORT).toBe(8080);
    expect(config.ALLOW_DEGRADED_READS).toBe(true);
    expect(config.TRADING_ENABLED).toBe(false);
    expect(config.HMAC_WINDOW_MS).toBe(60_000);
  });

  it("treats an empty flag as unset", () => {
    expect(loadConfig({ TRADING_ENABLED: " " }).TRADING_ENABLED).toBe(true);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ HMAC_WINDOW_MS: "-1" })).toThrow();
    expect(() => loadConfig({ TRADING_TESTNET_URL: "not a url" })).toThrow();
  });
});
