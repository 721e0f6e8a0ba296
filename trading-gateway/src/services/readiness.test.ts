import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "../testing/harness";
import { FakeCapability } from "../testing/fakeCapability";
import { ReadinessGate, configChecks, type ReadinessCheck } from "./readiness";

const healthyConfig = configChecks({ HMAC_SECRET: "test-secret", TRADING_API_KEY: "test-key", TRADING_ENABLED: true });

function gateWith(opts: { capability?: FakeCapability; checks?: ReadinessCheck[]; allowDegradedReads?: boolean; now?: () => number; minReprobeIntervalMs?: number; probeTimeoutMs?: number } = {}) {
  const capability = opts.capability ?? new FakeCapability();
  const gate = new ReadinessGate({
    capability,
    configChecks: opts.checks ?? healthyConfig,
    probeTimeoutMs: opts.probeTimeoutMs ?? 50,
    allowDegradedReads: opts.allowDegradedReads ?? false,
    logger: silentLogger,
    minReprobeIntervalMs: opts.minReprobeIntervalMs ?? 0,
    now: opts.now,
  });
  return { gate, capability };
}

describe("configChecks", () => {
  it("reports each missing piece of configuration", () => {
    expect(configChecks({ HMAC_SECRET: "", TRADING_API_KEY: undefined, TRADING_ENABLED: false })).toEqual([
      { name: "config.hmac_secret", ok: false, detail: "HMAC_SECRET is not configured" },
      { name: "config.credentials", ok: false, detail: "TRADING_API_KEY is not configured" },
      { name: "config.trading_enabled", ok: false, detail: "TRADING_ENABLED is false" },
    ]);
  });
});

describe("ReadinessGate", () => {
  it("starts NOT_READY with no probe recorded", () => {
    const { gate } = gateWith();
    expect(gate.current).toBe("NOT_READY");
    expect(gate.snapshot().checkedAt).toBeNull();
  });

  it("goes READY after a passing probe", async () => {
    const { gate, capability } = gateWith();
    const snap = await gate.probe();
    expect(snap.state).toBe("READY");
    expect(snap.checks.map((c) => c.name)).toEqual(["config.hmac_secret", "config.credentials", "config.trading_enabled", "capability.ping"]);
    expect(capability.pings).toBe(1);
  });

  it("stays NOT_READY when the first probe fails", async () => {
    const capability = new FakeCapability();
    capability.pingError = new Error("backend down");
    const { gate } = gateWith({ capability });
    const snap = await gate.probe();
    expect(snap.state).toBe("NOT_READY");
    expect(snap.checks[3]).toEqual({ name: "capability.ping", ok: false, detail: "backend down" });
  });

  it("moves READY to DEGRADED and back", async () => {
    const { gate, capability } = gateWith();
    await gate.probe();
    capability.pingError = new Error("backend down");
    expect((await gate.probe()).state).toBe("DEGRADED");
    // a second failure does not fall back to NOT_READY
    expect((await gate.probe()).state).toBe("DEGRADED");
    capability.pingError = null;
    expect((await gate.probe()).state).toBe("READY");
  });

  it("skips the ping while configuration is incomplete", async () => {
    const checks = configChecks({ HMAC_SECRET: "", TRADING_API_KEY: "test-key", TRADING_ENABLED: true });
    const { gate, capability } = gateWith({ checks });
    const snap = await gate.probe();
    expect(snap.state).toBe("NOT_READY");
    expect(capability.pings).toBe(0);
    expect(snap.checks[3]).toEqual({ name: "capability.ping", ok: false, detail: "skipped: configuration incomplete" });
  });

  it("fails the ping check when the ping outlives the probe timeout", async () => {
    const capability = new FakeCapability();
    capability.ping = () => new Promise<void>(() => undefined);
    const { gate } = gateWith({ capability });
    const snap = await gate.probe();
    expect(snap.state).toBe("NOT_READY");
    expect(snap.checks[3]).toEqual({ name: "capability.ping", ok: false, detail: "Deadline of 50ms exceeded" });
  });

  it("shares one run between concurrent probes", async () => {
    const capability = new FakeCapability();
    let release: () => void = () => undefined;
    let pings = 0;
    capability.ping = () => {
      pings++;
      return new Promise<void>((resolve) => {
        release = resolve;
      });
    };
    const { gate } = gateWith({ capability, probeTimeoutMs: 5_000 });
    const first = gate.probe();
    const second = gate.probe();
    expect(second).toBe(first);
    await vi.waitFor(() => expect(pings).toBe(1));
    release();
    expect((await first).state).toBe("READY");
    expect(pings).toBe(1);
  });

  it("throttles background refreshes", async () => {
    let clock = 0;
    const { gate, capability } = gateWith({ now: () => clock, minReprobeIntervalMs: 1_000 });
    await gate.probe();
    clock = 500;
    gate.refresh();
    expect(capability.pings).toBe(1);
    clock = 1_500;
    gate.refresh();
    await vi.waitFor(() => expect(capability.pings).toBe(2));
  });

  describe("admits", () => {
    it("lets everything through when READY", async () => {
      const { gate } = gateWith();
      await gate.probe();
      expect(gate.admits(true)).toBe(true);
      expect(gate.admits(false)).toBe(true);
    });

    it("lets nothing through when NOT_READY", () => {
      const { gate } = gateWith({ allowDegradedReads: true });
      expect(gate.admits(true)).toBe(false);
      expect(gate.admits(false)).toBe(false);
    });

    it("blocks mutations when DEGRADED and reads unless allowed", async () => {
      for (const allowDegradedReads of [false, true]) {
        const { gate, capability } = gateWith({ allowDegradedReads });
        await gate.probe();
        capability.pingError = new Error("backend down");
        await gate.probe();
        expect(gate.current).toBe("DEGRADED");
        expect(gate.admits(true)).toBe(false);
        expect(gate.admits(false)).toBe(allowDegradedReads);
      }
    });
  });
});
