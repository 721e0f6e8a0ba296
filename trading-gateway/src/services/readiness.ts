import type { Logger } from "../logger";
import type { TradingCapability } from "./capability";
import { withDeadline } from "./deadline";

export type ReadinessState = "NOT_READY" | "READY" | "DEGRADED";

export interface ReadinessCheck {
  name: string;
  ok: boolean;
  detail?: string;
}

export interface ReadinessSnapshot {
  state: ReadinessState;
  checks: ReadinessCheck[];
  /** ISO time of the last completed probe; null before the first one. */
  checkedAt: string | null;
  /** ISO time the current state was entered. */
  since: string;
}

export interface ReadinessGateOptions {
  capability: Pick<TradingCapability, "ping">;
  /** Configuration checks; these never change over the life of the process. */
  configChecks: ReadinessCheck[];
  probeTimeoutMs: number;
  allowDegradedReads: boolean;
  logger: Logger;
  /** Lower bound on the spacing of background re-probes. */
  minReprobeIntervalMs?: number;
  now?: () => number;
}

const PING_CHECK = "capability.ping";

/**
 * Process-wide readiness. Starts NOT_READY; only `probe` changes the state,
 * and a running instance that loses the backend goes DEGRADED, never back to
 * NOT_READY. Readers get the cached snapshot and never wait on a probe.
 */
export class ReadinessGate {
  private state: ReadinessState = "NOT_READY";
  private checks: ReadinessCheck[];
  private checkedAt: number | null = null;
  private since: number;
  private inflight: Promise<ReadinessSnapshot> | null = null;
  private readonly configChecks: ReadinessCheck[];
  private readonly capability: Pick<TradingCapability, "ping">;
  private readonly probeTimeoutMs: number;
  private readonly allowDegradedReads: boolean;
  private readonly logger: Logger;
  private readonly minReprobeIntervalMs: number;
  private readonly now: () => number;

  constructor({ capability, configChecks, probeTimeoutMs, allowDegradedReads, logger, minReprobeIntervalMs = 1_000, now = Date.now }: ReadinessGateOptions) {
    this.capability = capability;
    this.configChecks = configChecks;
    this.probeTimeoutMs = probeTimeoutMs;
    this.allowDegradedReads = allowDegradedReads;
    this.logger = logger.child({ component: "readiness" });
    this.minReprobeIntervalMs = minReprobeIntervalMs;
    this.now = now;
    this.since = now();
    this.checks = [...configChecks];
  }

  get current(): ReadinessState {
    return this.state;
  }

  snapshot(): ReadinessSnapshot {
    return {
      state: this.state,
      checks: this.checks.map((c) => ({ ...c })),
      checkedAt: this.checkedAt === null ? null : new Date(this.checkedAt).toISOString(),
      since: new Date(this.since).toISOString(),
    };
  }

  /** Whether an operation of the given kind may reach the capability right now. */
  admits(isMutating: boolean): boolean {
    if (this.state === "READY") return true;
    return this.state === "DEGRADED" && !isMutating && this.allowDegradedReads;
  }

  /** Re-evaluates every check. Concurrent callers share one run. */
  probe(): Promise<ReadinessSnapshot> {
    if (!this.inflight) {
      this.inflight = this.runProbe().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /**
   * Starts a probe in the background unless one is running or the last one
   * finished less than `minReprobeIntervalMs` ago. Results only show up in the state.
   */
  refresh(): void {
    if (this.inflight) return;
    if (this.checkedAt !== null && this.now() - this.checkedAt < this.minReprobeIntervalMs) return;
    this.background();
  }

  /** Re-probes every `intervalMs`. Returns a function that stops the timer. */
  startPolling(intervalMs: number): () => void {
    const timer = setInterval(() => this.background(), intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  private background(): void {
    this.probe().catch((err: unknown) => this.logger.error({ err }, "readiness probe crashed"));
  }

  private async runProbe(): Promise<ReadinessSnapshot> {
    const checks = [...this.configChecks];
    checks.push(checks.every((c) => c.ok) ? await this.pingCheck() : { name: PING_CHECK, ok: false, detail: "skipped: configuration incomplete" });

    const healthy = checks.every((c) => c.ok);
    const next: ReadinessState = healthy ? "READY" : this.state === "NOT_READY" ? "NOT_READY" : "DEGRADED";
    this.checks = checks;
    this.checkedAt = this.now();
    if (next !== this.state) {
      const failed = checks.filter((c) => !c.ok).map((c) => c.name);
      if (next === "READY") this.logger.info({ from: this.state, to: next }, "readiness changed");
      else this.logger.warn({ from: this.state, to: next, failed }, "readiness changed");
      this.state = next;
      this.since = this.checkedAt;
    }
    return this.snapshot();
  }

  private async pingCheck(): Promise<ReadinessCheck> {
    try {
      await withDeadline(this.probeTimeoutMs, (signal) => this.capability.ping({ signal, requestId: "readiness-probe" }));
      return { name: PING_CHECK, ok: true };
    } catch (err) {
      return { name: PING_CHECK, ok: false, detail: err instanceof Error ? err.message : String(err) };
    }
  }
}

/** The static configuration checks for a gateway config. */
export function configChecks(config: { HMAC_SECRET: string; TRADING_API_KEY?: string; TRADING_ENABLED: boolean }): ReadinessCheck[] {
  return [
    config.HMAC_SECRET ? { name: "config.hmac_secret", ok: true } : { name: "config.hmac_secret", ok: false, detail: "HMAC_SECRET is not configured" },
    config.TRADING_API_KEY ? { name: "config.credentials", ok: true } : { name: "config.credentials", ok: false, detail: "TRADING_API_KEY is not configured" },
    config.TRADING_ENABLED ? { name: "config.trading_enabled", ok: true } : { name: "config.trading_enabled", ok: false, detail: "TRADING_ENABLED is false" },
  ];
}
