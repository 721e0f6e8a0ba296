export type AdmitResult = { admitted: true } | { admitted: false; reason: "STALE" | "REPLAYED" };

export interface ReplayGuardOptions {
  /** Maximum age of a request timestamp, in ms. */
  windowMs: number;
  /** Maximum amount a timestamp may lie ahead of `now`. Clamped to `windowMs`. */
  futureToleranceMs: number;
  /** Minimum spacing of the full sweeps `admit` runs on its own. */
  sweepIntervalMs?: number;
}

interface ReplayRecord {
  timestamp: number;
  firstSeenAt: number;
  expiresAt: number;
}

/**
 * Freshness window plus a record of signatures admitted inside it.
 * `admit` checks and records in one synchronous step, so two requests carrying
 * the same signature can never both be admitted.
 */
export class ReplayGuard {
  private readonly seen = new Map<string, ReplayRecord>();
  private readonly windowMs: number;
  private readonly futureToleranceMs: number;
  private readonly sweepIntervalMs: number;
  private lastSweepAt = Number.NEGATIVE_INFINITY;

  constructor({ windowMs, futureToleranceMs, sweepIntervalMs = 1_000 }: ReplayGuardOptions) {
    this.windowMs = windowMs;
    this.futureToleranceMs = Math.min(futureToleranceMs, windowMs);
    this.sweepIntervalMs = sweepIntervalMs;
  }

  /** Whether `timestamp` lies inside the window around `now`. */
  isFresh(timestamp: number, now: number): boolean {
    return now - timestamp <= this.windowMs && timestamp - now <= this.futureToleranceMs;
  }

  admit(signature: string, timestamp: number, now: number): AdmitResult {
    if (!this.isFresh(timestamp, now)) return { admitted: false, reason: "STALE" };
    if (now - this.lastSweepAt >= this.sweepIntervalMs) this.sweep(now);

    const key = signature.toLowerCase();
    const existing = this.seen.get(key);
    if (existing && existing.expiresAt > now) return { admitted: false, reason: "REPLAYED" };

    // a future-dated timestamp stays fresh past firstSeenAt + window, so keep the record until the timestamp itself goes stale
    this.seen.set(key, { timestamp, firstSeenAt: now, expiresAt: Math.max(now, timestamp) + this.windowMs });
    return { admitted: true };
  }

  /** Drops every record whose window has passed. Returns how many were removed. */
  sweep(now: number): number {
    this.lastSweepAt = now;
    let removed = 0;
    for (const [key, record] of this.seen) {
      if (record.expiresAt <= now) {
        this.seen.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.seen.size;
  }
}
