import type { JsonObject } from "./capability";

type Entry = { createdAt: number; result: Promise<JsonObject>; settled: boolean };

/**
 * Results of keyed mutations. A repeated key gets the stored result, or joins
 * the call still in flight. Failed calls are forgotten so the caller can retry,
 * unless `retainFailure` says the failure left the outcome unknown; that failure
 * is then replayed for the TTL like a result.
 */
export class IdempotencyCache {
  private readonly entries = new Map<string, Entry>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Runs `task` unless `key` already has a live entry. `hit` tells which happened. */
  run(key: string, task: () => Promise<JsonObject>, retainFailure: (err: unknown) => boolean = () => false): { hit: boolean; result: Promise<JsonObject> } {
    this.purge();
    const existing = this.entries.get(key);
    if (existing) return { hit: true, result: existing.result };

    const entry: Entry = { createdAt: this.now(), result: task(), settled: false };
    this.entries.set(key, entry);
    entry.result.then(
      () => {
        entry.settled = true;
      },
      (err: unknown) => {
        if (retainFailure(err)) entry.settled = true;
        else if (this.entries.get(key) === entry) this.entries.delete(key);
      },
    );
    return { hit: false, result: entry.result };
  }

  private purge(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.settled && now - entry.createdAt > this.ttlMs) this.entries.delete(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
