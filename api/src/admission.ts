import { KeyedMutex } from './keyedMutex.js';
import { MemoryBucketStore, type BucketStore } from './store.js';

const MINUTE_MS = 60_000;

export type AdmissionOptions = {
  store?: BucketStore;
  windowMs?: number;
  now?: () => number;
};

/**
 * Fixed-window request counter per client key.
 *
 * A window starts with the client's first request and lasts `windowMs`; once more than
 * `windowMs` has passed the counter starts again from zero. Up to `limit` requests are
 * admitted per window, with no smoothing inside it.
 */
export class AdmissionTracker {
  private readonly store: BucketStore;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly locks = new KeyedMutex();

  constructor(opts: AdmissionOptions = {}) {
    this.store = opts.store ?? new MemoryBucketStore();
    this.windowMs = opts.windowMs ?? MINUTE_MS;
    this.now = opts.now ?? Date.now;
  }

  admit(clientKey: string, limit: number): Promise<boolean> {
    return this.locks.run(clientKey, () => {
      const now = this.now();
      let bucket = this.store.get(clientKey) ?? { count: 0, windowStart: now };
      if (now - bucket.windowStart > this.windowMs) {
        bucket = { count: 0, windowStart: now };
      }

      if (bucket.count >= limit) {
        this.store.set(clientKey, bucket);
        return false;
      }

      this.store.set(clientKey, { count: bucket.count + 1, windowStart: bucket.windowStart });
      return true;
    });
  }

  /** Milliseconds until the client's current window closes, or 0 when it has no open window. */
  retryAfterMs(clientKey: string): number {
    const bucket = this.store.get(clientKey);
    if (!bucket) return 0;
    return Math.max(0, bucket.windowStart + this.windowMs - this.now());
  }

  // Expired buckets would be reset on next use anyway, so dropping them changes no decision.
  async prune(): Promise<number> {
    const now = this.now();
    const stale: string[] = [];
    for (const [key, bucket] of this.store.entries()) {
      if (now - bucket.windowStart > this.windowMs) stale.push(key);
    }
    let removed = 0;
    for (const key of stale) {
      await this.locks.run(key, () => {
        const bucket = this.store.get(key);
        if (bucket && this.now() - bucket.windowStart > this.windowMs) {
          this.store.delete(key);
          removed += 1;
        }
      });
    }
    return removed;
  }
}
