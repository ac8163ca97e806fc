import { describe, expect, it } from 'vitest';
import { AdmissionTracker } from '../src/admission.js';
import { MemoryBucketStore } from '../src/store.js';
import { Clock } from './helpers.js';

describe('AdmissionTracker', () => {
  it('admits up to the limit and rejects the next request in the same window', async () => {
    const clock = new Clock();
    const tracker = new AdmissionTracker({ now: clock.now });

    const results: boolean[] = [];
    for (let i = 0; i < 6; i++) results.push(await tracker.admit('10.0.0.1', 5));

    expect(results).toEqual([true, true, true, true, true, false]);
  });

  it('limits each client key independently', async () => {
    const clock = new Clock();
    const tracker = new AdmissionTracker({ now: clock.now });

    expect(await tracker.admit('a', 1)).toBe(true);
    expect(await tracker.admit('a', 1)).toBe(false);
    expect(await tracker.admit('b', 1)).toBe(true);
  });

  it('admits again once the window has elapsed, without carrying the old count over', async () => {
    const clock = new Clock();
    const tracker = new AdmissionTracker({ now: clock.now });

    // limit 3/min: three requests within 5 seconds
    expect(await tracker.admit('A', 3)).toBe(true);
    clock.advance(2_000);
    expect(await tracker.admit('A', 3)).toBe(true);
    clock.advance(3_000);
    expect(await tracker.admit('A', 3)).toBe(true);

    // 4th request 5 seconds later
    clock.advance(5_000);
    expect(await tracker.admit('A', 3)).toBe(false);

    // 61 seconds after the first request
    clock.advance(51_000);
    expect(await tracker.admit('A', 3)).toBe(true);
    expect(await tracker.admit('A', 3)).toBe(true);
    expect(await tracker.admit('A', 3)).toBe(true);
    expect(await tracker.admit('A', 3)).toBe(false);
  });

  it('does not reset exactly at the window boundary', async () => {
    const clock = new Clock();
    const tracker = new AdmissionTracker({ now: clock.now });

    expect(await tracker.admit('A', 1)).toBe(true);
    clock.advance(60_000);
    expect(await tracker.admit('A', 1)).toBe(false);
    clock.advance(1);
    expect(await tracker.admit('A', 1)).toBe(true);
  });

  it('counts concurrent requests from one client without lost updates', async () => {
    const clock = new Clock();
    const store = new MemoryBucketStore();
    const tracker = new AdmissionTracker({ now: clock.now, store });

    const results = await Promise.all(Array.from({ length: 20 }, () => tracker.admit('burst', 7)));

    expect(results.filter(Boolean)).toHaveLength(7);
    expect(store.get('burst')).toEqual({ count: 7, windowStart: clock.current });
  });

  it('reports time remaining in the window', async () => {
    const clock = new Clock();
    const tracker = new AdmissionTracker({ now: clock.now });

    expect(tracker.retryAfterMs('A')).toBe(0);
    await tracker.admit('A', 1);
    clock.advance(15_000);
    expect(tracker.retryAfterMs('A')).toBe(45_000);
  });

  it('prunes only buckets whose window has elapsed', async () => {
    const clock = new Clock();
    const store = new MemoryBucketStore();
    const tracker = new AdmissionTracker({ now: clock.now, store });

    await tracker.admit('old', 5);
    clock.advance(30_000);
    await tracker.admit('fresh', 5);
    clock.advance(31_000);

    expect(await tracker.prune()).toBe(1);
    expect(store.get('old')).toBeUndefined();
    expect(store.get('fresh')).toEqual({ count: 1, windowStart: clock.current - 31_000 });
  });
});
