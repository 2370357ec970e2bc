import type { FlushResult, HitBatch, ICounterStore } from '@hitboard/types';
import { EPOCH, bucketOf } from './bucket';
import { assertValidKey } from './keys';

/**
 * Map-backed counter store for tests and single-process use.
 * Map operations run to completion on the event loop, so an increment
 * never interleaves with another.
 */
export class MemoryCounterStore implements ICounterStore {
  private rows = new Map<string, Map<number, number>>();

  async increment(key: string, timestamp: Date = new Date()): Promise<number> {
    assertValidKey(key);
    return this.add(key, bucketOf(timestamp).getTime(), 1);
  }

  async sumRange(key: string, from: Date = EPOCH, to: Date = new Date()): Promise<number> {
    assertValidKey(key);
    const windows = this.rows.get(key);
    if (!windows || from.getTime() >= to.getTime()) return 0;

    let total = 0;
    for (const [window, count] of windows) {
      if (window >= from.getTime() && window < to.getTime()) {
        total += count;
      }
    }
    return total;
  }

  /** All-or-nothing: every key is validated before any bucket changes. */
  async flush(batch: HitBatch): Promise<FlushResult | void> {
    for (const { key } of batch.values()) {
      assertValidKey(key);
    }
    for (const { key, window, count } of batch.values()) {
      this.add(key, bucketOf(window).getTime(), count);
    }
  }

  /** Number of stored buckets for a key. */
  bucketCount(key: string): number {
    return this.rows.get(key)?.size ?? 0;
  }

  private add(key: string, window: number, count: number): number {
    let windows = this.rows.get(key);
    if (!windows) {
      windows = new Map();
      this.rows.set(key, windows);
    }
    const next = (windows.get(window) ?? 0) + count;
    windows.set(window, next);
    return next;
  }
}
