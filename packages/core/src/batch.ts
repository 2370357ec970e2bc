import type { BucketDelta, HitBatch, HitEvent } from '@hitboard/types';
import { bucketId, bucketOf } from './bucket';

export interface DrainedBatch {
  buckets: HitBatch;
  /** Stream message IDs folded into each bucket, keyed by bucket ID */
  sources: Map<string, string[]>;
}

/**
 * In-memory fold of hit events into per-bucket counts.
 *
 * Example: three hits on "demo" within 00:00-00:01 fold into one bucket of 3.
 * Each bucket remembers the stream messages it was built from, so they can
 * be ACK'd once that bucket, and only that bucket, is persisted.
 */
export class BucketBatch {
  private buckets: HitBatch = new Map();
  private sources = new Map<string, string[]>();
  private count = 0;

  /** Fold one event, optionally tagged with the stream message it came from. */
  add(event: HitEvent, messageId?: string): void {
    const window = bucketOf(event.timestamp ?? Date.now());
    this.fold({ key: event.key, window, count: 1 }, messageId === undefined ? [] : [messageId]);
  }

  /** Put back a drained bucket whose write failed, with its messages. */
  restore(delta: BucketDelta, messageIds: readonly string[]): void {
    this.fold({ key: delta.key, window: bucketOf(delta.window), count: delta.count }, messageIds);
  }

  /** Returns the number of events accumulated. */
  get size(): number {
    return this.count;
  }

  /** Returns the number of distinct buckets. */
  get bucketCount(): number {
    return this.buckets.size;
  }

  /**
   * Drain the batch and return the folded buckets.
   * Resets internal state for the next window.
   */
  drain(): DrainedBatch {
    const drained = { buckets: this.buckets, sources: this.sources };
    this.buckets = new Map();
    this.sources = new Map();
    this.count = 0;
    return drained;
  }

  private fold(delta: BucketDelta, messageIds: readonly string[]): void {
    const id = bucketId(delta.key, delta.window);
    const current = this.buckets.get(id);
    if (current) {
      current.count += delta.count;
    } else {
      this.buckets.set(id, delta);
    }

    if (messageIds.length > 0) {
      const ids = this.sources.get(id) ?? [];
      ids.push(...messageIds);
      this.sources.set(id, ids);
    }
    this.count += delta.count;
  }
}
