import type { HitBatch } from './core';

/**
 * Result of a flush operation. Stores that can detect partial failures
 * should return the failed buckets so the caller retries only those.
 */
export interface FlushResult {
  /** Buckets that failed to persist, with their original counts. */
  failed?: HitBatch;
}

/**
 * Durable `(key, window) -> count` table.
 * All store implementations must conform to this interface.
 */
export interface ICounterStore {
  /**
   * Record one hit for `key` in the minute bucket containing `timestamp`.
   * Creates the bucket with a count of 1 or increments it atomically.
   *
   * @param timestamp - Defaults to now
   * @returns The bucket's count after the increment
   * @throws InvalidKeyError before any storage access when the key is malformed
   * @throws StoreUnavailableError when the backing store cannot be reached
   */
  increment(key: string, timestamp?: Date): Promise<number>;

  /**
   * Sum the counts of all buckets for `key` whose window lies in `[from, to)`.
   * Returns 0 when nothing matches.
   *
   * @param from - Defaults to the Unix epoch
   * @param to - Defaults to now
   */
  sumRange(key: string, from?: Date, to?: Date): Promise<number>;

  /**
   * Apply a batch of pre-folded bucket counts.
   *
   * Returns void on full success. Optionally returns a FlushResult
   * with a `failed` map for partial failures.
   */
  flush(batch: HitBatch): Promise<FlushResult | void>;

  /**
   * Optional: Initialize store resources (indexes, schemas, etc.)
   */
  initialize?(): Promise<void>;

  /**
   * Optional: Clean up resources on shutdown
   */
  close?(): Promise<void>;
}

/**
 * A named statistic computed as the sum over `[start(now), now)`.
 */
export interface NamedRange<N extends string = string> {
  name: N;
  start(now: Date): Date;
}

export type HitStatName = 'total' | 'today' | 'thisMonth' | 'thisYear';

/** Counts a badge renders for a key. */
export type HitStats = Record<HitStatName, number>;
