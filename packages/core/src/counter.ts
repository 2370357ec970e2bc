import { EventEmitter } from 'events';
import type { HitStats, ICounterStore, NamedRange, HitStatName } from '@hitboard/types';
import { Aggregator } from './aggregator';
import { BUCKET_MS, bucketOf } from './bucket';
import { assertValidKey } from './keys';

export interface HitCounterConfig {
  /** Persistence backend */
  store: ICounterStore;

  /** Ranges reported by `aggregate`. Default: total, today, thisMonth, thisYear */
  ranges?: readonly NamedRange<HitStatName>[];
}

export interface HitNotice {
  key: string;
  window: Date;
  count: number;
}

/**
 * Entry point for the request layer: record hits and read badge stats.
 *
 * Emits `'hit'` with a {@link HitNotice} after every successful increment.
 */
export class HitCounter extends EventEmitter {
  private readonly store: ICounterStore;
  private readonly aggregator: Aggregator;

  constructor(config: HitCounterConfig) {
    super();
    this.store = config.store;
    this.aggregator = new Aggregator(config.store, config.ranges);
  }

  /** Prepare the store (index builds) ahead of the first request. */
  async initialize(): Promise<void> {
    if (this.store.initialize) {
      await this.store.initialize();
    }
  }

  /** Record one hit; resolves the count of the bucket it landed in. */
  async increment(key: string, timestamp: Date = new Date()): Promise<number> {
    assertValidKey(key);
    const count = await this.store.increment(key, timestamp);
    this.emit('hit', { key, window: bucketOf(timestamp), count } satisfies HitNotice);
    return count;
  }

  async aggregate(key: string, now: Date = new Date()): Promise<HitStats> {
    return this.aggregator.aggregate(key, now);
  }

  /**
   * Increment then read, as a badge fetch does. Ranges are anchored at `now`
   * but read through the end of the current bucket, so the hit just
   * recorded is counted even when `now` sits on a minute boundary.
   */
  async hit(key: string, now: Date = new Date()): Promise<HitStats> {
    await this.increment(key, now);
    return this.aggregator.aggregate(key, now, new Date(bucketOf(now).getTime() + BUCKET_MS));
  }
}
