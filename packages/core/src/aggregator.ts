import type { HitStatName, HitStats, ICounterStore, NamedRange } from '@hitboard/types';
import { EPOCH, startOfDay, startOfMonth, startOfYear } from './bucket';
import { assertValidKey } from './keys';

export const DEFAULT_RANGES: readonly NamedRange<HitStatName>[] = [
  { name: 'total', start: () => EPOCH },
  { name: 'today', start: startOfDay },
  { name: 'thisMonth', start: startOfMonth },
  { name: 'thisYear', start: startOfYear },
];

/**
 * Sums store buckets over a configured set of named ranges.
 *
 * Every range is its own `sumRange` query over `[start(now), now)`, so
 * adding or removing a range never changes the others.
 */
export class RangeAggregator<N extends string> {
  constructor(
    protected readonly store: ICounterStore,
    protected readonly ranges: readonly NamedRange<N>[]
  ) {}

  /**
   * @param now - Anchors each range's start
   * @param end - Exclusive upper bound of every range. Default: `now`
   */
  async sums(key: string, now: Date = new Date(), end: Date = now): Promise<Map<N, number>> {
    assertValidKey(key);
    const entries = await Promise.all(
      this.ranges.map(async (range) => [range.name, await this.store.sumRange(key, range.start(now), end)] as const)
    );
    return new Map(entries);
  }
}

/**
 * Badge statistics: all-time total plus today, this month and this year (UTC).
 */
export class Aggregator extends RangeAggregator<HitStatName> {
  constructor(store: ICounterStore, ranges: readonly NamedRange<HitStatName>[] = DEFAULT_RANGES) {
    super(store, ranges);
  }

  async aggregate(key: string, now: Date = new Date(), end: Date = now): Promise<HitStats> {
    const sums = await this.sums(key, now, end);
    return {
      total: sums.get('total') ?? 0,
      today: sums.get('today') ?? 0,
      thisMonth: sums.get('thisMonth') ?? 0,
      thisYear: sums.get('thisYear') ?? 0,
    };
  }
}
