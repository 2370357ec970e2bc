import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ICounterStore } from '@hitboard/types';
import { Aggregator, RangeAggregator, DEFAULT_RANGES } from './aggregator';
import { MemoryCounterStore } from './memory-store';
import { EPOCH } from './bucket';
import { InvalidKeyError } from './errors';

const at = (iso: string) => new Date(iso);

describe('Aggregator', () => {
  let store: MemoryCounterStore;
  let aggregator: Aggregator;

  beforeEach(() => {
    store = new MemoryCounterStore();
    aggregator = new Aggregator(store);
  });

  it('should report zeros for a key with no hits', async () => {
    expect(await aggregator.aggregate('fresh', at('2025-03-01T00:00:00Z'))).toEqual({
      total: 0,
      today: 0,
      thisMonth: 0,
      thisYear: 0,
    });
  });

  it('should count January and February hits in the year but not in March', async () => {
    await store.increment('demo', at('2025-01-15T10:00:00Z'));
    await store.increment('demo', at('2025-02-10T10:00:00Z'));

    const stats = await aggregator.aggregate('demo', at('2025-03-01T00:00:00Z'));
    expect(stats.total).toBe(2);
    expect(stats.thisYear).toBe(2);
    expect(stats.thisMonth).toBe(0);
    expect(stats.today).toBe(0);
  });

  it('should split hits across day, month, year and total', async () => {
    await store.increment('repo', at('2024-12-31T23:59:00Z'));
    await store.increment('repo', at('2025-01-03T09:00:00Z'));
    await store.increment('repo', at('2025-05-02T12:00:00Z'));
    await store.increment('repo', at('2025-05-20T00:00:10Z'));
    await store.increment('repo', at('2025-05-20T07:30:00Z'));

    expect(await aggregator.aggregate('repo', at('2025-05-20T08:00:00Z'))).toEqual({
      total: 5,
      today: 2,
      thisMonth: 3,
      thisYear: 4,
    });
  });

  it('should exclude the bucket that starts exactly at now', async () => {
    await store.increment('edge', at('2025-05-20T08:00:00Z'));

    const atBoundary = await aggregator.aggregate('edge', at('2025-05-20T08:00:00Z'));
    expect(atBoundary.total).toBe(0);

    const later = await aggregator.aggregate('edge', at('2025-05-20T08:00:01Z'));
    expect(later.total).toBe(1);
  });

  it('should read up to an explicit end bound', async () => {
    await store.increment('edge', at('2025-05-20T08:00:00Z'));

    const stats = await aggregator.aggregate('edge', at('2025-05-20T08:00:00Z'), at('2025-05-20T08:01:00Z'));
    expect(stats.today).toBe(1);
  });

  it('should agree with sumRange from the epoch', async () => {
    await store.increment('demo', at('2023-07-04T00:00:00Z'));
    await store.increment('demo', at('2025-01-01T00:00:00Z'));
    const now = at('2025-06-01T00:00:00Z');

    const stats = await aggregator.aggregate('demo', now);
    expect(stats.total).toBe(await store.sumRange('demo', EPOCH, now));
  });

  it('should return identical results when read twice', async () => {
    await store.increment('demo', at('2025-01-01T00:00:00Z'));
    const now = at('2025-01-02T00:00:00Z');

    const first = await aggregator.aggregate('demo', now);
    const second = await aggregator.aggregate('demo', now);
    expect(second).toEqual(first);
  });

  it('should issue one sumRange per range', async () => {
    const sumRange = vi.fn().mockResolvedValue(0);
    const mockStore: ICounterStore = {
      increment: vi.fn(),
      sumRange,
      flush: vi.fn(),
    };
    const now = at('2025-05-20T08:00:00Z');

    await new Aggregator(mockStore).aggregate('demo', now);

    expect(sumRange).toHaveBeenCalledTimes(DEFAULT_RANGES.length);
    expect(sumRange).toHaveBeenCalledWith('demo', EPOCH, now);
    expect(sumRange).toHaveBeenCalledWith('demo', at('2025-05-20T00:00:00Z'), now);
    expect(sumRange).toHaveBeenCalledWith('demo', at('2025-05-01T00:00:00Z'), now);
    expect(sumRange).toHaveBeenCalledWith('demo', at('2025-01-01T00:00:00Z'), now);
  });

  it('should report 0 for stats left out of a custom range set', async () => {
    await store.increment('demo', at('2025-05-20T07:00:00Z'));
    const totalsOnly = new Aggregator(store, [{ name: 'total', start: () => EPOCH }]);

    expect(await totalsOnly.aggregate('demo', at('2025-05-20T08:00:00Z'))).toEqual({
      total: 1,
      today: 0,
      thisMonth: 0,
      thisYear: 0,
    });
  });

  it('should reject an invalid key before querying', async () => {
    const sumRange = vi.fn();
    const mockStore: ICounterStore = { increment: vi.fn(), sumRange, flush: vi.fn() };

    await expect(new Aggregator(mockStore).aggregate('')).rejects.toThrow(InvalidKeyError);
    expect(sumRange).not.toHaveBeenCalled();
  });

  it('should propagate store failures', async () => {
    const mockStore: ICounterStore = {
      increment: vi.fn(),
      sumRange: vi.fn().mockRejectedValue(new Error('store down')),
      flush: vi.fn(),
    };

    await expect(new Aggregator(mockStore).aggregate('demo')).rejects.toThrow('store down');
  });
});

describe('RangeAggregator', () => {
  it('should sum arbitrary named ranges', async () => {
    const store = new MemoryCounterStore();
    await store.increment('page', at('2025-05-20T07:58:00Z'));
    await store.increment('page', at('2025-05-20T07:30:00Z'));

    const lastFiveMinutes = new RangeAggregator(store, [
      { name: 'recent', start: (now: Date) => new Date(now.getTime() - 5 * 60_000) },
    ]);

    const sums = await lastFiveMinutes.sums('page', at('2025-05-20T08:00:00Z'));
    expect(sums.get('recent')).toBe(1);
  });
});
