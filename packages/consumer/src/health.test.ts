import { describe, it, expect, vi } from 'vitest';
import type { SyncStats } from '@hitboard/core';
import { healthResponse } from './health';

const stats: SyncStats = {
  eventsProcessed: 12,
  eventsDropped: 1,
  flushCount: 3,
  pendingMessages: 0,
  avgBatchSize: 4,
  errorCount: 0,
};

const bridge = { getStats: vi.fn(() => stats) };

describe('healthResponse', () => {
  it('should report ok with stats when the store is ready', () => {
    const response = healthResponse('/healthz', { bridge, storeReady: () => true }, 1_000, 61_500);

    expect(response).toEqual({
      statusCode: 200,
      body: { status: 'ok', uptime: 60, store: 'up', stats },
    });
  });

  it('should answer on /health as well', () => {
    expect(healthResponse('/health', { bridge, storeReady: () => true }, 0, 0).statusCode).toBe(200);
  });

  it('should report degraded with 503 when the store is down', () => {
    const response = healthResponse('/healthz', { bridge, storeReady: () => false }, 0, 2_000);

    expect(response.statusCode).toBe(503);
    expect(response.body).toMatchObject({ status: 'degraded', store: 'down', uptime: 2 });
  });

  it('should return 404 for other paths', () => {
    expect(healthResponse('/metrics', { bridge, storeReady: () => true }, 0)).toEqual({ statusCode: 404 });
    expect(healthResponse(undefined, { bridge, storeReady: () => true }, 0)).toEqual({ statusCode: 404 });
  });
});
