export type {
  HitEvent,
  BucketDelta,
  HitBatch,
  BatchingConfig,
  SyncStats,
} from './core';
export type {
  FlushResult,
  ICounterStore,
  NamedRange,
  HitStatName,
  HitStats,
} from './store';
