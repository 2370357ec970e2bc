export { HitCounter } from './counter';
export type { HitCounterConfig, HitNotice } from './counter';
export { Aggregator, RangeAggregator, DEFAULT_RANGES } from './aggregator';
export { MemoryCounterStore } from './memory-store';
export { HitBridge } from './bridge';
export type { BridgeConfig, StreamConnection } from './bridge';
export { BucketBatch } from './batch';
export type { DrainedBatch } from './batch';
export {
  BUCKET_MS,
  EPOCH,
  bucketOf,
  bucketId,
  startOfDay,
  startOfMonth,
  startOfYear,
} from './bucket';
export {
  MAX_KEY_LENGTH,
  DEFAULT_PARTITIONS,
  assertValidKey,
  isValidKey,
  partitionOf,
} from './keys';
export { InvalidKeyError, StoreUnavailableError } from './errors';

// Re-export types consumers need
export type {
  HitEvent,
  BucketDelta,
  HitBatch,
  BatchingConfig,
  SyncStats,
  FlushResult,
  ICounterStore,
  NamedRange,
  HitStatName,
  HitStats,
} from '@hitboard/types';
