/**
 * A single hit on a key, as carried on the ingestion stream.
 */
export interface HitEvent {
  /** Caller-supplied counter key (e.g. 'github.com/acme/widgets') */
  key: string;

  /** Event timestamp (epoch ms). Defaults to the time it was read. */
  timestamp?: number;
}

/**
 * Hits folded into one (key, minute window) bucket.
 */
export interface BucketDelta {
  key: string;

  /** Start of the minute the hits fall in */
  window: Date;

  /** Number of hits to add to the bucket */
  count: number;
}

/**
 * Folded hits keyed by bucket id (see `bucketId` in core).
 */
export type HitBatch = Map<string, BucketDelta>;

/**
 * Batching and windowing configuration
 */
export interface BatchingConfig {
  /** Maximum time (ms) to wait before flushing. Default: 500 */
  maxWaitMs?: number;

  /** Maximum number of messages to batch before forcing a flush. Default: 1000 */
  maxMessages?: number;
}

/**
 * Sync statistics for monitoring
 */
export interface SyncStats {
  /** Total events processed */
  eventsProcessed: number;

  /** Events dropped as malformed */
  eventsDropped: number;

  /** Total flush operations */
  flushCount: number;

  /** Last flush timestamp */
  lastFlushAt?: Date;

  /** Current pending message count */
  pendingMessages: number;

  /** Average batch size */
  avgBatchSize: number;

  /** Errors encountered */
  errorCount: number;
}
