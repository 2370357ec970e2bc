import Redis from 'ioredis';
import { EventEmitter } from 'events';
import type { BatchingConfig, HitBatch, HitEvent, ICounterStore, SyncStats } from '@hitboard/types';
import { BucketBatch } from './batch';
import { isValidKey } from './keys';

const DEFAULTS = {
  STREAM_KEY: 'hitboard:hits',
  GROUP_NAME: 'hitboard-group',
  WINDOW_MS: 500,
  MAX_BATCH_SIZE: 1000,
  CLAIM_IDLE_MS: 60_000,
};

/** The subset of an ioredis client the bridge talks to. */
export type StreamConnection = Pick<Redis, 'xgroup' | 'xreadgroup' | 'xautoclaim' | 'xack' | 'quit'>;

/**
 * Configuration for the HitBridge stream consumer
 */
export interface BridgeConfig {
  /** Redis connection URL string or an ioredis client instance */
  redis: string | StreamConnection;

  /** Counter store the folded buckets are flushed to */
  store: ICounterStore;

  /** Redis Stream key name. Default: "hitboard:hits" */
  streamKey?: string;

  /** Consumer group name. Default: "hitboard-group" */
  consumerGroup?: string;

  /** Unique consumer ID within the group. Default: auto-generated */
  consumerId?: string;

  /**
   * Entries pending on other consumers for at least this long are claimed
   * on start, so a crashed consumer's hits are replayed under a new ID.
   * Default: 60000. 0 disables claiming.
   */
  claimIdleMs?: number;

  /** Flush trigger options */
  batching?: BatchingConfig;
}

type StreamMessage = [id: string, fields: string[]];

/**
 * Buffered hit ingestion.
 *
 * Reads hit events from a Redis Stream using Consumer Groups, folds them
 * into per-minute buckets, and flushes the buckets to the counter store.
 *
 * Guarantees at-least-once delivery: messages are only ACK'd after the
 * store accepted them. A redelivered message counts again.
 */
export class HitBridge extends EventEmitter {
  private redis: StreamConnection;
  private store: ICounterStore;
  private batch: BucketBatch;
  private running = false;
  private flushing: Promise<void> | null = null;
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private pendingIds: string[] = [];

  private readonly streamKey: string;
  private readonly groupName: string;
  private readonly consumerName: string;
  private readonly windowMs: number;
  private readonly maxBatchSize: number;
  private readonly claimIdleMs: number;

  private stats: SyncStats = {
    eventsProcessed: 0,
    eventsDropped: 0,
    flushCount: 0,
    lastFlushAt: undefined,
    pendingMessages: 0,
    avgBatchSize: 0,
    errorCount: 0,
  };

  constructor(config: BridgeConfig) {
    super();
    this.redis = typeof config.redis === 'string' ? new Redis(config.redis) : config.redis;
    this.store = config.store;
    this.batch = new BucketBatch();

    this.streamKey = config.streamKey ?? DEFAULTS.STREAM_KEY;
    this.groupName = config.consumerGroup ?? DEFAULTS.GROUP_NAME;
    this.consumerName = config.consumerId ?? `consumer-${process.pid}-${Date.now()}`;
    this.windowMs = config.batching?.maxWaitMs ?? DEFAULTS.WINDOW_MS;
    this.maxBatchSize = config.batching?.maxMessages ?? DEFAULTS.MAX_BATCH_SIZE;
    this.claimIdleMs = config.claimIdleMs ?? DEFAULTS.CLAIM_IDLE_MS;
  }

  /** Start consuming from the Redis Stream. */
  async start(): Promise<void> {
    if (this.running) return;

    if (this.store.initialize) {
      await this.store.initialize();
    }

    // MKSTREAM creates the stream if needed
    try {
      await this.redis.xgroup('CREATE', this.streamKey, this.groupName, '0', 'MKSTREAM');
    } catch (err) {
      if (!(err instanceof Error && err.message.includes('BUSYGROUP'))) throw err;
    }

    this.running = true;
    this.emit('started');

    // Replay anything a previous run read but never ACK'd
    await this.recoverPending();

    void this.readLoop();
    this.scheduleFlush();
  }

  /** Gracefully stop the consumer. */
  async stop(): Promise<void> {
    this.running = false;

    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }

    if (this.flushing) {
      await this.flushing;
    }

    // Final flush of any remaining data
    await this.flush();

    if (this.store.close) {
      await this.store.close();
    }

    await this.redis.quit();
    this.emit('stopped');
  }

  /** Get current sync statistics. */
  getStats(): Readonly<SyncStats> {
    return { ...this.stats, pendingMessages: this.batch.size };
  }

  // ─── Internal ────────────────────────────────────────────────────────────

  /**
   * Claim idle entries left by other consumers, then page through this
   * consumer's Pending Entries List from ID '0' and flush each page before
   * switching to '>' for new messages.
   */
  private async recoverPending(): Promise<void> {
    try {
      const claimedCount = await this.claimIdle();

      let cursor = '0';
      let messageCount = 0;
      for (;;) {
        const reply = await this.redis.xreadgroup(
          'GROUP', this.groupName, this.consumerName,
          'COUNT', this.maxBatchSize,
          'STREAMS', this.streamKey, cursor
        );

        const messages = readMessages(reply);
        if (messages.length === 0) break;

        this.ingest(messages);
        messageCount += messages.length;
        cursor = messages[messages.length - 1][0];
        await this.flush();

        // A short page means the PEL is exhausted
        if (messages.length < this.maxBatchSize) break;
      }

      if (messageCount > 0 || claimedCount > 0) {
        this.emit('recovery', { messageCount, claimedCount });
      }
    } catch (err) {
      this.reportError(err);
    }
  }

  /** XAUTOCLAIM idle entries into this consumer's PEL. Returns how many. */
  private async claimIdle(): Promise<number> {
    if (this.claimIdleMs <= 0) return 0;

    let cursor = '0-0';
    let claimed = 0;
    do {
      const reply = await this.redis.xautoclaim(
        this.streamKey, this.groupName, this.consumerName,
        this.claimIdleMs, cursor,
        'COUNT', this.maxBatchSize,
        'JUSTID'
      );
      if (!Array.isArray(reply) || typeof reply[0] !== 'string') break;

      cursor = reply[0];
      if (Array.isArray(reply[1])) claimed += reply[1].length;
    } while (cursor !== '0-0');

    return claimed;
  }

  private async readLoop(): Promise<void> {
    while (this.running) {
      try {
        const reply = await this.redis.xreadgroup(
          'GROUP', this.groupName, this.consumerName,
          'COUNT', this.maxBatchSize,
          'BLOCK', this.windowMs,
          'STREAMS', this.streamKey, '>'
        );

        this.ingest(readMessages(reply));

        if (this.batch.size >= this.maxBatchSize) {
          await this.flush();
        }
      } catch (err) {
        if (!this.running) break;
        this.reportError(err);
        await this.sleep(1000);
      }
    }
  }

  private ingest(messages: StreamMessage[]): void {
    for (const [id, fields] of messages) {
      const event = this.parseEvent(fields);
      if (event) {
        this.batch.add(event, id);
        this.stats.eventsProcessed++;
      } else {
        // Malformed entries are still ACK'd so they leave the PEL
        this.pendingIds.push(id);
        this.stats.eventsDropped++;
      }
    }
  }

  private scheduleFlush(): void {
    if (!this.running) return;

    this.flushTimer = setTimeout(() => {
      void this.flush().finally(() => this.scheduleFlush());
    }, this.windowMs);
  }

  /**
   * Flush folded buckets to the store, then ACK the messages.
   * Uses a mutex to prevent concurrent flushes from the timer and readLoop.
   */
  private async flush(): Promise<void> {
    if (this.flushing) {
      await this.flushing;
      return;
    }

    if (this.batch.size === 0 && this.pendingIds.length === 0) return;

    this.flushing = this.doFlush();
    try {
      await this.flushing;
    } finally {
      this.flushing = null;
    }
  }

  private async doFlush(): Promise<void> {
    const { buckets, sources } = this.batch.drain();
    // Dropped entries: not bound to any bucket
    const idsToAck = this.pendingIds.splice(0);

    if (buckets.size > 0) {
      let failed: HitBatch;
      try {
        const result = await this.store.flush(buckets);
        failed = result?.failed ?? new Map();
      } catch (err) {
        this.reportError(err);

        // Total failure: keep everything for retry. IDs stay un-ACK'd
        // so Redis redelivers them on restart.
        for (const [id, delta] of buckets) {
          this.batch.restore(delta, sources.get(id) ?? []);
        }
        this.pendingIds.unshift(...idsToAck);
        return;
      }

      // A message is ACK'd only once the bucket it fed is persisted
      for (const [id, delta] of buckets) {
        const ids = sources.get(id) ?? [];
        const retry = failed.get(id);
        if (retry) {
          this.batch.restore(retry, ids);
        } else {
          idsToAck.push(...ids);
        }
      }

      if (failed.size > 0) {
        this.emit('warn', {
          message: 'Partial flush failure',
          failedBuckets: failed.size,
          totalBuckets: buckets.size,
        });
      }
    }

    if (idsToAck.length > 0) {
      try {
        await this.redis.xack(this.streamKey, this.groupName, ...idsToAck);
      } catch (err) {
        // Persisted but not ACK'd: a restart replays these, counting them twice
        this.reportError(err);
      }
    }

    this.stats.flushCount++;
    this.stats.lastFlushAt = new Date();
    this.stats.avgBatchSize = Math.round(
      (this.stats.avgBatchSize * (this.stats.flushCount - 1) + buckets.size) / this.stats.flushCount
    );
    this.emit('flush', { bucketCount: buckets.size, flushNumber: this.stats.flushCount });
  }

  /** Count the error and emit it; EventEmitter throws on an unheard 'error'. */
  private reportError(err: unknown): void {
    this.stats.errorCount++;
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    } else {
      this.emit('warn', { message: 'Bridge error', error: err });
    }
  }

  /**
   * Parse a Redis Stream field array into a HitEvent.
   */
  private parseEvent(fields: string[]): HitEvent | null {
    let key: string | undefined;
    let timestamp: string | undefined;

    for (let i = 0; i < fields.length; i += 2) {
      switch (fields[i]) {
        case 'key': key = fields[i + 1]; break;
        case 'timestamp': timestamp = fields[i + 1]; break;
      }
    }

    if (!isValidKey(key)) {
      this.emit('warn', { message: 'Dropped malformed event', fields });
      return null;
    }

    const ts = timestamp === undefined ? Date.now() : Number(timestamp);
    if (!Number.isFinite(ts)) {
      this.emit('warn', { message: 'Dropped event with invalid timestamp', key, timestamp });
      return null;
    }

    return { key, timestamp: ts };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/** Flatten an XREADGROUP reply into `[id, fields]` pairs. */
function readMessages(reply: unknown): StreamMessage[] {
  if (!Array.isArray(reply)) return [];

  const messages: StreamMessage[] = [];
  for (const stream of reply) {
    if (!Array.isArray(stream) || !Array.isArray(stream[1])) continue;
    for (const entry of stream[1]) {
      if (!Array.isArray(entry) || typeof entry[0] !== 'string') continue;
      // Trimmed entries still listed in the PEL come back with null fields
      messages.push([entry[0], Array.isArray(entry[1]) ? entry[1].map(String) : []]);
    }
  }
  return messages;
}
