import Redis from 'ioredis';
import { assertValidKey } from '@hitboard/core';

const DEFAULT_STREAM_KEY = 'hitboard:hits';
const DEFAULT_MAX_LEN = 100_000;

/** The subset of an ioredis client the producer talks to. */
export type StreamProducer = Pick<Redis, 'xadd' | 'quit'>;

export interface HitClientConfig {
  /** Redis connection URL or ioredis instance. */
  redis: string | StreamProducer;
  /** Stream key name. Default: "hitboard:hits". */
  streamKey?: string;
  /** Approximate max stream length for auto-trimming. Default: 100000. Set to 0 to disable. */
  maxStreamLength?: number;
}

/**
 * Lightweight producer for buffered hit ingestion.
 *
 * Usage:
 * ```ts
 * const hits = new HitClient({ redis: 'redis://localhost:6379' });
 * await hits.hit('github.com/acme/widgets');
 * await hits.close();
 * ```
 */
export class HitClient {
  private redis: StreamProducer;
  private streamKey: string;
  private maxStreamLength: number;
  private ownsConnection: boolean;

  constructor(config: HitClientConfig) {
    if (typeof config.redis === 'string') {
      this.redis = new Redis(config.redis);
      this.ownsConnection = true;
    } else {
      this.redis = config.redis;
      this.ownsConnection = false;
    }
    this.streamKey = config.streamKey ?? DEFAULT_STREAM_KEY;
    this.maxStreamLength = config.maxStreamLength ?? DEFAULT_MAX_LEN;
  }

  /**
   * Append one hit for `key`. Rejects invalid keys with InvalidKeyError
   * before anything is written.
   */
  async hit(key: string, timestamp: Date = new Date()): Promise<void> {
    assertValidKey(key);
    const fields: string[] = [
      'key', key,
      'timestamp', String(timestamp.getTime()),
    ];

    if (this.maxStreamLength > 0) {
      // Approximate trimming (~) is O(1) and keeps the stream bounded
      await this.redis.xadd(
        this.streamKey, 'MAXLEN', '~', String(this.maxStreamLength), '*', ...fields
      );
    } else {
      await this.redis.xadd(this.streamKey, '*', ...fields);
    }
  }

  /** Close the Redis connection (only if this client created it). */
  async close(): Promise<void> {
    if (this.ownsConnection) {
      await this.redis.quit();
    }
  }
}
