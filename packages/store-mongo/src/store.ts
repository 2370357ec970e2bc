import mongoose, { Model } from 'mongoose';
import { EPOCH, DEFAULT_PARTITIONS, assertValidKey, bucketOf, partitionOf } from '@hitboard/core';
import type { BucketDelta, FlushResult, HitBatch, ICounterStore } from '@hitboard/core';
import { getCounterModel } from './schema';
import type { ICounterRow } from './schema';
import { failedWriteIndexes, isDuplicateKeyError, toStoreError } from './errors';

export interface MongoCounterStoreConfig {
  /** Existing Mongoose connection. If omitted, uses the default connection. */
  connection?: mongoose.Connection;
  /** Base name of the partition collections. Default: "counters". */
  collectionName?: string;
  /** Number of hash partitions, fixed per deployment. Default: 128. */
  partitions?: number;
}

/**
 * MongoDB counter store.
 *
 * Rows are spread over `partitions` collections (`counters_p0` ...) by a
 * hash of the key, so a key's buckets always live in one collection and
 * hot keys only contend with keys in the same partition.
 */
export class MongoCounterStore implements ICounterStore {
  private readonly connection?: mongoose.Connection;
  private readonly collectionName: string;
  private readonly partitions: number;
  private models = new Map<number, Model<ICounterRow>>();
  private indexed = new Map<number, Promise<void>>();

  constructor(config: MongoCounterStoreConfig = {}) {
    this.connection = config.connection;
    this.collectionName = config.collectionName ?? 'counters';
    this.partitions = config.partitions ?? DEFAULT_PARTITIONS;

    if (!Number.isInteger(this.partitions) || this.partitions < 1) {
      throw new RangeError(`Partition count must be a positive integer, got ${this.partitions}`);
    }
  }

  /** Collection holding the buckets of `key`. */
  collectionFor(key: string): string {
    return this.partitionCollection(partitionOf(key, this.partitions));
  }

  /**
   * Upsert-increment the bucket. The unique (key, window) index makes the
   * create-or-increment atomic; a concurrent first insert that loses the
   * race surfaces as E11000 and is retried as a plain increment.
   * The partition's index is built before its first write.
   */
  async increment(key: string, timestamp: Date = new Date()): Promise<number> {
    assertValidKey(key);
    const window = bucketOf(timestamp);
    const partition = partitionOf(key, this.partitions);

    let model: Model<ICounterRow>;
    try {
      model = await this.indexedModel(partition);
    } catch (err) {
      throw toStoreError('increment', err);
    }

    try {
      return await this.incrementRow(model, key, window, true);
    } catch (err) {
      if (!isDuplicateKeyError(err)) throw toStoreError('increment', err);
    }

    try {
      return await this.incrementRow(model, key, window, false);
    } catch (err) {
      throw toStoreError('increment', err);
    }
  }

  async sumRange(key: string, from: Date = EPOCH, to: Date = new Date()): Promise<number> {
    assertValidKey(key);
    if (from.getTime() >= to.getTime()) return 0;

    try {
      const [row] = await this.model(partitionOf(key, this.partitions)).aggregate<{ total: number }>([
        { $match: { key, window: { $gte: from, $lt: to } } },
        { $group: { _id: null, total: { $sum: '$count' } } },
      ]);
      return row?.total ?? 0;
    } catch (err) {
      throw toStoreError('sumRange', err);
    }
  }

  /**
   * Apply folded buckets with one unordered bulkWrite per partition.
   *
   * Returns the buckets whose writes failed when only some did; throws
   * when nothing was written.
   */
  async flush(batch: HitBatch): Promise<FlushResult | void> {
    if (batch.size === 0) return;

    const byPartition = new Map<number, [string, BucketDelta][]>();
    for (const [id, delta] of batch) {
      assertValidKey(delta.key);
      const partition = partitionOf(delta.key, this.partitions);
      const entries = byPartition.get(partition) ?? [];
      entries.push([id, delta]);
      byPartition.set(partition, entries);
    }

    const failed: HitBatch = new Map();
    let lastError: unknown;

    await Promise.all(
      Array.from(byPartition, async ([partition, entries]) => {
        const ops = entries.map(([, { key, window, count }]) => ({
          updateOne: {
            filter: { key, window: bucketOf(window) },
            update: { $inc: { count } },
            upsert: true,
          },
        }));

        try {
          const model = await this.indexedModel(partition);
          await model.bulkWrite(ops, { ordered: false });
        } catch (err) {
          lastError = err;
          // Unknown error shape: treat the whole partition as failed
          const failedIndexes = failedWriteIndexes(err);
          entries.forEach(([id, delta], index) => {
            if (!failedIndexes || failedIndexes.has(index)) {
              failed.set(id, delta);
            }
          });
        }
      })
    );

    if (failed.size === 0) return;
    if (failed.size === batch.size) throw toStoreError('flush', lastError);
    return { failed };
  }

  /** Create the unique bucket index on every partition collection up front. */
  async initialize(): Promise<void> {
    try {
      await Promise.all(Array.from({ length: this.partitions }, (_, partition) => this.indexedModel(partition)));
    } catch (err) {
      throw toStoreError('initialize', err);
    }
  }

  private async incrementRow(
    model: Model<ICounterRow>,
    key: string,
    window: Date,
    upsert: boolean
  ): Promise<number> {
    const row = await model
      .findOneAndUpdate({ key, window }, { $inc: { count: 1 } }, { upsert, new: true })
      .lean();
    if (!row) {
      throw new Error(`Counter row ${key}@${window.toISOString()} vanished during increment`);
    }
    return row.count;
  }

  /** The partition's model once its unique index exists. A failed build is retried on next use. */
  private async indexedModel(partition: number): Promise<Model<ICounterRow>> {
    const model = this.model(partition);
    let ready = this.indexed.get(partition);
    if (!ready) {
      ready = model.ensureIndexes().catch((err: unknown) => {
        this.indexed.delete(partition);
        throw err;
      });
      this.indexed.set(partition, ready);
    }
    await ready;
    return model;
  }

  private model(partition: number): Model<ICounterRow> {
    let model = this.models.get(partition);
    if (!model) {
      model = getCounterModel(this.connection, this.partitionCollection(partition));
      this.models.set(partition, model);
    }
    return model;
  }

  private partitionCollection(partition: number): string {
    return `${this.collectionName}_p${partition}`;
  }
}
