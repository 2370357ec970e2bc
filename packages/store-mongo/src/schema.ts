import mongoose, { Schema, Model } from 'mongoose';

/** One `(key, window) -> count` bucket. */
export interface ICounterRow {
  key: string;
  window: Date;
  count: number;
}

const counterRowSchema = new Schema<ICounterRow>(
  {
    key: { type: String, required: true },
    window: { type: Date, required: true },
    count: { type: Number, required: true, default: 0, min: 0 },
  },
  {
    collection: 'counters',
    versionKey: false,
    // Partition collections and their indexes are created by
    // MongoCounterStore.initialize(), not on model compile
    autoIndex: false,
    autoCreate: false,
  }
);

// At most one row per key and minute; also serves the per-key range scans
counterRowSchema.index({ key: 1, window: 1 }, { unique: true });

/**
 * Model bound to one partition collection. Models are registered once
 * per connection and reused.
 */
export function getCounterModel(
  connection: mongoose.Connection | undefined,
  collectionName: string
): Model<ICounterRow> {
  const conn = connection ?? mongoose.connection;
  const modelName = `CounterRow_${collectionName}`;

  const existing: Model<ICounterRow> | undefined = conn.models[modelName];
  if (existing) return existing;

  const schema = counterRowSchema.clone();
  schema.set('collection', collectionName);
  return conn.model<ICounterRow>(modelName, schema);
}
