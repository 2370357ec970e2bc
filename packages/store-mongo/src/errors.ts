import { StoreUnavailableError } from '@hitboard/core';

const UNAVAILABLE_ERRORS = new Set([
  'MongoNetworkError',
  'MongoNetworkTimeoutError',
  'MongoServerSelectionError',
  'MongooseServerSelectionError',
  'MongoNotConnectedError',
  'MongoTopologyClosedError',
  'MongoPoolClearedError',
]);

/** True for driver errors that mean the server could not be reached in time. */
export function isUnavailableError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  // Mongoose queues operations while disconnected and fails them with this
  return UNAVAILABLE_ERRORS.has(err.name) || /buffering timed out/i.test(err.message);
}

export function isDuplicateKeyError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 11000;
}

/**
 * Indexes of the failed operations in an unordered bulkWrite, or null
 * when the error is not a per-operation failure.
 */
export function failedWriteIndexes(err: unknown): Set<number> | null {
  if (!(err instanceof Error) || err.name !== 'MongoBulkWriteError') return null;

  const writeErrors: unknown = 'writeErrors' in err ? err.writeErrors : undefined;
  const list = Array.isArray(writeErrors) ? writeErrors : writeErrors ? [writeErrors] : [];

  const indexes = new Set<number>();
  for (const writeError of list) {
    if (typeof writeError === 'object' && writeError !== null && 'index' in writeError && typeof writeError.index === 'number') {
      indexes.add(writeError.index);
    }
  }
  return indexes.size > 0 ? indexes : null;
}

export function toStoreError(operation: string, err: unknown): unknown {
  return isUnavailableError(err) ? new StoreUnavailableError(operation, err) : err;
}
