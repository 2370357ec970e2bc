import { createHash } from 'node:crypto';
import { InvalidKeyError } from './errors';

export const MAX_KEY_LENGTH = 512;
export const DEFAULT_PARTITIONS = 128;

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Throws InvalidKeyError unless `key` is a usable counter key.
 */
export function assertValidKey(key: unknown): asserts key is string {
  if (typeof key !== 'string') {
    throw new InvalidKeyError(key, 'key must be a string');
  }
  if (key.trim().length === 0) {
    throw new InvalidKeyError(key, 'key must not be empty');
  }
  if (key.length > MAX_KEY_LENGTH) {
    throw new InvalidKeyError(key, `key exceeds ${MAX_KEY_LENGTH} characters`);
  }
  if (CONTROL_CHARS.test(key)) {
    throw new InvalidKeyError(key, 'key contains control characters');
  }
}

export function isValidKey(key: unknown): key is string {
  try {
    assertValidKey(key);
    return true;
  } catch {
    return false;
  }
}

/**
 * Partition a key hashes to: first 32 bits of SHA-1, modulo `partitions`.
 * All buckets of one key share a partition.
 */
export function partitionOf(key: string, partitions: number = DEFAULT_PARTITIONS): number {
  if (!Number.isInteger(partitions) || partitions < 1) {
    throw new RangeError(`Partition count must be a positive integer, got ${partitions}`);
  }
  const digest = createHash('sha1').update(key, 'utf8').digest();
  return digest.readUInt32BE(0) % partitions;
}
