/** Width of a storage bucket. */
export const BUCKET_MS = 60_000;

export const EPOCH = new Date(0);

function toMillis(t: Date | number): number {
  const ms = typeof t === 'number' ? t : t.getTime();
  if (!Number.isFinite(ms)) {
    throw new RangeError(`Invalid timestamp: ${String(t)}`);
  }
  return ms;
}

/**
 * Start of the minute containing `t` (default: now).
 *
 * Example: 2025-01-01T00:00:45.120Z -> 2025-01-01T00:00:00.000Z
 */
export function bucketOf(t: Date | number = Date.now()): Date {
  const ms = toMillis(t);
  return new Date(Math.floor(ms / BUCKET_MS) * BUCKET_MS);
}

/** Stable map key for a (key, window) pair. */
export function bucketId(key: string, window: Date): string {
  return `${window.getTime()}:${key}`;
}

// Calendar boundaries are UTC, matching the minute buckets.

export function startOfDay(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

export function startOfMonth(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
}

export function startOfYear(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), 0, 1));
}
