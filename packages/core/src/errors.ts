export class InvalidKeyError extends Error {
  readonly key: unknown;

  constructor(key: unknown, reason: string) {
    super(`Invalid counter key: ${reason}`);
    this.name = 'InvalidKeyError';
    this.key = key;
  }
}

/**
 * The backing store could not be reached or timed out. Safe to retry:
 * a retried increment may count twice, which is accepted.
 */
export class StoreUnavailableError extends Error {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Counter store unavailable during ${operation}: ${detail}`, { cause });
    this.name = 'StoreUnavailableError';
  }
}
