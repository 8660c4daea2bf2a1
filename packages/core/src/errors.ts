/**
 * SlotCache error taxonomy
 */

export type SlotCacheErrorCode = 'E_USAGE' | 'E_REENTRANT' | 'E_STALE_HANDLE';

/**
 * Base class for every error raised by the cache
 */
export class SlotCacheError extends Error {
  readonly code: SlotCacheErrorCode;

  constructor(code: SlotCacheErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A bug in the rebuild function (duplicate key, schema mismatch, unbalanced groups).
 * Aborts the pass.
 */
export class UsageError extends SlotCacheError {
  constructor(message: string) {
    super('E_USAGE', message);
  }
}

/**
 * A pass was started while another one is still running
 */
export class ReentrancyError extends SlotCacheError {
  constructor(message = 'A rebuild pass is already running') {
    super('E_REENTRANT', message);
  }
}

/**
 * A handle or context was used after the pass that produced it
 */
export class StaleHandleError extends SlotCacheError {
  constructor(message: string) {
    super('E_STALE_HANDLE', message);
  }
}

export function isSlotCacheError(err: unknown): err is SlotCacheError {
  return err instanceof SlotCacheError;
}
