/**
 * SlotCache - positional memoization for rebuild passes
 *
 * Core concepts:
 * - A rebuild pass walks a flat slot table in call order
 * - Groups whose inputs did not change are skipped in O(1)
 * - State lives in slots keyed by call-site identity
 */

export { SlotCache } from './cache.js';
export type { PassListener } from './cache.js';

export { CacheContext } from './context.js';

export { StateHandle, InvalidationToken } from './handles.js';

export { MemoCell } from './memoCell.js';

export {
  SlotCacheError,
  UsageError,
  ReentrancyError,
  StaleHandleError,
  isSlotCacheError,
} from './errors.js';
export type { SlotCacheErrorCode } from './errors.js';

export { createConsoleLogger } from './logger.js';
export type { CacheLogger, ConsoleLoggerOptions } from './logger.js';

export { sameValue } from './equality.js';
export type { EqualityFn } from './equality.js';

export { formatSlotTable, buildSlotTree, previewValue } from './slotDump.js';
export type { SlotGroupSnapshot, SlotValueSnapshot } from './slotDump.js';

export { identityLabel, slotKeyOf } from './callSite.js';

export type {
  CallSiteKey,
  CallIdentity,
  GroupStatus,
  EvaluationReason,
  GroupEvaluation,
  PassStats,
  SlotCacheOptions,
  StateOptions,
  GroupOptions,
  ChangedOptions,
  SlotEntry,
} from './types.js';
