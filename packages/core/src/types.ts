/**
 * SlotCache type definitions
 */

import type { EqualityFn } from './equality.js';
import type { CacheLogger } from './logger.js';

/**
 * Caller-chosen key for keyed call sites
 */
export type CallSiteKey = string | number;

/**
 * Identity of one call within its enclosing group
 */
export type CallIdentity =
  | { mode: 'positional'; callSite: string; ordinal: number }
  | { mode: 'keyed'; callSite: string; key: CallSiteKey };

/**
 * Group lifecycle, see `tracker.ts` for the allowed transitions
 */
export type GroupStatus = 'fresh' | 'stale' | 'evaluating' | 'cached';

/**
 * Why a group body ran during a pass
 */
export type EvaluationReason =
  | 'created'
  | 'inherited'
  | 'invalidated'
  | 'stale'
  | 'changed'
  | 'descendant';

/**
 * Storage behind a value slot
 */
export interface ValueCell {
  /** Readable identity path, e.g. `list/row[B]/expanded` */
  path: string;
  value: unknown;
  hasValue: boolean;
  /** Generation of the last write */
  writtenAt: number;
  alive: boolean;
  /** Groups whose last evaluation read this cell */
  readers: Set<GroupRecord>;
  /** Teardown hook, called with the last value */
  dispose: ((value: unknown) => void) | undefined;
}

/**
 * Bookkeeping for one group (the payload of its `groupStart` entry)
 */
export interface GroupRecord {
  id: number;
  /** Label within the parent, e.g. `row[B]` */
  label: string;
  /** Labels from the root, joined with `/` */
  path: string;
  parent: GroupRecord | null;
  status: GroupStatus;
  /** An invalidation token fired since the last evaluation */
  forced: boolean;
  /** Some group nested inside this one is stale */
  staleDescendant: boolean;
  alive: boolean;
  /** Generation of the last completed evaluation */
  evaluatedAt: number;
  /** Cells read by the last evaluation */
  deps: Set<ValueCell>;
  teardowns: Array<() => void>;
}

export interface GroupStartEntry {
  kind: 'groupStart';
  key: string;
  record: GroupRecord;
  /** Span length including this entry and the matching `groupEnd` */
  len: number;
}

export interface GroupEndEntry {
  kind: 'groupEnd';
}

export interface ValueEntry {
  kind: 'value';
  key: string;
  typeTag: string;
  cell: ValueCell;
}

export interface TagEntry {
  kind: 'tag';
  identity: CallIdentity;
}

export type SlotEntry = GroupStartEntry | GroupEndEntry | ValueEntry | TagEntry;

/**
 * SlotCache configuration
 */
export interface SlotCacheOptions {
  /** Log pass summaries at debug level, default false */
  debug?: boolean;
  /** Defaults to a console logger */
  logger?: CacheLogger;
  /** Equality for `changed`, memo arguments and state writes, default `sameValue` */
  equals?: EqualityFn;
}

export interface StateOptions<T> {
  /** Keyed identity instead of positional */
  key?: CallSiteKey;
  /** Type tag of the slot, default `state`. Changing it rebuilds the slot. */
  type?: string;
  /** Called once with the last value when the slot is torn down */
  dispose?: (value: T) => void;
  equals?: EqualityFn;
}

export interface GroupOptions {
  /** Keyed identity instead of positional */
  key?: CallSiteKey;
  /** Memoized arguments: the body re-runs when they change */
  args?: unknown;
  equals?: EqualityFn;
}

export interface ChangedOptions {
  key?: CallSiteKey;
  equals?: EqualityFn;
  /** Type tag of the stored baseline, default `changed` */
  type?: string;
}

export interface GroupEvaluation {
  path: string;
  reason: EvaluationReason;
}

/**
 * Summary of one committed pass
 */
export interface PassStats {
  generation: number;
  /** Groups whose body ran for their own reasons */
  evaluated: number;
  /** Groups whose body ran only to reach a stale descendant */
  reentered: number;
  skipped: number;
  created: number;
  tornDown: number;
  appliedWrites: number;
  droppedWrites: number;
  invalidations: number;
  evaluations: GroupEvaluation[];
  durationMs: number;
}
