/**
 * Cache context: the primitives rebuild code calls during a pass
 *
 * One context exists per open group. It is handed to the group's body and
 * must not be used from inside a nested group or after the pass.
 */

import { CallSiteResolver, identityLabel } from './callSite.js';
import type { ResolvedCall } from './callSite.js';
import type { EqualityFn } from './equality.js';
import { StaleHandleError, UsageError } from './errors.js';
import { cellValue, InvalidationToken, StateHandle } from './handles.js';
import type { HandleRuntime } from './handles.js';
import type { Journal } from './journal.js';
import type { CacheLogger } from './logger.js';
import type { SlotTable } from './slotTable.js';
import type { DependencyTracker } from './tracker.js';
import type {
  CallSiteKey,
  ChangedOptions,
  EvaluationReason,
  GroupOptions,
  GroupRecord,
  PassStats,
  StateOptions,
} from './types.js';

/**
 * Cache internals shared by every context of one pass
 */
export interface PassRuntime extends HandleRuntime {
  readonly passId: number;
  readonly generation: number;
  readonly table: SlotTable;
  readonly tracker: DependencyTracker;
  readonly journal: Journal;
  readonly equals: EqualityFn;
  readonly logger: CacheLogger;
  readonly stats: PassStats;
}

interface ContextFrame {
  record: GroupRecord;
  resolver: CallSiteResolver;
  /** Every group nested in this one must re-evaluate */
  forced: boolean;
  /** `skipToEnd` was called */
  bailed: boolean;
  /** A nested group is still stale, or leads to one, after its visit */
  staleBelow: boolean;
}

const ARGS_CALL_SITE = 'args';
const CHANGED_TYPE_TAG = 'changed';

export class CacheContext {
  private constructor(
    private readonly runtime: PassRuntime,
    private readonly frame: ContextFrame
  ) {}

  /**
   * Evaluate the root group. A pending invalidation of the root forces every group.
   */
  static evaluateRoot<R>(runtime: PassRuntime, record: GroupRecord, body: (cx: CacheContext) => R): R {
    const { table, tracker, generation } = runtime;
    const frame: ContextFrame = {
      record,
      resolver: new CallSiteResolver(),
      forced: record.forced,
      bailed: false,
      staleBelow: false,
    };

    tracker.beginEvaluation(record);
    const result = body(new CacheContext(runtime, frame));
    table.writeValue(table.resultCell(), result, generation);
    tracker.finishEvaluation(record, generation, frame.staleBelow);
    return result;
  }

  /** Identity path of the group this context belongs to (`''` for the root) */
  get path(): string {
    return this.frame.record.path;
  }

  /** Generation this pass will commit as */
  get generation(): number {
    return this.runtime.generation;
  }

  /** Whether every nested group is forced to re-evaluate */
  get forced(): boolean {
    return this.frame.forced;
  }

  /**
   * Return the state cell for this call site, creating it with `init` on first use.
   */
  state<T>(callSite: string, init: () => T, options: StateOptions<T> = {}): StateHandle<T> {
    this.assertCurrent();
    const { runtime, frame } = this;
    const { identity, slotKey } = frame.resolver.resolve('state', callSite, options.key);
    const path = this.childPath(identityLabel(identity));
    const typeTag = options.type ?? 'state';

    const { cell, replaced } = runtime.table.resolveValue(
      slotKey,
      typeTag,
      path,
      init,
      runtime.generation,
      'replace'
    );
    if (replaced) {
      runtime.logger.debug(`schema change at "${path}": slot rebuilt as "${typeTag}"`);
    }

    const { dispose } = options;
    if (dispose) {
      runtime.journal.set(cell, 'dispose', (value: unknown) => dispose(value as T));
    }

    return new StateHandle<T>(runtime, cell, runtime.passId, options.equals ?? runtime.equals);
  }

  /**
   * Read-modify-write on a state cell. Returns the value produced by `update`;
   * the stored value follows on the next pass.
   */
  withState<T>(
    callSite: string,
    init: () => T,
    update: (current: T) => T,
    options: StateOptions<T> = {}
  ): T {
    const handle = this.state(callSite, init, options);
    const current = handle.get();
    const next = update(current);
    const equals = options.equals ?? this.runtime.equals;
    if (!equals(current, next)) {
      handle.set(next);
    }
    return next;
  }

  /**
   * Run `body` as a group, or skip it and return its stored result when nothing
   * it depends on changed.
   */
  group<R>(callSite: string, body: (cx: CacheContext) => R, options: GroupOptions = {}): R {
    this.assertCurrent();
    const { runtime, frame } = this;
    const { table, stats } = runtime;

    const { identity, slotKey } = frame.resolver.resolve('group', callSite, options.key);
    const { record, created } = table.beginGroup(slotKey, identity);

    const childFrame: ContextFrame = {
      record,
      resolver: new CallSiteResolver(),
      forced: false,
      bailed: false,
      staleBelow: false,
    };
    const child = new CacheContext(runtime, childFrame);

    let argsChanged = false;
    if ('args' in options) {
      const changedOptions: ChangedOptions = {};
      if (options.equals) changedOptions.equals = options.equals;
      const resolved = childFrame.resolver.resolveReserved('changed', ARGS_CALL_SITE);
      argsChanged = child.compare(resolved, options.args, changedOptions);
    }

    const reason = this.decide(record, created, argsChanged);
    if (reason === null) {
      table.skipToMatchingEnd();
      const cached = cellValue<R>(table.resultCell());
      table.endGroup();
      stats.skipped++;
      return cached;
    }

    childFrame.forced = reason === 'inherited' || reason === 'invalidated';
    return this.evaluate(child, childFrame, reason, body);
  }

  /**
   * `group` with a caller-chosen key, for sequences whose order or membership changes
   */
  keyed<R>(callSite: string, key: CallSiteKey, body: (cx: CacheContext) => R): R {
    return this.group(callSite, body, { key });
  }

  /**
   * `group` whose body re-runs when `args` differ from the previous pass
   */
  memo<A, R>(callSite: string, args: A, body: (cx: CacheContext, args: A) => R): R {
    return this.group(callSite, (cx) => body(cx, args), { args });
  }

  /**
   * Compare `value` with the baseline stored for this call site and store it.
   * True on first use, when the value differs, and inside a forced subtree.
   * The baseline is stored under `options.type`; reading it under another
   * type is a `UsageError`.
   */
  changed(callSite: string, value: unknown, options: ChangedOptions = {}): boolean {
    this.assertCurrent();
    const resolved = this.frame.resolver.resolve('changed', callSite, options.key);
    return this.compare(resolved, value, options);
  }

  private compare(resolved: ResolvedCall, value: unknown, options: ChangedOptions): boolean {
    const { runtime, frame } = this;
    const { identity, slotKey } = resolved;
    const path = this.childPath(identityLabel(identity));

    const typeTag = options.type ?? CHANGED_TYPE_TAG;
    const { cell } = runtime.table.expectValue(slotKey, typeTag, path, 'throw');
    const equals = options.equals ?? runtime.equals;
    const differs = !cell.hasValue || !equals(cell.value, value);
    if (differs) {
      runtime.table.writeValue(cell, value, runtime.generation);
    }
    return differs || frame.forced;
  }

  /**
   * Token that marks this group stale from outside the pass
   */
  invalidationToken(): InvalidationToken {
    this.assertCurrent();
    return new InvalidationToken(this.runtime, this.frame.record);
  }

  /**
   * Register a hook that runs once when this group is torn down. Hooks are
   * replaced on every evaluation of the group.
   */
  onTeardown(hook: () => void): void {
    this.assertCurrent();
    this.runtime.journal.push(this.frame.record.teardowns, hook);
  }

  /**
   * Stop evaluating the current group: the rest of its previous contents is
   * kept and the group returns its previously stored result.
   */
  skipToEnd(): void {
    this.assertCurrent();
    const { table } = this.runtime;
    if (this.frame.record === table.root) {
      throw new UsageError('The root group cannot be skipped');
    }
    if (!table.resultCell().hasValue) {
      throw new UsageError(`Group "${this.path}" has no stored result to skip to`);
    }
    table.skipToMatchingEnd();
    this.frame.bailed = true;
  }

  private decide(record: GroupRecord, created: boolean, argsChanged: boolean): EvaluationReason | null {
    if (created) return 'created';
    if (this.frame.forced) return 'inherited';
    if (record.forced) return 'invalidated';
    if (record.status === 'stale' || this.runtime.tracker.isDependencyStale(record)) return 'stale';
    if (argsChanged) return 'changed';
    if (record.staleDescendant) return 'descendant';
    return null;
  }

  private evaluate<R>(
    child: CacheContext,
    childFrame: ContextFrame,
    reason: EvaluationReason,
    body: (cx: CacheContext) => R
  ): R {
    const { table, tracker, generation, stats } = this.runtime;
    const { record } = childFrame;

    const previous = tracker.beginEvaluation(record);
    const result = body(child);

    if (childFrame.bailed) {
      tracker.abandonEvaluation(record, previous, childFrame.staleBelow);
      this.noteStaleBelow(record);
      const kept = cellValue<R>(table.resultCell());
      table.endGroup();
      stats.skipped++;
      return kept;
    }

    table.writeValue(table.resultCell(), result, generation);
    tracker.finishEvaluation(record, generation, childFrame.staleBelow);
    this.noteStaleBelow(record);
    table.endGroup();

    if (reason === 'descendant') {
      stats.reentered++;
    } else {
      stats.evaluated++;
    }
    stats.evaluations.push({ path: record.path, reason });
    return result;
  }

  private noteStaleBelow(child: GroupRecord): void {
    if (child.staleDescendant || child.status === 'stale') {
      this.frame.staleBelow = true;
    }
  }

  private childPath(label: string): string {
    const parent = this.frame.record.path;
    return parent ? `${parent}/${label}` : label;
  }

  private assertCurrent(): void {
    const { runtime, frame } = this;
    if (!runtime.isPassActive(runtime.passId)) {
      throw new StaleHandleError(`Context of "${frame.record.path}" used after its pass`);
    }
    const current = runtime.table.currentRecord();
    if (current !== frame.record) {
      throw new UsageError(
        `Context of "${frame.record.path}" used while group "${current.path}" is open`
      );
    }
    if (frame.bailed) {
      throw new UsageError(`Group "${frame.record.path}" was skipped; no further calls allowed`);
    }
  }
}
