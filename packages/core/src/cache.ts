/**
 * SlotCache main class
 */

import { CacheContext } from './context.js';
import type { PassRuntime } from './context.js';
import { sameValue } from './equality.js';
import type { EqualityFn } from './equality.js';
import { ReentrancyError } from './errors.js';
import type { HandleRuntime, InvalidationToken } from './handles.js';
import { Journal } from './journal.js';
import { createConsoleLogger } from './logger.js';
import type { CacheLogger } from './logger.js';
import { buildSlotTree, formatSlotTable } from './slotDump.js';
import type { SlotGroupSnapshot } from './slotDump.js';
import { SlotTable } from './slotTable.js';
import type { PendingTeardown } from './slotTable.js';
import { DependencyTracker } from './tracker.js';
import type { GroupRecord, PassStats, SlotCacheOptions, SlotEntry } from './types.js';

export type PassListener = (stats: PassStats) => void;

interface PassOutcome<R> {
  result: R;
  stats: PassStats;
  teardowns: PendingTeardown[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SlotCache {
  private readonly debug: boolean;
  private readonly logger: CacheLogger;
  private readonly equals: EqualityFn;
  private readonly journal = new Journal();
  private readonly tracker: DependencyTracker;
  private readonly table: SlotTable;
  private readonly handles: HandleRuntime;
  private readonly listeners = new Set<PassListener>();
  private committedGeneration = 0;
  private passCounter = 0;
  private activePassId: number | null = null;
  private lastStats: PassStats | null = null;

  constructor(options: SlotCacheOptions = {}) {
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? createConsoleLogger({ debug: this.debug });
    this.equals = options.equals ?? sameValue;
    this.tracker = new DependencyTracker(this.journal, this.logger);
    this.table = new SlotTable(this.journal, this.tracker);
    this.handles = {
      isPassActive: (passId) => this.activePassId === passId,
      recordRead: (cell) => this.tracker.recordRead(this.table.currentRecord(), cell),
      enqueue: (mutation) => this.tracker.enqueue(mutation),
    };
  }

  /** Number of committed passes */
  get generation(): number {
    return this.committedGeneration;
  }

  get lastPassStats(): PassStats | null {
    return this.lastStats;
  }

  get isRunning(): boolean {
    return this.activePassId !== null;
  }

  /**
   * Whether writes or invalidations are waiting for the next pass
   */
  needsPass(): boolean {
    return this.tracker.hasPending();
  }

  /**
   * Run one rebuild pass. Queued writes and invalidations are applied first;
   * groups whose inputs did not change are skipped. If `root` throws, every
   * change made by the pass is rolled back and the error propagates.
   */
  runPass<R>(root: (cx: CacheContext) => R): R {
    if (this.activePassId !== null) {
      throw new ReentrancyError();
    }

    const startedAt = performance.now();
    const passId = ++this.passCounter;
    this.activePassId = passId;

    let outcome: PassOutcome<R>;
    try {
      outcome = this.executePass(passId, root);
    } catch (error) {
      if (this.journal.isOpen) {
        this.journal.rollback();
      }
      this.table.abortPass();
      this.tracker.abortPass();
      this.logger.debug(`pass ${passId} aborted: ${errorMessage(error)}`);
      throw error;
    } finally {
      this.activePassId = null;
    }

    const { result, stats, teardowns } = outcome;
    this.runTeardowns(teardowns);
    stats.durationMs = performance.now() - startedAt;
    this.lastStats = stats;

    if (this.debug) {
      this.logger.debug(
        `pass ${stats.generation}: evaluated=${stats.evaluated} reentered=${stats.reentered} ` +
          `skipped=${stats.skipped} created=${stats.created} tornDown=${stats.tornDown} ` +
          `writes=${stats.appliedWrites}/${stats.appliedWrites + stats.droppedWrites}`
      );
    }
    this.notify(stats);
    return result;
  }

  /**
   * Queue an invalidation, same as `token.invalidate()`
   */
  invalidate(token: InvalidationToken): void {
    token.invalidate();
  }

  /**
   * Queue an invalidation of the live group with `id`. Returns false when no
   * such group exists.
   */
  invalidateGroup(id: number): boolean {
    const record = this.findGroup(id);
    if (!record) return false;
    this.tracker.enqueue({ type: 'invalidate', record });
    return true;
  }

  findGroup(id: number): GroupRecord | undefined {
    for (const entry of this.table.view) {
      if (entry.kind === 'groupStart' && entry.record.id === id) {
        return entry.record;
      }
    }
    return undefined;
  }

  /**
   * Subscribe to committed passes. Returns the unsubscribe function.
   */
  onPass(listener: PassListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Text dump of the slot table */
  dump(): string {
    return formatSlotTable(this.table.view);
  }

  snapshot(): SlotGroupSnapshot {
    return buildSlotTree(this.table.view);
  }

  entries(): SlotEntry[] {
    return this.table.entriesSnapshot();
  }

  private executePass<R>(passId: number, root: (cx: CacheContext) => R): PassOutcome<R> {
    const generation = this.committedGeneration + 1;
    const drained = this.tracker.drain(generation);

    const stats: PassStats = {
      generation,
      evaluated: 0,
      reentered: 0,
      skipped: 0,
      created: 0,
      tornDown: 0,
      appliedWrites: drained.appliedWrites,
      droppedWrites: drained.droppedWrites,
      invalidations: drained.invalidations,
      evaluations: [],
      durationMs: 0,
    };

    this.journal.begin();
    this.tracker.beginPass();
    const rootRecord = this.table.beginPass();

    const runtime: PassRuntime = {
      ...this.handles,
      passId,
      generation,
      table: this.table,
      tracker: this.tracker,
      journal: this.journal,
      equals: this.equals,
      logger: this.logger,
      stats,
    };

    const result = CacheContext.evaluateRoot(runtime, rootRecord, root);
    const teardowns = this.table.finishPass();

    stats.created = this.table.counters.createdGroups;
    stats.tornDown = this.table.counters.tornDownGroups;

    this.journal.commit();
    this.tracker.commitPass();
    this.committedGeneration = generation;
    return { result, stats, teardowns };
  }

  private runTeardowns(teardowns: PendingTeardown[]): void {
    for (const teardown of teardowns) {
      try {
        teardown.run();
      } catch (error) {
        this.logger.error(`teardown hook for "${teardown.path}" failed: ${errorMessage(error)}`);
      }
    }
  }

  private notify(stats: PassStats): void {
    for (const listener of this.listeners) {
      try {
        listener(stats);
      } catch (error) {
        this.logger.error(`pass listener failed: ${errorMessage(error)}`);
      }
    }
  }
}
