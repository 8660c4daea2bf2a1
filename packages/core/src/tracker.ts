/**
 * Dependency / invalidation tracker
 *
 * Owns the group state machine, the read sets captured while group bodies run,
 * and the queue of mutations requested from outside (or during) a pass.
 */

import type { EqualityFn } from './equality.js';
import type { Journal } from './journal.js';
import type { CacheLogger } from './logger.js';
import type { GroupRecord, GroupStatus, ValueCell } from './types.js';

const TRANSITIONS: Record<GroupStatus, readonly GroupStatus[]> = {
  fresh: ['evaluating'],
  evaluating: ['cached'],
  // `cached -> evaluating` covers inherited, changed-args and descendant re-entries
  cached: ['stale', 'evaluating'],
  stale: ['stale', 'evaluating'],
};

export type PendingMutation =
  | { type: 'write'; cell: ValueCell; value: unknown; equals: EqualityFn }
  | { type: 'update'; cell: ValueCell; fn: (current: unknown) => unknown; equals: EqualityFn }
  | { type: 'invalidate'; record: GroupRecord };

/** Read set and hooks of the previous evaluation */
export interface EvaluationSnapshot {
  deps: Set<ValueCell>;
  teardowns: Array<() => void>;
}

export interface DrainResult {
  appliedWrites: number;
  droppedWrites: number;
  invalidations: number;
}

export class DependencyTracker {
  private nextGroupId = 0;
  private pending: PendingMutation[] = [];
  /** Mutations requested by code running inside the open pass */
  private passBuffer: PendingMutation[] = [];
  private passOpen = false;

  constructor(
    private readonly journal: Journal,
    private readonly logger: CacheLogger
  ) {}

  createGroup(parent: GroupRecord | null, label: string): GroupRecord {
    const path = parent && parent.path ? `${parent.path}/${label}` : label;
    const record: GroupRecord = {
      id: this.nextGroupId++,
      label,
      path,
      parent,
      status: 'fresh',
      forced: false,
      staleDescendant: false,
      // flipped through the journal so a rolled back pass leaves the record dead
      alive: false,
      evaluatedAt: 0,
      deps: new Set(),
      teardowns: [],
    };
    this.journal.set(record, 'alive', true);
    return record;
  }

  createCell(path: string): ValueCell {
    const cell: ValueCell = {
      path,
      value: undefined,
      hasValue: false,
      writtenAt: 0,
      alive: false,
      readers: new Set(),
      dispose: undefined,
    };
    this.journal.set(cell, 'alive', true);
    return cell;
  }

  transition(record: GroupRecord, to: GroupStatus): void {
    const allowed = TRANSITIONS[record.status];
    if (!allowed.includes(to)) {
      throw new Error(`Illegal group transition ${record.status} -> ${to} for "${record.path}"`);
    }
    this.journal.set(record, 'status', to);
  }

  // ---------------------------------------------------------------------------
  // Pending mutations
  // ---------------------------------------------------------------------------

  enqueue(mutation: PendingMutation): void {
    if (this.passOpen) {
      this.passBuffer.push(mutation);
    } else {
      this.pending.push(mutation);
    }
  }

  hasPending(): boolean {
    return this.pending.length > 0;
  }

  beginPass(): void {
    this.passOpen = true;
    this.passBuffer = [];
  }

  /** Writes requested during the pass become visible to the next one */
  commitPass(): void {
    this.pending.push(...this.passBuffer);
    this.passBuffer = [];
    this.passOpen = false;
  }

  abortPass(): void {
    this.passBuffer = [];
    this.passOpen = false;
  }

  /**
   * Apply queued mutations in order. Runs before any group of the next pass is visited.
   * When an `update` callback throws, that update is dropped, the mutations
   * after it stay queued and the error propagates.
   */
  drain(generation: number): DrainResult {
    const queue = this.pending;
    this.pending = [];
    const result: DrainResult = { appliedWrites: 0, droppedWrites: 0, invalidations: 0 };

    for (const [index, mutation] of queue.entries()) {
      if (mutation.type === 'invalidate') {
        if (!mutation.record.alive) {
          this.logger.warn(`invalidate: group "${mutation.record.path}" no longer exists`);
          continue;
        }
        this.markStale(mutation.record, true);
        result.invalidations++;
        continue;
      }

      const { cell } = mutation;
      if (!cell.alive) {
        result.droppedWrites++;
        continue;
      }
      let next: unknown;
      try {
        next = mutation.type === 'write' ? mutation.value : mutation.fn(cell.value);
      } catch (error) {
        this.pending = [...queue.slice(index + 1), ...this.pending];
        throw error;
      }
      if (cell.hasValue && mutation.equals(cell.value, next)) {
        result.droppedWrites++;
        continue;
      }
      cell.value = next;
      cell.hasValue = true;
      cell.writtenAt = generation;
      for (const reader of cell.readers) {
        this.markStale(reader, false);
      }
      result.appliedWrites++;
    }

    return result;
  }

  /**
   * Mark a group stale for the next pass and flag every ancestor so the pass
   * walks down to it.
   */
  markStale(record: GroupRecord, forced: boolean): void {
    if (!record.alive) return;
    this.transition(record, 'stale');
    if (forced) {
      this.journal.set(record, 'forced', true);
    }
    let ancestor = record.parent;
    while (ancestor && !ancestor.staleDescendant) {
      this.journal.set(ancestor, 'staleDescendant', true);
      ancestor = ancestor.parent;
    }
  }

  // ---------------------------------------------------------------------------
  // Evaluation
  // ---------------------------------------------------------------------------

  isDependencyStale(record: GroupRecord): boolean {
    for (const cell of record.deps) {
      if (cell.writtenAt > record.evaluatedAt) return true;
    }
    return false;
  }

  /**
   * Enter `evaluating`: forget the previous read set and teardown hooks, the
   * body captures new ones. Returns what was forgotten.
   */
  beginEvaluation(record: GroupRecord): EvaluationSnapshot {
    const previous: EvaluationSnapshot = { deps: record.deps, teardowns: record.teardowns };
    this.transition(record, 'evaluating');
    for (const cell of previous.deps) {
      this.journal.deleteFromSet(cell.readers, record);
    }
    this.journal.set(record, 'deps', new Set());
    this.journal.set(record, 'teardowns', []);
    return previous;
  }

  /**
   * `staleBelow`: a nested group visited in this evaluation is still stale or
   * leads to one, so the next pass must walk down here again.
   */
  finishEvaluation(record: GroupRecord, generation: number, staleBelow: boolean): void {
    this.transition(record, 'cached');
    this.journal.set(record, 'evaluatedAt', generation);
    this.journal.set(record, 'forced', false);
    this.journal.set(record, 'staleDescendant', staleBelow);
  }

  /**
   * Leave `evaluating` without a new result: the previous read set and
   * teardown hooks stay in force. The stale-descendant mark is kept, since the
   * skipped remainder may still hold stale groups.
   */
  abandonEvaluation(record: GroupRecord, previous: EvaluationSnapshot, staleBelow: boolean): void {
    for (const cell of record.deps) {
      this.journal.deleteFromSet(cell.readers, record);
    }
    for (const cell of previous.deps) {
      if (cell.alive) {
        this.journal.addToSet(cell.readers, record);
      }
    }
    this.journal.set(record, 'deps', previous.deps);
    this.journal.set(record, 'teardowns', previous.teardowns);
    this.transition(record, 'cached');
    this.journal.set(record, 'forced', false);
    if (staleBelow) {
      this.journal.set(record, 'staleDescendant', true);
    }
  }

  recordRead(reader: GroupRecord, cell: ValueCell): void {
    if (!cell.alive) return;
    this.journal.addToSet(reader.deps, cell);
    this.journal.addToSet(cell.readers, reader);
  }

  // ---------------------------------------------------------------------------
  // Teardown
  // ---------------------------------------------------------------------------

  teardownGroup(record: GroupRecord): void {
    this.journal.set(record, 'alive', false);
    for (const cell of record.deps) {
      this.journal.deleteFromSet(cell.readers, record);
    }
  }

  teardownCell(cell: ValueCell): void {
    this.journal.set(cell, 'alive', false);
    for (const reader of cell.readers) {
      this.journal.deleteFromSet(reader.deps, cell);
    }
  }
}
