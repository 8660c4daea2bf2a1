/**
 * State handles and invalidation tokens handed to rebuild code
 */

import type { EqualityFn } from './equality.js';
import { StaleHandleError } from './errors.js';
import type { PendingMutation } from './tracker.js';
import type { GroupRecord, ValueCell } from './types.js';

/**
 * What handles need from the cache that issued them
 */
export interface HandleRuntime {
  isPassActive(passId: number): boolean;
  recordRead(cell: ValueCell): void;
  enqueue(mutation: PendingMutation): void;
}

/**
 * Values in the table are type-erased; a slot is only ever read back through
 * the call site that wrote it.
 */
export function cellValue<T>(cell: ValueCell): T {
  return cell.value as T;
}

/**
 * Handle to a state cell.
 *
 * `get()` is valid during the pass that produced the handle and records a
 * dependency of the group being evaluated. `set()` and `update()` queue a write
 * that is applied at the start of the next pass; they are valid as long as the
 * cell exists.
 */
export class StateHandle<T> {
  constructor(
    private readonly runtime: HandleRuntime,
    private readonly cell: ValueCell,
    private readonly passId: number,
    private readonly equals: EqualityFn
  ) {}

  get path(): string {
    return this.cell.path;
  }

  /** False once the slot has been torn down */
  get alive(): boolean {
    return this.cell.alive;
  }

  get(): T {
    if (!this.runtime.isPassActive(this.passId)) {
      throw new StaleHandleError(
        `State "${this.cell.path}" read outside the pass that produced its handle`
      );
    }
    this.runtime.recordRead(this.cell);
    return cellValue<T>(this.cell);
  }

  set(value: T): void {
    this.assertAlive();
    this.runtime.enqueue({ type: 'write', cell: this.cell, value, equals: this.equals });
  }

  /**
   * Queue a write computed from the value current when the queue is drained,
   * so consecutive updates compose.
   */
  update(fn: (current: T) => T): void {
    this.assertAlive();
    this.runtime.enqueue({
      type: 'update',
      cell: this.cell,
      fn: (current) => fn(current as T),
      equals: this.equals,
    });
  }

  private assertAlive(): void {
    if (!this.cell.alive) {
      throw new StaleHandleError(`State "${this.cell.path}" was torn down`);
    }
  }
}

/**
 * Marks one group stale from outside the pass, e.g. from an event callback
 */
export class InvalidationToken {
  constructor(
    private readonly runtime: HandleRuntime,
    private readonly record: GroupRecord
  ) {}

  get path(): string {
    return this.record.path;
  }

  get groupId(): number {
    return this.record.id;
  }

  get alive(): boolean {
    return this.record.alive;
  }

  /**
   * Queue an invalidation. The group and everything nested in it re-evaluate
   * on the next pass. Invalidating a group that no longer exists logs a warning
   * when the queue is drained.
   */
  invalidate(): void {
    this.runtime.enqueue({ type: 'invalidate', record: this.record });
  }
}
