/**
 * Slot table
 *
 * A flat, positionally addressed sequence of entries. Each group occupies a
 * contiguous span `[groupStart, tag, result, ...children, groupEnd]`.
 * A pass walks the table with a forward-only cursor; entries that a group does
 * not revisit are removed when the group closes.
 */

import { identityLabel } from './callSite.js';
import { UsageError } from './errors.js';
import type { Journal } from './journal.js';
import type { DependencyTracker } from './tracker.js';
import type {
  CallIdentity,
  GroupRecord,
  GroupStartEntry,
  SlotEntry,
  ValueCell,
  ValueEntry,
} from './types.js';

/** Entries before the first child: groupStart, tag, result */
export const GROUP_HEADER_LEN = 3;

export const RESULT_TYPE_TAG = 'result';

export const ROOT_IDENTITY: CallIdentity = { mode: 'positional', callSite: 'root', ordinal: 0 };

interface OpenGroup {
  start: number;
  /** Position of the groupEnd when the group was entered */
  endAtEntry: number;
  /** Value of `netInserted` when the group was entered */
  netAtEntry: number;
}

export interface PendingTeardown {
  path: string;
  run: () => void;
}

export interface BeginGroupResult {
  record: GroupRecord;
  created: boolean;
}

export type TypeMismatchPolicy = 'throw' | 'replace';

export interface ExpectValueResult {
  cell: ValueCell;
  /** The slot did not exist, or was rebuilt after a type change */
  created: boolean;
  /** The slot existed with another type tag and was rebuilt */
  replaced: boolean;
}

export interface TableCounters {
  createdGroups: number;
  tornDownGroups: number;
}

export class SlotTable {
  private readonly entries: SlotEntry[];
  private pos = 0;
  private stack: OpenGroup[] = [];
  /** Entries inserted minus entries removed since the pass began */
  private netInserted = 0;
  private teardowns: PendingTeardown[] = [];
  private passOpen = false;
  readonly root: GroupRecord;
  counters: TableCounters = { createdGroups: 0, tornDownGroups: 0 };

  constructor(
    private readonly journal: Journal,
    private readonly tracker: DependencyTracker
  ) {
    this.root = tracker.createGroup(null, '');
    this.entries = [
      { kind: 'groupStart', key: 'g:root#0', record: this.root, len: 4 },
      { kind: 'tag', identity: ROOT_IDENTITY },
      { kind: 'value', key: RESULT_TYPE_TAG, typeTag: RESULT_TYPE_TAG, cell: tracker.createCell('') },
      { kind: 'groupEnd' },
    ];
  }

  /** Read-only view of the entries, valid until the next mutation */
  get view(): readonly SlotEntry[] {
    return this.entries;
  }

  /** Copy of the entries, safe to keep across passes */
  entriesSnapshot(): SlotEntry[] {
    return this.entries.slice();
  }

  get cursor(): number {
    return this.pos;
  }

  get depth(): number {
    return this.stack.length;
  }

  get isPassOpen(): boolean {
    return this.passOpen;
  }

  // ---------------------------------------------------------------------------
  // Pass lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start a pass and enter the root group
   */
  beginPass(): GroupRecord {
    if (this.passOpen) {
      throw new Error('Slot table pass is already open');
    }
    this.passOpen = true;
    this.pos = 0;
    this.stack = [];
    this.netInserted = 0;
    this.teardowns = [];
    this.counters = { createdGroups: 0, tornDownGroups: 0 };
    this.enterAt(0);
    return this.root;
  }

  /**
   * Close the root group and verify the table is consistent.
   * Returns the teardown hooks collected during the pass, to run after commit.
   */
  finishPass(): PendingTeardown[] {
    if (this.stack.length !== 1) {
      const open = this.currentRecord();
      throw new UsageError(`Unterminated group "${open.path}" at the end of the pass`);
    }
    this.endGroup();
    if (this.pos !== this.entries.length) {
      throw new Error(`Slot table inconsistent: cursor ${this.pos} of ${this.entries.length}`);
    }
    this.passOpen = false;
    const teardowns = this.teardowns;
    this.teardowns = [];
    return teardowns;
  }

  /**
   * Forget the cursor state. The journal restores the entries themselves.
   */
  abortPass(): void {
    this.passOpen = false;
    this.pos = 0;
    this.stack = [];
    this.netInserted = 0;
    this.teardowns = [];
  }

  // ---------------------------------------------------------------------------
  // Groups
  // ---------------------------------------------------------------------------

  currentRecord(): GroupRecord {
    const top = this.stack[this.stack.length - 1];
    if (!top) {
      throw new Error('No open group');
    }
    return this.groupStartAt(top.start).record;
  }

  /**
   * Enter the group with `key` at the cursor: reuse it when found within the
   * enclosing group (moving it to the cursor), insert it otherwise.
   */
  beginGroup(key: string, identity: CallIdentity): BeginGroupResult {
    this.assertPassOpen();
    const parent = this.currentRecord();
    const found = this.findInCurrentGroup(key);

    if (found !== null) {
      this.rotateToCursor(found);
      const entry = this.groupStartAt(this.pos);
      this.enterAt(this.pos);
      return { record: entry.record, created: false };
    }

    const record = this.tracker.createGroup(parent, identityLabel(identity));
    const inserted: SlotEntry[] = [
      { kind: 'groupStart', key, record, len: GROUP_HEADER_LEN + 1 },
      { kind: 'tag', identity },
      {
        kind: 'value',
        key: RESULT_TYPE_TAG,
        typeTag: RESULT_TYPE_TAG,
        cell: this.tracker.createCell(record.path),
      },
      { kind: 'groupEnd' },
    ];
    this.insertAtCursor(inserted);
    this.counters.createdGroups++;
    this.enterAt(this.pos);
    return { record, created: true };
  }

  /**
   * Result slot of the innermost open group
   */
  resultCell(): ValueCell {
    const top = this.topGroup();
    const entry = this.entries[top.start + 2];
    if (!entry || entry.kind !== 'value' || entry.typeTag !== RESULT_TYPE_TAG) {
      throw new Error('Group result slot is missing');
    }
    return entry.cell;
  }

  /**
   * Close the innermost group. Children not revisited in this pass are removed.
   */
  endGroup(): GroupRecord {
    this.assertPassOpen();
    const top = this.topGroup();
    this.truncateUnusedTail();

    const end = this.entries[this.pos];
    if (!end || end.kind !== 'groupEnd') {
      throw new Error(`Slot table inconsistent: expected groupEnd at ${this.pos}`);
    }
    this.pos++;
    this.stack.pop();

    const start = this.groupStartAt(top.start);
    this.journal.set(start, 'len', this.pos - top.start);
    return start.record;
  }

  /**
   * Jump to the groupEnd of the innermost group without reading its contents. O(1).
   */
  skipToMatchingEnd(): void {
    this.assertPassOpen();
    this.pos = this.currentEnd();
  }

  /**
   * Remove every entry between the cursor and the innermost group's end.
   */
  truncateUnusedTail(): void {
    this.assertPassOpen();
    const end = this.currentEnd();
    if (end <= this.pos) return;

    const removed = this.journal.splice(this.entries, this.pos, end - this.pos);
    this.netInserted -= removed.length;
    for (const entry of removed) {
      this.retire(entry);
    }
  }

  // ---------------------------------------------------------------------------
  // Values
  // ---------------------------------------------------------------------------

  /**
   * Claim the value slot with `key` at the cursor. A missing slot is inserted
   * empty (`hasValue: false`). A slot stored under another type tag either
   * raises a `UsageError` or is torn down and rebuilt, depending on `onMismatch`.
   */
  expectValue(
    key: string,
    typeTag: string,
    path: string,
    onMismatch: TypeMismatchPolicy = 'throw'
  ): ExpectValueResult {
    this.assertPassOpen();
    const found = this.findInCurrentGroup(key);

    if (found !== null) {
      this.rotateToCursor(found);
      const entry = this.valueAt(this.pos);
      if (entry.typeTag === typeTag) {
        this.pos++;
        return { cell: entry.cell, created: false, replaced: false };
      }
      if (onMismatch === 'throw') {
        throw new UsageError(
          `Type tag mismatch at "${path}": stored "${entry.typeTag}", read as "${typeTag}"`
        );
      }
      const replacement: ValueEntry = {
        kind: 'value',
        key,
        typeTag,
        cell: this.tracker.createCell(path),
      };
      this.journal.splice(this.entries, this.pos, 1, replacement);
      this.retire(entry);
      this.pos++;
      return { cell: replacement.cell, created: true, replaced: true };
    }

    const entry: ValueEntry = { kind: 'value', key, typeTag, cell: this.tracker.createCell(path) };
    this.insertAtCursor([entry]);
    this.pos++;
    return { cell: entry.cell, created: true, replaced: false };
  }

  /**
   * `expectValue`, then fill an empty slot with `init()`
   */
  resolveValue(
    key: string,
    typeTag: string,
    path: string,
    init: () => unknown,
    generation: number,
    onMismatch: TypeMismatchPolicy = 'throw'
  ): ExpectValueResult {
    const result = this.expectValue(key, typeTag, path, onMismatch);
    if (!result.cell.hasValue) {
      this.writeValue(result.cell, init(), generation);
    }
    return result;
  }

  writeValue(cell: ValueCell, value: unknown, generation: number): void {
    this.journal.set(cell, 'value', value);
    this.journal.set(cell, 'hasValue', true);
    this.journal.set(cell, 'writtenAt', generation);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private assertPassOpen(): void {
    if (!this.passOpen) {
      throw new Error('Slot table is not in a pass');
    }
  }

  private topGroup(): OpenGroup {
    const top = this.stack[this.stack.length - 1];
    if (!top) {
      throw new Error('No open group');
    }
    return top;
  }

  /** Position of the innermost group's groupEnd, accounting for edits made since entry */
  private currentEnd(): number {
    const top = this.topGroup();
    return top.endAtEntry + (this.netInserted - top.netAtEntry);
  }

  private enterAt(start: number): void {
    const entry = this.groupStartAt(start);
    this.stack.push({
      start,
      endAtEntry: start + entry.len - 1,
      netAtEntry: this.netInserted,
    });
    this.pos = start + GROUP_HEADER_LEN;
  }

  private groupStartAt(index: number): GroupStartEntry {
    const entry = this.entries[index];
    if (!entry || entry.kind !== 'groupStart') {
      throw new Error(`Slot table inconsistent: expected groupStart at ${index}`);
    }
    return entry;
  }

  private valueAt(index: number): ValueEntry {
    const entry = this.entries[index];
    if (!entry || entry.kind !== 'value') {
      throw new Error(`Slot table inconsistent: expected value at ${index}`);
    }
    return entry;
  }

  /**
   * Nearest-first search from the cursor to the end of the innermost group,
   * stepping over sibling group spans.
   */
  private findInCurrentGroup(key: string): number | null {
    const end = this.currentEnd();
    let i = this.pos;
    while (i < end) {
      const entry = this.entries[i];
      if (!entry) break;
      switch (entry.kind) {
        case 'groupStart':
          if (entry.key === key) return i;
          i += entry.len;
          break;
        case 'value':
          if (entry.key === key) return i;
          i++;
          break;
        case 'groupEnd':
          return null;
        case 'tag':
          i++;
          break;
      }
    }
    return null;
  }

  /**
   * Move the span starting at `index` to the cursor; the siblings it jumped
   * over move behind it, to be claimed later in the pass or removed.
   */
  private rotateToCursor(index: number): void {
    const distance = index - this.pos;
    if (distance === 0) return;
    const end = this.currentEnd();
    const skipped = this.journal.splice(this.entries, this.pos, distance);
    this.journal.splice(this.entries, end - distance, 0, ...skipped);
  }

  private insertAtCursor(inserted: SlotEntry[]): void {
    this.journal.splice(this.entries, this.pos, 0, ...inserted);
    this.netInserted += inserted.length;
  }

  /** Tear down a removed entry and queue its hooks */
  private retire(entry: SlotEntry): void {
    switch (entry.kind) {
      case 'groupStart': {
        const { record } = entry;
        this.tracker.teardownGroup(record);
        this.counters.tornDownGroups++;
        for (const hook of record.teardowns) {
          this.teardowns.push({ path: record.path, run: hook });
        }
        break;
      }
      case 'value': {
        const { cell } = entry;
        this.tracker.teardownCell(cell);
        const { dispose } = cell;
        if (dispose && cell.hasValue) {
          const last = cell.value;
          this.teardowns.push({ path: cell.path, run: () => dispose(last) });
        }
        break;
      }
      case 'tag':
      case 'groupEnd':
        break;
    }
  }
}
