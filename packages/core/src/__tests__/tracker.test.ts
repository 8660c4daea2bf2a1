import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Journal } from '../journal.js';
import { DependencyTracker } from '../tracker.js';
import { sameValue } from '../equality.js';
import type { CacheLogger } from '../logger.js';
import type { GroupRecord } from '../types.js';

describe('DependencyTracker', () => {
  let tracker: DependencyTracker;
  let logger: CacheLogger;
  let warn: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    warn = vi.fn();
    logger = { debug: vi.fn(), warn, error: vi.fn() };
    tracker = new DependencyTracker(new Journal(), logger);
  });

  function evaluated(parent: GroupRecord | null, label: string, generation = 1): GroupRecord {
    const record = tracker.createGroup(parent, label);
    tracker.beginEvaluation(record);
    tracker.finishEvaluation(record, generation, false);
    return record;
  }

  describe('state machine', () => {
    it('should follow fresh -> evaluating -> cached -> stale -> evaluating', () => {
      const record = tracker.createGroup(null, 'g');
      expect(record.status).toBe('fresh');
      tracker.transition(record, 'evaluating');
      tracker.transition(record, 'cached');
      tracker.transition(record, 'stale');
      tracker.transition(record, 'evaluating');
      expect(record.status).toBe('evaluating');
    });

    it('should reject illegal transitions', () => {
      const record = tracker.createGroup(null, 'g');
      expect(() => tracker.transition(record, 'cached')).toThrow(
        'Illegal group transition fresh -> cached for "g"'
      );
      expect(() => tracker.transition(record, 'stale')).toThrow('fresh -> stale');
    });
  });

  it('should build paths from the parent', () => {
    const root = tracker.createGroup(null, '');
    const list = tracker.createGroup(root, 'list');
    const row = tracker.createGroup(list, 'row[B]');
    expect(list.path).toBe('list');
    expect(row.path).toBe('list/row[B]');
  });

  it('should mark ancestors when a group goes stale', () => {
    const root = evaluated(null, '');
    const list = evaluated(root, 'list');
    const row = evaluated(list, 'row');

    tracker.markStale(row, true);

    expect(row.status).toBe('stale');
    expect(row.forced).toBe(true);
    expect(list.staleDescendant).toBe(true);
    expect(root.staleDescendant).toBe(true);
    expect(list.status).toBe('cached');
  });

  describe('drain', () => {
    it('should apply writes in order and mark readers stale', () => {
      const reader = evaluated(null, 'reader');
      const cell = tracker.createCell('n');
      cell.value = 1;
      cell.hasValue = true;
      tracker.recordRead(reader, cell);

      tracker.enqueue({ type: 'write', cell, value: 2, equals: sameValue });
      tracker.enqueue({ type: 'update', cell, fn: (n) => Number(n) * 10, equals: sameValue });
      const result = tracker.drain(2);

      expect(cell.value).toBe(20);
      expect(cell.writtenAt).toBe(2);
      expect(result).toEqual({ appliedWrites: 2, droppedWrites: 0, invalidations: 0 });
      expect(reader.status).toBe('stale');
      expect(reader.forced).toBe(false);
      expect(tracker.isDependencyStale(reader)).toBe(true);
    });

    it('should drop writes of an equal value', () => {
      const reader = evaluated(null, 'reader');
      const cell = tracker.createCell('items');
      cell.value = [1, 2];
      cell.hasValue = true;
      tracker.recordRead(reader, cell);

      tracker.enqueue({ type: 'write', cell, value: [1, 2], equals: sameValue });
      expect(tracker.drain(2)).toEqual({ appliedWrites: 0, droppedWrites: 1, invalidations: 0 });
      expect(reader.status).toBe('cached');
    });

    it('should warn about and ignore invalidations of dead groups', () => {
      const record = evaluated(null, 'gone');
      tracker.teardownGroup(record);

      tracker.enqueue({ type: 'invalidate', record });
      expect(tracker.drain(2).invalidations).toBe(0);
      expect(warn).toHaveBeenCalledWith('invalidate: group "gone" no longer exists');
    });

    it('should keep the mutations after an update that throws', () => {
      const a = tracker.createCell('a');
      const b = tracker.createCell('b');

      tracker.enqueue({ type: 'write', cell: a, value: 1, equals: sameValue });
      tracker.enqueue({
        type: 'update',
        cell: a,
        fn: () => {
          throw new Error('update failed');
        },
        equals: sameValue,
      });
      tracker.enqueue({ type: 'write', cell: b, value: 7, equals: sameValue });

      expect(() => tracker.drain(2)).toThrow('update failed');
      expect(a.value).toBe(1);
      expect(b.hasValue).toBe(false);
      expect(tracker.hasPending()).toBe(true);

      expect(tracker.drain(2)).toEqual({ appliedWrites: 1, droppedWrites: 0, invalidations: 0 });
      expect(b.value).toBe(7);
      expect(tracker.hasPending()).toBe(false);
    });

    it('should hold writes made during a pass until it commits', () => {
      const cell = tracker.createCell('n');
      tracker.beginPass();
      tracker.enqueue({ type: 'write', cell, value: 1, equals: sameValue });
      expect(tracker.hasPending()).toBe(false);
      tracker.commitPass();
      expect(tracker.hasPending()).toBe(true);
    });

    it('should discard writes made during an aborted pass', () => {
      const cell = tracker.createCell('n');
      tracker.beginPass();
      tracker.enqueue({ type: 'write', cell, value: 1, equals: sameValue });
      tracker.abortPass();
      expect(tracker.hasPending()).toBe(false);
    });
  });

  it('should restore the previous read set and hooks when an evaluation is abandoned', () => {
    const group = evaluated(null, 'g');
    const kept = tracker.createCell('kept');
    const fresh = tracker.createCell('fresh');
    tracker.recordRead(group, kept);
    const hook = () => undefined;
    group.teardowns.push(hook);

    const previous = tracker.beginEvaluation(group);
    tracker.recordRead(group, fresh);
    tracker.abandonEvaluation(group, previous, false);

    expect([...group.deps]).toEqual([kept]);
    expect(kept.readers.has(group)).toBe(true);
    expect(fresh.readers.has(group)).toBe(false);
    expect(group.teardowns).toEqual([hook]);
    expect(group.status).toBe('cached');
  });

  it('should keep the stale-descendant mark when an evaluation is abandoned', () => {
    const outer = evaluated(null, 'outer');
    const inner = evaluated(outer, 'inner');
    tracker.markStale(inner, true);

    const previous = tracker.beginEvaluation(outer);
    tracker.abandonEvaluation(outer, previous, false);

    expect(outer.staleDescendant).toBe(true);
    expect(inner.status).toBe('stale');
  });

  it('should set the stale-descendant mark from the nested groups on finish', () => {
    const outer = evaluated(null, 'outer');
    tracker.markStale(evaluated(outer, 'inner'), false);

    tracker.beginEvaluation(outer);
    tracker.finishEvaluation(outer, 2, true);
    expect(outer.staleDescendant).toBe(true);

    tracker.beginEvaluation(outer);
    tracker.finishEvaluation(outer, 3, false);
    expect(outer.staleDescendant).toBe(false);
  });
});
