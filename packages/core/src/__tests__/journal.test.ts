import { describe, it, expect } from 'vitest';
import { Journal } from '../journal.js';

describe('Journal', () => {
  it('should undo every recorded change in reverse order', () => {
    const journal = new Journal();
    const target = { count: 1, label: 'a' };
    const list = ['x', 'y', 'z'];
    const set = new Set<number>([1]);

    journal.begin();
    journal.set(target, 'count', 2);
    journal.set(target, 'count', 3);
    journal.splice(list, 1, 1, 'q', 'r');
    journal.addToSet(set, 2);
    journal.deleteFromSet(set, 1);
    journal.push(list, 'w');

    expect(target.count).toBe(3);
    expect(list).toEqual(['x', 'q', 'r', 'z', 'w']);
    expect([...set]).toEqual([2]);

    journal.rollback();

    expect(target).toEqual({ count: 1, label: 'a' });
    expect(list).toEqual(['x', 'y', 'z']);
    expect([...set]).toEqual([1]);
    expect(journal.isOpen).toBe(false);
  });

  it('should keep changes after commit', () => {
    const journal = new Journal();
    const target = { count: 1 };
    journal.begin();
    journal.set(target, 'count', 5);
    journal.commit();
    journal.rollback();
    expect(target.count).toBe(5);
  });

  it('should apply changes without recording when closed', () => {
    const journal = new Journal();
    const list = [1];
    journal.push(list, 2);
    journal.begin();
    journal.rollback();
    expect(list).toEqual([1, 2]);
  });

  it('should refuse to open twice', () => {
    const journal = new Journal();
    journal.begin();
    expect(() => journal.begin()).toThrow('Journal is already open');
  });
});
