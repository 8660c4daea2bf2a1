import { describe, it, expect } from 'vitest';
import { sameValue } from '../equality.js';
import { MemoCell } from '../memoCell.js';

describe('sameValue', () => {
  it('should compare primitives like Object.is', () => {
    expect(sameValue(1, 1)).toBe(true);
    expect(sameValue(Number.NaN, Number.NaN)).toBe(true);
    expect(sameValue(0, -0)).toBe(false);
    expect(sameValue('a', 'b')).toBe(false);
    expect(sameValue(null, undefined)).toBe(false);
  });

  it('should compare arrays and plain objects structurally', () => {
    expect(sameValue([1, { a: [2] }], [1, { a: [2] }])).toBe(true);
    expect(sameValue([1, 2], [1, 2, 3])).toBe(false);
    expect(sameValue({ a: 1, b: 2 }, { b: 2, a: 1 })).toBe(true);
    expect(sameValue({ a: 1 }, { a: 1, b: undefined })).toBe(false);
    expect(sameValue([], {})).toBe(false);
  });

  it('should compare dates, maps and sets by content', () => {
    expect(sameValue(new Date(5), new Date(5))).toBe(true);
    expect(sameValue(new Map([['k', [1]]]), new Map([['k', [1]]]))).toBe(true);
    expect(sameValue(new Set([1, 2]), new Set([2, 1]))).toBe(true);
    expect(sameValue(new Set([1]), new Set([2]))).toBe(false);
  });

  it('should compare class instances by identity', () => {
    class Point {
      constructor(readonly x: number) {}
    }
    const p = new Point(1);
    expect(sameValue(p, p)).toBe(true);
    expect(sameValue(new Point(1), new Point(1))).toBe(false);
  });
});

describe('MemoCell', () => {
  it('should recompute only when the arguments change', () => {
    const cell = new MemoCell<{ n: number }, number>();
    const square = ({ n }: { n: number }) => n * n;

    expect(cell.get({ n: 3 }, square)).toBe(9);
    expect(cell.get({ n: 3 }, square)).toBe(9);
    expect(cell.computations).toBe(1);

    expect(cell.get({ n: 4 }, square)).toBe(16);
    expect(cell.computations).toBe(2);
  });

  it('should forget the stored value on clear', () => {
    const cell = new MemoCell<number, string>((a, b) => a === b);
    cell.get(1, (n) => `v${n}`);
    expect(cell.hasValue).toBe(true);
    cell.clear();
    expect(cell.hasValue).toBe(false);
    expect(cell.get(1, (n) => `w${n}`)).toBe('w1');
  });
});
