import { sameValue } from './equality.js';
import type { EqualityFn } from './equality.js';

/**
 * Single-entry memo for use outside a pass: keeps the last arguments and the
 * value computed from them.
 */
export class MemoCell<Args, T> {
  private last: { args: Args; value: T } | undefined;
  private computeCount = 0;

  constructor(private readonly equals: EqualityFn = sameValue) {}

  get hasValue(): boolean {
    return this.last !== undefined;
  }

  /** Number of times `compute` actually ran */
  get computations(): number {
    return this.computeCount;
  }

  get(args: Args, compute: (args: Args) => T): T {
    if (this.last && this.equals(this.last.args, args)) {
      return this.last.value;
    }
    const value = compute(args);
    this.computeCount++;
    this.last = { args, value };
    return value;
  }

  clear(): void {
    this.last = undefined;
  }
}
