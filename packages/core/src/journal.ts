/**
 * Undo log for one pass. Every table mutation made while a pass is open goes
 * through here so that an abandoned pass can be rolled back as a whole.
 */

export class Journal {
  private undo: Array<() => void> = [];
  private open = false;

  get isOpen(): boolean {
    return this.open;
  }

  begin(): void {
    if (this.open) {
      throw new Error('Journal is already open');
    }
    this.undo = [];
    this.open = true;
  }

  commit(): void {
    this.undo = [];
    this.open = false;
  }

  rollback(): void {
    for (let i = this.undo.length - 1; i >= 0; i--) {
      this.undo[i]?.();
    }
    this.undo = [];
    this.open = false;
  }

  private record(undo: () => void): void {
    if (this.open) {
      this.undo.push(undo);
    }
  }

  set<T extends object, K extends keyof T>(target: T, key: K, value: T[K]): void {
    const previous = target[key];
    if (Object.is(previous, value)) return;
    target[key] = value;
    this.record(() => {
      target[key] = previous;
    });
  }

  splice<T>(array: T[], start: number, deleteCount: number, ...items: T[]): T[] {
    const removed = array.splice(start, deleteCount, ...items);
    this.record(() => {
      array.splice(start, items.length, ...removed);
    });
    return removed;
  }

  addToSet<T>(set: Set<T>, value: T): void {
    if (set.has(value)) return;
    set.add(value);
    this.record(() => {
      set.delete(value);
    });
  }

  deleteFromSet<T>(set: Set<T>, value: T): void {
    if (!set.delete(value)) return;
    this.record(() => {
      set.add(value);
    });
  }

  push<T>(array: T[], value: T): void {
    array.push(value);
    this.record(() => {
      array.pop();
    });
  }
}
