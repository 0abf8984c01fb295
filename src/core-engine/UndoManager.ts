/**
 * Undo Manager for the Klondike engine.
 *
 * Keeps a bounded linear history of full state snapshots. Each
 * snapshot is an independent copy produced by the supplied clone
 * function, so restoring one never aliases live state.
 *
 * - `push(state)` copies the state onto the stack. Once the stack
 *   exceeds its capacity the OLDEST snapshot is evicted, preserving
 *   the most recent undo depth.
 * - `pop()` removes and returns the most recent snapshot, or
 *   `undefined` when there is nothing to undo.
 * - `discard()` withdraws the snapshot just pushed for an attempt
 *   that failed, bringing back any snapshot that push evicted, so a
 *   failed attempt leaves the history exactly as it was.
 */

/** Default number of snapshots retained. */
export const DEFAULT_UNDO_CAPACITY = 100;

export interface UndoManagerOptions<T> {
  /** Produces an independent deep copy of a state. */
  clone: (state: T) => T;
  /** Maximum snapshots retained (defaults to 100). */
  capacity?: number;
}

export class UndoManager<T> {
  private readonly stack: T[] = [];
  /** Snapshot evicted by the latest push, until the next change. */
  private evicted: T | undefined;
  private readonly clone: (state: T) => T;
  readonly capacity: number;

  /**
   * @throws If `capacity` is not a positive integer.
   */
  constructor(options: UndoManagerOptions<T>) {
    const capacity = options.capacity ?? DEFAULT_UNDO_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(
        `Undo capacity must be a positive integer, got ${capacity}`,
      );
    }
    this.capacity = capacity;
    this.clone = options.clone;
  }

  /** Copy `state` onto the history, evicting the oldest past capacity. */
  push(state: T): void {
    this.stack.push(this.clone(state));
    this.evicted = undefined;
    if (this.stack.length > this.capacity) {
      this.evicted = this.stack.shift();
    }
  }

  /** Remove and return the most recent snapshot. */
  pop(): T | undefined {
    this.evicted = undefined;
    return this.stack.pop();
  }

  /**
   * Undo the latest `push`: drop its snapshot and restore the oldest
   * snapshot it evicted.
   */
  discard(): void {
    this.stack.pop();
    if (this.evicted !== undefined) {
      this.stack.unshift(this.evicted);
      this.evicted = undefined;
    }
  }

  /** Whether there are snapshots that can be restored. */
  canUndo(): boolean {
    return this.stack.length > 0;
  }

  /** Number of snapshots in the history. */
  get size(): number {
    return this.stack.length;
  }

  /** Clear all history. */
  clear(): void {
    this.stack.length = 0;
    this.evicted = undefined;
  }
}
