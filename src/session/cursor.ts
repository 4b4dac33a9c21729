import type { Listing } from "../types.js";

export type CursorPosition =
  | { done: false; index: number; listing: Listing; total: number }
  | { done: true; total: number };

/**
 * Position in one user's result set. `index` stays within [0, length]; an index
 * equal to the length means the list is exhausted.
 */
export class ResultCursor {
  private position = 0;

  constructor(readonly listings: readonly Listing[]) {}

  get index(): number {
    return this.position;
  }

  get length(): number {
    return this.listings.length;
  }

  current(): CursorPosition {
    const listing = this.listings[this.position];
    if (listing === undefined) {
      return { done: true, total: this.listings.length };
    }
    return { done: false, index: this.position, listing, total: this.listings.length };
  }

  advance(): CursorPosition {
    this.position = Math.min(this.position + 1, this.listings.length);
    return this.current();
  }

  retreat(): CursorPosition {
    this.position = Math.max(this.position - 1, 0);
    return this.current();
  }

  /** Jumps to `index`, clamped into range. */
  seek(index: number): CursorPosition {
    const whole = Number.isFinite(index) ? Math.trunc(index) : 0;
    this.position = Math.min(Math.max(whole, 0), this.listings.length);
    return this.current();
  }

  at(index: number): Listing | undefined {
    return Number.isInteger(index) && index >= 0 ? this.listings[index] : undefined;
  }
}
