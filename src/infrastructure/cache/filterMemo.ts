/**
 * Filter Memo
 *
 * Single-slot cache of the last filter result. It hits only when both
 * query strings are exactly the ones it was computed for.
 *
 * invalidate() also advances an epoch. A recomputation records the epoch
 * before it starts and its result is only stored if nothing invalidated the
 * memo in the meantime; otherwise the next query recomputes.
 */

import type { Query } from "../../domain/entities";

interface MemoSlot {
  glob: string;
  content: string;
  files: readonly string[];
}

export class FilterMemo {
  private slot: MemoSlot | null = null;
  private currentEpoch = 0;

  get epoch(): number {
    return this.currentEpoch;
  }

  lookup(query: Query): readonly string[] | undefined {
    if (
      this.slot &&
      this.slot.glob === query.glob &&
      this.slot.content === query.content
    ) {
      return this.slot.files;
    }
    return undefined;
  }

  /**
   * Store a result computed from the state at `epoch`.
   *
   * @returns Whether the result was stored
   */
  store(query: Query, files: readonly string[], epoch: number): boolean {
    if (epoch !== this.currentEpoch) {
      return false;
    }
    this.slot = { glob: query.glob, content: query.content, files };
    return true;
  }

  invalidate(): void {
    this.slot = null;
    this.currentEpoch++;
  }

  get isEmpty(): boolean {
    return this.slot === null;
  }
}
