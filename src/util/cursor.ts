/// \file cursor.ts
/// \brief Forward-only cursor over an OrderedMap chain

import type { ChainEntry, Link } from './chain.js';

/** What a cursor needs to see of its map. */
export interface ChainView<K, V> {
  /** Sentinel head, or null once the map has been destroyed. */
  readonly head: Link<K, V> | null;
  /** Bumped by every mutation of the map. */
  readonly generation: number;
}

/**
 * A single iteration position.  The cursor remembers the map generation at
 * which it was positioned; once the map mutates, the cursor is unset and
 * `next()` yields undefined until `first()` is called again.
 *
 * Keys are returned by reference.
 */
export class MapCursor<K, V> {
  private view: ChainView<K, V>;
  private entry: ChainEntry<K, V> | null = null;
  private generation = -1;

  constructor(view: ChainView<K, V>) {
    this.view = view;
  }

  /** True when positioned on a live entry of the current generation. */
  get valid(): boolean {
    return this.entry !== null && this.generation === this.view.generation;
  }

  /** Key under the cursor, or undefined when not valid. */
  get key(): K | undefined {
    return this.valid && this.entry !== null ? this.entry.key : undefined;
  }

  /** Data under the cursor, or undefined when not valid. */
  get data(): V | undefined {
    return this.valid && this.entry !== null ? this.entry.data : undefined;
  }

  /** Position on the first entry and return its key; unset if there is none. */
  first(): K | undefined {
    const head = this.view.head;
    if (head === null || head.next === null) {
      this.reset();
      return undefined;
    }
    this.entry = head.next;
    this.generation = this.view.generation;
    return this.entry.key;
  }

  /**
   * Advance and return the next key.  At the last entry this returns
   * undefined and stays where it is.
   */
  next(): K | undefined {
    if (!this.valid || this.entry === null) {
      this.reset();
      return undefined;
    }
    const nxt = this.entry.next;
    if (nxt === null) return undefined;
    this.entry = nxt;
    return nxt.key;
  }

  reset(): void {
    this.entry = null;
    this.generation = -1;
  }
}
