/**
 * @file ordered-map.ts
 * @description OrderedMap<K,V>: a sorted associative container over
 * caller-defined key and data types.
 *
 * Entries live on a singly linked chain in strictly ascending key order,
 * anchored by a sentinel head.  The map owns a copy of every key and data
 * value it stores; copies are made and disposed of through the ElementPolicy
 * given at construction.
 *
 * Contract summary:
 *   - Lookup is a linear scan that stops early once past the key's position.
 *   - Failures are reported as MapResult codes; a failed operation leaves the
 *     map exactly as it was.
 *   - Every successful mutation (put, remove, clear, copy) invalidates the
 *     built-in cursor and every cursor opened with `cursor()`.
 *   - After `destroy()` the map behaves as an absent map: sizes report -1,
 *     lookups report nothing, mutations report NullArgument.
 */

import {
  cloneChain,
  cloneEntry,
  findInsertionPoint,
  makeHead,
  releaseChain,
  releaseEntry,
  spliceAfter,
  unlinkAfter,
} from './chain.js';
import type { ChainEntry, Link } from './chain.js';
import { MapCursor } from './cursor.js';
import type { ChainView } from './cursor.js';
import { isCompletePolicy } from './policy.js';
import type { ElementPolicy } from './policy.js';
import { MapError, MapResult, isAbsent } from './result.js';
import type { Maybe } from './result.js';
import type { Writer } from './writer.js';

export class OrderedMap<K, V> implements ChainView<K, V> {
  /** @internal */ _head: Link<K, V> | null;
  /** @internal */ _size: number;
  /** @internal */ _generation: number;
  private readonly _policy: Readonly<ElementPolicy<K, V>>;
  private readonly _cursor: MapCursor<K, V>;

  /**
   * @throws MapError with `MapResult.NullArgument` if any policy member is
   *         missing.
   */
  constructor(policy: ElementPolicy<K, V>) {
    if (!isCompletePolicy(policy)) {
      throw new MapError(MapResult.NullArgument, 'element policy is missing a callback');
    }
    this._policy = Object.freeze({
      cloneKey: policy.cloneKey,
      cloneData: policy.cloneData,
      releaseKey: policy.releaseKey,
      releaseData: policy.releaseData,
      compare: policy.compare,
    });
    this._head = makeHead<K, V>();
    this._size = 0;
    this._generation = 0;
    this._cursor = new MapCursor<K, V>(this);
  }

  // -- ChainView ----------------------------------------------------------

  /** @internal */
  get head(): Link<K, V> | null {
    return this._head;
  }

  /** @internal */
  get generation(): number {
    return this._generation;
  }

  // -- Capacity -----------------------------------------------------------

  /** Number of entries, or -1 once the map has been destroyed. */
  get size(): number {
    return this._head === null ? -1 : this._size;
  }

  getSize(): number {
    return this.size;
  }

  /** False once destroyed: a destroyed map is absent, not empty. */
  get empty(): boolean {
    return this._head !== null && this._size === 0;
  }

  get destroyed(): boolean {
    return this._head === null;
  }

  /** The policy this map was built with (frozen).  Copies share its callbacks. */
  get policy(): Readonly<ElementPolicy<K, V>> {
    return this._policy;
  }

  // -- Lookup -------------------------------------------------------------

  contains(key: Maybe<K>): boolean {
    if (this._head === null || isAbsent(key)) return false;
    return findInsertionPoint(this._head, key, this._policy.compare).found;
  }

  /**
   * The stored data for `key`, by reference (the map keeps ownership), or
   * undefined if the key is absent or not present.
   */
  get(key: Maybe<K>): V | undefined {
    if (this._head === null || isAbsent(key)) return undefined;
    const point = findInsertionPoint(this._head, key, this._policy.compare);
    return point.found ? point.match.data : undefined;
  }

  // -- Modifiers ----------------------------------------------------------

  /**
   * Insert a copy of `key`/`data`, or replace the data stored under an
   * existing key with a copy of `data` (the stored key is kept).
   *
   * The replacement copy is made before the old data is released, so a
   * failed clone leaves the old data in place.
   */
  put(key: Maybe<K>, data: Maybe<V>): MapResult {
    if (this._head === null || isAbsent(key) || isAbsent(data)) return MapResult.NullArgument;
    const policy = this._policy;
    const point = findInsertionPoint(this._head, key, policy.compare);
    if (point.found) {
      const fresh = policy.cloneData(data);
      if (isAbsent(fresh)) return MapResult.OutOfMemory;
      const old = point.match.data;
      point.match.data = fresh;
      policy.releaseData(old);
    } else {
      const entry = cloneEntry(key, data, policy);
      if (entry === null) return MapResult.OutOfMemory;
      spliceAfter(point.prev, entry);
      this._size++;
    }
    this._touch();
    return MapResult.Success;
  }

  remove(key: Maybe<K>): MapResult {
    if (this._head === null || isAbsent(key)) return MapResult.NullArgument;
    const point = findInsertionPoint(this._head, key, this._policy.compare);
    if (!point.found) return MapResult.ItemNotFound;
    const victim = unlinkAfter(point.prev);
    this._size--;
    this._touch();
    if (victim !== null) releaseEntry(victim, this._policy);
    return MapResult.Success;
  }

  /** Release every entry.  The policy stays; the map remains usable. */
  clear(): MapResult {
    if (this._head === null) return MapResult.NullArgument;
    const first = this._head.next;
    this._head.next = null;
    this._size = 0;
    this._touch();
    releaseChain(first, this._policy);
    return MapResult.Success;
  }

  /** Clear, then drop the sentinel.  Calling it again is a no-op. */
  destroy(): void {
    if (this._head === null) return;
    this.clear();
    this._head = null;
    this._touch();
  }

  /**
   * Deep copy: a new map sharing this map's policy, holding copies of every
   * entry in the same order.
   * @returns `[copy, Success]`, or `[undefined, OutOfMemory]` if a clone
   *          failed (nothing of the partial copy survives), or
   *          `[undefined, NullArgument]` on a destroyed map.
   *
   * A successful copy invalidates the cursors of both maps.
   */
  copy(): [OrderedMap<K, V> | undefined, MapResult] {
    if (this._head === null) return [undefined, MapResult.NullArgument];
    const chain = cloneChain(this._head.next, this._policy);
    if (!chain.ok) return [undefined, MapResult.OutOfMemory];
    const dup = new OrderedMap<K, V>(this._policy);
    if (dup._head !== null) dup._head.next = chain.first;
    dup._size = this._size;
    dup._touch();
    this._touch();
    return [dup, MapResult.Success];
  }

  // -- Iteration ----------------------------------------------------------

  /** Position the built-in cursor on the smallest key and return it. */
  first(): K | undefined {
    return this._cursor.first();
  }

  /** Advance the built-in cursor; undefined at the end or after a mutation. */
  next(): K | undefined {
    return this._cursor.next();
  }

  /** Open an independent cursor, unset until its `first()` is called. */
  cursor(): MapCursor<K, V> {
    return new MapCursor<K, V>(this);
  }

  /**
   * Iterate `[key, data]` references in key order.  Iteration ends early if
   * the map is mutated while the generator is suspended.
   */
  *entries(): IterableIterator<[K, V]> {
    const gen = this._generation;
    let cur: ChainEntry<K, V> | null = this._head === null ? null : this._head.next;
    while (cur !== null && gen === this._generation) {
      yield [cur.key, cur.data];
      cur = cur.next;
    }
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.entries()) {
      yield key;
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  // -- Diagnostics --------------------------------------------------------

  /** Dump the map, one `key -> data` line per entry. */
  printRaw(
    s: Writer,
    fmtKey: (key: K) => string = String,
    fmtData: (data: V) => string = String,
  ): void {
    if (this._head === null) {
      s.write('OrderedMap (destroyed)\n');
      return;
    }
    s.write(`OrderedMap size=${this._size}\n`);
    for (let cur = this._head.next; cur !== null; cur = cur.next) {
      s.write(`  ${fmtKey(cur.key)} -> ${fmtData(cur.data)}\n`);
    }
  }

  /** @internal */
  private _touch(): void {
    this._generation++;
  }
}
