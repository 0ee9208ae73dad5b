/**
 * @file chain.ts
 * @description The ordered singly linked chain behind OrderedMap.
 *
 * The chain hangs off a sentinel head that carries no key or data.  Reading
 * from `head.next` onward, keys are strictly increasing under the map's
 * comparator.  Every entry owns its key and data copies.
 */

import type { Comparator, ElementPolicy } from './policy.js';
import { isAbsent } from './result.js';

/** Anything that can precede an entry: the sentinel head or another entry. */
export interface Link<K, V> {
  next: ChainEntry<K, V> | null;
}

export class ChainEntry<K, V> implements Link<K, V> {
  key: K;
  data: V;
  next: ChainEntry<K, V> | null;

  constructor(key: K, data: V, next: ChainEntry<K, V> | null = null) {
    this.key = key;
    this.data = data;
    this.next = next;
  }
}

/** A fresh, empty sentinel head. */
export function makeHead<K, V>(): Link<K, V> {
  return { next: null };
}

/**
 * Result of a lookup.  `prev` is the link the key hangs off (when found) or
 * the link a new entry for the key must be spliced after (when not found).
 */
export type InsertionPoint<K, V> =
  | { found: true; prev: Link<K, V>; match: ChainEntry<K, V> }
  | { found: false; prev: Link<K, V> };

/**
 * Walk from `head` looking for `key`.  Stops at the first entry whose key
 * compares greater than `key`, so never scans past where `key` belongs.
 */
export function findInsertionPoint<K, V>(
  head: Link<K, V>,
  key: K,
  compare: Comparator<K>,
): InsertionPoint<K, V> {
  let cur: Link<K, V> = head;
  for (let nxt = cur.next; nxt !== null; nxt = cur.next) {
    const c = compare(key, nxt.key);
    if (c === 0) return { found: true, prev: cur, match: nxt };
    if (c < 0) break;
    cur = nxt;
  }
  return { found: false, prev: cur };
}

export function spliceAfter<K, V>(prev: Link<K, V>, entry: ChainEntry<K, V>): void {
  entry.next = prev.next;
  prev.next = entry;
}

/** Detach and return the entry following `prev`, or null at the tail. */
export function unlinkAfter<K, V>(prev: Link<K, V>): ChainEntry<K, V> | null {
  const victim = prev.next;
  if (victim === null) return null;
  prev.next = victim.next;
  victim.next = null;
  return victim;
}

export function releaseEntry<K, V>(entry: ChainEntry<K, V>, policy: ElementPolicy<K, V>): void {
  policy.releaseData(entry.data);
  policy.releaseKey(entry.key);
}

/** Release every entry from `first` to the tail, in chain order. */
export function releaseChain<K, V>(first: ChainEntry<K, V> | null, policy: ElementPolicy<K, V>): void {
  let cur = first;
  while (cur !== null) {
    const nxt: ChainEntry<K, V> | null = cur.next;
    cur.next = null;
    releaseEntry(cur, policy);
    cur = nxt;
  }
}

/**
 * Build a detached entry holding copies of `key` and `data`.
 * @returns null if either clone reports failure; nothing stays allocated then.
 */
export function cloneEntry<K, V>(key: K, data: V, policy: ElementPolicy<K, V>): ChainEntry<K, V> | null {
  const keyCopy = policy.cloneKey(key);
  if (isAbsent(keyCopy)) return null;
  let dataCopy: V | null | undefined;
  try {
    dataCopy = policy.cloneData(data);
  } catch (err) {
    policy.releaseKey(keyCopy);
    throw err;
  }
  if (isAbsent(dataCopy)) {
    policy.releaseKey(keyCopy);
    return null;
  }
  return new ChainEntry<K, V>(keyCopy, dataCopy);
}

export type ChainCopy<K, V> =
  | { ok: true; first: ChainEntry<K, V> | null }
  | { ok: false };

/**
 * Deep-copy the chain starting at `first`, preserving order.  On failure the
 * partial copy is released before returning (or before rethrowing, if a clone
 * threw).
 */
export function cloneChain<K, V>(first: ChainEntry<K, V> | null, policy: ElementPolicy<K, V>): ChainCopy<K, V> {
  const anchor = makeHead<K, V>();
  let tail: Link<K, V> = anchor;
  try {
    for (let src = first; src !== null; src = src.next) {
      const entry = cloneEntry(src.key, src.data, policy);
      if (entry === null) {
        releaseChain(anchor.next, policy);
        return { ok: false };
      }
      tail.next = entry;
      tail = entry;
    }
  } catch (err) {
    releaseChain(anchor.next, policy);
    throw err;
  }
  return { ok: true, first: anchor.next };
}
