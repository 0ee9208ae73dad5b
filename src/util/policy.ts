/**
 * @file policy.ts
 * @description Element policy for OrderedMap: how keys and data are copied,
 * released and ordered. The container never looks inside a key or a data
 * value; everything it does to them goes through these callbacks.
 */

/** Comparator function: negative ⇒ a < b, 0 ⇒ equal, positive ⇒ a > b. */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Produce an independently owned copy of `value`.
 * Returning `null` or `undefined` reports an allocation failure.
 */
export type CloneFn<T> = (value: T) => T | null | undefined;

/** Dispose of a copy previously produced by the matching CloneFn. */
export type ReleaseFn<T> = (value: T) => void;

/** Clone/release pair for one element kind. */
export interface ElementTraits<T> {
  clone: CloneFn<T>;
  release: ReleaseFn<T>;
}

/**
 * The full policy a map is constructed with.  Held for the map's lifetime
 * and shared (not copied) with maps produced by `copy()`.
 */
export interface ElementPolicy<K, V> {
  cloneKey: CloneFn<K>;
  cloneData: CloneFn<V>;
  releaseKey: ReleaseFn<K>;
  releaseData: ReleaseFn<V>;
  compare: Comparator<K>;
}

/** Assemble a policy from per-kind traits and a key comparator. */
export function makePolicy<K, V>(
  key: ElementTraits<K>,
  data: ElementTraits<V>,
  compare: Comparator<K>,
): ElementPolicy<K, V> {
  return {
    cloneKey: key.clone,
    cloneData: data.clone,
    releaseKey: key.release,
    releaseData: data.release,
    compare,
  };
}

/**
 * Traits for immutable values (numbers, strings, bigints, frozen objects):
 * the value is its own copy and there is nothing to release.
 */
export function valueTraits<T>(): ElementTraits<T> {
  return {
    clone: (value: T) => value,
    release: () => {},
  };
}

export const compareNumbers: Comparator<number> = (a, b) => (a < b ? -1 : a > b ? 1 : 0);

export const compareStrings: Comparator<string> = (a, b) => (a < b ? -1 : a > b ? 1 : 0);

/** True when every member of the policy is callable. */
export function isCompletePolicy<K, V>(policy: ElementPolicy<K, V> | null | undefined): boolean {
  if (policy === null || policy === undefined) return false;
  return typeof policy.cloneKey === 'function'
    && typeof policy.cloneData === 'function'
    && typeof policy.releaseKey === 'function'
    && typeof policy.releaseData === 'function'
    && typeof policy.compare === 'function';
}
