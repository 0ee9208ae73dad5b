/**
 * @file map-api.ts
 * @description Free-function interface to OrderedMap for callers holding a
 * map reference that may be absent.  Each function answers for an absent map
 * with the value a caller can check: -1, false, undefined, null or
 * MapResult.NullArgument.
 */

import { OrderedMap } from './ordered-map.js';
import type { CloneFn, Comparator, ReleaseFn } from './policy.js';
import { MapResult, isAbsent } from './result.js';
import type { Maybe } from './result.js';

type MapRef<K, V> = Maybe<OrderedMap<K, V>>;

/** New empty map, or null if any callback is missing. */
export function createMap<K, V>(
  cloneData: Maybe<CloneFn<V>>,
  cloneKey: Maybe<CloneFn<K>>,
  releaseData: Maybe<ReleaseFn<V>>,
  releaseKey: Maybe<ReleaseFn<K>>,
  compare: Maybe<Comparator<K>>,
): OrderedMap<K, V> | null {
  if (isAbsent(cloneData) || isAbsent(cloneKey) || isAbsent(releaseData)
    || isAbsent(releaseKey) || isAbsent(compare)) {
    return null;
  }
  return new OrderedMap<K, V>({ cloneKey, cloneData, releaseKey, releaseData, compare });
}

export function destroyMap<K, V>(map: MapRef<K, V>): void {
  if (isAbsent(map)) return;
  map.destroy();
}

/** Deep copy, or null if the map is absent or a clone failed. */
export function copyMap<K, V>(map: MapRef<K, V>): OrderedMap<K, V> | null {
  if (isAbsent(map)) return null;
  const [dup] = map.copy();
  return dup ?? null;
}

export function mapSize<K, V>(map: MapRef<K, V>): number {
  return isAbsent(map) ? -1 : map.size;
}

export function mapContains<K, V>(map: MapRef<K, V>, key: Maybe<K>): boolean {
  return isAbsent(map) ? false : map.contains(key);
}

export function mapPut<K, V>(map: MapRef<K, V>, key: Maybe<K>, data: Maybe<V>): MapResult {
  return isAbsent(map) ? MapResult.NullArgument : map.put(key, data);
}

export function mapGet<K, V>(map: MapRef<K, V>, key: Maybe<K>): V | undefined {
  return isAbsent(map) ? undefined : map.get(key);
}

export function mapRemove<K, V>(map: MapRef<K, V>, key: Maybe<K>): MapResult {
  return isAbsent(map) ? MapResult.NullArgument : map.remove(key);
}

export function mapFirst<K, V>(map: MapRef<K, V>): K | undefined {
  return isAbsent(map) ? undefined : map.first();
}

export function mapNext<K, V>(map: MapRef<K, V>): K | undefined {
  return isAbsent(map) ? undefined : map.next();
}

export function mapClear<K, V>(map: MapRef<K, V>): MapResult {
  return isAbsent(map) ? MapResult.NullArgument : map.clear();
}
