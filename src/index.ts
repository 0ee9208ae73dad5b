export { OrderedMap } from './util/ordered-map.js';
export { MapCursor } from './util/cursor.js';
export type { ChainView } from './util/cursor.js';
export {
  compareNumbers,
  compareStrings,
  isCompletePolicy,
  makePolicy,
  valueTraits,
} from './util/policy.js';
export type {
  CloneFn,
  Comparator,
  ElementPolicy,
  ElementTraits,
  ReleaseFn,
} from './util/policy.js';
export { MapError, MapResult, isAbsent, resultName } from './util/result.js';
export type { Maybe } from './util/result.js';
export {
  copyMap,
  createMap,
  destroyMap,
  mapClear,
  mapContains,
  mapFirst,
  mapGet,
  mapNext,
  mapPut,
  mapRemove,
  mapSize,
} from './util/map-api.js';
export { StringWriter } from './util/writer.js';
export type { Writer } from './util/writer.js';
