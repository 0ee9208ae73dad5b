/**
 * @file result.ts
 * @description Outcome codes and the error class used by OrderedMap.
 */

/** Outcome of a mutating map operation. */
export enum MapResult {
  Success = 0,
  NullArgument = 1,
  OutOfMemory = 2,
  ItemNotFound = 3,
}

const RESULT_NAMES: Record<MapResult, string> = {
  [MapResult.Success]: 'SUCCESS',
  [MapResult.NullArgument]: 'NULL_ARGUMENT',
  [MapResult.OutOfMemory]: 'OUT_OF_MEMORY',
  [MapResult.ItemNotFound]: 'ITEM_NOT_FOUND',
};

/** Upper-case name of a result code, for diagnostics. */
export function resultName(result: MapResult): string {
  return RESULT_NAMES[result];
}

/** A value a caller may fail to supply. */
export type Maybe<T> = T | null | undefined;

export function isAbsent<T>(value: Maybe<T>): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Raised where a result code cannot be returned, i.e. from the OrderedMap
 * constructor.
 */
export class MapError extends Error {
  readonly result: MapResult;
  explain: string;

  constructor(result: MapResult, message: string) {
    super(`${resultName(result)}: ${message}`);
    this.name = 'MapError';
    this.result = result;
    this.explain = message;
  }
}
