/**
 * @file policy.test.ts
 * @description Element policy helpers, result codes and the string writer.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  compareNumbers,
  compareStrings,
  isCompletePolicy,
  makePolicy,
  valueTraits,
} from '../../src/util/policy.js';
import { MapError, MapResult, isAbsent, resultName } from '../../src/util/result.js';
import { StringWriter } from '../../src/util/writer.js';

describe('comparators', () => {
  it('compareNumbers orders numerically', () => {
    expect(compareNumbers(1, 2)).toBe(-1);
    expect(compareNumbers(2, 1)).toBe(1);
    expect(compareNumbers(-3, -3)).toBe(0);
    expect([10, 9, 100].sort(compareNumbers)).toEqual([9, 10, 100]);
  });

  it('compareStrings orders by code unit', () => {
    expect(compareStrings('a', 'b')).toBe(-1);
    expect(compareStrings('b', 'B')).toBe(1);
    expect(compareStrings('x', 'x')).toBe(0);
  });
});

describe('policies', () => {
  it('valueTraits clones by identity and releases nothing', () => {
    const traits = valueTraits<string>();
    expect(traits.clone('abc')).toBe('abc');
    expect(traits.release('abc')).toBeUndefined();
  });

  it('makePolicy routes key and data traits', () => {
    const keyTraits = { clone: (k: number) => k + 0, release: vi.fn() };
    const dataTraits = { clone: (d: string) => `${d}`, release: vi.fn() };
    const policy = makePolicy(keyTraits, dataTraits, compareNumbers);
    expect(policy.cloneKey).toBe(keyTraits.clone);
    expect(policy.cloneData).toBe(dataTraits.clone);
    policy.releaseKey(4);
    policy.releaseData('four');
    expect(keyTraits.release).toHaveBeenCalledWith(4);
    expect(dataTraits.release).toHaveBeenCalledWith('four');
    expect(policy.compare).toBe(compareNumbers);
  });

  it('isCompletePolicy detects missing members', () => {
    const policy = makePolicy(valueTraits<number>(), valueTraits<number>(), compareNumbers);
    expect(isCompletePolicy(policy)).toBe(true);
    expect(isCompletePolicy(null)).toBe(false);
    Reflect.deleteProperty(policy, 'compare');
    expect(isCompletePolicy(policy)).toBe(false);
  });
});

describe('results', () => {
  it('names every result code', () => {
    expect(resultName(MapResult.Success)).toBe('SUCCESS');
    expect(resultName(MapResult.NullArgument)).toBe('NULL_ARGUMENT');
    expect(resultName(MapResult.OutOfMemory)).toBe('OUT_OF_MEMORY');
    expect(resultName(MapResult.ItemNotFound)).toBe('ITEM_NOT_FOUND');
  });

  it('MapError carries its result', () => {
    const err = new MapError(MapResult.OutOfMemory, 'no room');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('MapError');
    expect(err.message).toBe('OUT_OF_MEMORY: no room');
    expect(err.explain).toBe('no room');
    expect(err.result).toBe(MapResult.OutOfMemory);
  });

  it('isAbsent is true only for null and undefined', () => {
    expect(isAbsent(null)).toBe(true);
    expect(isAbsent(undefined)).toBe(true);
    expect(isAbsent(0)).toBe(false);
    expect(isAbsent('')).toBe(false);
  });
});

describe('StringWriter', () => {
  it('accumulates and clears', () => {
    const w = new StringWriter();
    w.write('a');
    w.write('b');
    expect(w.toString()).toBe('ab');
    w.clear();
    expect(w.toString()).toBe('');
  });
});
