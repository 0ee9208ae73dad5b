/**
 * Element policy for tests that counts outstanding copies and can be told to
 * fail or throw on the next clone.
 */
import type { ElementPolicy } from '../../src/util/policy.js';

export interface Key { id: number }
export interface Text { text: string }

export const key = (id: number): Key => ({ id });
export const text = (s: string): Text => ({ text: s });

export class Tracker {
  liveKeys = 0;
  liveData = 0;
  /** Remaining successful clones before a clone reports failure. */
  keyClonesLeft = Infinity;
  dataClonesLeft = Infinity;
  throwOnDataClone = false;
  releasedData: string[] = [];
  releasedKeys: number[] = [];

  policy(): ElementPolicy<Key, Text> {
    return {
      cloneKey: (k) => {
        if (this.keyClonesLeft <= 0) return null;
        this.keyClonesLeft--;
        this.liveKeys++;
        return { id: k.id };
      },
      cloneData: (d) => {
        if (this.throwOnDataClone) throw new Error('data clone exploded');
        if (this.dataClonesLeft <= 0) return undefined;
        this.dataClonesLeft--;
        this.liveData++;
        return { text: d.text };
      },
      releaseKey: (k) => {
        this.liveKeys--;
        this.releasedKeys.push(k.id);
      },
      releaseData: (d) => {
        this.liveData--;
        this.releasedData.push(d.text);
      },
      compare: (a, b) => a.id - b.id,
    };
  }
}
