import { describe, it, expect } from 'vitest';
import {
  mergesortBottomUp,
  mergesortTopDown,
  mergesortTopDownIterative,
} from '../../src/mergesort/mergesort.js';
import { createRng, randomIntegers } from '../../src/bench/input-generator.js';
import type { Less } from '../../src/core/ordering.js';

interface Keyed {
  key: number;
  index: number;
}

const byKeyOnly: Less<Keyed> = (a, b) => a.key < b.key;

function recordingLess(log: string[]): Less<number> {
  return (a, b) => {
    log.push(`${a}<${b}`);
    return a < b;
  };
}

describe('mergesort', () => {
  const variants = [
    ['mergesortTopDown', mergesortTopDown],
    ['mergesortTopDownIterative', mergesortTopDownIterative],
    ['mergesortBottomUp', mergesortBottomUp],
  ] as const;

  for (const [name, sort] of variants) {
    describe(name, () => {
      it('sorts lengths 0 through 40', () => {
        const rng = createRng(11);
        for (let n = 0; n <= 40; n++) {
          const arr = randomIntegers(n, rng, -20, 20);
          const expected = [...arr].sort((a, b) => a - b);
          sort(arr);
          expect(arr).toEqual(expected);
        }
      });

      it('is stable on many duplicate keys', () => {
        const rng = createRng(3);
        const arr: Keyed[] = Array.from({ length: 300 }, (_, index) => ({
          key: rng() % 5,
          index,
        }));
        sort(arr, byKeyOnly);

        for (let i = 1; i < arr.length; i++) {
          const prev = arr[i - 1];
          const cur = arr[i];
          expect(prev.key < cur.key || (prev.key === cur.key && prev.index < cur.index)).toBe(true);
        }
      });
    });
  }

  it('top-down iterative makes the same comparisons as top-down recursive', () => {
    const input = randomIntegers(57, createRng(21), 0, 30);

    const recursiveLog: string[] = [];
    mergesortTopDown([...input], recordingLess(recursiveLog));

    const iterativeLog: string[] = [];
    mergesortTopDownIterative([...input], recordingLess(iterativeLog));

    expect(iterativeLog).toEqual(recursiveLog);
  });

  it('bottom-up handles a short final run', () => {
    const arr = [5, 4, 3, 2, 1];
    mergesortBottomUp(arr);
    expect(arr).toEqual([1, 2, 3, 4, 5]);
  });
});
