/**
 * Every registered algorithm against the same inputs.
 */

import { describe, it, expect } from 'vitest';
import { getAllAlgorithms } from '../../src/registry/algorithm-registry.js';
import { byKey } from '../../src/core/ordering.js';
import { createRng, randomIntegers, randomPermutation } from '../../src/bench/input-generator.js';

interface Item {
  key: number;
  order: number;
}

const scenarios: Array<{ name: string; input: number[]; expected: number[] }> = [
  {
    name: 'ten mixed-sign values',
    input: [3, 7, 1, 5, 2, -6, 15, 4, 33, -5],
    expected: [-6, -5, 1, 2, 3, 4, 5, 7, 15, 33],
  },
  {
    name: 'thirteen values with duplicates',
    input: [9, 9, 1, 8, 3, 0, 2, 0, 7, 15, 4, 3, 3],
    expected: [0, 0, 1, 2, 3, 3, 3, 4, 7, 8, 9, 9, 15],
  },
  { name: 'three values', input: [111, 333, 222], expected: [111, 222, 333] },
  { name: 'descending pair', input: [2, 1], expected: [1, 2] },
  { name: 'ascending pair', input: [1, 2], expected: [1, 2] },
  { name: 'singleton', input: [5], expected: [5] },
  { name: 'empty', input: [], expected: [] },
];

describe('all algorithms', () => {
  for (const algorithm of getAllAlgorithms()) {
    describe(algorithm.label, () => {
      for (const scenario of scenarios) {
        it(`sorts ${scenario.name}`, () => {
          const arr = [...scenario.input];
          algorithm.sort(arr);
          expect(arr).toEqual(scenario.expected);
        });
      }

      it('sorts a random permutation of 0..999', () => {
        const arr = randomPermutation(1000, createRng(2024));
        algorithm.sort(arr);
        expect(arr).toEqual(Array.from({ length: 1000 }, (_, i) => i));
      });

      it('keeps the multiset and is idempotent', () => {
        const input = randomIntegers(257, createRng(99), -50, 50);
        const expected = [...input].sort((a, b) => a - b);

        const once = [...input];
        algorithm.sort(once);
        expect(once).toEqual(expected);

        const twice = [...once];
        algorithm.sort(twice);
        expect(twice).toEqual(once);
      });

      if (algorithm.stable) {
        it('keeps equal keys in input order', () => {
          const rng = createRng(8);
          const items: Item[] = Array.from({ length: 200 }, (_, order) => ({ key: rng() % 7, order }));
          algorithm.sort(items, byKey((item: Item) => item.key));

          for (let i = 1; i < items.length; i++) {
            if (items[i].key === items[i - 1].key) {
              expect(items[i].order).toBeGreaterThan(items[i - 1].order);
            } else {
              expect(items[i].key).toBeGreaterThan(items[i - 1].key);
            }
          }
        });
      }
    });
  }
});
