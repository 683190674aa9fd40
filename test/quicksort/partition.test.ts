import { describe, it, expect } from 'vitest';
import { partitionHoare, partitionLomuto } from '../../src/quicksort/partition.js';
import { createRng, randomIntegers } from '../../src/bench/input-generator.js';

function sorted(values: number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

describe('partition', () => {
  describe('partitionLomuto', () => {
    it('puts the pivot in its final slot', () => {
      const arr = [4, 7, 1, 9, 3, 4, 2];
      const p = partitionLomuto(arr, 0, arr.length);

      expect(arr[p]).toBe(4);
      expect(p).toBe(3);
      for (let i = 0; i < p; i++) expect(arr[i]).toBeLessThan(4);
      for (let i = p + 1; i < arr.length; i++) expect(arr[i]).toBeGreaterThanOrEqual(4);
    });

    it('returns first when the pivot is the minimum', () => {
      const arr = [1, 5, 3];
      expect(partitionLomuto(arr, 0, 3)).toBe(0);
      expect(arr[0]).toBe(1);
    });

    it('works on a subrange', () => {
      const arr = [99, 5, 8, 2, -99];
      const p = partitionLomuto(arr, 1, 4);
      expect(p).toBe(2);
      expect(arr).toEqual([99, 2, 5, 8, -99]);
    });

    it('handles a single element', () => {
      const arr = [7];
      expect(partitionLomuto(arr, 0, 1)).toBe(0);
    });
  });

  describe('partitionHoare', () => {
    function expectValidBoundary(arr: number[], first: number, last: number, b: number): void {
      expect(b).toBeGreaterThan(first);
      expect(b).toBeLessThan(last);
      const leftMax = Math.max(...arr.slice(first, b));
      const rightMin = Math.min(...arr.slice(b, last));
      expect(leftMax).toBeLessThanOrEqual(rightMin);
    }

    it('splits a distinct input', () => {
      const arr = [5, 3, 8, 1, 9, 2, 7];
      const before = sorted(arr);
      const b = partitionHoare(arr, 0, arr.length);
      expectValidBoundary(arr, 0, arr.length, b);
      expect(sorted(arr)).toEqual(before);
    });

    it('splits an all-equal input near the middle', () => {
      const arr = [4, 4, 4, 4, 4, 4, 4, 4];
      const b = partitionHoare(arr, 0, arr.length);
      expect(b).toBe(4);
    });

    it('splits two elements', () => {
      const ascending = [1, 2];
      expect(partitionHoare(ascending, 0, 2)).toBe(1);

      const descending = [2, 1];
      expect(partitionHoare(descending, 0, 2)).toBe(1);
      expect(descending).toEqual([1, 2]);
    });

    it('returns first + 1 when the pivot is the unique minimum', () => {
      const arr = [0, 5, 6, 7];
      expect(partitionHoare(arr, 0, arr.length)).toBe(1);
      expect(arr).toEqual([0, 5, 6, 7]);
    });

    it('stays inside a subrange', () => {
      const arr = [-100, 3, 3, 1, 3, 100];
      const b = partitionHoare(arr, 1, 5);
      expectValidBoundary(arr, 1, 5, b);
      expect(arr[0]).toBe(-100);
      expect(arr[5]).toBe(100);
    });

    it('gives a valid boundary on duplicate-heavy and two-valued inputs', () => {
      const rng = createRng(42);
      for (let trial = 0; trial < 200; trial++) {
        const length = 2 + (rng() % 40);
        const arr = randomIntegers(length, rng, 0, trial % 2 === 0 ? 1 : 3);
        const before = sorted(arr);
        const b = partitionHoare(arr, 0, length);
        expectValidBoundary(arr, 0, length, b);
        expect(sorted(arr)).toEqual(before);
      }
    });
  });
});
