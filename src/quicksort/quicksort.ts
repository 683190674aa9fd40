/**
 * Quicksort variants: {Lomuto with middle pivot, Lomuto with
 * median-of-three pivot, Hoare with median-of-three pivot}, each in a
 * recursive and an explicit-stack form. None is stable, and all degrade
 * to quadratic time on adversarial input.
 */

import { defaultLess, type Less } from '../core/ordering.js';
import { RangeStack } from '../core/range-stack.js';
import { swap, type MutableSequence } from '../core/sequence.js';
import { partitionHoare, partitionLomuto } from './partition.js';
import { bringMedianOfThreeToFront, bringMidToFront } from './pivot.js';

export type QuicksortScheme = 'lomuto-simple' | 'lomuto-median3' | 'hoare-median3';

/**
 * Partition [first, last) under `scheme`. Returns the end of the left
 * subrange and the start of the right one, or null when the range is
 * already sorted and nothing is left to recurse into.
 */
export function splitRange<T>(
  seq: MutableSequence<T>,
  first: number,
  last: number,
  less: Less<T>,
  scheme: QuicksortScheme,
): [number, number] | null {
  const length = last - first;
  if (length < 2) return null;

  if (scheme === 'lomuto-simple') {
    bringMidToFront(seq, first, last);
    const pivot = partitionLomuto(seq, first, last, less);
    return [pivot, pivot + 1];
  }

  // Median-of-three needs three distinct positions.
  if (length === 2) {
    if (less(seq[first + 1], seq[first])) swap(seq, first, first + 1);
    return null;
  }

  bringMedianOfThreeToFront(seq, first, last, less);

  if (scheme === 'lomuto-median3') {
    const pivot = partitionLomuto(seq, first, last, less);
    return [pivot, pivot + 1];
  }

  const boundary = partitionHoare(seq, first, last, less);
  return [boundary, boundary];
}

function quicksortRecursive<T>(
  seq: MutableSequence<T>,
  first: number,
  last: number,
  less: Less<T>,
  scheme: QuicksortScheme,
): void {
  const split = splitRange(seq, first, last, less, scheme);
  if (split === null) return;

  quicksortRecursive(seq, first, split[0], less, scheme);
  quicksortRecursive(seq, split[1], last, less, scheme);
}

function quicksortIterative<T>(seq: MutableSequence<T>, less: Less<T>, scheme: QuicksortScheme): void {
  const pending = new RangeStack();
  pending.push(0, seq.length);

  for (let range = pending.pop(); range !== undefined; range = pending.pop()) {
    const { first, last } = range;
    const split = splitRange(seq, first, last, less, scheme);
    if (split === null) continue;

    pending.push(split[1], last);
    pending.push(first, split[0]);
  }
}

/**
 * Lomuto partition, middle-element pivot (K&R 2nd ed., p. 87).
 */
export function quicksortLomutoSimple<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  quicksortRecursive(seq, 0, seq.length, less, 'lomuto-simple');
}

export function quicksortLomutoSimpleIterative<T>(
  seq: MutableSequence<T>,
  less: Less<T> = defaultLess,
): void {
  quicksortIterative(seq, less, 'lomuto-simple');
}

/**
 * Lomuto partition, median-of-three pivot.
 */
export function quicksortLomuto<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  quicksortRecursive(seq, 0, seq.length, less, 'lomuto-median3');
}

export function quicksortLomutoIterative<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  quicksortIterative(seq, less, 'lomuto-median3');
}

/**
 * Hoare partition, median-of-three pivot.
 */
export function quicksortHoare<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  quicksortRecursive(seq, 0, seq.length, less, 'hoare-median3');
}

export function quicksortHoareIterative<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  quicksortIterative(seq, less, 'hoare-median3');
}
