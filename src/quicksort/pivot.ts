/**
 * Pivot selection. Each policy moves its pivot to the front of the
 * range, where both partition schemes expect it.
 */

import { defaultLess, type Less } from '../core/ordering.js';
import { midpoint, swap, type MutableSequence } from '../core/sequence.js';

/**
 * Middle-element pivot (K&R).
 */
export function bringMidToFront<T>(seq: MutableSequence<T>, first: number, last: number): void {
  swap(seq, first, midpoint(first, last));
}

function lesserIndex<T>(seq: MutableSequence<T>, p: number, q: number, less: Less<T>): number {
  return less(seq[q], seq[p]) ? q : p;
}

/**
 * Index holding the median of the elements at p, q and r.
 */
export function medianOfThree<T>(
  seq: MutableSequence<T>,
  p: number,
  q: number,
  r: number,
  less: Less<T> = defaultLess,
): number {
  if (less(seq[p], seq[q])) {
    return less(seq[p], seq[r]) ? lesserIndex(seq, q, r, less) : p;
  }
  return less(seq[q], seq[r]) ? lesserIndex(seq, p, r, less) : q;
}

/**
 * Median of the first, middle and last elements as pivot.
 */
export function bringMedianOfThreeToFront<T>(
  seq: MutableSequence<T>,
  first: number,
  last: number,
  less: Less<T> = defaultLess,
): void {
  swap(seq, first, medianOfThree(seq, first, midpoint(first, last), last - 1, less));
}
