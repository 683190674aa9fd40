/**
 * Mergesort in three traversal orders. All three share one auxiliary
 * buffer per call, are stable, and give identical output.
 */

import { defaultLess, type Less } from '../core/ordering.js';
import { RangeStack } from '../core/range-stack.js';
import { midpoint, possiblyUnsorted, type MutableSequence } from '../core/sequence.js';
import { merge } from './merge.js';

/**
 * Top-down mergesort on the call stack.
 */
export function mergesortTopDown<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  const aux: T[] = [];

  const sortRange = (first: number, last: number): void => {
    if (!possiblyUnsorted(first, last)) return;

    const mid = midpoint(first, last);
    sortRange(first, mid);
    sortRange(mid, last);
    merge(seq, aux, first, mid, last, less);
  };

  sortRange(0, seq.length);
}

/**
 * Top-down mergesort with an explicit stack. Performs the same merges in
 * the same order as mergesortTopDown.
 *
 * Each stacked range is visited twice: once on the way down, and again
 * after its left half is sorted. The second visit either descends into
 * the right half or, when the right half was the range merged last (or
 * needs no sorting), merges both halves and pops.
 */
export function mergesortTopDownIterative<T>(
  seq: MutableSequence<T>,
  less: Less<T> = defaultLess,
): void {
  const aux: T[] = [];
  const pending = new RangeStack();

  let first = 0;
  let last = seq.length;
  // Last merged range; [length, length) never matches a right half.
  let mergedFirst = seq.length;
  let mergedLast = seq.length;

  while (first !== last || !pending.isEmpty()) {
    // Go left as far as possible.
    for (; first !== last; last = midpoint(first, last)) {
      pending.push(first, last);
    }

    const top = pending.peek();
    if (top === undefined) break;

    const mid = midpoint(top.first, top.last);

    if (possiblyUnsorted(mid, top.last) && (mid !== mergedFirst || top.last !== mergedLast)) {
      first = mid;
      last = top.last;
    } else {
      merge(seq, aux, top.first, mid, top.last, less);
      mergedFirst = top.first;
      mergedLast = top.last;
      pending.pop();
    }
  }
}

/**
 * Bottom-up mergesort: merge runs of width 1, 2, 4, ... until one run
 * covers everything. The last right run of a pass may be short.
 */
export function mergesortBottomUp<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  const length = seq.length;
  const aux: T[] = [];

  for (let width = 1; width < length; width *= 2) {
    for (let first1 = 0; first1 + width < length; first1 += 2 * width) {
      const first2 = first1 + width;
      const last2 = Math.min(first2 + width, length);
      merge(seq, aux, first1, first2, last2, less);
    }
  }
}
