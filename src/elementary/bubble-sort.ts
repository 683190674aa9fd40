/**
 * Bubble sort in three flavours, differing only in how the scanned
 * range shrinks between passes. All are stable.
 */

import { defaultLess, type Less } from '../core/ordering.js';
import { swap, type MutableSequence } from '../core/sequence.js';

/**
 * Classic bubble sort: full passes until one makes no swap.
 */
export function bubbleSort<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  if (seq.length < 2) return;

  for (let again = true; again; ) {
    again = false;

    for (let right = 1; right < seq.length; right++) {
      if (less(seq[right], seq[right - 1])) {
        swap(seq, right - 1, right);
        again = true;
      }
    }
  }
}

/**
 * Each pass parks the maximum at the end, so the range shrinks by one
 * whether or not anything moved.
 */
export function bubbleSortNonAdaptive<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  for (let end = seq.length; end > 1; end--) {
    for (let right = 1; right < end; right++) {
      if (less(seq[right], seq[right - 1])) swap(seq, right - 1, right);
    }
  }
}

/**
 * Everything from the last swap position onward is already in place,
 * so the next pass stops there.
 */
export function bubbleSortAdaptive<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  let end = seq.length;

  while (end > 1) {
    let lastSwap = 0;

    for (let right = 1; right < end; right++) {
      if (less(seq[right], seq[right - 1])) {
        swap(seq, right - 1, right);
        lastSwap = right;
      }
    }

    end = lastSwap;
  }
}
