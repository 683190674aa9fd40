/**
 * Insertion sort and its variants. All are stable: an element is never
 * moved in front of an equal one.
 */

import { defaultLess, type Less } from '../core/ordering.js';
import { rotate, swap, type MutableSequence } from '../core/sequence.js';

/**
 * Insertion sort: lift each element out, shift greater predecessors
 * right by one, drop it into the hole.
 */
export function insertionSort<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  for (let right = 1; right < seq.length; right++) {
    const elem = seq[right];

    let left = right;
    for (; left > 0 && less(elem, seq[left - 1]); left--) {
      seq[left] = seq[left - 1];
    }

    seq[left] = elem;
  }
}

/**
 * Insertion sort by adjacent swaps instead of a buffered element.
 */
export function insertionSortBySwap<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  for (let right = 1; right < seq.length; right++) {
    for (let left = right; left > 0 && less(seq[left], seq[left - 1]); left--) {
      swap(seq, left, left - 1);
    }
  }
}

/**
 * First position in [first, last) whose element is greater than `value`.
 * Equal elements are skipped, which keeps binary insertion stable.
 */
export function upperBound<T>(
  seq: MutableSequence<T>,
  first: number,
  last: number,
  value: T,
  less: Less<T> = defaultLess,
): number {
  let count = last - first;

  while (count > 0) {
    const step = Math.floor(count / 2);
    const probe = first + step;

    if (less(value, seq[probe])) {
      count = step;
    } else {
      first = probe + 1;
      count -= step + 1;
    }
  }

  return first;
}

/**
 * Binary insertion sort: binary search for the slot, then shift by moves.
 */
export function binaryInsertionSort<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  for (let right = 1; right < seq.length; right++) {
    const elem = seq[right];
    const pos = upperBound(seq, 0, right, elem, less);

    for (let i = right; i > pos; i--) {
      seq[i] = seq[i - 1];
    }

    seq[pos] = elem;
  }
}

/**
 * Binary insertion sort that rotates [pos, right] right by one
 * instead of shifting.
 */
export function binaryInsertionSortByRotation<T>(
  seq: MutableSequence<T>,
  less: Less<T> = defaultLess,
): void {
  for (let right = 1; right < seq.length; right++) {
    const pos = upperBound(seq, 0, right, seq[right], less);
    rotate(seq, pos, right, right + 1);
  }
}
