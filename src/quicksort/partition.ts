/**
 * In-place partition schemes. Both take the pivot from `seq[first]` and
 * expect a range of at least one (Lomuto) or two (Hoare) elements.
 */

import { defaultLess, type Less } from '../core/ordering.js';
import { swap, type MutableSequence } from '../core/sequence.js';

/**
 * Lomuto partition with the pivot at the front.
 *
 * Elements less than the pivot are swapped to a growing low block;
 * the pivot is then swapped to the end of that block, its final slot.
 * Returns the pivot's index.
 */
export function partitionLomuto<T>(
  seq: MutableSequence<T>,
  first: number,
  last: number,
  less: Less<T> = defaultLess,
): number {
  const pivot = seq[first];
  let mid = first;

  for (let cur = first + 1; cur < last; cur++) {
    if (less(seq[cur], pivot)) swap(seq, ++mid, cur);
  }

  swap(seq, first, mid);
  return mid;
}

/**
 * Hoare partition with the pivot value taken from the front.
 *
 * Returns a boundary b with first < b < last such that nothing in
 * [first, b) is greater than anything in [b, last). The pivot itself may
 * end up on either side. Each scanner stops on elements equal to the
 * pivot, so on a first pass the left scanner stops at `first` and the
 * right scanner can go no further left than it; after a swap the
 * swapped elements stop them again. Neither scanner leaves the range,
 * whatever the duplicates.
 */
export function partitionHoare<T>(
  seq: MutableSequence<T>,
  first: number,
  last: number,
  less: Less<T> = defaultLess,
): number {
  const pivot = seq[first];
  let left = first - 1;
  let right = last;

  for (;;) {
    do {
      left++;
    } while (less(seq[left], pivot));

    do {
      right--;
    } while (less(pivot, seq[right]));

    if (left >= right) return right + 1;

    swap(seq, left, right);
  }
}
