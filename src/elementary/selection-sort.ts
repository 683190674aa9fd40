import { defaultLess, type Less } from '../core/ordering.js';
import { swap, type MutableSequence } from '../core/sequence.js';

/**
 * Index of the least element in [first, last), earliest on ties.
 */
export function minIndex<T>(
  seq: MutableSequence<T>,
  first: number,
  last: number,
  less: Less<T> = defaultLess,
): number {
  let min = first;
  for (let i = first + 1; i < last; i++) {
    if (less(seq[i], seq[min])) min = i;
  }
  return min;
}

/**
 * Selection sort. Always quadratic in comparisons; not stable.
 */
export function selectionSort<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  for (let i = 0; i < seq.length; i++) {
    const min = minIndex(seq, i, seq.length, less);
    if (min !== i) swap(seq, i, min);
  }
}
