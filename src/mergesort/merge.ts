import { defaultLess, type Less } from '../core/ordering.js';
import type { MutableSequence } from '../core/sequence.js';

/**
 * Merge the sorted runs [first1, first2) and [first2, last2) in place,
 * staging through `aux`. The left run wins ties, so merging is stable.
 * `aux` is left empty for the next merge.
 */
export function merge<T>(
  seq: MutableSequence<T>,
  aux: T[],
  first1: number,
  first2: number,
  last2: number,
  less: Less<T> = defaultLess,
): void {
  let cur1 = first1;
  let cur2 = first2;

  while (cur1 < first2 && cur2 < last2) {
    if (less(seq[cur2], seq[cur1])) {
      aux.push(seq[cur2++]);
    } else {
      aux.push(seq[cur1++]);
    }
  }

  while (cur1 < first2) aux.push(seq[cur1++]);
  while (cur2 < last2) aux.push(seq[cur2++]);

  for (let i = 0; i < aux.length; i++) {
    seq[first1 + i] = aux[i];
  }
  aux.length = 0;
}
