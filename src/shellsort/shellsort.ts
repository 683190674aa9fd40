/**
 * Shellsort: insertion sort over interleaved subsequences with shrinking
 * strides. The last stride is always 1, so the final pass is a plain
 * insertion sort over an almost sorted sequence. Not stable.
 */

import { defaultLess, type Less } from '../core/ordering.js';
import type { MutableSequence } from '../core/sequence.js';
import {
  collectGaps,
  hibbard,
  quasiCiura,
  sedgewick,
  sedgewick1986,
  threeSmooth,
  tokuda,
  type GapGenerator,
} from './gap-sequences.js';

/**
 * Insertion-sort the elements at first, first + gap, first + 2*gap, ... below last.
 */
export function insertionSortSubsequence<T>(
  seq: MutableSequence<T>,
  first: number,
  last: number,
  gap: number,
  less: Less<T> = defaultLess,
): void {
  for (let right = first + gap; right < last; right += gap) {
    const elem = seq[right];

    let left = right;
    for (; left - gap >= first && less(elem, seq[left - gap]); left -= gap) {
      seq[left] = seq[left - gap];
    }

    seq[left] = elem;
  }
}

/**
 * Shellsort driven by any gap generator.
 */
export function shellsort<T>(
  seq: MutableSequence<T>,
  generate: GapGenerator,
  less: Less<T> = defaultLess,
): void {
  const gaps = collectGaps(generate, seq.length);

  for (let k = gaps.length - 1; k >= 0; k--) {
    const gap = gaps[k];
    for (let start = 0; start < gap; start++) {
      insertionSortSubsequence(seq, start, seq.length, gap, less);
    }
  }
}

export function shellsortHibbard<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  shellsort(seq, hibbard, less);
}

export function shellsortThreeSmooth<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  shellsort(seq, threeSmooth, less);
}

export function shellsortSedgewick<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  shellsort(seq, sedgewick, less);
}

export function shellsortSedgewick1986<T>(
  seq: MutableSequence<T>,
  less: Less<T> = defaultLess,
): void {
  shellsort(seq, sedgewick1986, less);
}

export function shellsortTokuda<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  shellsort(seq, tokuda, less);
}

export function shellsortQuasiCiura<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  shellsort(seq, quasiCiura, less);
}
