/**
 * Registry of every sort the benchmark knows, keyed by a stable id,
 * with the display label and the properties the harness needs.
 */

import type { Less } from '../core/ordering.js';
import type { MutableSequence } from '../core/sequence.js';
import {
  binaryInsertionSort,
  binaryInsertionSortByRotation,
  bubbleSort,
  bubbleSortAdaptive,
  bubbleSortNonAdaptive,
  gnomeSort,
  insertionSort,
  insertionSortBySwap,
  selectionSort,
} from '../elementary/index.js';
import {
  shellsortHibbard,
  shellsortQuasiCiura,
  shellsortSedgewick,
  shellsortSedgewick1986,
  shellsortThreeSmooth,
  shellsortTokuda,
} from '../shellsort/index.js';
import { mergesortBottomUp, mergesortTopDown, mergesortTopDownIterative } from '../mergesort/index.js';
import { heapsort, heapsortBySwap } from '../heapsort/index.js';
import {
  quicksortHoare,
  quicksortHoareIterative,
  quicksortLomuto,
  quicksortLomutoIterative,
  quicksortLomutoSimple,
  quicksortLomutoSimpleIterative,
} from '../quicksort/index.js';
import { builtinSort } from '../builtin/builtin-sort.js';
import { BenchmarkError } from '../utils/errors.js';

export type AlgorithmFamily =
  | 'elementary'
  | 'shellsort'
  | 'mergesort'
  | 'heapsort'
  | 'quicksort'
  | 'builtin';

/** In-place sort over a sequence; the ordering defaults to natural order. */
export type SortFunction = <T>(seq: MutableSequence<T>, less?: Less<T>) => void;

export const ALGORITHM_IDS = [
  'insertion',
  'insertion-by-swap',
  'binary-insertion',
  'binary-insertion-by-rotation',
  'selection',
  'bubble',
  'bubble-non-adaptive',
  'bubble-adaptive',
  'gnome',
  'shellsort-hibbard',
  'shellsort-three-smooth',
  'shellsort-sedgewick',
  'shellsort-sedgewick-1986',
  'shellsort-tokuda',
  'shellsort-quasi-ciura',
  'mergesort-topdown',
  'mergesort-topdown-iterative',
  'mergesort-bottomup',
  'heapsort',
  'heapsort-by-swap',
  'quicksort-lomuto-simple',
  'quicksort-lomuto-simple-iterative',
  'quicksort-lomuto',
  'quicksort-lomuto-iterative',
  'quicksort-hoare',
  'quicksort-hoare-iterative',
  'builtin',
] as const;

export type AlgorithmId = (typeof ALGORITHM_IDS)[number];

export interface SortAlgorithm {
  /** Short identifier used on the command line. */
  id: AlgorithmId;
  /** Display label for reports. */
  label: string;
  family: AlgorithmFamily;
  /** Equal elements keep their relative order. */
  stable: boolean;
  /** Quadratic time on random input; skipped on large inputs when asked. */
  quadratic: boolean;
  sort: SortFunction;
}

export const ALGORITHM_REGISTRY: Readonly<Record<AlgorithmId, SortAlgorithm>> = {
  insertion: {
    id: 'insertion',
    label: 'Insertion sort',
    family: 'elementary',
    stable: true,
    quadratic: true,
    sort: insertionSort,
  },
  'insertion-by-swap': {
    id: 'insertion-by-swap',
    label: 'Insertion sort (by swap)',
    family: 'elementary',
    stable: true,
    quadratic: true,
    sort: insertionSortBySwap,
  },
  'binary-insertion': {
    id: 'binary-insertion',
    label: 'Binary insertion sort',
    family: 'elementary',
    stable: true,
    quadratic: true,
    sort: binaryInsertionSort,
  },
  'binary-insertion-by-rotation': {
    id: 'binary-insertion-by-rotation',
    label: 'Binary insertion sort (by rotation)',
    family: 'elementary',
    stable: true,
    quadratic: true,
    sort: binaryInsertionSortByRotation,
  },
  selection: {
    id: 'selection',
    label: 'Selection sort',
    family: 'elementary',
    stable: false,
    quadratic: true,
    sort: selectionSort,
  },
  bubble: {
    id: 'bubble',
    label: 'Bubble sort',
    family: 'elementary',
    stable: true,
    quadratic: true,
    sort: bubbleSort,
  },
  'bubble-non-adaptive': {
    id: 'bubble-non-adaptive',
    label: 'Bubble sort (non-adaptive)',
    family: 'elementary',
    stable: true,
    quadratic: true,
    sort: bubbleSortNonAdaptive,
  },
  'bubble-adaptive': {
    id: 'bubble-adaptive',
    label: 'Bubble sort (fully adaptive)',
    family: 'elementary',
    stable: true,
    quadratic: true,
    sort: bubbleSortAdaptive,
  },
  gnome: {
    id: 'gnome',
    label: 'Gnome sort',
    family: 'elementary',
    stable: true,
    quadratic: true,
    sort: gnomeSort,
  },
  'shellsort-hibbard': {
    id: 'shellsort-hibbard',
    label: 'Shellsort (Hibbard gap sequence)',
    family: 'shellsort',
    stable: false,
    quadratic: false,
    sort: shellsortHibbard,
  },
  'shellsort-three-smooth': {
    id: 'shellsort-three-smooth',
    label: 'Shellsort (3-smooth gap sequence)',
    family: 'shellsort',
    stable: false,
    quadratic: false,
    sort: shellsortThreeSmooth,
  },
  'shellsort-sedgewick': {
    id: 'shellsort-sedgewick',
    label: 'Shellsort (Sedgewick gap sequence)',
    family: 'shellsort',
    stable: false,
    quadratic: false,
    sort: shellsortSedgewick,
  },
  'shellsort-sedgewick-1986': {
    id: 'shellsort-sedgewick-1986',
    label: 'Shellsort (Sedgewick 1986 gap sequence)',
    family: 'shellsort',
    stable: false,
    quadratic: false,
    sort: shellsortSedgewick1986,
  },
  'shellsort-tokuda': {
    id: 'shellsort-tokuda',
    label: 'Shellsort (Tokuda gap sequence)',
    family: 'shellsort',
    stable: false,
    quadratic: false,
    sort: shellsortTokuda,
  },
  'shellsort-quasi-ciura': {
    id: 'shellsort-quasi-ciura',
    label: 'Shellsort (Extended Ciura gap sequence)',
    family: 'shellsort',
    stable: false,
    quadratic: false,
    sort: shellsortQuasiCiura,
  },
  'mergesort-topdown': {
    id: 'mergesort-topdown',
    label: 'Mergesort (top-down, recursive)',
    family: 'mergesort',
    stable: true,
    quadratic: false,
    sort: mergesortTopDown,
  },
  'mergesort-topdown-iterative': {
    id: 'mergesort-topdown-iterative',
    label: 'Mergesort (top-down, iterative)',
    family: 'mergesort',
    stable: true,
    quadratic: false,
    sort: mergesortTopDownIterative,
  },
  'mergesort-bottomup': {
    id: 'mergesort-bottomup',
    label: 'Mergesort (bottom-up, iterative)',
    family: 'mergesort',
    stable: true,
    quadratic: false,
    sort: mergesortBottomUp,
  },
  heapsort: {
    id: 'heapsort',
    label: 'Heapsort',
    family: 'heapsort',
    stable: false,
    quadratic: false,
    sort: heapsort,
  },
  'heapsort-by-swap': {
    id: 'heapsort-by-swap',
    label: 'Heapsort (by swap)',
    family: 'heapsort',
    stable: false,
    quadratic: false,
    sort: heapsortBySwap,
  },
  'quicksort-lomuto-simple': {
    id: 'quicksort-lomuto-simple',
    label: 'Quicksort (Lomuto partitioning, middle-element pivot, recursive)',
    family: 'quicksort',
    stable: false,
    quadratic: false,
    sort: quicksortLomutoSimple,
  },
  'quicksort-lomuto-simple-iterative': {
    id: 'quicksort-lomuto-simple-iterative',
    label: 'Quicksort (Lomuto partitioning, middle-element pivot, iterative)',
    family: 'quicksort',
    stable: false,
    quadratic: false,
    sort: quicksortLomutoSimpleIterative,
  },
  'quicksort-lomuto': {
    id: 'quicksort-lomuto',
    label: 'Quicksort (Lomuto partitioning, median-of-three pivot, recursive)',
    family: 'quicksort',
    stable: false,
    quadratic: false,
    sort: quicksortLomuto,
  },
  'quicksort-lomuto-iterative': {
    id: 'quicksort-lomuto-iterative',
    label: 'Quicksort (Lomuto partitioning, median-of-three pivot, iterative)',
    family: 'quicksort',
    stable: false,
    quadratic: false,
    sort: quicksortLomutoIterative,
  },
  'quicksort-hoare': {
    id: 'quicksort-hoare',
    label: 'Quicksort (Hoare partitioning, median-of-three pivot, recursive)',
    family: 'quicksort',
    stable: false,
    quadratic: false,
    sort: quicksortHoare,
  },
  'quicksort-hoare-iterative': {
    id: 'quicksort-hoare-iterative',
    label: 'Quicksort (Hoare partitioning, median-of-three pivot, iterative)',
    family: 'quicksort',
    stable: false,
    quadratic: false,
    sort: quicksortHoareIterative,
  },
  builtin: {
    id: 'builtin',
    label: 'Array.prototype.sort',
    family: 'builtin',
    stable: true,
    quadratic: false,
    sort: builtinSort,
  },
};

export function isAlgorithmId(id: string): id is AlgorithmId {
  return Object.prototype.hasOwnProperty.call(ALGORITHM_REGISTRY, id);
}

export function findAlgorithm(id: string): SortAlgorithm | undefined {
  return isAlgorithmId(id) ? ALGORITHM_REGISTRY[id] : undefined;
}

export function getAlgorithm(id: string): SortAlgorithm {
  const algorithm = findAlgorithm(id);
  if (!algorithm) {
    throw new BenchmarkError(
      `Unknown algorithm: ${id}. Available: ${ALGORITHM_IDS.join(', ')}`,
      'UNKNOWN_ALGORITHM',
    );
  }
  return algorithm;
}

/**
 * Every algorithm, in benchmark order.
 */
export function getAllAlgorithms(): SortAlgorithm[] {
  return ALGORITHM_IDS.map((id) => ALGORITHM_REGISTRY[id]);
}
