/**
 * Random-access helpers over half-open ranges [first, last).
 */

/**
 * Fixed-length, randomly indexable, writable sequence.
 * Plain arrays and typed arrays both satisfy it.
 */
export interface MutableSequence<T> {
  readonly length: number;
  [index: number]: T;
}

/**
 * Swap two elements.
 */
export function swap<T>(seq: MutableSequence<T>, i: number, j: number): void {
  const temp = seq[i];
  seq[i] = seq[j];
  seq[j] = temp;
}

/**
 * Middle index of [first, last), rounding toward first.
 */
export function midpoint(first: number, last: number): number {
  return first + Math.floor((last - first) / 2);
}

/**
 * A range needs sorting only if it holds at least two elements.
 */
export function possiblyUnsorted(first: number, last: number): boolean {
  return last - first >= 2;
}

/**
 * Reverse [first, last) in place.
 */
export function reverseRange<T>(seq: MutableSequence<T>, first: number, last: number): void {
  for (let i = first, j = last - 1; i < j; i++, j--) {
    swap(seq, i, j);
  }
}

/**
 * Rotate [first, last) left so that `middle` becomes the first element.
 * Returns the new position of the element originally at `first`.
 */
export function rotate<T>(seq: MutableSequence<T>, first: number, middle: number, last: number): number {
  if (first === middle) return last;
  if (middle === last) return first;

  reverseRange(seq, first, middle);
  reverseRange(seq, middle, last);
  reverseRange(seq, first, last);
  return first + (last - middle);
}

/**
 * Copy a sequence into a fresh array.
 */
export function copyOf<T>(seq: MutableSequence<T>): T[] {
  return Array.from(seq);
}
