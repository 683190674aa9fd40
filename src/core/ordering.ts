/**
 * Ordering primitives shared by every sort.
 *
 * A `Less<T>` must be a strict weak ordering (irreflexive, transitive,
 * with transitive incomparability). Passing anything else is a
 * precondition violation: the sorts still terminate but the output order
 * is unspecified.
 */

import type { MutableSequence } from './sequence.js';
import { OrderingError } from '../utils/errors.js';

/** Strict weak ordering predicate: true when `a` goes before `b`. */
export type Less<T> = (a: T, b: T) => boolean;

/** Three-way comparator, as taken by `Array.prototype.sort`. */
export type Comparator<T> = (a: T, b: T) => number;

/** Element types the natural ordering knows how to compare. */
export type Comparable = number | bigint | string | Date;

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Date) return 'Date';
  return typeof value;
}

/**
 * Natural ordering: numbers, strings and bigints by `<`, dates by time value.
 * Throws OrderingError for any other pair of elements.
 */
export function defaultLess<T>(a: T, b: T): boolean {
  if (typeof a === 'number' && typeof b === 'number') return a < b;
  if (typeof a === 'string' && typeof b === 'string') return a < b;
  if (typeof a === 'bigint' && typeof b === 'bigint') return a < b;
  if (a instanceof Date && b instanceof Date) return a.getTime() < b.getTime();

  throw new OrderingError(
    `Cannot compare ${describe(a)} with ${describe(b)} without an explicit ordering`,
    'INCOMPARABLE_ELEMENTS',
  );
}

/**
 * Order elements by a projected key.
 */
export function byKey<T, K>(key: (value: T) => K, less: Less<K> = defaultLess): Less<T> {
  return (a, b) => less(key(a), key(b));
}

/**
 * Reverse an ordering (descending sorts).
 */
export function reverseOrder<T>(less: Less<T> = defaultLess): Less<T> {
  return (a, b) => less(b, a);
}

/**
 * Turn a predicate into a three-way comparator.
 */
export function toComparator<T>(less: Less<T> = defaultLess): Comparator<T> {
  return (a, b) => {
    if (less(a, b)) return -1;
    if (less(b, a)) return 1;
    return 0;
  };
}

/**
 * Index of the first element that is less than its predecessor,
 * or `seq.length` when the whole sequence is sorted.
 */
export function isSortedUntil<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): number {
  for (let i = 1; i < seq.length; i++) {
    if (less(seq[i], seq[i - 1])) return i;
  }
  return seq.length;
}

/**
 * True when no adjacent pair is out of order.
 */
export function isSorted<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): boolean {
  return isSortedUntil(seq, less) === seq.length;
}
