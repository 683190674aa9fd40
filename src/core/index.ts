/**
 * Ordering and sequence primitives shared by every algorithm family.
 */

export type { Less, Comparator, Comparable } from './ordering.js';
export { defaultLess, byKey, reverseOrder, toComparator, isSortedUntil, isSorted } from './ordering.js';

export type { MutableSequence } from './sequence.js';
export { swap, midpoint, possiblyUnsorted, reverseRange, rotate, copyOf } from './sequence.js';

export type { Range } from './range-stack.js';
export { RangeStack } from './range-stack.js';
