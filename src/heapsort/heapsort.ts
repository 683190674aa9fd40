/**
 * Heapsort over an implicit binary max-heap: children of i live at
 * 2i + 1 and 2i + 2. Not stable.
 */

import { defaultLess, type Less } from '../core/ordering.js';
import { swap, type MutableSequence } from '../core/sequence.js';

const NO_CHILD = -1;

/**
 * Child of `parent` to sift toward within a heap of `length` elements:
 * the greater child, the right one when neither is less than the other.
 */
export function pickChild<T>(
  seq: MutableSequence<T>,
  parent: number,
  length: number,
  less: Less<T> = defaultLess,
): number {
  const left = parent * 2 + 1;
  if (left >= length) return NO_CHILD;

  const right = left + 1;
  return right < length && !less(seq[right], seq[left]) ? right : left;
}

/**
 * Restore heap order below `parent`, holding the sinking element aside
 * and moving children up into the hole.
 */
export function siftDown<T>(
  seq: MutableSequence<T>,
  parent: number,
  length: number,
  less: Less<T> = defaultLess,
): void {
  const elem = seq[parent];

  for (;;) {
    const child = pickChild(seq, parent, length, less);
    if (child === NO_CHILD || !less(elem, seq[child])) break;

    seq[parent] = seq[child];
    parent = child;
  }

  seq[parent] = elem;
}

/**
 * Same as siftDown, with a swap per level.
 */
export function siftDownBySwap<T>(
  seq: MutableSequence<T>,
  parent: number,
  length: number,
  less: Less<T> = defaultLess,
): void {
  for (;;) {
    const child = pickChild(seq, parent, length, less);
    if (child === NO_CHILD || !less(seq[parent], seq[child])) break;

    swap(seq, parent, child);
    parent = child;
  }
}

type SiftDown = <T>(seq: MutableSequence<T>, parent: number, length: number, less: Less<T>) => void;

function buildHeap<T>(seq: MutableSequence<T>, less: Less<T>, sift: SiftDown): void {
  if (seq.length < 2) return;

  for (let parent = Math.floor(seq.length / 2); parent >= 0; parent--) {
    sift(seq, parent, seq.length, less);
  }
}

function sortHeap<T>(seq: MutableSequence<T>, less: Less<T>, sift: SiftDown): void {
  let length = seq.length;
  if (length < 2) return;

  buildHeap(seq, less, sift);

  // Pop each maximum to just past the shrinking heap.
  while (--length !== 0) {
    swap(seq, 0, length);
    sift(seq, 0, length, less);
  }
}

/**
 * Rearrange the whole sequence into a max-heap.
 */
export function makeHeap<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  buildHeap(seq, less, siftDown);
}

/**
 * True when no element is less than one of its children.
 */
export function isHeap<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): boolean {
  for (let child = 1; child < seq.length; child++) {
    if (less(seq[Math.floor((child - 1) / 2)], seq[child])) return false;
  }
  return true;
}

export function heapsort<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  sortHeap(seq, less, siftDown);
}

export function heapsortBySwap<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  sortHeap(seq, less, siftDownBySwap);
}
