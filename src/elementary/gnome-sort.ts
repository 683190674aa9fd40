import { defaultLess, type Less } from '../core/ordering.js';
import { swap, type MutableSequence } from '../core/sequence.js';

/**
 * Gnome sort: a single cursor walks forward over ordered pairs and
 * carries each out-of-order element back by swapping. Stable.
 */
export function gnomeSort<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  let pos = 1;

  while (pos < seq.length) {
    if (pos === 0 || !less(seq[pos], seq[pos - 1])) {
      pos++;
    } else {
      swap(seq, pos, pos - 1);
      pos--;
    }
  }
}
