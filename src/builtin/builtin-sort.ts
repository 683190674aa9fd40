/**
 * Thin wrapper over the platform sort, the baseline every hand-written
 * algorithm is benchmarked against. V8 implements Array.prototype.sort
 * as TimSort, which is stable.
 */

import { defaultLess, toComparator, type Less } from '../core/ordering.js';
import type { MutableSequence } from '../core/sequence.js';

export function builtinSort<T>(seq: MutableSequence<T>, less: Less<T> = defaultLess): void {
  const compare = toComparator(less);

  if (Array.isArray(seq)) {
    seq.sort(compare);
    return;
  }

  const sorted = Array.from(seq).sort(compare);
  for (let i = 0; i < sorted.length; i++) {
    seq[i] = sorted[i];
  }
}
