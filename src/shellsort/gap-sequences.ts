/**
 * Gap sequence generators for shellsort.
 *
 * A generator receives the input length and emits gaps in ascending
 * order through `emit`. Every generator here emits only gaps below the
 * length and, when it emits anything, starts at 1.
 */

import { GapSequenceError } from '../utils/errors.js';

export type GapGenerator = (length: number, emit: (gap: number) => void) => void;

export type GapSequenceName =
  | 'hibbard'
  | 'three-smooth'
  | 'sedgewick'
  | 'sedgewick-1986'
  | 'tokuda'
  | 'quasi-ciura';

/** Growth ratio shared by the Tokuda and extended Ciura sequences. */
export const NINE_FOURTHS = 2.25;

/** Ciura 2001: experimentally best known gaps, no formula beyond these. */
export const CIURA_GAPS: readonly number[] = [1, 4, 10, 23, 57, 132, 301, 701, 1750];

/**
 * Hibbard 1963: 2^k - 1.
 */
export const hibbard: GapGenerator = (length, emit) => {
  for (let k = 1; ; k++) {
    const gap = 2 ** k - 1;
    if (gap >= length) break;
    emit(gap);
  }
};

/**
 * Pratt 1971: the 3-smooth numbers 2^a * 3^b, produced in order by
 * merging the doubled and tripled streams of the numbers emitted so far.
 */
export const threeSmooth: GapGenerator = (length, emit) => {
  const smooth = [1];
  let twoPos = 0;
  let threePos = 0;

  while (smooth[smooth.length - 1] < length) {
    emit(smooth[smooth.length - 1]);

    const twoMultiple = smooth[twoPos] * 2;
    const threeMultiple = smooth[threePos] * 3;
    smooth.push(Math.min(twoMultiple, threeMultiple));

    if (twoMultiple <= threeMultiple) twoPos++;
    if (threeMultiple <= twoMultiple) threePos++;
  }
};

/**
 * Sedgewick 1982: 9*4^i - 9*2^i + 1 interleaved with
 * 4^(i+2) - 3*2^(i+2) + 1, giving 1, 5, 19, 41, 109, 209, ...
 */
export const sedgewick: GapGenerator = (length, emit) => {
  for (let i = 0; ; i++) {
    const even = 9 * 4 ** i - 9 * 2 ** i + 1;
    if (even >= length) break;
    emit(even);

    const odd = 4 ** (i + 2) - 3 * 2 ** (i + 2) + 1;
    if (odd >= length) break;
    emit(odd);
  }
};

/**
 * Sedgewick 1986: 1, then 4^(i+1) + 3*2^i + 1, giving 1, 8, 23, 77, 281, ...
 */
export const sedgewick1986: GapGenerator = (length, emit) => {
  if (length <= 1) return;
  emit(1);

  for (let i = 0; ; i++) {
    const gap = 4 ** (i + 1) + 3 * 2 ** i + 1;
    if (gap >= length) break;
    emit(gap);
  }
};

/**
 * Tokuda 1992: ceil(h) for h <- 2.25h + 1, starting at 1.
 */
export const tokuda: GapGenerator = (length, emit) => {
  for (let h = 1; ; h = h * NINE_FOURTHS + 1) {
    const gap = Math.ceil(h);
    if (gap >= length) break;
    emit(gap);
  }
};

/**
 * Ciura's nine gaps, then keep multiplying by a bit less than 9/4
 * (truncating).
 */
export const quasiCiura: GapGenerator = (length, emit) => {
  let gap = 0;

  for (const h of CIURA_GAPS) {
    gap = h;
    if (gap >= length) return;
    emit(gap);
  }

  while ((gap = Math.floor(gap * NINE_FOURTHS)) < length) {
    emit(gap);
  }
};

export const GAP_SEQUENCES: Readonly<Record<GapSequenceName, GapGenerator>> = {
  hibbard,
  'three-smooth': threeSmooth,
  sedgewick,
  'sedgewick-1986': sedgewick1986,
  tokuda,
  'quasi-ciura': quasiCiura,
};

export function isGapSequenceName(name: string): name is GapSequenceName {
  return Object.prototype.hasOwnProperty.call(GAP_SEQUENCES, name);
}

/**
 * Run a generator for `length` and return its gaps in ascending order.
 * Throws GapSequenceError if the generator breaks the invariant.
 */
export function collectGaps(generate: GapGenerator, length: number): number[] {
  const gaps: number[] = [];

  generate(length, (gap) => {
    if (!Number.isInteger(gap) || gap < 1 || gap >= length) {
      throw new GapSequenceError(
        `Gap ${gap} is not a positive integer below the length ${length}`,
        'INVALID_GAP_SEQUENCE',
      );
    }
    if (gaps.length > 0 && gap <= gaps[gaps.length - 1]) {
      throw new GapSequenceError(
        `Gap ${gap} does not increase on ${gaps[gaps.length - 1]}`,
        'INVALID_GAP_SEQUENCE',
      );
    }
    gaps.push(gap);
  });

  if (gaps.length > 0 && gaps[0] !== 1) {
    throw new GapSequenceError(
      `Gap sequence starts at ${gaps[0]} instead of 1`,
      'INVALID_GAP_SEQUENCE',
    );
  }

  return gaps;
}
