export {
  shellsort,
  insertionSortSubsequence,
  shellsortHibbard,
  shellsortThreeSmooth,
  shellsortSedgewick,
  shellsortSedgewick1986,
  shellsortTokuda,
  shellsortQuasiCiura,
} from './shellsort.js';
export {
  GAP_SEQUENCES,
  CIURA_GAPS,
  NINE_FOURTHS,
  collectGaps,
  isGapSequenceName,
  hibbard,
  threeSmooth,
  sedgewick,
  sedgewick1986,
  tokuda,
  quasiCiura,
} from './gap-sequences.js';
export type { GapGenerator, GapSequenceName } from './gap-sequences.js';
