export {
  quicksortLomutoSimple,
  quicksortLomutoSimpleIterative,
  quicksortLomuto,
  quicksortLomutoIterative,
  quicksortHoare,
  quicksortHoareIterative,
  splitRange,
} from './quicksort.js';
export type { QuicksortScheme } from './quicksort.js';
export { partitionLomuto, partitionHoare } from './partition.js';
export { bringMidToFront, bringMedianOfThreeToFront, medianOfThree } from './pivot.js';
