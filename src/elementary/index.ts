export {
  insertionSort,
  insertionSortBySwap,
  binaryInsertionSort,
  binaryInsertionSortByRotation,
  upperBound,
} from './insertion-sort.js';
export { selectionSort, minIndex } from './selection-sort.js';
export { bubbleSort, bubbleSortNonAdaptive, bubbleSortAdaptive } from './bubble-sort.js';
export { gnomeSort } from './gnome-sort.js';
