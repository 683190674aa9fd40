export {
  heapsort,
  heapsortBySwap,
  makeHeap,
  isHeap,
  siftDown,
  siftDownBySwap,
  pickChild,
} from './heapsort.js';
