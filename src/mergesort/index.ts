export { merge } from './merge.js';
export { mergesortTopDown, mergesortTopDownIterative, mergesortBottomUp } from './mergesort.js';
