
export { FibonacciHeap, degreeBucketCount } from './core/heap.js';
export type { HeapOptions, HeapStats } from './core/heap.js';
export { TreeNode } from './core/node.js';
export type { Extracted } from './core/node.js';
export { naturalOrder } from './core/compare.js';
export type { Comparator } from './core/compare.js';
export { InvariantError, invariant } from './utils/invariant.js';
export { LabeledHistogram } from './utils/metrics.js';
export type { Labels } from './utils/metrics.js';
