/**
 * Baskets module: grouping classified keywords and reporting counts.
 */

export { buildBaskets, groupIntoBaskets } from './build.js';
export { summarizeBaskets } from './stats.js';
export { clusterKeywords } from './cluster.js';
export type { BasketCollection, ClusterResult } from './types.js';
