/**
 * Internal types for basket building.
 */

import type {
    Basket,
    BasketStats,
    ClassificationResult,
    PatternDiagnostic,
} from '../types/index.js';

/**
 * Baskets of one classification run with per-keyword results and counts.
 */
export interface BasketCollection {
    baskets: Basket[];
    results: ClassificationResult[];
    stats: BasketStats;
}

/**
 * Full run output: baskets plus the compile diagnostics reported alongside them.
 */
export interface ClusterResult extends BasketCollection {
    diagnostics: PatternDiagnostic[];
}
