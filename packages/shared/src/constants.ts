/**
 * Constants for Keyword Baskets.
 */

/**
 * Basket name for keywords that no declared category claims.
 * Applied only after every declared category has been tried.
 */
export const UNCATEGORIZED_BASKET_NAME = 'Uncategorized';

/**
 * Flags used for every compiled pattern.
 * Case-insensitive only: no `g` or `y`, so `RegExp.test` keeps no state between keywords.
 */
export const PATTERN_FLAGS = 'i';

/**
 * Keyword table defaults.
 */
export const KEYWORD_INPUT = {
    DEFAULT_COLUMN: 'Keyword',
    DEFAULT_SEPARATOR: ',',
} as const;

/**
 * Pattern breadth thresholds used when validating a new pattern against a keyword sample.
 * A pattern is "too broad" when it matches more than MAX_MATCH_PERCENT of the sample
 * AND more than MAX_MATCHES_FOR_BROAD keywords.
 */
export const PATTERN_VALIDATION = {
    MAX_MATCH_PERCENT: 0.5,
    MAX_MATCHES_FOR_BROAD: 3,
} as const;

/**
 * Column headers of the tabular export, in order.
 */
export const TABULAR_COLUMNS = ['Basket', 'Basket Name', 'Keyword'] as const;

/**
 * Key prefix of the structured export ("Basket 0", "Basket 1", ...).
 */
export const STRUCTURED_KEY_PREFIX = 'Basket ';

/**
 * Layout of the human-readable text export.
 */
export const TEXT_EXPORT = {
    KEYWORD_PREFIX: '  - ',
    LINE_BREAK: '\n',
} as const;

/**
 * Supported export formats produced by the core formatter.
 */
export const EXPORT_FORMATS = ['csv', 'txt', 'json'] as const;

/**
 * Version stamped into run manifests.
 */
export const ENGINE_VERSION = '1.0.0';
