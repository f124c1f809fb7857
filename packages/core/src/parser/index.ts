/**
 * Parser module: keyword tables and category definitions.
 */

export { parseKeywords } from './keywords.js';
export { parseCategoryDefinitions } from './categories.js';
export type { KeywordParseOptions, KeywordParseResult } from './keywords.js';
