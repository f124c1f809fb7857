// Types (re-exported from shared)
export type {
    KeywordList,
    CategoryDefinition,
    CategoryDefinitions,
    PatternDiagnostic,
    ClassificationResult,
    Basket,
    BasketCount,
    BasketStats,
    ExportFormat,
    TabularRow,
    StructuredBasket,
    StructuredExport,
} from './types/index.js';

export {
    KeywordListSchema,
    CategoryDefinitionSchema,
    CategoryDefinitionsSchema,
    StructuredExportSchema,
    UNCATEGORIZED_BASKET_NAME,
    PATTERN_FLAGS,
    KEYWORD_INPUT,
    PATTERN_VALIDATION,
    TABULAR_COLUMNS,
    STRUCTURED_KEY_PREFIX,
    TEXT_EXPORT,
} from './types/index.js';

// Errors
export { MalformedInputError, formatZodIssues } from './errors.js';

// Patterns
export {
    compilePattern,
    isValidPattern,
    patternMatches,
    buildRuleSet,
    categoryMatches,
    hasActivePatterns,
    validatePattern,
    findShadowingCategories,
} from './patterns/index.js';
export type {
    CompiledPattern,
    CompiledCategory,
    RuleSet,
    RuleSetBuild,
    PatternValidationResult,
} from './patterns/index.js';

// Classifier
export { classify, classifyKeyword, classifyAll } from './classifier/index.js';

// Baskets
export { buildBaskets, groupIntoBaskets, summarizeBaskets, clusterKeywords } from './baskets/index.js';
export type { BasketCollection, ClusterResult } from './baskets/index.js';

// Export formats
export {
    toTabularRows,
    toCsv,
    toReadableText,
    toStructured,
    toJson,
    parseStructuredExport,
    basketKey,
    formatExport,
} from './export/index.js';

// Parsers
export { parseKeywords, parseCategoryDefinitions } from './parser/index.js';
export type { KeywordParseOptions, KeywordParseResult } from './parser/index.js';
