/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@keyword-baskets/shared';

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
} from '@keyword-baskets/shared';
