// Schemas
export {
    KeywordSchema,
    KeywordListSchema,
    CategoryDefinitionSchema,
    CategoryDefinitionsSchema,
    PatternDiagnosticSchema,
    ClassificationResultSchema,
    BasketSchema,
    BasketCountSchema,
    BasketStatsSchema,
    ExportFormatSchema,
    TabularRowSchema,
    StructuredKeySchema,
    StructuredBasketSchema,
    StructuredExportSchema,
    RunManifestSchema,
} from './schemas.js';

// Types
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
    RunManifest,
} from './schemas.js';

// Constants
export {
    UNCATEGORIZED_BASKET_NAME,
    PATTERN_FLAGS,
    KEYWORD_INPUT,
    PATTERN_VALIDATION,
    TABULAR_COLUMNS,
    STRUCTURED_KEY_PREFIX,
    TEXT_EXPORT,
    EXPORT_FORMATS,
    ENGINE_VERSION,
} from './constants.js';
