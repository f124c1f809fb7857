/**
 * Zod schemas for Keyword Baskets data structures.
 *
 * Ordering matters everywhere: category definitions are an array (not a record) because
 * classification walks them in declaration order, and baskets are numbered by first occurrence.
 */

import { z } from 'zod';
import { EXPORT_FORMATS, STRUCTURED_KEY_PREFIX } from './constants.js';

// ============================================================================
// Input Schemas
// ============================================================================

/**
 * A keyword is any non-empty string. Duplicates are allowed and keep their multiplicity.
 */
export const KeywordSchema = z.string().min(1, 'Keyword cannot be empty');

export const KeywordListSchema = z.array(KeywordSchema);

export type KeywordList = z.infer<typeof KeywordListSchema>;

/**
 * One category: a display name plus its ordered pattern strings.
 * Names need not be unique; equal names share a basket.
 */
export const CategoryDefinitionSchema = z.object({
    name: z.string().min(1, 'Category name cannot be empty'),
    patterns: z.array(z.string()),
});

export type CategoryDefinition = z.infer<typeof CategoryDefinitionSchema>;

export const CategoryDefinitionsSchema = z.array(CategoryDefinitionSchema);

export type CategoryDefinitions = z.infer<typeof CategoryDefinitionsSchema>;

// ============================================================================
// Classification Schemas
// ============================================================================

/**
 * A pattern that failed to compile. Reported once per compilation, never per keyword.
 */
export const PatternDiagnosticSchema = z.object({
    category: z.string(),
    pattern: z.string(),
    reason: z.string(),
});

export type PatternDiagnostic = z.infer<typeof PatternDiagnosticSchema>;

/**
 * Outcome of classifying one keyword.
 * matchedPattern is null when the keyword fell through to the sentinel basket.
 */
export const ClassificationResultSchema = z.object({
    keyword: z.string(),
    category: z.string(),
    matchedPattern: z.string().nullable(),
});

export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;

// ============================================================================
// Basket Schemas
// ============================================================================

export const BasketSchema = z.object({
    index: z.number().int().min(0),
    name: z.string(),
    keywords: z.array(z.string()),
});

export type Basket = z.infer<typeof BasketSchema>;

export const BasketCountSchema = z.object({
    index: z.number().int().min(0),
    name: z.string(),
    count: z.number().int().min(0),
});

export type BasketCount = z.infer<typeof BasketCountSchema>;

/**
 * Aggregate counts for reporting.
 * categoryCount is the number of declared categories, matched or not.
 */
export const BasketStatsSchema = z.object({
    totalKeywords: z.number().int().min(0),
    basketCount: z.number().int().min(0),
    categoryCount: z.number().int().min(0),
    assignedKeywords: z.number().int().min(0),
    uncategorizedKeywords: z.number().int().min(0),
    baskets: z.array(BasketCountSchema),
});

export type BasketStats = z.infer<typeof BasketStatsSchema>;

// ============================================================================
// Export Schemas
// ============================================================================

export const ExportFormatSchema = z.enum(EXPORT_FORMATS);

export type ExportFormat = z.infer<typeof ExportFormatSchema>;

export const TabularRowSchema = z.object({
    basket: z.number().int().min(0),
    basketName: z.string(),
    keyword: z.string(),
});

export type TabularRow = z.infer<typeof TabularRowSchema>;

/**
 * Structured export key: "Basket {index}".
 */
export const StructuredKeySchema = z.string().regex(
    new RegExp(`^${STRUCTURED_KEY_PREFIX}(0|[1-9]\\d*)$`),
    `Must be "${STRUCTURED_KEY_PREFIX}{index}"`
);

export const StructuredBasketSchema = z.object({
    name: z.string(),
    keywords: z.array(z.string()),
});

export type StructuredBasket = z.infer<typeof StructuredBasketSchema>;

export const StructuredExportSchema = z.record(StructuredKeySchema, StructuredBasketSchema);

export type StructuredExport = z.infer<typeof StructuredExportSchema>;

// ============================================================================
// Run Manifest Schema
// ============================================================================

const hashedFile = z.object({
    name: z.string(),
    hash: z.string().regex(/^sha256:[0-9a-f]{64}$/, 'Must be sha256:<64 hex chars>'),
});

/**
 * Record of one classification run, written next to the exports.
 */
export const RunManifestSchema = z.object({
    run_timestamp: z.string(),
    keywords_file: hashedFile,
    categories_file: hashedFile,
    keyword_count: z.number().int().min(0),
    basket_count: z.number().int().min(0),
    invalid_pattern_count: z.number().int().min(0),
    outputs: z.array(z.string()),
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
