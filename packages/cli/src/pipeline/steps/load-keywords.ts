import { readFile } from 'node:fs/promises';
import { parseKeywords } from '@keyword-baskets/core';
import type { PipelineStep } from '../types.js';
import { hashContent } from '../../utils/hash.js';

/**
 * Step 1: Load Keywords
 * Reads the keyword table and extracts the keyword column.
 */
export const loadKeywords: PipelineStep = async (state) => {
    try {
        const buffer = await readFile(state.keywordsPath);
        const result = parseKeywords(buffer, {
            column: state.options.column,
            separator: state.options.separator,
        });

        state.keywords = result.keywords;
        state.files.keywords = hashContent(state.keywordsPath, buffer);

        for (const warning of result.warnings) {
            state.warnings.push(`[${state.files.keywords.name}] ${warning}`);
        }
    } catch (err) {
        state.errors.push({
            step: 'load-keywords',
            message: `Failed to load keywords from ${state.keywordsPath}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
