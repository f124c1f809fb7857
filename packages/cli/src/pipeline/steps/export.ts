import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { formatExport } from '@keyword-baskets/core';
import { RunManifestSchema, ENGINE_VERSION, type ExportFormat } from '@keyword-baskets/shared';
import type { PipelineStep } from '../types.js';
import type { OutputFormat } from '../../types.js';
import { generateBasketsExcel } from '../../excel/baskets.js';

export const BASKETS_FILE_STEM = 'baskets';
export const MANIFEST_FILE = 'run_manifest.json';

function isTextFormat(format: OutputFormat): format is ExportFormat {
    return format !== 'xlsx';
}

/**
 * Step 4: Export
 * Writes one baskets file per requested format plus the run manifest.
 */
export const exportBaskets: PipelineStep = async (state) => {
    const { result } = state;
    if (!result) {
        state.errors.push({ step: 'export', message: 'Nothing to export: classification did not run.', fatal: true });
        return state;
    }

    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    try {
        await mkdir(state.outDir, { recursive: true });

        for (const format of state.options.formats) {
            const filename = `${BASKETS_FILE_STEM}.${format}`;
            const target = join(state.outDir, filename);

            if (isTextFormat(format)) {
                await writeFile(target, formatExport(result.baskets, format), 'utf8');
            } else {
                await generateBasketsExcel(result).xlsx.writeFile(target);
            }
            state.outputs.push(filename);
        }

        const manifest = RunManifestSchema.parse({
            run_timestamp: new Date().toISOString(),
            keywords_file: state.files.keywords,
            categories_file: state.files.categories,
            keyword_count: result.stats.totalKeywords,
            basket_count: result.stats.basketCount,
            invalid_pattern_count: result.diagnostics.length,
            outputs: state.outputs,
            version: ENGINE_VERSION,
        });

        await writeFile(join(state.outDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
        state.outputs.push(MANIFEST_FILE);
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${state.outDir}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
