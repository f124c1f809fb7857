import { resolve } from 'node:path';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace, getRunName, getOutputsPath } from '../workspace/paths.js';
import { resolveCategoriesPath } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { log, success, warn, arrow, info, error } from '../utils/console.js';
import type { ClassifyOptions } from '../types.js';

export async function classifyFile(keywordsFile: string, options: ClassifyOptions): Promise<void> {
    log('\nKeyword Baskets - Classifying keywords');

    // 1. Workspace detection; the current directory stands in when none is found
    const root = options.workspace ?? detectWorkspaceRoot();
    const workspace = resolveWorkspace(resolve(root ?? process.cwd()));
    if (root) {
        success(`Workspace: ${workspace.root}`);
    } else {
        info('No workspace found, using the current directory.');
    }

    const keywordsPath = resolve(keywordsFile);
    const categoriesPath = resolveCategoriesPath(options.categories, workspace);
    const outDir = options.outDir
        ? resolve(options.outDir)
        : getOutputsPath(workspace, getRunName(keywordsPath));

    arrow(`Categories: ${categoriesPath}`);

    // 2. Run Pipeline
    const state = await runPipeline({ workspace, options, keywordsPath, categoriesPath, outDir });

    // 3. Report Final Status
    log('\n--- Classification Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            error(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Classification failed with fatal errors.');
            process.exit(1);
        }
    }

    const { result } = state;
    if (!result) {
        return;
    }

    const { stats } = result;
    success(`Classified ${stats.totalKeywords} keywords into ${stats.basketCount} baskets.`);
    arrow(`Total keywords: ${stats.totalKeywords}`);
    arrow(`Categories: ${stats.categoryCount}`);
    arrow(`Assigned: ${stats.assignedKeywords}`);
    arrow(`Unassigned: ${stats.uncategorizedKeywords}`);

    log('');
    for (const basket of stats.baskets) {
        log(`  Basket ${basket.index}: ${basket.name} (${basket.count})`);
    }

    if (!options.dryRun) {
        log('');
        arrow(`Outputs saved to: ${outDir}`);
        for (const file of state.outputs) {
            log(`  ${file}`);
        }
    } else {
        log('\n[DRY RUN] No files were written.');
    }
}
