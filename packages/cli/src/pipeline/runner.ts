import type { PipelineState, PipelineStep } from './types.js';
import { loadKeywords } from './steps/load-keywords.js';
import { loadCategoryFile } from './steps/load-categories.js';
import { classifyKeywords } from './steps/classify.js';
import { exportBaskets } from './steps/export.js';
import { arrow, error } from '../utils/console.js';
import type { Workspace, ClassifyOptions } from '../types.js';

export interface PipelineInput {
    workspace: Workspace;
    options: ClassifyOptions;
    keywordsPath: string;
    categoriesPath: string;
    outDir: string;
}

export const PIPELINE_STEPS: { name: string; fn: PipelineStep }[] = [
    { name: 'Load Keywords', fn: loadKeywords },
    { name: 'Load Categories', fn: loadCategoryFile },
    { name: 'Classify', fn: classifyKeywords },
    { name: 'Export', fn: exportBaskets },
];

/**
 * Runs each step sequentially, stopping after the first fatal error.
 */
export async function runPipeline(input: PipelineInput): Promise<PipelineState> {
    let state: PipelineState = {
        ...input,
        keywords: [],
        definitions: [],
        files: {},
        outputs: [],
        warnings: [],
        errors: [],
    };

    for (let i = 0; i < PIPELINE_STEPS.length; i++) {
        const step = PIPELINE_STEPS[i];
        arrow(`Step ${i + 1}/${PIPELINE_STEPS.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
