import type { CategoryDefinition, ClusterResult } from '@keyword-baskets/core';
import type { HashedFile } from '../utils/hash.js';
import type { Workspace, ClassifyOptions } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * State passed through the classify pipeline.
 */
export interface PipelineState {
    workspace: Workspace;
    options: ClassifyOptions;
    keywordsPath: string;
    categoriesPath: string;
    outDir: string;

    // Accumulated during pipeline execution
    keywords: string[];
    definitions: CategoryDefinition[];
    result?: ClusterResult;
    files: {
        keywords?: HashedFile;
        categories?: HashedFile;
    };
    outputs: string[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
