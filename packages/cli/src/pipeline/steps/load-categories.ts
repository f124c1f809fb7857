import type { PipelineStep } from '../types.js';
import { loadCategories } from '../../workspace/config.js';
import { hashContent } from '../../utils/hash.js';

/**
 * Step 2: Load Categories
 * Reads the ordered category definitions. Earlier categories take precedence.
 */
export const loadCategoryFile: PipelineStep = async (state) => {
    try {
        const loaded = await loadCategories(state.categoriesPath);
        state.definitions = loaded.definitions;
        state.files.categories = hashContent(loaded.path, loaded.content);
    } catch (err) {
        state.errors.push({
            step: 'load-categories',
            message: `Failed to load categories from ${state.categoriesPath}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
