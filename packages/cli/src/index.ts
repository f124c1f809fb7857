#!/usr/bin/env node
/**
 * Keyword Baskets CLI
 *
 * The CLI owns all file I/O and console output; @keyword-baskets/core receives
 * bytes and text and returns data.
 */

import { parseCliArgs, USAGE, type CliCommand } from './args.js';
import { classifyFile } from './commands/classify.js';
import { checkCategories } from './commands/check.js';
import { addPattern } from './commands/add-pattern.js';
import { log, error } from './utils/console.js';

async function main(): Promise<void> {
    let cli: CliCommand;
    try {
        cli = parseCliArgs(process.argv.slice(2));
    } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        log(`\n${USAGE}`);
        process.exit(1);
    }

    switch (cli.command) {
        case 'help':
            log(USAGE);
            return;
        case 'classify':
            await classifyFile(cli.keywordsFile, cli.options);
            return;
        case 'check':
            await checkCategories(cli.categoriesFile, cli.options);
            return;
        case 'add-pattern':
            await addPattern(cli.category, cli.pattern, cli.options);
            return;
    }
}

main().catch((err: unknown) => {
    console.error('Unexpected error:', err instanceof Error ? err.message : err);
    process.exit(1);
});
