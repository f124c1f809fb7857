import { parseArgs } from 'node:util';
import { KEYWORD_INPUT, EXPORT_FORMATS } from '@keyword-baskets/shared';
import type { AddPatternOptions, CheckOptions, ClassifyOptions, OutputFormat } from './types.js';

export type CliCommand =
    | { command: 'classify'; keywordsFile: string; options: ClassifyOptions }
    | { command: 'check'; categoriesFile?: string; options: CheckOptions }
    | { command: 'add-pattern'; category: string; pattern: string; options: AddPatternOptions }
    | { command: 'help' };

export const OUTPUT_FORMATS: readonly OutputFormat[] = [...EXPORT_FORMATS, 'xlsx'];

export const USAGE = `Usage:
  kwb classify <keywords-file> [options]   Group keywords into baskets
  kwb check [categories-file]              Report invalid patterns
  kwb add-pattern <category> <pattern>     Append a pattern to the workspace categories

Options:
  -c, --categories <file>   Category definitions (YAML or JSON)
  -k, --column <name>       Keyword column (default "${KEYWORD_INPUT.DEFAULT_COLUMN}")
  -s, --separator <char>    CSV separator (default "${KEYWORD_INPUT.DEFAULT_SEPARATOR}", "\\t" for tab)
  -o, --out-dir <dir>       Output directory
  -f, --format <format>     ${OUTPUT_FORMATS.join(' | ')} (repeatable, default all)
      --dry-run             Classify without writing files
      --strict              Fail when any pattern is invalid
      --keywords <file>     Keyword file used by add-pattern to check breadth
  -w, --workspace <dir>     Workspace root (default: detected from cwd)
  -h, --help                Show this help`;

function isOutputFormat(value: string): value is OutputFormat {
    return OUTPUT_FORMATS.some(format => format === value);
}

function parseFormats(values: string[] | undefined): OutputFormat[] {
    if (!values || values.length === 0) {
        return [...OUTPUT_FORMATS];
    }
    const formats: OutputFormat[] = [];
    for (const value of values) {
        const format = value.toLowerCase();
        if (!isOutputFormat(format)) {
            throw new Error(`Unknown format "${value}". Expected one of: ${OUTPUT_FORMATS.join(', ')}`);
        }
        if (!formats.includes(format)) {
            formats.push(format);
        }
    }
    return formats;
}

function parseSeparator(value: string | undefined): string {
    if (value === undefined) return KEYWORD_INPUT.DEFAULT_SEPARATOR;
    return value === '\\t' || value.toLowerCase() === 'tab' ? '\t' : value;
}

/**
 * Parses argv (without node and script) into a command.
 * Throws on unknown options, unknown commands and missing arguments.
 */
export function parseCliArgs(argv: string[]): CliCommand {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        strict: true,
        options: {
            categories: { type: 'string', short: 'c' },
            column: { type: 'string', short: 'k' },
            separator: { type: 'string', short: 's' },
            'out-dir': { type: 'string', short: 'o' },
            format: { type: 'string', short: 'f', multiple: true },
            'dry-run': { type: 'boolean' },
            strict: { type: 'boolean' },
            keywords: { type: 'string' },
            workspace: { type: 'string', short: 'w' },
            help: { type: 'boolean', short: 'h' },
        },
    });

    const [command, ...rest] = positionals;
    if (values.help || command === undefined || command === 'help') {
        return { command: 'help' };
    }

    const column = values.column ?? KEYWORD_INPUT.DEFAULT_COLUMN;
    const separator = parseSeparator(values.separator);

    switch (command) {
        case 'classify': {
            const [keywordsFile] = rest;
            if (!keywordsFile) {
                throw new Error('classify requires a keywords file');
            }
            return {
                command: 'classify',
                keywordsFile,
                options: {
                    categories: values.categories,
                    column,
                    separator,
                    outDir: values['out-dir'],
                    formats: parseFormats(values.format),
                    dryRun: values['dry-run'] ?? false,
                    strict: values.strict ?? false,
                    workspace: values.workspace,
                },
            };
        }
        case 'check':
            return {
                command: 'check',
                categoriesFile: rest[0] ?? values.categories,
                options: { workspace: values.workspace },
            };
        case 'add-pattern': {
            const [category, pattern] = rest;
            if (category === undefined || pattern === undefined) {
                throw new Error('add-pattern requires a category and a pattern');
            }
            return {
                command: 'add-pattern',
                category,
                pattern,
                options: { keywords: values.keywords, column, separator, workspace: values.workspace },
            };
        }
        default:
            throw new Error(`Unknown command "${command}"`);
    }
}
