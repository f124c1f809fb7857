/**
 * Error raised when keyword lists or category definitions are structurally invalid.
 * Thrown before classification starts; nothing is classified from partially parsed input.
 */

import type { ZodError } from 'zod';

export class MalformedInputError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'MalformedInputError';
        this.issues = issues;
    }
}

/**
 * Flatten zod issues to "path: message" lines.
 */
export function formatZodIssues(error: ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}
