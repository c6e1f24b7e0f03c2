import type { ZodError } from 'zod';

/**
 * Flatten zod issues into "path: message" lines.
 */
export function formatIssues(error: ZodError): string[] {
    return error.issues.map(issue => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
    });
}
