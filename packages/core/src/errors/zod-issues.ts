import type { ZodIssue } from 'zod';

/**
 * One `path: message` line per issue.
 */
export function formatZodIssues(issues: readonly ZodIssue[]): string[] {
    return issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
}
