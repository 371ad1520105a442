import { ZodError } from 'zod';

/**
 * One-line description of a caught value. Validation errors list each
 * failing field as `path: message`.
 */
export function describeError(err: unknown): string {
    if (err instanceof ZodError) {
        return err.issues
            .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
    }
    return err instanceof Error ? err.message : String(err);
}
