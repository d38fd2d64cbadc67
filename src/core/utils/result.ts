import type { ZodError } from 'zod';
import { ErrorScope, ErrorType, type Issue } from '../errors/types.js';

/**
 * Convert zod issues into dockform validation issues
 */
export function zodToIssues<C = unknown>(
    err: ZodError,
    scope: ErrorScope = ErrorScope.CONFIG,
    context?: C
): Issue<C>[] {
    return err.issues.map((issue) => ({
        code: 'schema_validation',
        message: issue.message,
        scope,
        type: ErrorType.USER,
        severity: 'error',
        path: issue.path,
        ...(context === undefined ? {} : { context }),
    }));
}
