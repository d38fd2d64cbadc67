import { DockformBaseError } from './DockformBaseError.js';
import type { Issue } from './types.js';

/**
 * Validation error holding every issue found, so the CLI can print all of them at once
 */
export class DockformValidationError extends DockformBaseError {
    public readonly issues: Issue[];

    constructor(issues: Issue[], traceId?: string) {
        super(DockformValidationError.formatMessage(issues), traceId);
        this.issues = issues;
    }

    private static formatMessage(issues: Issue[]): string {
        const errors = issues.filter((i) => i.severity === 'error');
        if (errors.length === 0) {
            return 'Validation failed';
        }
        if (errors.length === 1) {
            return errors[0]?.message ?? 'Validation failed';
        }
        return `Validation failed with ${errors.length} errors:\n${errors
            .map((i) => `  - ${i.path && i.path.length > 0 ? `${i.path.join('.')}: ` : ''}${i.message}`)
            .join('\n')}`;
    }

    get errors(): Issue[] {
        return this.issues.filter((i) => i.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((i) => i.severity === 'warning');
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            issues: this.issues,
            traceId: this.traceId,
        };
    }
}
