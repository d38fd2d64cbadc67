import { DockformBaseError } from './DockformBaseError.js';
import type { DockformErrorCode, ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error with a typed code, the domain that raised it and structured context.
 * Created through the per-module factories (MacroError, OverlayError, ...), not directly.
 */
export class DockformRuntimeError<C = Record<string, unknown>> extends DockformBaseError {
    constructor(
        public readonly code: DockformErrorCode | string,
        public readonly scope: ErrorScope | string,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        options?: { cause?: unknown; traceId?: string }
    ) {
        super(
            message,
            options?.traceId,
            options?.cause === undefined ? undefined : { cause: options.cause }
        );
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            scope: this.scope,
            type: this.type,
            message: this.message,
            context: this.context,
            traceId: this.traceId,
        };
    }
}

/**
 * Narrow an unknown value to a DockformRuntimeError, optionally of a given code
 */
export function isDockformRuntimeError(
    error: unknown,
    code?: DockformErrorCode
): error is DockformRuntimeError {
    return error instanceof DockformRuntimeError && (code === undefined || error.code === code);
}
