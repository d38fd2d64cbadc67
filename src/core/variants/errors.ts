import { DockformRuntimeError } from '../errors/DockformRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { VariantErrorCode } from './error-codes.js';

/**
 * Variant discovery error factory
 */
export class VariantError {
    static familyNotFound(family: string, familyPath: string): DockformRuntimeError {
        return new DockformRuntimeError(
            VariantErrorCode.FAMILY_NOT_FOUND,
            ErrorScope.VARIANTS,
            ErrorType.NOT_FOUND,
            `Image family '${family}' not found at ${familyPath}`,
            { family, familyPath }
        );
    }

    static listFailed(directory: string, cause: unknown): DockformRuntimeError {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new DockformRuntimeError(
            VariantErrorCode.LIST_FAILED,
            ErrorScope.VARIANTS,
            ErrorType.SYSTEM,
            `Failed to list ${directory}: ${reason}`,
            { directory, reason },
            { cause }
        );
    }
}
