import { DockformRuntimeError } from '../errors/DockformRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { errorMessage } from '../utils/fs.js';
import { OverlayErrorCode } from './error-codes.js';

/**
 * Overlay error factory
 */
export class OverlayError {
    /**
     * Source tree missing, not a directory, or not readable
     */
    static sourceUnreadable(source: string, reason: string): DockformRuntimeError {
        return new DockformRuntimeError(
            OverlayErrorCode.SOURCE_UNREADABLE,
            ErrorScope.OVERLAY,
            ErrorType.USER,
            `Cannot read overlay source ${source}: ${reason}`,
            { source, reason }
        );
    }

    /**
     * Copying into one variant failed
     */
    static copyFailed(
        variant: string,
        source: string,
        target: string,
        cause: unknown
    ): DockformRuntimeError {
        return new DockformRuntimeError(
            OverlayErrorCode.COPY_FAILED,
            ErrorScope.OVERLAY,
            ErrorType.SYSTEM,
            `Failed to copy ${source} into ${target}: ${errorMessage(cause)}`,
            { variant, source, target, operation: 'copy', reason: errorMessage(cause) },
            { cause }
        );
    }

    static clearFailed(variant: string, target: string, cause: unknown): DockformRuntimeError {
        return new DockformRuntimeError(
            OverlayErrorCode.CLEAR_FAILED,
            ErrorScope.OVERLAY,
            ErrorType.SYSTEM,
            `Failed to clear ${target}: ${errorMessage(cause)}`,
            { variant, target, operation: 'remove', reason: errorMessage(cause) },
            { cause }
        );
    }
}
