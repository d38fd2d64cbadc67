import { DockformRuntimeError } from '../errors/DockformRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { errorMessage } from '../utils/fs.js';
import { DispatchErrorCode } from './error-codes.js';

/**
 * Target dispatch error factory
 */
export class DispatchError {
    static tableReadError(tablePath: string, reason: string): DockformRuntimeError {
        return new DockformRuntimeError(
            DispatchErrorCode.TABLE_READ_ERROR,
            ErrorScope.DISPATCH,
            ErrorType.SYSTEM,
            `Failed to read target table ${tablePath}: ${reason}`,
            { tablePath, reason }
        );
    }

    static tableParseError(tablePath: string, reason: string): DockformRuntimeError {
        return new DockformRuntimeError(
            DispatchErrorCode.TABLE_PARSE_ERROR,
            ErrorScope.DISPATCH,
            ErrorType.USER,
            `Failed to parse target table ${tablePath}: ${reason}`,
            { tablePath, reason }
        );
    }

    static unknownTarget(requested: string, available: string[]): DockformRuntimeError {
        return new DockformRuntimeError(
            DispatchErrorCode.UNKNOWN_TARGET,
            ErrorScope.DISPATCH,
            ErrorType.USER,
            `Unknown target '${requested}'. Available targets: all, ${available.join(', ')}`,
            { requested, available }
        );
    }

    /**
     * A step of a target failed; names what was being processed
     */
    static stepFailed(
        target: string,
        step: string,
        cause: unknown,
        details?: Record<string, unknown>
    ): DockformRuntimeError {
        return new DockformRuntimeError(
            DispatchErrorCode.STEP_FAILED,
            ErrorScope.DISPATCH,
            ErrorType.SYSTEM,
            `Target '${target}' failed at ${step}: ${errorMessage(cause)}`,
            { target, step, ...details },
            { cause }
        );
    }
}
