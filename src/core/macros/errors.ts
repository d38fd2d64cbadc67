import { DockformRuntimeError } from '../errors/DockformRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { errorMessage } from '../utils/fs.js';
import { MacroErrorCode } from './error-codes.js';

/**
 * Dockerfile macro error factory
 */
export class MacroError {
    static invalidMarker(value: string): DockformRuntimeError {
        return new DockformRuntimeError(
            MacroErrorCode.INVALID_MARKER,
            ErrorScope.MACROS,
            ErrorType.USER,
            `Invalid macro marker '${value}', expected <family>:<selector> using letters, digits, '.' and '-'`,
            { value }
        );
    }

    /**
     * A marker with no fragment file. Always fatal: the provisioning tree is authoritative,
     * so the build definition or the tree has an authoring error.
     */
    static unresolved(marker: string, expectedPath: string, dockerfile?: string) {
        return new DockformRuntimeError<{
            marker: string;
            expectedPath: string;
            dockerfile?: string;
        }>(
            MacroErrorCode.UNRESOLVED,
            ErrorScope.MACROS,
            ErrorType.USER,
            `Macro found: ${marker}\nMissing content file: ${expectedPath}`,
            dockerfile === undefined ? { marker, expectedPath } : { marker, expectedPath, dockerfile }
        );
    }

    static readFailed(filePath: string, cause: unknown): DockformRuntimeError {
        return new DockformRuntimeError(
            MacroErrorCode.FILE_READ_FAILED,
            ErrorScope.MACROS,
            ErrorType.SYSTEM,
            `Failed to read ${filePath}: ${errorMessage(cause)}`,
            { path: filePath, operation: 'read', reason: errorMessage(cause) },
            { cause }
        );
    }

    static writeFailed(filePath: string, cause: unknown): DockformRuntimeError {
        return new DockformRuntimeError(
            MacroErrorCode.FILE_WRITE_FAILED,
            ErrorScope.MACROS,
            ErrorType.SYSTEM,
            `Failed to rewrite ${filePath}: ${errorMessage(cause)}`,
            { path: filePath, operation: 'write', reason: errorMessage(cause) },
            { cause }
        );
    }
}
