import { isDockformRuntimeError } from '../../../core/errors/DockformRuntimeError.js';
import { MacroErrorCode } from '../../../core/macros/error-codes.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
/** A Dockerfile marker names a fragment file that does not exist */
export const EXIT_UNRESOLVED_MACRO = 2;

export function exitCodeFor(error: unknown): number {
    return isDockformRuntimeError(error, MacroErrorCode.UNRESOLVED)
        ? EXIT_UNRESOLVED_MACRO
        : EXIT_FAILURE;
}
