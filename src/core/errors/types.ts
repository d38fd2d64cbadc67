import type { ConfigErrorCode } from '../config/error-codes.js';
import type { DispatchErrorCode } from '../dispatch/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';
import type { MacroErrorCode } from '../macros/error-codes.js';
import type { OverlayErrorCode } from '../overlay/error-codes.js';
import type { VariantErrorCode } from '../variants/error-codes.js';

/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    CONFIG = 'config', // Project configuration file, paths, environment
    DISPATCH = 'dispatch', // Target table loading and step execution
    LOGGER = 'logger', // Logging system operations, transports, and configuration
    MACROS = 'macros', // Dockerfile macro scanning, resolution, and expansion
    OVERLAY = 'overlay', // conf/ overlays and baselayout deployment
    VARIANTS = 'variants', // Image family and variant directory discovery
}

/**
 * Error types describing the nature of the error
 */
export enum ErrorType {
    USER = 'user', // bad input, config errors, authoring errors in the provisioning tree
    NOT_FOUND = 'not_found', // file or directory doesn't exist
    SYSTEM = 'system', // I/O failures, unexpected states
    UNKNOWN = 'unknown', // unclassified errors, fallback
}

/**
 * Union type for all error codes across domains
 */
export type DockformErrorCode =
    | ConfigErrorCode
    | DispatchErrorCode
    | LoggerErrorCode
    | MacroErrorCode
    | OverlayErrorCode
    | VariantErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: DockformErrorCode | string;
    message: string;
    scope: ErrorScope | string; // Domain that generated this issue
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
