/**
 * Main entry point for the error management system
 * Exports core types and utilities for error handling
 */

export { DockformBaseError } from './DockformBaseError.js';
export { DockformRuntimeError, isDockformRuntimeError } from './DockformRuntimeError.js';
export { DockformValidationError } from './DockformValidationError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { DockformErrorCode, Issue, Severity } from './types.js';
