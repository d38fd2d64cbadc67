/**
 * Dockerfile macro error codes
 */
export enum MacroErrorCode {
    // Marker grammar
    INVALID_MARKER = 'macro_invalid_marker',

    // Resolution
    UNRESOLVED = 'macro_unresolved',

    // File I/O
    FILE_READ_FAILED = 'macro_file_read_failed',
    FILE_WRITE_FAILED = 'macro_file_write_failed',
}
