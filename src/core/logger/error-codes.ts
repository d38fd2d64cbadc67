/**
 * Logger-specific error codes
 * Covers transport initialization and configuration
 */
export enum LoggerErrorCode {
    TRANSPORT_UNKNOWN_TYPE = 'logger_transport_unknown_type',
    TRANSPORT_INITIALIZATION_FAILED = 'logger_transport_initialization_failed',
    INVALID_LOG_LEVEL = 'logger_invalid_log_level',
}
