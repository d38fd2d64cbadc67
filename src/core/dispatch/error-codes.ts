/**
 * Target dispatch error codes
 */
export enum DispatchErrorCode {
    TABLE_READ_ERROR = 'dispatch_table_read_error',
    TABLE_PARSE_ERROR = 'dispatch_table_parse_error',
    UNKNOWN_TARGET = 'dispatch_unknown_target',
    STEP_FAILED = 'dispatch_step_failed',
}
