/**
 * Project configuration error codes
 */
export enum ConfigErrorCode {
    FILE_READ_ERROR = 'config_file_read_error',
    PARSE_ERROR = 'config_parse_error',
    BASE_DIR_NOT_FOUND = 'config_base_dir_not_found',
}
