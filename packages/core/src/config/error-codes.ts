/**
 * Configuration-specific error codes
 */
export enum ConfigErrorCode {
    FILE_READ_ERROR = 'config_file_read_error',
    PARSE_ERROR = 'config_parse_error',
    VALIDATION_ERROR = 'config_validation_error',
}
