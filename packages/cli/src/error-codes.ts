export enum CliErrorCode {
    MISSING_UPDATE_TARGET = 'CLI_MISSING_UPDATE_TARGET',
    INVALID_LOG_LEVEL = 'CLI_INVALID_LOG_LEVEL',
}
