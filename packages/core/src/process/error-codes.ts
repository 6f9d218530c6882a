/**
 * Process-specific error codes
 */
export enum ProcessErrorCode {
    COMMAND_NOT_FOUND = 'PROCESS_COMMAND_NOT_FOUND',
    PERMISSION_DENIED = 'PROCESS_PERMISSION_DENIED',
    SPAWN_FAILED = 'PROCESS_SPAWN_FAILED',
    TIMEOUT = 'PROCESS_TIMEOUT',
    PROTOCOL_ERROR = 'PROCESS_PROTOCOL_ERROR',
    INTROSPECTION_FAILED = 'PROCESS_INTROSPECTION_FAILED',
}
