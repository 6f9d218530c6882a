export enum AuthErrorCode {
    TOKEN_UNAVAILABLE = 'auth_token_unavailable',
    TOKEN_COMMAND_FAILED = 'auth_token_command_failed',
}
