import { FieldkitRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { AuthErrorCode } from './error-codes.js';

export class AuthError {
    static tokenUnavailable(tokenEnv: string) {
        return new FieldkitRuntimeError(
            AuthErrorCode.TOKEN_UNAVAILABLE,
            ErrorScope.AUTH,
            ErrorType.USER,
            `No auth token available: ${tokenEnv} is not set and no token command is configured`,
            { tokenEnv },
            `Export ${tokenEnv} or set auth.command in config.yaml`
        );
    }

    static commandFailed(command: string, reason: string) {
        return new FieldkitRuntimeError(
            AuthErrorCode.TOKEN_COMMAND_FAILED,
            ErrorScope.AUTH,
            ErrorType.THIRD_PARTY,
            `Token command '${command}' failed: ${reason}`,
            { command, reason }
        );
    }
}
