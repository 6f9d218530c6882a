import { ErrorScope, ErrorType, FieldkitRuntimeError } from '@fieldkit/core';
import { CliErrorCode } from './error-codes.js';

export class CliError {
    static missingUpdateTarget() {
        return new FieldkitRuntimeError(
            CliErrorCode.MISSING_UPDATE_TARGET,
            ErrorScope.USAGE,
            ErrorType.USER,
            'Specify a plugin name or --all',
            {},
            'Run: fieldkit plugin update <name> or fieldkit plugin update --all'
        );
    }

    static invalidLogLevel(level: string, allowed: readonly string[]) {
        return new FieldkitRuntimeError(
            CliErrorCode.INVALID_LOG_LEVEL,
            ErrorScope.USAGE,
            ErrorType.USER,
            `Invalid log level '${level}'`,
            { level },
            `Use one of: ${allowed.join(', ')}`
        );
    }
}
