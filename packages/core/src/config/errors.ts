import { FieldkitRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ConfigErrorCode } from './error-codes.js';

/**
 * Config runtime error factory methods
 */
export class ConfigError {
    static fileReadError(configPath: string, cause: string) {
        return new FieldkitRuntimeError(
            ConfigErrorCode.FILE_READ_ERROR,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Failed to read configuration file '${configPath}': ${cause}`,
            { configPath, cause },
            'Check file permissions'
        );
    }

    static parseError(configPath: string, cause: string) {
        return new FieldkitRuntimeError(
            ConfigErrorCode.PARSE_ERROR,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Failed to parse configuration file '${configPath}': ${cause}`,
            { configPath, cause },
            'Ensure the configuration file contains valid YAML syntax'
        );
    }

    static invalid(configPath: string, issues: string[]) {
        return new FieldkitRuntimeError(
            ConfigErrorCode.VALIDATION_ERROR,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Invalid configuration in '${configPath}': ${issues.join('; ')}`,
            { configPath, issues },
            `Fix or remove ${configPath}`
        );
    }
}
