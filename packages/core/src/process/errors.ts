import { FieldkitRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ProcessErrorCode } from './error-codes.js';

export function getErrnoCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Process error factory methods
 */
export class ProcessError {
    static commandNotFound(command: string) {
        return new FieldkitRuntimeError(
            ProcessErrorCode.COMMAND_NOT_FOUND,
            ErrorScope.PROCESS,
            ErrorType.NOT_FOUND,
            `Command not found: ${command}`,
            { command },
            'Check that the executable exists and is on PATH'
        );
    }

    static permissionDenied(command: string) {
        return new FieldkitRuntimeError(
            ProcessErrorCode.PERMISSION_DENIED,
            ErrorScope.PROCESS,
            ErrorType.USER,
            `Permission denied executing: ${command}`,
            { command },
            `Make the file executable: chmod +x ${command}`
        );
    }

    static spawnFailed(command: string, cause: string) {
        return new FieldkitRuntimeError(
            ProcessErrorCode.SPAWN_FAILED,
            ErrorScope.PROCESS,
            ErrorType.SYSTEM,
            `Failed to start ${command}: ${cause}`,
            { command, cause }
        );
    }

    /**
     * Map a child_process 'error' event to a typed error.
     */
    static fromSpawnError(command: string, error: Error) {
        switch (getErrnoCode(error)) {
            case 'ENOENT':
                return ProcessError.commandNotFound(command);
            case 'EACCES':
                return ProcessError.permissionDenied(command);
            default:
                return ProcessError.spawnFailed(command, error.message);
        }
    }

    static timeout(command: string, timeoutMs: number) {
        return new FieldkitRuntimeError(
            ProcessErrorCode.TIMEOUT,
            ErrorScope.PROCESS,
            ErrorType.TIMEOUT,
            `${command} did not finish within ${timeoutMs}ms`,
            { command, timeoutMs }
        );
    }

    static protocolError(binary: string, reason: string, context: Record<string, unknown> = {}) {
        return new FieldkitRuntimeError(
            ProcessErrorCode.PROTOCOL_ERROR,
            ErrorScope.PROCESS,
            ErrorType.THIRD_PARTY,
            `${binary} violated the plugin protocol: ${reason}`,
            { binary, reason, ...context }
        );
    }

    static introspectionFailed(binary: string, reason: string) {
        return new FieldkitRuntimeError(
            ProcessErrorCode.INTROSPECTION_FAILED,
            ErrorScope.PROCESS,
            ErrorType.THIRD_PARTY,
            `Introspection of ${binary} failed: ${reason}`,
            { binary, reason },
            `Run '${binary} --introspect' manually to inspect its output`
        );
    }
}
