import chalk from 'chalk';
import {
    FieldkitRuntimeError,
    formatErrorLine,
    isUsageError,
    type Logger,
    type RunStatus,
} from '@fieldkit/core';

export const EXIT_CODES = {
    success: 0,
    failure: 1,
    partial: 2,
    usage: 64,
    cancelled: 130,
} as const;

export function exitCodeForStatus(status: RunStatus): number {
    return EXIT_CODES[status];
}

/**
 * Usage errors (unknown plugin, bad arguments) exit 64, everything else 1.
 */
export function exitCodeForError(error: unknown): number {
    return isUsageError(error) ? EXIT_CODES.usage : EXIT_CODES.failure;
}

// Control-flow signal used to end a command with a specific exit code
export class ExitSignal extends Error {
    code: number;
    reason?: string | undefined;
    commandName?: string | undefined;
    constructor(code: number = 0, reason?: string, commandName?: string) {
        super('ExitSignal');
        this.name = 'ExitSignal';
        this.code = code;
        this.reason = reason;
        this.commandName = commandName;
    }
}

export function safeExit(commandName: string, code: number = 0, reason?: string): never {
    throw new ExitSignal(code, reason, commandName);
}

/**
 * Wrap a Commander action so that it never throws: `safeExit` sets the exit
 * code, any other error is printed as a single line and mapped to 64 or 1.
 */
export function withExitHandling<A extends unknown[]>(
    commandName: string,
    logger: Logger,
    handler: (...args: A) => Promise<void> | void
): (...args: A) => Promise<void> {
    return async (...args: A): Promise<void> => {
        try {
            await handler(...args);
        } catch (err) {
            if (err instanceof ExitSignal) {
                process.exitCode = err.code;
                logger.debug(`Command '${err.commandName ?? commandName}' exited with ${err.code}`, {
                    reason: err.reason,
                });
                return;
            }
            process.exitCode = exitCodeForError(err);
            console.error(chalk.red(`Error: ${formatErrorLine(err)}`));
            if (err instanceof Error && !(err instanceof FieldkitRuntimeError)) {
                logger.trackException(err, { command: commandName });
            }
        }
    };
}
