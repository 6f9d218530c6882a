/**
 * Auth token providers.
 *
 * Tokens are resolved by the dispatcher only for plugins that declare
 * `requiresAuth`, and injected read-only into the execution context.
 */

import type { AuthConfig } from '../config/schemas.js';
import { runCommand, type CommandResult } from '../process/run-command.js';
import { AuthError } from './errors.js';
import { toErrorMessage } from '../errors/runtime-error.js';

export interface AuthTokenProvider {
    /**
     * @throws {FieldkitRuntimeError} when no token can be produced
     */
    getToken(): Promise<string>;
}

/**
 * Reads a bearer token from an environment variable. Resolves to null when unset.
 */
export class EnvTokenProvider {
    constructor(
        private readonly envName: string,
        private readonly env: NodeJS.ProcessEnv = process.env
    ) {}

    async tryGetToken(): Promise<string | null> {
        const value = this.env[this.envName]?.trim();
        return value ? value : null;
    }
}

/**
 * Runs a command and uses its trimmed stdout as the token.
 */
export class CommandTokenProvider implements AuthTokenProvider {
    constructor(
        private readonly command: readonly string[],
        private readonly timeoutMs: number
    ) {}

    async getToken(): Promise<string> {
        const [executable, ...args] = this.command;
        if (executable === undefined) {
            throw AuthError.commandFailed('', 'empty command');
        }
        const display = this.command.join(' ');

        let result: CommandResult;
        try {
            result = await runCommand(executable, args, { timeoutMs: this.timeoutMs });
        } catch (error) {
            throw AuthError.commandFailed(display, toErrorMessage(error));
        }

        if (result.timedOut) {
            throw AuthError.commandFailed(display, `timed out after ${this.timeoutMs}ms`);
        }
        if (result.exitCode !== 0) {
            throw AuthError.commandFailed(
                display,
                result.stderr.trim() || `exited with code ${result.exitCode}`
            );
        }
        const token = result.stdout.trim();
        if (token === '') {
            throw AuthError.commandFailed(display, 'produced no output');
        }
        return token;
    }
}

/**
 * Environment variable first, then the configured token command.
 */
export function createDefaultTokenProvider(
    config: AuthConfig,
    env: NodeJS.ProcessEnv = process.env
): AuthTokenProvider {
    const fromEnv = new EnvTokenProvider(config.tokenEnv, env);
    const fromCommand = config.command
        ? new CommandTokenProvider(config.command, config.timeoutMs)
        : null;

    return {
        async getToken() {
            const token = await fromEnv.tryGetToken();
            if (token !== null) {
                return token;
            }
            if (fromCommand) {
                return fromCommand.getToken();
            }
            throw AuthError.tokenUnavailable(config.tokenEnv);
        },
    };
}
