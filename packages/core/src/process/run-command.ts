/**
 * Run an external command to completion, capturing its output.
 *
 * Used for package-manager installs, release downloads, token commands and
 * plugin introspection. The command is spawned without a shell.
 */

import { spawn } from 'child_process';
import { ProcessError } from './errors.js';
import { killProcessTree } from './kill-tree.js';
import { DEFAULT_KILL_GRACE_MS } from '../config/schemas.js';

export interface RunCommandOptions {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    /** Kill the command after this many milliseconds */
    timeoutMs?: number;
    signal?: AbortSignal;
    killGraceMs?: number;
}

export interface CommandResult {
    /** 130 when cancelled; 1 when terminated by a signal without an exit code */
    exitCode: number;
    stdout: string;
    stderr: string;
    timedOut: boolean;
    cancelled: boolean;
}

/**
 * @throws {FieldkitRuntimeError} when the command cannot be spawned (not found, not executable)
 */
export function runCommand(
    command: string,
    args: readonly string[],
    options: RunCommandOptions = {}
): Promise<CommandResult> {
    const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

    return new Promise((resolve, reject) => {
        if (options.signal?.aborted) {
            resolve({ exitCode: 130, stdout: '', stderr: '', timedOut: false, cancelled: true });
            return;
        }

        const child = spawn(command, args, {
            cwd: options.cwd,
            env: options.env ?? process.env,
            stdio: ['ignore', 'pipe', 'pipe'],
            detached: process.platform !== 'win32',
        });

        let stdout = '';
        let stderr = '';
        let timedOut = false;
        let cancelled = false;
        let settled = false;

        child.stdout.setEncoding('utf8');
        child.stderr.setEncoding('utf8');
        child.stdout.on('data', (chunk: string) => {
            stdout += chunk;
        });
        child.stderr.on('data', (chunk: string) => {
            stderr += chunk;
        });

        const terminate = () => {
            killProcessTree(child, killGraceMs).catch((error: unknown) => {
                stderr += `\nFailed to terminate ${command}: ${String(error)}`;
            });
        };

        const timeoutHandle =
            options.timeoutMs !== undefined
                ? setTimeout(() => {
                      timedOut = true;
                      terminate();
                  }, options.timeoutMs)
                : undefined;

        const abortHandler = () => {
            cancelled = true;
            terminate();
        };
        options.signal?.addEventListener('abort', abortHandler, { once: true });

        const cleanup = () => {
            settled = true;
            clearTimeout(timeoutHandle);
            options.signal?.removeEventListener('abort', abortHandler);
        };

        child.on('close', (code) => {
            if (settled) return;
            cleanup();
            resolve({
                exitCode: cancelled ? 130 : (code ?? 1),
                stdout,
                stderr,
                timedOut,
                cancelled,
            });
        });

        child.on('error', (error) => {
            if (settled) return;
            cleanup();
            reject(ProcessError.fromSpawnError(command, error));
        });
    });
}
