/**
 * Process plugin adapter.
 *
 * Wraps a binary that speaks the stdio protocol behind the ToolPlugin
 * contract. The descriptor comes from the introspection cache; the binary is
 * only spawned for `run`.
 */

import { spawn } from 'child_process';
import { createInterface } from 'readline';
import { ProcessErrorCode } from '../../process/error-codes.js';
import { ProcessError } from '../../process/errors.js';
import { killProcessTree, trackChildProcess } from '../../process/kill-tree.js';
import { DEFAULT_KILL_GRACE_MS, DEFAULT_RUN_TIMEOUT_MS } from '../../config/schemas.js';
import { toErrorMessage } from '../../errors/runtime-error.js';
import { cancelledOutcome, createRunOutcome, failureOutcome } from '../outcome.js';
import type { CapabilityDescriptor, PluginDescriptor } from '../schemas.js';
import type { ExecutionContext, RunOutcome, ToolArgs, ToolPlugin } from '../types.js';
import { EXECUTE_FLAG, parseProgressLine, parseTerminalResult } from './protocol.js';

export interface ProcessRunOptions {
    runTimeoutMs: number;
    killGraceMs: number;
}

/** Environment variable carrying the auth token to process plugins that require it */
export const AUTH_TOKEN_ENV = 'FIELDKIT_AUTH_TOKEN';

type Termination = 'none' | 'cancelled' | 'timedOut';

export class ProcessPlugin implements ToolPlugin {
    readonly name: string;
    readonly description: string;
    readonly version: string;
    readonly requiresAuth: boolean;
    private readonly options: ProcessRunOptions;

    constructor(
        readonly binaryPath: string,
        private readonly descriptor: PluginDescriptor,
        options: Partial<ProcessRunOptions> = {}
    ) {
        this.name = descriptor.name;
        this.description = descriptor.description;
        this.version = descriptor.version;
        this.requiresAuth = descriptor.requiresAuth;
        this.options = {
            runTimeoutMs: options.runTimeoutMs ?? DEFAULT_RUN_TIMEOUT_MS,
            killGraceMs: options.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
        };
    }

    getCapabilities(): readonly CapabilityDescriptor[] {
        return this.descriptor.capabilities;
    }

    async run(args: ToolArgs, ctx: ExecutionContext): Promise<RunOutcome> {
        if (ctx.cancelled) {
            return cancelledOutcome('Cancelled by user');
        }

        const logger = ctx.logger;
        const env = { ...process.env };
        if (this.requiresAuth && ctx.authToken !== '') {
            env[AUTH_TOKEN_ENV] = ctx.authToken;
        }

        logger.debug(`Spawning process plugin ${this.name}`, { binary: this.binaryPath });
        const child = spawn(this.binaryPath, [EXECUTE_FLAG, JSON.stringify(args)], {
            stdio: ['ignore', 'pipe', 'pipe'],
            env,
            detached: process.platform !== 'win32',
        });
        trackChildProcess(child);

        return new Promise<RunOutcome>((resolve) => {
            let stdout = '';
            const stderrLines: string[] = [];
            let termination: Termination = 'none';
            let settled = false;

            const terminate = (reason: Exclude<Termination, 'none'>) => {
                if (termination !== 'none' || settled) return;
                termination = reason;
                logger.debug(`Terminating ${this.name}: ${reason}`, { pid: child.pid });
                killProcessTree(child, this.options.killGraceMs).catch((error: unknown) => {
                    logger.warn(`Failed to terminate ${this.name}: ${toErrorMessage(error)}`);
                });
            };

            const onAbort = () => terminate('cancelled');
            ctx.signal.addEventListener('abort', onAbort, { once: true });
            const timer = setTimeout(() => terminate('timedOut'), this.options.runTimeoutMs);

            // Progress stream
            const lines = createInterface({ input: child.stderr, crlfDelay: Infinity });
            lines.on('line', (line) => {
                const event = parseProgressLine(line);
                if (event) {
                    ctx.progress(event.progress, event.message);
                } else if (line.trim() !== '') {
                    stderrLines.push(line);
                    logger.debug(`[${this.name}] ${line}`);
                }
                if (ctx.cancelled) {
                    terminate('cancelled');
                }
            });

            // Terminal result
            child.stdout.setEncoding('utf8');
            child.stdout.on('data', (chunk: string) => {
                stdout += chunk;
            });

            const finish = (outcome: RunOutcome) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                ctx.signal.removeEventListener('abort', onAbort);
                lines.close();
                resolve(outcome);
            };

            child.on('error', (error) => {
                // Only spawn failures leave the child without a pid; later errors end in 'close'
                if (child.pid !== undefined) {
                    logger.debug(`Process error from ${this.name}: ${error.message}`);
                    return;
                }
                const spawnError = ProcessError.fromSpawnError(this.binaryPath, error);
                finish(
                    failureOutcome(spawnError.message, {
                        error: { code: spawnError.code, message: spawnError.message },
                    })
                );
            });

            child.on('close', (code, signal) => {
                const stderr = stderrLines.join('\n');
                if (termination === 'cancelled') {
                    finish(cancelledOutcome('Cancelled by user'));
                    return;
                }
                if (termination === 'timedOut') {
                    finish(
                        failureOutcome(
                            `${this.name} timed out after ${this.options.runTimeoutMs}ms`,
                            {
                                timedOut: true,
                                stdout,
                                stderr,
                                error: {
                                    code: ProcessErrorCode.TIMEOUT,
                                    message: `No result within ${this.options.runTimeoutMs}ms`,
                                },
                            }
                        )
                    );
                    return;
                }

                const result = parseTerminalResult(stdout);
                if (result) {
                    finish(
                        createRunOutcome(result.status, result.summary, result.data, result.artifacts)
                    );
                    return;
                }

                const exitCode = code ?? 1;
                const protocolError = ProcessError.protocolError(
                    this.name,
                    stdout.trim() === ''
                        ? 'no result on stdout'
                        : 'stdout is not a result object'
                );
                logger.warn(protocolError.message, { exitCode, signal });
                finish(
                    failureOutcome(`${this.name} returned no valid result (exit code ${exitCode})`, {
                        exitCode,
                        signal,
                        stdout,
                        stderr,
                        error: { code: protocolError.code, message: protocolError.message },
                    })
                );
            });
        });
    }
}
