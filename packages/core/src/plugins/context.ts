import type { Logger } from '../logger/types.js';
import type { ExecutionContext, ProgressSink } from './types.js';

export interface ExecutionContextOptions {
    authToken?: string;
    config?: Record<string, unknown>;
    signal?: AbortSignal;
    progress?: ProgressSink;
    logger: Logger;
}

export function clampFraction(fraction: number): number {
    if (Number.isNaN(fraction)) return 0;
    return Math.min(1, Math.max(0, fraction));
}

/**
 * Execution context for a single invocation. Created right before `run` and
 * discarded afterwards.
 */
export class PluginExecutionContext implements ExecutionContext {
    readonly authToken: string;
    readonly config: Readonly<Record<string, unknown>>;
    readonly signal: AbortSignal;
    readonly logger: Logger;
    private readonly sink: ProgressSink | undefined;

    constructor(options: ExecutionContextOptions) {
        this.authToken = options.authToken ?? '';
        this.config = Object.freeze({ ...(options.config ?? {}) });
        this.signal = options.signal ?? new AbortController().signal;
        this.logger = options.logger;
        this.sink = options.progress;
    }

    get cancelled(): boolean {
        return this.signal.aborted;
    }

    progress(fraction: number, message: string): void {
        const clamped = clampFraction(fraction);
        this.logger.silly('progress', { fraction: clamped, message });
        this.sink?.(clamped, message);
    }
}
