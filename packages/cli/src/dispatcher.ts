/**
 * Dispatcher: resolves a plugin by name, coerces raw CLI values, builds a
 * fresh execution context and runs the plugin exactly once.
 */

import {
    LogComponent,
    PluginError,
    PluginExecutionContext,
    coerceArguments,
    failureOutcome,
    formatErrorLine,
    parseRunOutcome,
    toErrorMessage,
    type AuthTokenProvider,
    type Logger,
    type PluginRegistry,
    type ProgressSink,
    type RawArguments,
    type RunOutcome,
} from '@fieldkit/core';
import { exitCodeForStatus } from './exit.js';

export interface DispatcherOptions {
    logger: Logger;
    tokenProvider: AuthTokenProvider;
    /** `tools` section of the user config, keyed by plugin name */
    toolConfig?: Readonly<Record<string, Record<string, unknown>>>;
}

export interface InvokeOptions {
    signal?: AbortSignal;
    progress?: ProgressSink;
}

export interface InvocationResult {
    outcome: RunOutcome;
    exitCode: number;
}

export class Dispatcher {
    private readonly logger: Logger;

    constructor(
        private readonly registry: PluginRegistry,
        private readonly options: DispatcherOptions
    ) {
        this.logger = options.logger.createChild(LogComponent.DISPATCHER);
    }

    /**
     * @throws {FieldkitRuntimeError} USAGE-scoped error for an unknown plugin or
     *   arguments that do not match its capabilities; the plugin is not run
     */
    async invoke(
        name: string,
        rawArgs: RawArguments,
        options: InvokeOptions = {}
    ): Promise<InvocationResult> {
        const registered = this.registry.get(name);
        if (!registered) {
            throw PluginError.notFound(name, this.registry.names());
        }

        const args = coerceArguments(registered.descriptor.capabilities, rawArgs);
        this.logger.debug(`Invoking ${registered.source} plugin '${name}'`, { args });

        let authToken = '';
        if (registered.descriptor.requiresAuth) {
            try {
                authToken = await this.options.tokenProvider.getToken();
            } catch (error) {
                const outcome = failureOutcome(`Authentication failed: ${formatErrorLine(error)}`, {
                    error: { message: toErrorMessage(error) },
                });
                return this.finish(name, outcome);
            }
        }

        const ctx = new PluginExecutionContext({
            authToken,
            config: this.toolConfigFor(name),
            signal: options.signal,
            progress: options.progress,
            logger: this.logger.createChild(LogComponent.PLUGIN),
        });

        let returned: unknown;
        try {
            returned = await registered.plugin.run(args, ctx);
        } catch (error) {
            const failure = PluginError.executionFailed(name, toErrorMessage(error));
            this.logger.error(failure.message, { code: failure.code });
            if (error instanceof Error) {
                this.logger.trackException(error, { plugin: name });
            }
            return this.finish(
                name,
                failureOutcome(failure.message, {
                    error: { code: failure.code, message: toErrorMessage(error) },
                })
            );
        }

        const parsed = parseRunOutcome(returned);
        if (!parsed.ok) {
            const invalid = PluginError.invalidOutcome(name, parsed.problems);
            this.logger.error(invalid.message, { code: invalid.code });
            return this.finish(
                name,
                failureOutcome(invalid.message, { error: { code: invalid.code } })
            );
        }
        return this.finish(name, parsed.outcome);
    }

    private toolConfigFor(name: string): Record<string, unknown> {
        const tools = this.options.toolConfig;
        return tools && Object.hasOwn(tools, name) ? (tools[name] ?? {}) : {};
    }

    private finish(name: string, outcome: RunOutcome): InvocationResult {
        const exitCode = exitCodeForStatus(outcome.status);
        this.logger.info(`Plugin '${name}' finished with ${outcome.status}`, { exitCode });
        return { outcome, exitCode };
    }
}
