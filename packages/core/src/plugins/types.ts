import type { Logger } from '../logger/types.js';
import type { CapabilityDescriptor, CapabilityValue, PluginDescriptor, RunStatus } from './schemas.js';

/**
 * Result of one plugin invocation. Frozen at construction (see createRunOutcome).
 */
export interface RunOutcome {
    readonly status: RunStatus;
    readonly summary: string;
    readonly data: Readonly<Record<string, unknown>>;
    /** Artifact name to file path */
    readonly artifacts: Readonly<Record<string, string>>;
}

/** Coerced argument values keyed by capability name */
export type ToolArgs = Readonly<Record<string, CapabilityValue>>;

export type ProgressSink = (fraction: number, message: string) => void;

/**
 * Per-invocation bundle handed to `ToolPlugin.run`.
 *
 * Cancellation is cooperative: long-running plugins poll `cancelled`
 * (or listen on `signal`) and return a `cancelled` outcome.
 */
export interface ExecutionContext {
    /** Empty string for plugins that do not require auth */
    readonly authToken: string;
    /** The plugin's `tools.<name>` section of the user config */
    readonly config: Readonly<Record<string, unknown>>;
    readonly cancelled: boolean;
    readonly signal: AbortSignal;
    readonly logger: Logger;
    /**
     * Report progress. `fraction` is clamped to [0, 1]; values may go backwards.
     */
    progress(fraction: number, message: string): void;
}

/**
 * The single invocation contract shared by native, wrapper and process plugins.
 */
export interface ToolPlugin {
    readonly name: string;
    readonly description: string;
    readonly version: string;
    readonly requiresAuth: boolean;
    getCapabilities(): readonly CapabilityDescriptor[];
    run(args: ToolArgs, ctx: ExecutionContext): Promise<RunOutcome>;
}

/** Zero-argument factory producing a plugin. Results are validated before registration. */
export type PluginFactory = () => unknown;

export type PluginSource = 'native' | 'process';

export interface RegisteredPlugin {
    readonly plugin: ToolPlugin;
    /** Normalized at registration; argument parsing uses this, not getCapabilities() */
    readonly descriptor: PluginDescriptor;
    readonly source: PluginSource;
    /** Package name, built-in table key or binary path the plugin came from */
    readonly origin: string;
}
