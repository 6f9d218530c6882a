/**
 * Plugin registry and discovery.
 *
 * The registry is a plain value: the dispatcher builds one at startup and
 * passes it down, and tests build as many independent registries as they need.
 */

import type { Logger } from '../logger/types.js';
import { toErrorMessage, FieldkitRuntimeError } from '../errors/runtime-error.js';
import { getIntrospectionCachePath, getNativePluginRoots } from '../config/paths.js';
import { PluginError } from './errors.js';
import { validateToolPlugin } from './validate-plugin.js';
import {
    findNativePluginEntries,
    loadNativeFactory,
    type ModuleImporter,
    type NativeCandidate,
} from './native-source.js';
import { readIntrospectionCache } from './process/introspection-cache.js';
import { ProcessPlugin, type ProcessRunOptions } from './process/process-plugin.js';
import { wireToDescriptor } from './process/protocol.js';
import type { PluginDescriptor } from './schemas.js';
import type { PluginFactory, PluginSource, RegisteredPlugin } from './types.js';

export class PluginRegistry {
    private readonly plugins = new Map<string, RegisteredPlugin>();

    constructor(private readonly logger: Logger) {}

    /**
     * First registration of a name wins. A later candidate with the same name
     * is dropped with a warning and never merged.
     *
     * @returns false when the candidate was dropped
     */
    register(entry: RegisteredPlugin): boolean {
        const name = entry.descriptor.name;
        const existing = this.plugins.get(name);
        if (existing) {
            const error = PluginError.duplicate(name, existing.origin, entry.origin);
            this.logger.warn(error.message, {
                code: error.code,
                keptSource: existing.source,
                droppedSource: entry.source,
            });
            return false;
        }
        this.plugins.set(name, entry);
        this.logger.debug(`Registered ${entry.source} plugin '${name}'`, { origin: entry.origin });
        return true;
    }

    /**
     * Validate an arbitrary candidate and register it. Load errors are logged, not thrown.
     */
    registerCandidate(candidate: unknown, source: PluginSource, origin: string): boolean {
        try {
            const { plugin, descriptor } = validateToolPlugin(candidate, origin);
            return this.register({ plugin, descriptor, source, origin });
        } catch (error) {
            this.logLoadError(origin, error);
            return false;
        }
    }

    get(name: string): RegisteredPlugin | undefined {
        return this.plugins.get(name);
    }

    has(name: string): boolean {
        return this.plugins.has(name);
    }

    /** Sorted by name */
    list(): RegisteredPlugin[] {
        return [...this.plugins.values()].sort((a, b) =>
            a.descriptor.name.localeCompare(b.descriptor.name)
        );
    }

    names(): string[] {
        return this.list().map((entry) => entry.descriptor.name);
    }

    descriptors(): PluginDescriptor[] {
        return this.list().map((entry) => entry.descriptor);
    }

    get size(): number {
        return this.plugins.size;
    }

    logLoadError(origin: string, error: unknown): void {
        if (error instanceof FieldkitRuntimeError) {
            this.logger.warn(error.message, { code: error.code, origin });
        } else if (error instanceof Error) {
            this.logger.trackException(error, { origin });
        } else {
            this.logger.warn(`Failed to load plugin from '${origin}': ${toErrorMessage(error)}`);
        }
    }
}

export interface DiscoverPluginsOptions {
    logger: Logger;
    /** Built-in registration table, registered before anything else */
    builtins?: Readonly<Record<string, PluginFactory>>;
    /** node_modules roots to scan; defaults to the plugin home and FIELDKIT_PLUGIN_PATH */
    nativeRoots?: readonly string[];
    /** Introspection cache path; null disables process plugins */
    cachePath?: string | null;
    runtime?: Partial<ProcessRunOptions>;
    importModule?: ModuleImporter;
}

async function instantiate(
    registry: PluginRegistry,
    candidate: NativeCandidate
): Promise<void> {
    let produced: unknown;
    try {
        produced = await candidate.factory();
    } catch (error) {
        registry.logLoadError(
            candidate.origin,
            PluginError.factoryFailed(candidate.origin, toErrorMessage(error))
        );
        return;
    }
    registry.registerCandidate(produced, 'native', candidate.origin);
}

/**
 * Build a registry from every source. Native plugins (built-ins first, then
 * scanned packages) are registered before process plugins, so on a name
 * collision the native plugin is kept.
 */
export async function discoverPlugins(options: DiscoverPluginsOptions): Promise<PluginRegistry> {
    const { logger } = options;
    const registry = new PluginRegistry(logger);

    for (const [name, factory] of Object.entries(options.builtins ?? {})) {
        await instantiate(registry, { origin: `builtin:${name}`, factory });
    }

    const roots = options.nativeRoots ?? getNativePluginRoots();
    const entries = await findNativePluginEntries(roots, logger);
    for (const entry of entries) {
        let candidate: NativeCandidate;
        try {
            candidate = await loadNativeFactory(entry, options.importModule);
        } catch (error) {
            registry.logLoadError(`${entry.packageName}:${entry.entryName}`, error);
            continue;
        }
        await instantiate(registry, candidate);
    }

    const cachePath =
        options.cachePath === undefined ? getIntrospectionCachePath() : options.cachePath;
    if (cachePath !== null) {
        const cache = await readIntrospectionCache(cachePath, logger);
        for (const name of [...cache.keys()].sort()) {
            const entry = cache.get(name);
            if (!entry) continue;
            const plugin = new ProcessPlugin(
                entry.binaryPath,
                wireToDescriptor(entry.introspection),
                options.runtime
            );
            registry.registerCandidate(plugin, 'process', entry.binaryPath);
        }
    }

    logger.debug(`Discovered ${registry.size} plugin(s)`, { plugins: registry.names() });
    return registry;
}
