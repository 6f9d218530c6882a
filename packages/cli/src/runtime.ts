import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
    LogComponent,
    createDefaultTokenProvider,
    createLogger,
    discoverPlugins,
    expandHome,
    getDefaultLogFilePath,
    getIntrospectionCachePath,
    getPluginHome,
    loadUserConfig,
    walkUpDirectories,
    type FieldkitLogger,
    type LoggerTransportConfig,
    type PluginRegistry,
    type UserConfig,
} from '@fieldkit/core';
import { PluginManager, loadPluginCatalog } from '@fieldkit/plugin-management';
import { BUILTIN_PLUGINS } from './builtin-plugins.js';
import { Dispatcher } from './dispatcher.js';

const PackageVersionSchema = z.object({ version: z.string() });

/**
 * Version of the nearest package.json above this module.
 */
export function readCliVersion(): string {
    const here = path.dirname(fileURLToPath(import.meta.url));
    const packageDir = walkUpDirectories(here, (dir) => existsSync(path.join(dir, 'package.json')));
    if (!packageDir) return '0.0.0';
    const parsed = PackageVersionSchema.safeParse(
        JSON.parse(readFileSync(path.join(packageDir, 'package.json'), 'utf-8'))
    );
    return parsed.success ? parsed.data.version : '0.0.0';
}

export function buildLoggerTransports(config: UserConfig): LoggerTransportConfig[] {
    const transports: LoggerTransportConfig[] = [{ type: 'console', colorize: true }];
    if (config.logFile !== false) {
        transports.push({
            type: 'file',
            path: config.logFile ? path.resolve(expandHome(config.logFile)) : getDefaultLogFilePath(),
            maxSize: 5 * 1024 * 1024,
            maxFiles: 3,
        });
    }
    return transports;
}

export interface CliRuntime {
    config: UserConfig;
    logger: FieldkitLogger;
    registry: PluginRegistry;
    dispatcher: Dispatcher;
    createPluginManager(): Promise<PluginManager>;
}

/**
 * Load config, build the logger and discover every plugin once per process.
 */
export async function createCliRuntime(configPath?: string): Promise<CliRuntime> {
    const config = await loadUserConfig(configPath);
    const logger = createLogger(
        { level: config.logLevel, transports: buildLoggerTransports(config) },
        LogComponent.CLI
    );

    const registry = await discoverPlugins({
        logger: logger.createChild(LogComponent.REGISTRY),
        builtins: BUILTIN_PLUGINS,
        runtime: {
            runTimeoutMs: config.runtime.runTimeoutMs,
            killGraceMs: config.runtime.killGraceMs,
        },
    });

    const dispatcher = new Dispatcher(registry, {
        logger,
        tokenProvider: createDefaultTokenProvider(config.auth),
        toolConfig: config.tools,
    });

    return {
        config,
        logger,
        registry,
        dispatcher,
        async createPluginManager() {
            const catalogLogger = logger.createChild(LogComponent.CATALOG);
            const catalog = await loadPluginCatalog({ logger: catalogLogger });
            return new PluginManager({
                catalog,
                logger: catalogLogger,
                pluginHome: getPluginHome(),
                cachePath: getIntrospectionCachePath(),
                introspectTimeoutMs: config.runtime.introspectTimeoutMs,
            });
        },
    };
}
