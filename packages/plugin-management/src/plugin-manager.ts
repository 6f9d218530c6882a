/**
 * Install, update and remove catalog plugins.
 *
 * Layout under the plugin home (default ~/.fieldkit/plugins):
 *   native/               npm prefix holding native and wrapper packages
 *   bin/                  default install dir for binary plugins
 *   process-plugins.json  introspection cache read at startup
 */

import * as path from 'path';
import { existsSync, promises as fs } from 'fs';
import {
    DEFAULT_INTROSPECT_TIMEOUT_MS,
    FieldkitRuntimeError,
    ProcessErrorCode,
    expandHome,
    getIntrospectionCachePath,
    getPluginHome,
    introspectBinary,
    readIntrospectionCache,
    removeIntrospectionCacheEntry,
    runCommand,
    toErrorMessage,
    upsertIntrospectionCacheEntry,
    type CommandResult,
    type IntrospectionResult,
    type Logger,
} from '@fieldkit/core';
import type { PluginCatalog } from './catalog/catalog.js';
import type { BinarySource, CatalogEntry, PluginType } from './catalog/schemas.js';
import { CatalogError } from './errors.js';
import {
    installSystemDependencies,
    parseSystemDependencies,
    type InstallSystemDependenciesOptions,
} from './system-deps/installer.js';
import { formatDependencyWarning } from './system-deps/results.js';
import type { ReleaseDependencySpec } from './system-deps/schemas.js';
import type {
    CommandRunner,
    DependencyInstallResult,
    DependencyInstallWarning,
    FetchLike,
    PathLookup,
} from './system-deps/types.js';

export type Introspector = (binaryPath: string, timeoutMs: number) => Promise<IntrospectionResult>;

export interface PluginManagerOptions {
    catalog: PluginCatalog;
    logger: Logger;
    pluginHome?: string;
    cachePath?: string;
    introspectTimeoutMs?: number;
    runCommand?: CommandRunner;
    findOnPath?: PathLookup;
    fetch?: FetchLike;
    introspect?: Introspector;
}

export interface PluginInstallOptions {
    /** Version, tag or git ref; overrides the catalog default */
    ref?: string;
    /** Fail when any system dependency could not be installed */
    strict?: boolean;
}

export interface PluginInstallResult {
    name: string;
    pluginType: PluginType;
    /** npm install argument, or the release the binary came from */
    installedFrom: string;
    /** Package directory or binary path */
    location: string;
    dependencies: DependencyInstallResult[];
    warnings: DependencyInstallWarning[];
    notes: string[];
}

export interface PluginRemoveResult {
    name: string;
    pluginType: PluginType;
    removed: string[];
    notes: string[];
}

export interface PluginListing {
    name: string;
    entry: CatalogEntry;
    installed: boolean;
}

export interface UpdateAllResult {
    updated: PluginInstallResult[];
    failed: Array<{ name: string; error: Error }>;
}

const REGISTRY_NAME = /^(@[\w.-]+\/)?[\w.-]+$/;

/**
 * Attach a ref to an npm install argument: `name@ref` for registry packages,
 * `source#ref` for git and URL sources.
 */
export function withRef(source: string, ref?: string): string {
    if (!ref) return source;
    const versionIndex = source.indexOf('@', 1);
    const bareName = versionIndex === -1 ? source : source.slice(0, versionIndex);
    if (REGISTRY_NAME.test(bareName)) {
        return `${bareName}@${ref}`;
    }
    const fragmentIndex = source.indexOf('#');
    const base = fragmentIndex === -1 ? source : source.slice(0, fragmentIndex);
    return `${base}#${ref}`;
}

export class PluginManager {
    private readonly catalog: PluginCatalog;
    private readonly logger: Logger;
    private readonly pluginHome: string;
    private readonly cachePath: string;
    private readonly introspectTimeoutMs: number;
    private readonly runCommand: CommandRunner;
    private readonly findOnPath: PathLookup | undefined;
    private readonly fetch: FetchLike | undefined;
    private readonly introspect: Introspector;

    constructor(options: PluginManagerOptions) {
        this.catalog = options.catalog;
        this.logger = options.logger;
        this.pluginHome = options.pluginHome ?? getPluginHome();
        this.cachePath = options.cachePath ?? getIntrospectionCachePath();
        this.introspectTimeoutMs = options.introspectTimeoutMs ?? DEFAULT_INTROSPECT_TIMEOUT_MS;
        this.runCommand = options.runCommand ?? runCommand;
        this.findOnPath = options.findOnPath;
        this.fetch = options.fetch;
        this.introspect = options.introspect ?? introspectBinary;
    }

    /** npm prefix for native and wrapper packages */
    get nativePrefix(): string {
        return path.join(this.pluginHome, 'native');
    }

    async install(name: string, options: PluginInstallOptions = {}): Promise<PluginInstallResult> {
        const entry = this.catalog.require(name);
        if (entry.pluginType === 'binary') {
            return this.installBinary(name, entry, options);
        }
        return this.installPackage(name, entry, options);
    }

    /**
     * Reinstall at the catalog (or given) ref. Binary plugins are removed first
     * so the release is downloaded again.
     */
    async update(name: string, options: PluginInstallOptions = {}): Promise<PluginInstallResult> {
        const entry = this.catalog.require(name);
        if (entry.pluginType === 'binary') {
            await this.removeBinary(name, entry);
        }
        return this.install(name, options);
    }

    /**
     * Update every installed catalog plugin. Failures are collected, not thrown.
     */
    async updateAll(options: Pick<PluginInstallOptions, 'strict'> = {}): Promise<UpdateAllResult> {
        const result: UpdateAllResult = { updated: [], failed: [] };
        for (const listing of await this.listAvailable()) {
            if (!listing.installed) continue;
            try {
                result.updated.push(await this.update(listing.name, options));
            } catch (error) {
                result.failed.push({
                    name: listing.name,
                    error: error instanceof Error ? error : new Error(String(error)),
                });
            }
        }
        return result;
    }

    async remove(name: string): Promise<PluginRemoveResult> {
        const entry = this.catalog.require(name);
        if (entry.pluginType === 'binary') {
            return this.removeBinary(name, entry);
        }

        const packageName = this.requirePackage(name, entry);
        const result = await this.npm(name, ['uninstall', '--prefix', this.nativePrefix, packageName]);
        if (result.exitCode !== 0) {
            throw CatalogError.uninstallFailed(
                name,
                result.stderr.trim() || `npm exited with code ${result.exitCode}`
            );
        }

        const notes: string[] = [];
        const binaries = parseSystemDependencies(entry.systemDeps, this.logger).map((s) => s.binary);
        if (binaries.length > 0) {
            notes.push(
                `System dependencies were not removed (they may be shared): ${binaries.join(', ')}`
            );
        }
        return { name, pluginType: entry.pluginType, removed: [packageName], notes };
    }

    /**
     * Catalog entries sorted by name, with installed markers.
     */
    async listAvailable(tag?: string): Promise<PluginListing[]> {
        const cache = await readIntrospectionCache(this.cachePath, this.logger);
        return this.catalog.list(tag).map(([name, entry]) => ({
            name,
            entry,
            installed:
                entry.pluginType === 'binary'
                    ? cache.has(name)
                    : entry.package !== undefined &&
                      existsSync(path.join(this.nativePrefix, 'node_modules', entry.package, 'package.json')),
        }));
    }

    private requirePackage(name: string, entry: CatalogEntry): string {
        if (!entry.package) {
            throw CatalogError.installFailed(name, 'catalog entry has no package');
        }
        return entry.package;
    }

    private requireBinarySource(name: string, entry: CatalogEntry): BinarySource {
        if (!entry.binarySource) {
            throw CatalogError.installFailed(name, 'catalog entry has no binarySource');
        }
        return entry.binarySource;
    }

    private installerOptions(): InstallSystemDependenciesOptions {
        return {
            logger: this.logger,
            runCommand: this.runCommand,
            findOnPath: this.findOnPath,
            fetch: this.fetch,
        };
    }

    private async npm(name: string, args: string[]): Promise<CommandResult> {
        await fs.mkdir(this.nativePrefix, { recursive: true });
        try {
            return await this.runCommand('npm', args);
        } catch (error) {
            if (
                error instanceof FieldkitRuntimeError &&
                error.code === ProcessErrorCode.COMMAND_NOT_FOUND
            ) {
                throw CatalogError.packageManagerMissing('npm');
            }
            throw CatalogError.installFailed(name, toErrorMessage(error));
        }
    }

    private async installPackage(
        name: string,
        entry: CatalogEntry,
        options: PluginInstallOptions
    ): Promise<PluginInstallResult> {
        const packageName = this.requirePackage(name, entry);
        const installArg = withRef(entry.source ?? packageName, options.ref ?? entry.ref);
        const notes: string[] = [];
        if (entry.private) {
            notes.push('Private package: make sure your npm registry or git credentials grant access');
        }

        // System dependencies first; failures come back as warnings
        const specs = parseSystemDependencies(entry.systemDeps, this.logger);
        const report = await installSystemDependencies(specs, this.installerOptions());

        this.logger.info(`Installing plugin '${name}' from ${installArg}`);
        const result = await this.npm(name, ['install', '--prefix', this.nativePrefix, installArg]);
        if (result.exitCode !== 0) {
            throw CatalogError.installFailed(
                name,
                result.stderr.trim() || `npm exited with code ${result.exitCode}`,
                entry.private
                    ? 'Check access to the private package (npm login, or SSH key / `gh auth login` for git sources)'
                    : undefined
            );
        }

        if (report.warnings.length > 0) {
            notes.push('The plugin is installed but may not work until the dependencies above are resolved');
            if (options.strict) {
                throw CatalogError.systemDependenciesFailed(
                    name,
                    report.warnings.map((w) => w.binary)
                );
            }
        }

        return {
            name,
            pluginType: entry.pluginType,
            installedFrom: installArg,
            location: path.join(this.nativePrefix, 'node_modules', packageName),
            dependencies: report.results,
            warnings: report.warnings,
            notes,
        };
    }

    private releaseSpec(name: string, source: BinarySource, ref?: string): ReleaseDependencySpec {
        return {
            manager: 'github-release',
            binary: source.binary ?? name,
            repo: source.repo,
            tag: ref ?? source.tag,
            asset: source.asset,
            installDir: source.installDir ?? path.join(this.pluginHome, 'bin'),
        };
    }

    private async installBinary(
        name: string,
        entry: CatalogEntry,
        options: PluginInstallOptions
    ): Promise<PluginInstallResult> {
        const spec = this.releaseSpec(name, this.requireBinarySource(name, entry), options.ref);
        const report = await installSystemDependencies([spec], this.installerOptions());
        const installed = report.results[0];
        if (!installed?.success) {
            throw CatalogError.binaryInstallFailed(
                name,
                spec.binary,
                installed?.warning ? formatDependencyWarning(installed.warning) : 'unknown error'
            );
        }

        const binaryPath =
            installed.location ?? path.join(path.resolve(expandHome(spec.installDir)), spec.binary);
        const { introspection, descriptor } = await this.introspect(binaryPath, this.introspectTimeoutMs);

        await upsertIntrospectionCacheEntry(
            this.cachePath,
            name,
            { binaryPath, introspection, installedAt: new Date().toISOString() },
            this.logger
        );

        const notes: string[] = [];
        if (descriptor.name !== name) {
            notes.push(`The binary reports its name as '${descriptor.name}'; run it as: fieldkit ${descriptor.name}`);
        }
        if (installed.alreadyInstalled) {
            notes.push(`${spec.binary} was already on PATH at ${binaryPath}; nothing was downloaded`);
        }

        return {
            name,
            pluginType: entry.pluginType,
            installedFrom: `${spec.repo}@${spec.tag}`,
            location: binaryPath,
            dependencies: report.results,
            warnings: [],
            notes,
        };
    }

    private async removeBinary(name: string, entry: CatalogEntry): Promise<PluginRemoveResult> {
        const spec = this.releaseSpec(name, this.requireBinarySource(name, entry));
        const installDir = path.resolve(expandHome(spec.installDir));
        const cached = await removeIntrospectionCacheEntry(this.cachePath, name, this.logger);
        const binaryPath = cached?.binaryPath ?? path.join(installDir, spec.binary);

        const removed: string[] = [];
        const notes: string[] = [];
        if (path.dirname(binaryPath) !== installDir) {
            notes.push(`${binaryPath} is outside ${installDir} and was left in place`);
        } else if (existsSync(binaryPath)) {
            await fs.rm(binaryPath, { force: true });
            removed.push(binaryPath);
        } else {
            notes.push(`Binary not found at ${binaryPath}`);
        }
        if (cached) {
            removed.push(`${name} (introspection cache)`);
        }
        return { name, pluginType: entry.pluginType, removed, notes };
    }
}
