import * as path from 'path';
import { existsSync, promises as fs } from 'fs';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import {
    formatZodIssues,
    getErrnoCode,
    getFieldkitHome,
    toErrorMessage,
    walkUpDirectories,
    type Logger,
} from '@fieldkit/core';
import { CatalogError } from '../errors.js';
import { PluginCatalogFileSchema, type CatalogEntry } from './schemas.js';

export const CATALOG_ENV_VAR = 'FIELDKIT_PLUGIN_CATALOG';
export const CATALOG_FILE_NAME = 'plugin-catalog.yaml';

export type CatalogOrigin = 'explicit' | 'env' | 'user' | 'bundled';

export interface CatalogLocation {
    path: string;
    origin: CatalogOrigin;
}

/**
 * The catalog shipped with this package, found by walking up from this module.
 */
export function getBundledCatalogPath(): string {
    const here = path.dirname(fileURLToPath(import.meta.url));
    const packageRoot = walkUpDirectories(here, (dir) =>
        existsSync(path.join(dir, 'catalog', CATALOG_FILE_NAME))
    );
    if (!packageRoot) {
        throw CatalogError.notFound(path.join('catalog', CATALOG_FILE_NAME), 'bundled catalog');
    }
    return path.join(packageRoot, 'catalog', CATALOG_FILE_NAME);
}

export function getUserCatalogPath(): string {
    return path.join(getFieldkitHome(), CATALOG_FILE_NAME);
}

/**
 * Resolution order: explicit path, then `FIELDKIT_PLUGIN_CATALOG`, then the
 * user catalog in the fieldkit home, then the bundled catalog.
 */
export function resolveCatalogLocation(
    explicitPath?: string,
    env: NodeJS.ProcessEnv = process.env
): CatalogLocation {
    if (explicitPath) {
        return { path: path.resolve(explicitPath), origin: 'explicit' };
    }
    const fromEnv = env[CATALOG_ENV_VAR]?.trim();
    if (fromEnv) {
        return { path: path.resolve(fromEnv), origin: 'env' };
    }
    const userPath = getUserCatalogPath();
    if (existsSync(userPath)) {
        return { path: userPath, origin: 'user' };
    }
    return { path: getBundledCatalogPath(), origin: 'bundled' };
}

export class PluginCatalog {
    private readonly entries: ReadonlyMap<string, CatalogEntry>;

    constructor(
        entries: Readonly<Record<string, CatalogEntry>>,
        public readonly location: CatalogLocation
    ) {
        this.entries = new Map(Object.entries(entries).sort(([a], [b]) => a.localeCompare(b)));
    }

    get(name: string): CatalogEntry | undefined {
        return this.entries.get(name);
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    /** Sorted plugin names */
    names(): string[] {
        return [...this.entries.keys()];
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * @throws {FieldkitRuntimeError} CATALOG_PLUGIN_NOT_FOUND listing the available names
     */
    require(name: string): CatalogEntry {
        const entry = this.entries.get(name);
        if (!entry) {
            throw CatalogError.pluginNotFound(name, this.names());
        }
        return entry;
    }

    /** Entries sorted by name, optionally only those carrying `tag` */
    list(tag?: string): Array<[string, CatalogEntry]> {
        return [...this.entries].filter(([, entry]) => !tag || entry.tags.includes(tag));
    }
}

export interface LoadPluginCatalogOptions {
    path?: string;
    env?: NodeJS.ProcessEnv;
    logger?: Logger;
}

/**
 * Read and validate the plugin catalog.
 *
 * @throws {FieldkitRuntimeError} when the resolved file is missing, is not YAML or fails validation
 */
export async function loadPluginCatalog(options: LoadPluginCatalogOptions = {}): Promise<PluginCatalog> {
    const location = resolveCatalogLocation(options.path, options.env);
    options.logger?.debug(`Loading plugin catalog from ${location.path} (${location.origin})`);

    let content: string;
    try {
        content = await fs.readFile(location.path, 'utf-8');
    } catch (error) {
        if (getErrnoCode(error) === 'ENOENT') {
            throw CatalogError.notFound(
                location.path,
                location.origin === 'env' ? CATALOG_ENV_VAR : location.origin
            );
        }
        throw CatalogError.readFailed(location.path, toErrorMessage(error));
    }

    let raw: unknown;
    try {
        raw = parseYaml(content);
    } catch (error) {
        throw CatalogError.parseFailed(location.path, toErrorMessage(error));
    }

    const parsed = PluginCatalogFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        throw CatalogError.invalid(location.path, formatZodIssues(parsed.error.issues));
    }
    return new PluginCatalog(parsed.data.plugins, location);
}
