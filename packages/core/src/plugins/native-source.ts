/**
 * Native plugin source.
 *
 * Native plugins come from two places: the built-in registration table the
 * CLI passes in, and installed npm packages whose package.json declares
 *
 *   "fieldkit": { "plugins": { "<entry>": "./dist/index.js#createPlugin" } }
 *
 * Each entry resolves to a zero-argument factory. Packages are found by
 * scanning `node_modules` roots, including one level of `@scope` directories.
 */

import path from 'path';
import { promises as fs, type Dirent } from 'fs';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import type { Logger } from '../logger/types.js';
import { toErrorMessage } from '../errors/runtime-error.js';
import { formatZodIssues } from '../errors/zod-issues.js';
import { getErrnoCode } from '../process/errors.js';
import { PluginError } from './errors.js';
import type { PluginFactory } from './types.js';

const DEFAULT_EXPORTS = ['default', 'createPlugin'] as const;

const PluginPackageSchema = z.object({
    name: z.string().min(1),
    version: z.string().optional(),
    fieldkit: z.object({
        plugins: z.record(z.string().min(1)),
    }),
});

export interface NativePluginEntry {
    packageName: string;
    packageDir: string;
    /** Key under `fieldkit.plugins` */
    entryName: string;
    modulePath: string;
    /** Explicit export after `#`, otherwise default then createPlugin */
    exportName?: string;
}

export interface NativeCandidate {
    /** `<package>:<entry>` or `builtin:<name>` */
    origin: string;
    factory: PluginFactory;
}

export type ModuleImporter = (url: string) => Promise<unknown>;

const defaultImporter: ModuleImporter = (url) => import(url);

export function parseEntryReference(
    packageDir: string,
    reference: string
): { modulePath: string; exportName?: string } {
    const hashIndex = reference.lastIndexOf('#');
    const file = hashIndex >= 0 ? reference.slice(0, hashIndex) : reference;
    const exportName = hashIndex >= 0 ? reference.slice(hashIndex + 1) : '';
    const modulePath = path.resolve(packageDir, file);
    return exportName ? { modulePath, exportName } : { modulePath };
}

async function listPackageDirs(root: string): Promise<string[]> {
    let entries: Dirent[];
    try {
        entries = await fs.readdir(root, { withFileTypes: true });
    } catch (error) {
        if (getErrnoCode(error) === 'ENOENT' || getErrnoCode(error) === 'ENOTDIR') {
            return [];
        }
        throw error;
    }

    const dirs: string[] = [];
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
        if (entry.name.startsWith('.') || !(entry.isDirectory() || entry.isSymbolicLink())) {
            continue;
        }
        const fullPath = path.join(root, entry.name);
        if (entry.name.startsWith('@')) {
            dirs.push(...(await listPackageDirs(fullPath)));
        } else {
            dirs.push(fullPath);
        }
    }
    return dirs;
}

/**
 * Read one package.json. Returns [] for packages that are not fieldkit plugins.
 */
async function readPluginEntries(packageDir: string, logger: Logger): Promise<NativePluginEntry[]> {
    let raw: unknown;
    try {
        raw = JSON.parse(await fs.readFile(path.join(packageDir, 'package.json'), 'utf-8'));
    } catch (error) {
        if (getErrnoCode(error) !== 'ENOENT') {
            logger.debug(`Skipping ${packageDir}: ${toErrorMessage(error)}`);
        }
        return [];
    }

    if (typeof raw !== 'object' || raw === null || !('fieldkit' in raw)) {
        return [];
    }

    const parsed = PluginPackageSchema.safeParse(raw);
    if (!parsed.success) {
        const error = PluginError.invalidMetadata(
            packageDir,
            formatZodIssues(parsed.error.issues).join('; ')
        );
        logger.warn(error.message, { code: error.code });
        return [];
    }

    return Object.entries(parsed.data.fieldkit.plugins).map(([entryName, reference]) => ({
        packageName: parsed.data.name,
        packageDir,
        entryName,
        ...parseEntryReference(packageDir, reference),
    }));
}

/**
 * Scan roots in order. When the same package name appears under several
 * roots the first one wins.
 */
export async function findNativePluginEntries(
    roots: readonly string[],
    logger: Logger
): Promise<NativePluginEntry[]> {
    const seenPackages = new Set<string>();
    const result: NativePluginEntry[] = [];

    for (const root of roots) {
        let packageDirs: string[];
        try {
            packageDirs = await listPackageDirs(root);
        } catch (error) {
            logger.warn(`Cannot scan plugin root ${root}: ${toErrorMessage(error)}`);
            continue;
        }

        for (const packageDir of packageDirs) {
            const entries = await readPluginEntries(packageDir, logger);
            const first = entries[0];
            if (!first) continue;
            if (seenPackages.has(first.packageName)) {
                logger.debug(`Package ${first.packageName} at ${packageDir} shadowed by an earlier root`);
                continue;
            }
            seenPackages.add(first.packageName);
            result.push(...entries);
        }
    }
    return result;
}

function readExport(moduleNamespace: unknown, key: string): unknown {
    if (typeof moduleNamespace !== 'object' || moduleNamespace === null) {
        return undefined;
    }
    const value: unknown = Reflect.get(moduleNamespace, key);
    return value;
}

/**
 * Import the entry's module and return its factory.
 *
 * @throws {FieldkitRuntimeError} PLUGIN_LOAD_FAILED
 */
export async function loadNativeFactory(
    entry: NativePluginEntry,
    importModule: ModuleImporter = defaultImporter
): Promise<NativeCandidate> {
    const origin = `${entry.packageName}:${entry.entryName}`;

    let moduleNamespace: unknown;
    try {
        moduleNamespace = await importModule(pathToFileURL(entry.modulePath).href);
    } catch (error) {
        throw PluginError.loadFailed(origin, toErrorMessage(error));
    }

    const candidates = entry.exportName ? [entry.exportName] : DEFAULT_EXPORTS;
    for (const key of candidates) {
        const exported = readExport(moduleNamespace, key);
        if (typeof exported === 'function') {
            const factory: PluginFactory = () => {
                const produced: unknown = Reflect.apply(exported, undefined, []);
                return produced;
            };
            return { origin, factory };
        }
    }

    throw PluginError.loadFailed(
        origin,
        `${entry.modulePath} has no factory export (looked for ${candidates.join(', ')})`
    );
}
