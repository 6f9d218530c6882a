/**
 * Persisted introspection results for installed process plugins.
 *
 * Written at install time, read on every startup. Rewrites go through a
 * temp file and rename so a crash mid-write leaves the previous file intact.
 */

import path from 'path';
import { promises as fs } from 'fs';
import { z } from 'zod';
import type { Logger } from '../../logger/types.js';
import { formatZodIssues } from '../../errors/zod-issues.js';
import { toErrorMessage } from '../../errors/runtime-error.js';
import { getErrnoCode } from '../../process/errors.js';
import { WireDescriptorSchema } from './protocol.js';

export const CACHE_VERSION = 1;

export const IntrospectionCacheEntrySchema = z
    .object({
        binaryPath: z.string().min(1),
        introspection: WireDescriptorSchema,
        installedAt: z.string(),
    })
    .strict();

const IntrospectionCacheFileSchema = z.object({
    version: z.literal(CACHE_VERSION),
    plugins: z.record(z.unknown()),
});

export type IntrospectionCacheEntry = z.output<typeof IntrospectionCacheEntrySchema>;

export type IntrospectionCache = Map<string, IntrospectionCacheEntry>;

/**
 * Load the cache. A missing or corrupt file yields an empty cache; invalid
 * entries are logged and skipped individually.
 */
export async function readIntrospectionCache(
    cachePath: string,
    logger: Logger
): Promise<IntrospectionCache> {
    const cache: IntrospectionCache = new Map();

    let text: string;
    try {
        text = await fs.readFile(cachePath, 'utf-8');
    } catch (error) {
        if (getErrnoCode(error) !== 'ENOENT') {
            logger.warn(`Cannot read process plugin cache ${cachePath}: ${toErrorMessage(error)}`);
        }
        return cache;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        logger.warn(`Ignoring corrupt process plugin cache ${cachePath}: ${toErrorMessage(error)}`);
        return cache;
    }

    const file = IntrospectionCacheFileSchema.safeParse(raw);
    if (!file.success) {
        logger.warn(
            `Ignoring process plugin cache ${cachePath}: ${formatZodIssues(file.error.issues).join('; ')}`
        );
        return cache;
    }

    for (const [name, value] of Object.entries(file.data.plugins)) {
        const entry = IntrospectionCacheEntrySchema.safeParse(value);
        if (!entry.success) {
            logger.warn(
                `Skipping cached process plugin '${name}': ${formatZodIssues(entry.error.issues).join('; ')}`
            );
            continue;
        }
        cache.set(name, entry.data);
    }
    return cache;
}

export async function writeIntrospectionCache(
    cachePath: string,
    cache: IntrospectionCache
): Promise<void> {
    await fs.mkdir(path.dirname(cachePath), { recursive: true });

    const plugins: Record<string, IntrospectionCacheEntry> = {};
    for (const name of [...cache.keys()].sort()) {
        const entry = cache.get(name);
        if (entry) plugins[name] = entry;
    }
    const data = { version: CACHE_VERSION, plugins };

    const tempPath = `${cachePath}.tmp.${process.pid}.${Date.now()}`;
    try {
        await fs.writeFile(tempPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
        await fs.rename(tempPath, cachePath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
    }
}

export async function upsertIntrospectionCacheEntry(
    cachePath: string,
    name: string,
    entry: IntrospectionCacheEntry,
    logger: Logger
): Promise<void> {
    const cache = await readIntrospectionCache(cachePath, logger);
    cache.set(name, entry);
    await writeIntrospectionCache(cachePath, cache);
}

/**
 * @returns the removed entry, or undefined when nothing was cached under `name`
 */
export async function removeIntrospectionCacheEntry(
    cachePath: string,
    name: string,
    logger: Logger
): Promise<IntrospectionCacheEntry | undefined> {
    const cache = await readIntrospectionCache(cachePath, logger);
    const existing = cache.get(name);
    if (existing) {
        cache.delete(name);
        await writeIntrospectionCache(cachePath, cache);
    }
    return existing;
}
