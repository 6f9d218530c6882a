import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
    readIntrospectionCache,
    removeIntrospectionCacheEntry,
    upsertIntrospectionCacheEntry,
    writeIntrospectionCache,
    type IntrospectionCacheEntry,
} from './introspection-cache.js';
import { WireDescriptorSchema, wireToDescriptor } from './protocol.js';
import { createTempDir } from './test-utils.js';
import { createMockLogger } from '../../logger/test-utils.js';

const entry: IntrospectionCacheEntry = {
    binaryPath: '/opt/fieldkit/bin/survey',
    introspection: WireDescriptorSchema.parse({
        name: 'survey',
        description: 'd',
        version: '1.0.0',
        requires_auth: false,
        params: [{ name: 'level', description: 'Depth', type: 'int', required: false, default: 1 }],
    }),
    installedAt: '2026-03-01T12:00:00.000Z',
};

describe('introspection cache', () => {
    let tempDir: string;
    let cachePath: string;

    beforeEach(async () => {
        tempDir = await createTempDir('fieldkit-cache-');
        cachePath = path.join(tempDir, 'nested', 'process-plugins.json');
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should reproduce an identical descriptor after a write and reload', async () => {
        await writeIntrospectionCache(cachePath, new Map([['survey', entry]]));

        const cache = await readIntrospectionCache(cachePath, createMockLogger());
        const reloaded = cache.get('survey');

        expect(reloaded).toEqual(entry);
        expect(reloaded && wireToDescriptor(reloaded.introspection)).toEqual(
            wireToDescriptor(entry.introspection)
        );
    });

    it('should write the versioned file layout and leave no temp files', async () => {
        await writeIntrospectionCache(cachePath, new Map([['survey', entry]]));

        const onDisk = JSON.parse(await fs.readFile(cachePath, 'utf-8'));
        expect(onDisk.version).toBe(1);
        expect(Object.keys(onDisk.plugins)).toEqual(['survey']);
        expect(await fs.readdir(path.dirname(cachePath))).toEqual(['process-plugins.json']);
    });

    it('should return an empty cache when the file is missing', async () => {
        const logger = createMockLogger();

        const cache = await readIntrospectionCache(cachePath, logger);

        expect(cache.size).toBe(0);
        expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should skip invalid entries and keep valid ones', async () => {
        await fs.mkdir(path.dirname(cachePath), { recursive: true });
        await fs.writeFile(
            cachePath,
            JSON.stringify({ version: 1, plugins: { survey: entry, broken: { binaryPath: '' } } })
        );
        const logger = createMockLogger();

        const cache = await readIntrospectionCache(cachePath, logger);

        expect([...cache.keys()]).toEqual(['survey']);
        expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('should ignore a file with an unknown version', async () => {
        await fs.mkdir(path.dirname(cachePath), { recursive: true });
        await fs.writeFile(cachePath, JSON.stringify({ version: 2, plugins: { survey: entry } }));

        const cache = await readIntrospectionCache(cachePath, createMockLogger());

        expect(cache.size).toBe(0);
    });

    it('should upsert and remove single entries', async () => {
        const logger = createMockLogger();
        await upsertIntrospectionCacheEntry(cachePath, 'survey', entry, logger);
        await upsertIntrospectionCacheEntry(
            cachePath,
            'other',
            { ...entry, binaryPath: '/opt/fieldkit/bin/other' },
            logger
        );

        const removed = await removeIntrospectionCacheEntry(cachePath, 'survey', logger);
        const cache = await readIntrospectionCache(cachePath, logger);

        expect(removed?.binaryPath).toBe('/opt/fieldkit/bin/survey');
        expect([...cache.keys()]).toEqual(['other']);
        await expect(removeIntrospectionCacheEntry(cachePath, 'survey', logger)).resolves.toBeUndefined();
    });
});
