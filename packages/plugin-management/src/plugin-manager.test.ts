import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { existsSync, promises as fs } from 'fs';
import * as path from 'path';
import {
    ProcessError,
    readIntrospectionCache,
    wireToDescriptor,
    type CommandResult,
    type WireDescriptor,
} from '@fieldkit/core';
import { createMockLogger, createTempDir } from '@fieldkit/core/test-utils';
import { PluginCatalog } from './catalog/catalog.js';
import { CatalogEntrySchema, type CatalogEntryInput } from './catalog/schemas.js';
import { PluginManager, withRef, type Introspector } from './plugin-manager.js';
import { CatalogErrorCode, InstallerErrorCode } from './error-codes.js';
import { resolveAssetName } from './system-deps/platform.js';
import type { CommandRunner, FetchLike, PathLookup } from './system-deps/types.js';

const OK: CommandResult = { exitCode: 0, stdout: '', stderr: '', timedOut: false, cancelled: false };

const ENTRIES: Record<string, CatalogEntryInput> = {
    coverage: { description: 'Coverage checks', package: '@acme/coverage', tags: ['quality'] },
    provenance: {
        description: 'Provenance verification',
        pluginType: 'wrapper',
        package: '@acme/provenance',
        systemDeps: [{ manager: 'go', package: 'example.com/cosign/cmd/cosign@v2.0.0', binary: 'cosign' }],
    },
    gauge: {
        description: 'Image scanner',
        pluginType: 'binary',
        binarySource: { repo: 'acme/gauge', tag: 'v0.4.0', asset: 'gauge_{os}_{arch}' },
    },
};

const GAUGE_INTROSPECTION: WireDescriptor = {
    name: 'gauge',
    description: 'Image scanner',
    version: '0.4.0',
    requires_auth: false,
    params: [],
};

function buildCatalog(): PluginCatalog {
    const entries = Object.fromEntries(
        Object.entries(ENTRIES).map(([name, entry]) => [name, CatalogEntrySchema.parse(entry)])
    );
    return new PluginCatalog(entries, { path: '/test/catalog.yaml', origin: 'explicit' });
}

describe('withRef', () => {
    it('should pin registry packages with @', () => {
        expect(withRef('@acme/coverage', '1.2.0')).toBe('@acme/coverage@1.2.0');
        expect(withRef('@acme/coverage@1.0.0', '2.0.0')).toBe('@acme/coverage@2.0.0');
        expect(withRef('coverage', 'next')).toBe('coverage@next');
    });

    it('should pin git sources with a fragment', () => {
        expect(withRef('git+https://github.com/acme/coverage.git', 'v2')).toBe(
            'git+https://github.com/acme/coverage.git#v2'
        );
        expect(withRef('github:acme/coverage#main', 'v2')).toBe('github:acme/coverage#v2');
        expect(withRef('git+ssh://git@github.com/acme/coverage.git', 'v2')).toBe(
            'git+ssh://git@github.com/acme/coverage.git#v2'
        );
    });

    it('should leave the source alone without a ref', () => {
        expect(withRef('@acme/coverage')).toBe('@acme/coverage');
    });
});

describe('PluginManager', () => {
    let home: string;
    let cachePath: string;
    let runCommand: Mock<CommandRunner>;
    let findOnPath: Mock<PathLookup>;
    let fetch: Mock<FetchLike>;
    let introspect: Mock<Introspector>;
    let manager: PluginManager;

    beforeEach(async () => {
        home = await createTempDir('fieldkit-plugins-');
        cachePath = path.join(home, 'process-plugins.json');
        runCommand = vi.fn<CommandRunner>(async () => OK);
        findOnPath = vi.fn<PathLookup>(async (binary) => (binary === 'npm' ? '/usr/bin/npm' : null));
        fetch = vi.fn<FetchLike>(async () => new Response('', { status: 500 }));
        introspect = vi.fn<Introspector>(async () => ({
            introspection: GAUGE_INTROSPECTION,
            descriptor: wireToDescriptor(GAUGE_INTROSPECTION),
        }));
        manager = new PluginManager({
            catalog: buildCatalog(),
            logger: createMockLogger(),
            pluginHome: home,
            cachePath,
            runCommand,
            findOnPath,
            fetch,
            introspect,
        });
    });

    afterEach(async () => {
        await fs.rm(home, { recursive: true, force: true });
    });

    describe('native and wrapper plugins', () => {
        it('should install the package into the plugin prefix', async () => {
            const result = await manager.install('coverage', { ref: '2.1.0' });

            expect(runCommand).toHaveBeenCalledWith('npm', [
                'install',
                '--prefix',
                path.join(home, 'native'),
                '@acme/coverage@2.1.0',
            ]);
            expect(result).toMatchObject({
                name: 'coverage',
                pluginType: 'native',
                installedFrom: '@acme/coverage@2.1.0',
                location: path.join(home, 'native', 'node_modules', '@acme/coverage'),
                warnings: [],
            });
        });

        it('should succeed with one warning when a system dependency toolchain is missing', async () => {
            const result = await manager.install('provenance');

            expect(result.warnings).toHaveLength(1);
            expect(result.warnings[0]).toMatchObject({
                code: InstallerErrorCode.TOOLCHAIN_MISSING,
                binary: 'cosign',
                manager: 'go',
            });
            expect(result.notes).toEqual([
                'The plugin is installed but may not work until the dependencies above are resolved',
            ]);
            expect(runCommand).toHaveBeenCalledTimes(1);
            expect(runCommand).toHaveBeenCalledWith('npm', [
                'install',
                '--prefix',
                path.join(home, 'native'),
                '@acme/provenance',
            ]);
        });

        it('should fail in strict mode when a system dependency is missing', async () => {
            await expect(manager.install('provenance', { strict: true })).rejects.toMatchObject({
                code: CatalogErrorCode.SYSTEM_DEPENDENCIES_FAILED,
                message: "Plugin 'provenance' installed but system dependencies failed: cosign",
            });
        });

        it('should surface npm stderr when the install fails', async () => {
            runCommand.mockResolvedValueOnce({ ...OK, exitCode: 1, stderr: 'E404 Not Found\n' });

            await expect(manager.install('coverage')).rejects.toMatchObject({
                code: CatalogErrorCode.INSTALL_FAILED,
                message: "Failed to install plugin 'coverage': E404 Not Found",
            });
        });

        it('should explain a missing npm', async () => {
            runCommand.mockRejectedValueOnce(ProcessError.commandNotFound('npm'));

            await expect(manager.install('coverage')).rejects.toMatchObject({
                code: CatalogErrorCode.PACKAGE_MANAGER_MISSING,
            });
        });

        it('should uninstall the package and leave system dependencies in place', async () => {
            const result = await manager.remove('provenance');

            expect(runCommand).toHaveBeenCalledWith('npm', [
                'uninstall',
                '--prefix',
                path.join(home, 'native'),
                '@acme/provenance',
            ]);
            expect(result.notes).toEqual([
                'System dependencies were not removed (they may be shared): cosign',
            ]);
        });

        it('should reject names missing from the catalog', async () => {
            await expect(manager.install('nope')).rejects.toMatchObject({
                code: CatalogErrorCode.PLUGIN_NOT_FOUND,
            });
            expect(runCommand).not.toHaveBeenCalled();
        });
    });

    describe('binary plugins', () => {
        const assetName = resolveAssetName('gauge_{os}_{arch}');

        beforeEach(() => {
            fetch.mockImplementation(async (url) =>
                url.includes('/releases/tags/')
                    ? new Response(
                          JSON.stringify({
                              assets: [
                                  {
                                      name: assetName,
                                      browser_download_url: `https://downloads.example.test/${assetName}`,
                                  },
                              ],
                          })
                      )
                    : new Response('#!/bin/sh\n')
            );
        });

        it('should download, introspect and cache the binary', async () => {
            const binaryPath = path.join(home, 'bin', 'gauge');

            const result = await manager.install('gauge');

            expect(result).toMatchObject({
                name: 'gauge',
                pluginType: 'binary',
                installedFrom: 'acme/gauge@v0.4.0',
                location: binaryPath,
                notes: [],
            });
            expect(introspect).toHaveBeenCalledWith(binaryPath, 10_000);
            const cache = await readIntrospectionCache(cachePath, createMockLogger());
            expect(cache.get('gauge')).toMatchObject({ binaryPath, introspection: GAUGE_INTROSPECTION });
        });

        it('should not write the cache when introspection fails', async () => {
            introspect.mockRejectedValueOnce(ProcessError.introspectionFailed('gauge', 'exited with code 2'));

            await expect(manager.install('gauge')).rejects.toThrow('Introspection of gauge failed');
            expect(existsSync(cachePath)).toBe(false);
        });

        it('should report a failed download', async () => {
            fetch.mockImplementation(async () => new Response('', { status: 404 }));

            await expect(manager.install('gauge')).rejects.toMatchObject({
                code: CatalogErrorCode.BINARY_INSTALL_FAILED,
            });
            expect(introspect).not.toHaveBeenCalled();
        });

        it('should mark installed plugins and remove binary and cache entry', async () => {
            await manager.install('gauge');
            const binaryPath = path.join(home, 'bin', 'gauge');

            const listing = await manager.listAvailable();
            expect(listing.map((l) => [l.name, l.installed])).toEqual([
                ['coverage', false],
                ['gauge', true],
                ['provenance', false],
            ]);

            const removed = await manager.remove('gauge');

            expect(removed.removed).toEqual([binaryPath, 'gauge (introspection cache)']);
            expect(existsSync(binaryPath)).toBe(false);
            expect((await readIntrospectionCache(cachePath, createMockLogger())).has('gauge')).toBe(false);
        });
    });

    describe('listAvailable and updateAll', () => {
        it('should filter by tag', async () => {
            const listing = await manager.listAvailable('quality');

            expect(listing.map((l) => l.name)).toEqual(['coverage']);
        });

        it('should update only installed plugins', async () => {
            const packageDir = path.join(home, 'native', 'node_modules', '@acme', 'coverage');
            await fs.mkdir(packageDir, { recursive: true });
            await fs.writeFile(path.join(packageDir, 'package.json'), '{"name":"@acme/coverage"}');

            const result = await manager.updateAll();

            expect(result.updated.map((r) => r.name)).toEqual(['coverage']);
            expect(result.failed).toEqual([]);
        });

        it('should collect failures instead of stopping', async () => {
            const packageDir = path.join(home, 'native', 'node_modules', '@acme', 'coverage');
            await fs.mkdir(packageDir, { recursive: true });
            await fs.writeFile(path.join(packageDir, 'package.json'), '{}');
            runCommand.mockResolvedValueOnce({ ...OK, exitCode: 1, stderr: 'network down' });

            const result = await manager.updateAll();

            expect(result.updated).toEqual([]);
            expect(result.failed.map((f) => [f.name, f.error.message])).toEqual([
                ['coverage', "Failed to install plugin 'coverage': network down"],
            ]);
        });
    });
});
