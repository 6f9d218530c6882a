import { describe, it, expect, vi, beforeAll, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import {
    CatalogEntrySchema,
    InstallerErrorCode,
    type PluginInstallResult,
} from '@fieldkit/plugin-management';
import {
    handlePluginInstallCommand,
    handlePluginListCommand,
    handlePluginRemoveCommand,
    handlePluginUpdateCommand,
    type PluginManagerApi,
} from './plugin.js';

const coverageEntry = CatalogEntrySchema.parse({
    description: 'Coverage reports',
    package: '@example/plugin-coverage',
    tags: ['quality'],
});

const gaugeEntry = CatalogEntrySchema.parse({
    description: 'Gauge binary',
    pluginType: 'binary',
    private: true,
    binarySource: { repo: 'example-org/gauge', tag: 'v0.4.0', asset: 'gauge_{os}_{arch}' },
});

const provenanceResult: PluginInstallResult = {
    name: 'provenance',
    pluginType: 'wrapper',
    installedFrom: '@example/plugin-provenance',
    location: '/tmp/plugins/native/node_modules/@example/plugin-provenance',
    dependencies: [],
    warnings: [
        {
            code: InstallerErrorCode.TOOLCHAIN_MISSING,
            binary: 'cosign',
            manager: 'go',
            reason: 'Go runtime not found',
            remediation: 'Install Go from https://go.dev/dl/ then re-run: go install example.com/cosign@v1',
        },
    ],
    notes: ['The plugin is installed but may not work until the dependencies above are resolved'],
};

function createManager() {
    return {
        install: vi.fn<PluginManagerApi['install']>(async () => provenanceResult),
        update: vi.fn<PluginManagerApi['update']>(async () => provenanceResult),
        updateAll: vi.fn<PluginManagerApi['updateAll']>(),
        remove: vi.fn<PluginManagerApi['remove']>(),
        listAvailable: vi.fn<PluginManagerApi['listAvailable']>(),
    };
}

describe('plugin command handlers', () => {
    let logSpy: MockInstance<typeof console.log>;
    let errorSpy: MockInstance<typeof console.error>;
    const printed = () => logSpy.mock.calls.map((call) => call[0]);

    beforeAll(() => {
        chalk.level = 0;
    });

    beforeEach(() => {
        logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
        errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should list catalog plugins with installed markers and details', async () => {
        const manager = createManager();
        manager.listAvailable.mockResolvedValue([
            { name: 'coverage', entry: coverageEntry, installed: true },
            { name: 'gauge', entry: gaugeEntry, installed: false },
        ]);

        await handlePluginListCommand(manager, { verbose: true });

        expect(manager.listAvailable).toHaveBeenCalledWith(undefined);
        expect(printed()).toEqual([
            'Available Plugins (2):',
            '',
            '  coverage (native) [installed]',
            '    Coverage reports',
            '    Source: @example/plugin-coverage',
            '    Tags: quality',
            '  gauge (binary)',
            '    Gauge binary',
            '    Source: example-org/gauge@v0.4.0 (gauge_{os}_{arch})',
            '    Private: requires GitHub access',
            '',
        ]);
    });

    it('should say so when no plugin carries the tag', async () => {
        const manager = createManager();
        manager.listAvailable.mockResolvedValue([]);

        await handlePluginListCommand(manager, { tag: 'security' });

        expect(manager.listAvailable).toHaveBeenCalledWith('security');
        expect(printed()).toEqual(["No catalog plugins are tagged 'security'."]);
    });

    it('should print dependency warnings before the install summary', async () => {
        const manager = createManager();

        await handlePluginInstallCommand(manager, { name: 'provenance' });

        expect(manager.install).toHaveBeenCalledWith('provenance', {
            ref: undefined,
            strict: false,
        });
        expect(printed()).toEqual([
            "Installing plugin 'provenance'...",
            'System dependency warnings:',
            '  - cosign (go): Go runtime not found. Install Go from https://go.dev/dl/ then re-run: go install example.com/cosign@v1',
            '',
            "Installed plugin 'provenance' (wrapper)",
            '  From: @example/plugin-provenance',
            '  Location: /tmp/plugins/native/node_modules/@example/plugin-provenance',
            '  Note: The plugin is installed but may not work until the dependencies above are resolved',
            '',
        ]);
    });

    it('should report failed updates and return false', async () => {
        const manager = createManager();
        manager.updateAll.mockResolvedValue({
            updated: [provenanceResult],
            failed: [{ name: 'gauge', error: new Error('download failed') }],
        });

        const ok = await handlePluginUpdateCommand(manager, { all: true });

        expect(ok).toBe(false);
        expect(manager.updateAll).toHaveBeenCalledWith({ strict: false });
        expect(errorSpy).toHaveBeenCalledWith("Failed to update 'gauge': download failed");
    });

    it('should update a single plugin by name', async () => {
        const manager = createManager();

        const ok = await handlePluginUpdateCommand(manager, { name: 'provenance', strict: true });

        expect(ok).toBe(true);
        expect(manager.update).toHaveBeenCalledWith('provenance', { strict: true });
        expect(manager.updateAll).not.toHaveBeenCalled();
    });

    it('should list what was removed and the notes', async () => {
        const manager = createManager();
        manager.remove.mockResolvedValue({
            name: 'provenance',
            pluginType: 'wrapper',
            removed: ['@example/plugin-provenance'],
            notes: ['System dependencies were not removed (they may be shared): cosign'],
        });

        await handlePluginRemoveCommand(manager, { name: 'provenance' });

        expect(printed()).toEqual([
            "Removing plugin 'provenance'...",
            "Removed plugin 'provenance'",
            '  Removed: @example/plugin-provenance',
            '  Note: System dependencies were not removed (they may be shared): cosign',
            '',
        ]);
    });
});
