/**
 * Plugin CLI Command Handlers
 *
 * Handles CLI commands for catalog plugins:
 * - fieldkit plugin list [--tag <tag>] [--verbose]
 * - fieldkit plugin install <name> [--ref <ref>] [--strict]
 * - fieldkit plugin update [name] [--all] [--strict]
 * - fieldkit plugin remove <name>
 */

import { z } from 'zod';
import chalk from 'chalk';
import {
    formatDependencyWarning,
    type CatalogEntry,
    type PluginInstallResult,
    type PluginManager,
} from '@fieldkit/plugin-management';
import { CliError } from '../errors.js';

export type PluginManagerApi = Pick<
    PluginManager,
    'install' | 'update' | 'updateAll' | 'remove' | 'listAvailable'
>;

// === Schema Definitions ===

const PluginListCommandSchema = z
    .object({
        tag: z.string().min(1).optional().describe('Only show plugins with this tag'),
        verbose: z.boolean().default(false).describe('Show detailed plugin information'),
    })
    .strict();

const PluginInstallCommandSchema = z
    .object({
        name: z.string().min(1).describe('Catalog name of the plugin'),
        ref: z.string().min(1).optional().describe('Version, tag or git ref to install'),
        strict: z.boolean().default(false).describe('Fail when a system dependency fails'),
    })
    .strict();

const PluginUpdateCommandSchema = z
    .object({
        name: z.string().min(1).optional().describe('Plugin to update'),
        all: z.boolean().default(false).describe('Update every installed plugin'),
        strict: z.boolean().default(false).describe('Fail when a system dependency fails'),
    })
    .strict();

const PluginRemoveCommandSchema = z
    .object({
        name: z.string().min(1).describe('Catalog name of the plugin'),
    })
    .strict();

// === Type Exports ===

export type PluginListCommandOptionsInput = z.input<typeof PluginListCommandSchema>;
export type PluginInstallCommandOptionsInput = z.input<typeof PluginInstallCommandSchema>;
export type PluginUpdateCommandOptionsInput = z.input<typeof PluginUpdateCommandSchema>;
export type PluginRemoveCommandOptionsInput = z.input<typeof PluginRemoveCommandSchema>;

// === Helpers ===

function describeSource(entry: CatalogEntry): string {
    if (entry.binarySource) {
        const { repo, tag, asset } = entry.binarySource;
        return `${repo}@${tag} (${asset})`;
    }
    return entry.package ?? entry.source ?? 'unknown';
}

function printInstallResult(verb: string, result: PluginInstallResult): void {
    if (result.warnings.length > 0) {
        console.log(chalk.yellow('System dependency warnings:'));
        for (const warning of result.warnings) {
            console.log(chalk.yellow(`  - ${formatDependencyWarning(warning)}`));
        }
        console.log('');
    }

    console.log(chalk.green(`${verb} plugin '${result.name}' (${result.pluginType})`));
    console.log(chalk.dim(`  From: ${result.installedFrom}`));
    console.log(chalk.dim(`  Location: ${result.location}`));
    for (const note of result.notes) {
        console.log(chalk.dim(`  Note: ${note}`));
    }
    console.log('');
}

// === Command Handlers ===

/**
 * Handles the `fieldkit plugin list` command.
 */
export async function handlePluginListCommand(
    manager: PluginManagerApi,
    options: PluginListCommandOptionsInput
): Promise<void> {
    const validated = PluginListCommandSchema.parse(options);
    const listings = await manager.listAvailable(validated.tag);

    if (listings.length === 0) {
        console.log(
            chalk.yellow(
                validated.tag
                    ? `No catalog plugins are tagged '${validated.tag}'.`
                    : 'The plugin catalog is empty.'
            )
        );
        return;
    }

    console.log(chalk.bold(`Available Plugins (${listings.length}):`));
    console.log('');

    for (const { name, entry, installed } of listings) {
        const installedLabel = installed ? chalk.green(' [installed]') : '';
        console.log(`  ${chalk.cyan(name)} ${chalk.dim(`(${entry.pluginType})`)}${installedLabel}`);

        if (entry.description) {
            console.log(chalk.dim(`    ${entry.description}`));
        }
        if (validated.verbose) {
            console.log(chalk.dim(`    Source: ${describeSource(entry)}`));
            if (entry.tags.length > 0) {
                console.log(chalk.dim(`    Tags: ${entry.tags.join(', ')}`));
            }
            if (entry.private) {
                console.log(chalk.dim('    Private: requires GitHub access'));
            }
        }
    }

    console.log('');
}

/**
 * Handles the `fieldkit plugin install <name>` command.
 */
export async function handlePluginInstallCommand(
    manager: PluginManagerApi,
    options: PluginInstallCommandOptionsInput
): Promise<void> {
    const validated = PluginInstallCommandSchema.parse(options);

    console.log(chalk.cyan(`Installing plugin '${validated.name}'...`));
    const result = await manager.install(validated.name, {
        ref: validated.ref,
        strict: validated.strict,
    });
    printInstallResult('Installed', result);
}

/**
 * Handles the `fieldkit plugin update [name] [--all]` command.
 *
 * @returns false when at least one plugin failed to update
 */
export async function handlePluginUpdateCommand(
    manager: PluginManagerApi,
    options: PluginUpdateCommandOptionsInput
): Promise<boolean> {
    const validated = PluginUpdateCommandSchema.parse(options);

    if (validated.name) {
        console.log(chalk.cyan(`Updating plugin '${validated.name}'...`));
        const result = await manager.update(validated.name, { strict: validated.strict });
        printInstallResult('Updated', result);
        return true;
    }

    if (!validated.all) {
        throw CliError.missingUpdateTarget();
    }

    console.log(chalk.cyan('Updating installed plugins...'));
    const { updated, failed } = await manager.updateAll({ strict: validated.strict });

    if (updated.length === 0 && failed.length === 0) {
        console.log(chalk.yellow('No catalog plugins are installed.'));
        return true;
    }

    for (const result of updated) {
        printInstallResult('Updated', result);
    }
    for (const { name, error } of failed) {
        console.error(chalk.red(`Failed to update '${name}': ${error.message}`));
    }
    return failed.length === 0;
}

/**
 * Handles the `fieldkit plugin remove <name>` command.
 */
export async function handlePluginRemoveCommand(
    manager: PluginManagerApi,
    options: PluginRemoveCommandOptionsInput
): Promise<void> {
    const validated = PluginRemoveCommandSchema.parse(options);

    console.log(chalk.cyan(`Removing plugin '${validated.name}'...`));
    const result = await manager.remove(validated.name);

    console.log(chalk.green(`Removed plugin '${validated.name}'`));
    for (const removed of result.removed) {
        console.log(chalk.dim(`  Removed: ${removed}`));
    }
    for (const note of result.notes) {
        console.log(chalk.dim(`  Note: ${note}`));
    }
    console.log('');
}
