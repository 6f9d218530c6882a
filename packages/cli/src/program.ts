import { Command, Option } from 'commander';
import {
    LOG_LEVELS,
    LogLevelSchema,
    PluginError,
    buildArgumentSurface,
    type ArgumentSpec,
    type Logger,
    type PluginRegistry,
    type ProgressSink,
    type RawArguments,
    type RegisteredPlugin,
} from '@fieldkit/core';
import type { Dispatcher } from './dispatcher.js';
import { CliError } from './errors.js';
import { safeExit, withExitHandling } from './exit.js';
import { printOutcome } from './output.js';
import {
    handlePluginInstallCommand,
    handlePluginListCommand,
    handlePluginRemoveCommand,
    handlePluginUpdateCommand,
    type PluginInstallCommandOptionsInput,
    type PluginListCommandOptionsInput,
    type PluginManagerApi,
    type PluginUpdateCommandOptionsInput,
} from './commands/plugin.js';

/** Top-level command names a plugin may not take */
export const RESERVED_COMMANDS: ReadonlySet<string> = new Set(['plugin', 'version', 'help']);

export interface ProgramDependencies {
    version: string;
    registry: PluginRegistry;
    dispatcher: Pick<Dispatcher, 'invoke'>;
    logger: Logger;
    /** Called only by `plugin` subcommands, so the catalog is not read for plugin runs */
    createPluginManager: () => Promise<PluginManagerApi>;
    progress?: ProgressSink;
    signal?: AbortSignal;
}

interface OptionBinding {
    /** Commander attribute name (`dryRun` for `--dry-run`) */
    attribute: string;
    capability: string;
}

function describeArgument(spec: ArgumentSpec): string {
    const parts = [spec.description];
    if (spec.allowedValues) {
        parts.push(`(choices: ${spec.allowedValues.join(', ')})`);
    }
    if (spec.defaultValue !== undefined && spec.kind !== 'bool') {
        parts.push(`(default: ${String(spec.defaultValue)})`);
    }
    if (spec.required) {
        parts.push('(required)');
    }
    return parts.join(' ');
}

function collectRawArguments(
    command: Command,
    bindings: readonly OptionBinding[],
    positional: string | undefined
): RawArguments {
    const values = command.opts<Record<string, unknown>>();
    const raw: Record<string, string | boolean> = {};
    for (const { attribute, capability } of bindings) {
        const value = values[attribute];
        if (typeof value === 'string' || typeof value === 'boolean') {
            raw[capability] = value;
        }
    }
    const selector = command.args[0];
    if (positional !== undefined && selector !== undefined) {
        raw[positional] = selector;
    }
    return raw;
}

/**
 * One subcommand per plugin. Flags come from the plugin's argument surface;
 * type coercion and required checks are left to the dispatcher.
 */
function addPluginCommand(
    program: Command,
    registered: RegisteredPlugin,
    deps: ProgramDependencies
): void {
    const { descriptor } = registered;
    const command = program
        .command(descriptor.name)
        .description(descriptor.description)
        .allowExcessArguments(false);

    const bindings: OptionBinding[] = [];
    let positional: string | undefined;

    for (const spec of buildArgumentSurface(descriptor.capabilities)) {
        if (spec.positional) {
            command.argument(spec.required ? '<command>' : '[command]', describeArgument(spec));
            positional = spec.name;
            continue;
        }
        const option = new Option(
            spec.takesValue ? `${spec.flag} <value>` : spec.flag,
            describeArgument(spec)
        );
        command.addOption(option);
        bindings.push({ attribute: option.attributeName(), capability: spec.name });
        if (spec.negatedFlag) {
            command.addOption(new Option(spec.negatedFlag, `Turn off ${spec.flag}`));
        }
    }

    command.action(
        withExitHandling(descriptor.name, deps.logger, async () => {
            const raw = collectRawArguments(command, bindings, positional);
            const { outcome, exitCode } = await deps.dispatcher.invoke(descriptor.name, raw, {
                signal: deps.signal,
                progress: deps.progress,
            });
            printOutcome(outcome);
            safeExit(descriptor.name, exitCode, outcome.status);
        })
    );
}

function addPluginManagementCommands(program: Command, deps: ProgramDependencies): void {
    const { logger } = deps;
    const pluginCommand = program.command('plugin').description('Manage catalog plugins');

    pluginCommand
        .command('list')
        .description('List plugins in the catalog')
        .option('--tag <tag>', 'Only show plugins with this tag')
        .option('--verbose', 'Show detailed plugin information')
        .action(
            withExitHandling('plugin list', logger, async (options: PluginListCommandOptionsInput) => {
                await handlePluginListCommand(await deps.createPluginManager(), options);
                safeExit('plugin list', 0);
            })
        );

    pluginCommand
        .command('install')
        .description('Install a plugin from the catalog')
        .argument('<name>', 'Catalog name of the plugin')
        .option('--ref <ref>', 'Version, tag or git ref to install')
        .option('--strict', 'Fail when a system dependency cannot be installed')
        .action(
            withExitHandling(
                'plugin install',
                logger,
                async (name: string, options: Omit<PluginInstallCommandOptionsInput, 'name'>) => {
                    await handlePluginInstallCommand(await deps.createPluginManager(), {
                        ...options,
                        name,
                    });
                    safeExit('plugin install', 0);
                }
            )
        );

    pluginCommand
        .command('update')
        .description('Reinstall a plugin, or every installed plugin with --all')
        .argument('[name]', 'Catalog name of the plugin')
        .option('--all', 'Update every installed catalog plugin')
        .option('--strict', 'Fail when a system dependency cannot be installed')
        .action(
            withExitHandling(
                'plugin update',
                logger,
                async (
                    name: string | undefined,
                    options: Omit<PluginUpdateCommandOptionsInput, 'name'>
                ) => {
                    const ok = await handlePluginUpdateCommand(await deps.createPluginManager(), {
                        ...options,
                        name,
                    });
                    safeExit('plugin update', ok ? 0 : 1);
                }
            )
        );

    pluginCommand
        .command('remove')
        .description('Remove an installed plugin')
        .argument('<name>', 'Catalog name of the plugin')
        .action(
            withExitHandling('plugin remove', logger, async (name: string) => {
                await handlePluginRemoveCommand(await deps.createPluginManager(), { name });
                safeExit('plugin remove', 0);
            })
        );
}

/**
 * Build the `fieldkit` command tree for an already-populated registry.
 *
 * Commander errors (unknown options, missing operands) are thrown as
 * CommanderError through `exitOverride` so the caller decides the exit code.
 */
export function buildProgram(deps: ProgramDependencies): Command {
    const { logger, registry } = deps;
    const program = new Command();

    program
        .name('fieldkit')
        .description('Run and manage field-engineering plugins')
        .version(deps.version, '-V, --version', 'Show the fieldkit version')
        .addOption(
            new Option('--log-level <level>', 'Override the configured log level').choices(
                LOG_LEVELS
            )
        )
        .exitOverride();

    program.hook('preAction', () => {
        const { logLevel } = program.opts<{ logLevel?: string }>();
        if (logLevel === undefined) return;
        const parsed = LogLevelSchema.safeParse(logLevel);
        if (!parsed.success) {
            throw CliError.invalidLogLevel(logLevel, LOG_LEVELS);
        }
        logger.setLevel(parsed.data);
    });

    program
        .command('version')
        .description('Show the fieldkit version')
        .action(() => {
            console.log(deps.version);
        });

    addPluginManagementCommands(program, deps);

    for (const registered of registry.list()) {
        const name = registered.descriptor.name;
        if (RESERVED_COMMANDS.has(name)) {
            logger.warn(
                `Plugin '${name}' conflicts with the built-in '${name}' command and was skipped`,
                { origin: registered.origin }
            );
            continue;
        }
        addPluginCommand(program, registered, deps);
    }

    // Bare `fieldkit` prints help; an unmatched word is an unknown plugin.
    program.action(
        withExitHandling('fieldkit', logger, () => {
            const [requested] = program.args;
            if (requested !== undefined) {
                throw PluginError.notFound(requested, registry.names());
            }
            program.outputHelp();
        })
    );

    return program;
}
