#!/usr/bin/env node
import { applyLayeredEnvironmentLoading } from './utils/env.js';

// Environment first: config paths and auth read from process.env
applyLayeredEnvironmentLoading();

import chalk from 'chalk';
import { CommanderError } from 'commander';
import { formatErrorLine, killTrackedProcessTrees } from '@fieldkit/core';
import { EXIT_CODES, exitCodeForError } from './exit.js';
import { createInterruptHandler } from './interrupt.js';
import { createProgressRenderer } from './output.js';
import { buildProgram } from './program.js';
import { createCliRuntime, readCliVersion } from './runtime.js';

async function main(): Promise<number> {
    const runtime = await createCliRuntime();
    const { logger } = runtime;

    const abortController = new AbortController();
    const onInterrupt = createInterruptHandler({
        controller: abortController,
        logger,
        killActive: killTrackedProcessTrees,
        exit: (code) => process.exit(code),
    });
    process.on('SIGINT', onInterrupt);

    const program = buildProgram({
        version: readCliVersion(),
        registry: runtime.registry,
        dispatcher: runtime.dispatcher,
        logger,
        createPluginManager: () => runtime.createPluginManager(),
        progress: createProgressRenderer(),
        signal: abortController.signal,
    });

    try {
        await program.parseAsync(process.argv);
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.usage;
        }
        throw error;
    } finally {
        process.off('SIGINT', onInterrupt);
        await logger.destroy();
    }

    return typeof process.exitCode === 'number' ? process.exitCode : EXIT_CODES.success;
}

try {
    process.exitCode = await main();
} catch (error) {
    console.error(chalk.red(`Error: ${formatErrorLine(error)}`));
    process.exitCode = exitCodeForError(error);
}
