import { toErrorMessage } from '@fieldkit/core';
import { InstallerErrorCode } from '../error-codes.js';
import { failedResult, installedResult } from './results.js';
import type { SystemDependencyInstaller } from './types.js';

/**
 * A language toolchain that installs executables from a package argument.
 */
export interface Toolchain {
    /** Executable that must be on PATH */
    command: string;
    displayName: string;
    /** First half of the remediation line */
    installHint: string;
    installArgs(packageArg: string): string[];
}

export const NPM_TOOLCHAIN: Toolchain = {
    command: 'npm',
    displayName: 'npm',
    installHint: 'Install Node.js from https://nodejs.org/',
    installArgs: (packageArg) => ['install', '-g', packageArg],
};

export const GO_TOOLCHAIN: Toolchain = {
    command: 'go',
    displayName: 'Go runtime',
    installHint: 'Install Go from https://go.dev/dl/',
    installArgs: (packageArg) => ['install', packageArg],
};

/**
 * Build an installer that shells out to a toolchain's own install command.
 * A missing toolchain is reported, never installed.
 */
export function createToolchainInstaller<M extends 'npm' | 'go'>(
    toolchain: Toolchain
): SystemDependencyInstaller<M> {
    return async (spec, environment) => {
        const args = toolchain.installArgs(spec.package);
        const manualCommand = [toolchain.command, ...args].join(' ');

        if (!(await environment.findOnPath(toolchain.command))) {
            return failedResult(
                spec,
                InstallerErrorCode.TOOLCHAIN_MISSING,
                `${toolchain.displayName} not found`,
                `${toolchain.installHint} then re-run: ${manualCommand}`
            );
        }

        environment.logger.info(`Installing ${spec.binary} via ${manualCommand}`);
        try {
            const result = await environment.runCommand(toolchain.command, args);
            if (result.exitCode !== 0) {
                return failedResult(
                    spec,
                    InstallerErrorCode.COMMAND_FAILED,
                    result.stderr.trim() || `${toolchain.command} exited with code ${result.exitCode}`,
                    `Re-run manually: ${manualCommand}`
                );
            }
        } catch (error) {
            return failedResult(
                spec,
                InstallerErrorCode.COMMAND_FAILED,
                toErrorMessage(error),
                `Re-run manually: ${manualCommand}`
            );
        }
        return installedResult(spec);
    };
}
