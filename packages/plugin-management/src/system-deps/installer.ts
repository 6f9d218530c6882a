import { runCommand, toErrorMessage, formatZodIssues, type Logger } from '@fieldkit/core';
import { InstallerErrorCode } from '../error-codes.js';
import { GO_TOOLCHAIN, NPM_TOOLCHAIN, createToolchainInstaller } from './cli-installer.js';
import { installReleaseAsset } from './release-installer.js';
import { failedResult, formatDependencyWarning } from './results.js';
import {
    SYSTEM_DEPENDENCY_MANAGERS,
    SystemDependencySpecSchema,
    type SystemDependencyManager,
    type SystemDependencySpec,
    type SystemDependencySpecMap,
} from './schemas.js';
import { findOnPath } from './which.js';
import type {
    DependencyInstallResult,
    DependencyInstallWarning,
    InstallerEnvironment,
    SystemDependencyInstaller,
    SystemDependencyReport,
} from './types.js';

/**
 * One installer per manager. A new manager is a schema variant plus an entry here.
 */
export const SYSTEM_DEPENDENCY_INSTALLERS: {
    [M in SystemDependencyManager]: SystemDependencyInstaller<M>;
} = {
    npm: createToolchainInstaller<'npm'>(NPM_TOOLCHAIN),
    go: createToolchainInstaller<'go'>(GO_TOOLCHAIN),
    'github-release': installReleaseAsset,
};

function isSupportedManager(value: unknown): value is SystemDependencyManager {
    return SYSTEM_DEPENDENCY_MANAGERS.some((manager) => manager === value);
}

function describeEntry(entry: unknown): string {
    try {
        return JSON.stringify(entry);
    } catch {
        return String(entry);
    }
}

/**
 * Parse the `systemDeps` list of a catalog entry.
 * Malformed entries and unknown managers are skipped with a warning.
 */
export function parseSystemDependencies(raw: unknown, logger: Logger): SystemDependencySpec[] {
    if (raw === undefined || raw === null) {
        return [];
    }
    if (!Array.isArray(raw)) {
        logger.warn(`Ignoring systemDeps: expected a list, got ${describeEntry(raw)}`);
        return [];
    }

    const specs: SystemDependencySpec[] = [];
    for (const entry of raw) {
        const manager: unknown =
            typeof entry === 'object' && entry !== null ? Reflect.get(entry, 'manager') : undefined;
        const binary: unknown =
            typeof entry === 'object' && entry !== null ? Reflect.get(entry, 'binary') : undefined;

        if (!manager || !binary) {
            logger.warn(
                `Skipping malformed system dependency entry (missing manager/binary): ${describeEntry(entry)}`
            );
            continue;
        }
        if (!isSupportedManager(manager)) {
            logger.warn(
                `Skipping system dependency with unknown manager '${String(manager)}' (supported: ${[...SYSTEM_DEPENDENCY_MANAGERS].sort().join(', ')})`
            );
            continue;
        }

        const parsed = SystemDependencySpecSchema.safeParse(entry);
        if (!parsed.success) {
            logger.warn(
                `Skipping ${manager} dependency '${String(binary)}': ${formatZodIssues(parsed.error.issues).join('; ')}`
            );
            continue;
        }
        specs.push(parsed.data);
    }
    return specs;
}

function runInstaller<M extends SystemDependencyManager>(
    manager: M,
    spec: SystemDependencySpecMap[M],
    environment: InstallerEnvironment
): Promise<DependencyInstallResult> {
    const installer: SystemDependencyInstaller<M> = SYSTEM_DEPENDENCY_INSTALLERS[manager];
    return installer(spec, environment);
}

export interface InstallSystemDependenciesOptions extends Partial<InstallerEnvironment> {
    logger: Logger;
}

export function createInstallerEnvironment(
    options: InstallSystemDependenciesOptions
): InstallerEnvironment {
    const env = options.env ?? process.env;
    const platform = options.platform ?? process.platform;
    return {
        runCommand: options.runCommand ?? runCommand,
        findOnPath: options.findOnPath ?? ((binary) => findOnPath(binary, env, platform)),
        fetch: options.fetch ?? ((url, init) => fetch(url, init)),
        env,
        platform,
        arch: options.arch ?? process.arch,
        logger: options.logger,
    };
}

/**
 * Install every dependency whose binary is not already on PATH.
 *
 * Never throws: each failure becomes a {@link DependencyInstallWarning} and the
 * remaining dependencies are still attempted.
 */
export async function installSystemDependencies(
    specs: readonly SystemDependencySpec[],
    options: InstallSystemDependenciesOptions
): Promise<SystemDependencyReport> {
    const environment = createInstallerEnvironment(options);
    const logger = environment.logger;
    const results: DependencyInstallResult[] = [];
    const warnings: DependencyInstallWarning[] = [];

    for (const spec of specs) {
        let result: DependencyInstallResult;
        try {
            const existing = await environment.findOnPath(spec.binary);
            if (existing) {
                logger.debug(`${spec.binary} already installed at ${existing}`);
                results.push({ spec, alreadyInstalled: true, success: true, location: existing });
                continue;
            }
            result = await runInstaller(spec.manager, spec, environment);
        } catch (error) {
            result = failedResult(
                spec,
                InstallerErrorCode.UNEXPECTED,
                toErrorMessage(error),
                'Install the binary manually'
            );
        }

        if (result.warning) {
            warnings.push(result.warning);
            logger.warn(formatDependencyWarning(result.warning), { code: result.warning.code });
        } else {
            logger.info(`${spec.binary} installed via ${spec.manager}`);
        }
        results.push(result);
    }

    return { results, warnings };
}
