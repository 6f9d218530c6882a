import type { CommandResult, Logger, RunCommandOptions } from '@fieldkit/core';
import type { InstallerErrorCode } from '../error-codes.js';
import type { SystemDependencyManager, SystemDependencySpec, SystemDependencySpecMap } from './schemas.js';

/**
 * Structured record of a dependency that could not be installed.
 * Never thrown; collected and reported next to an otherwise successful install.
 */
export interface DependencyInstallWarning {
    code: InstallerErrorCode;
    binary: string;
    manager: SystemDependencyManager;
    reason: string;
    /** What the user can do by hand, usually the exact command */
    remediation: string;
}

export interface DependencyInstallResult {
    spec: SystemDependencySpec;
    /** True when the binary was already on PATH and nothing was run */
    alreadyInstalled: boolean;
    success: boolean;
    /** Where the binary lives, when known */
    location?: string;
    warning?: DependencyInstallWarning;
}

export interface SystemDependencyReport {
    results: DependencyInstallResult[];
    warnings: DependencyInstallWarning[];
}

export type CommandRunner = (
    command: string,
    args: readonly string[],
    options?: RunCommandOptions
) => Promise<CommandResult>;

export type PathLookup = (binary: string) => Promise<string | null>;

export type FetchLike = (url: string, init?: { headers?: Record<string, string> }) => Promise<Response>;

/**
 * Everything an installer touches outside its own arguments.
 * Tests substitute each collaborator.
 */
export interface InstallerEnvironment {
    runCommand: CommandRunner;
    findOnPath: PathLookup;
    fetch: FetchLike;
    env: NodeJS.ProcessEnv;
    platform: NodeJS.Platform;
    arch: string;
    logger: Logger;
}

export type SystemDependencyInstaller<M extends SystemDependencyManager> = (
    spec: SystemDependencySpecMap[M],
    environment: InstallerEnvironment
) => Promise<DependencyInstallResult>;
