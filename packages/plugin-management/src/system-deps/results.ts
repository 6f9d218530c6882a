import type { InstallerErrorCode } from '../error-codes.js';
import type { SystemDependencySpec } from './schemas.js';
import type { DependencyInstallResult, DependencyInstallWarning } from './types.js';

export function installedResult(spec: SystemDependencySpec, location?: string): DependencyInstallResult {
    return { spec, alreadyInstalled: false, success: true, ...(location ? { location } : {}) };
}

export function failedResult(
    spec: SystemDependencySpec,
    code: InstallerErrorCode,
    reason: string,
    remediation: string
): DependencyInstallResult {
    const warning: DependencyInstallWarning = {
        code,
        binary: spec.binary,
        manager: spec.manager,
        reason,
        remediation,
    };
    return { spec, alreadyInstalled: false, success: false, warning };
}

/**
 * One line for terminal output: reason, then remediation.
 */
export function formatDependencyWarning(warning: DependencyInstallWarning): string {
    return `${warning.binary} (${warning.manager}): ${warning.reason}. ${warning.remediation}`;
}
