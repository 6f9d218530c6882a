export {
    SYSTEM_DEPENDENCY_MANAGERS,
    DEFAULT_RELEASE_INSTALL_DIR,
    SystemDependencySpecSchema,
    NpmDependencySchema,
    GoDependencySchema,
    ReleaseDependencySchema,
    describeDependencySource,
    type SystemDependencyManager,
    type SystemDependencySpec,
    type SystemDependencySpecMap,
    type NpmDependencySpec,
    type GoDependencySpec,
    type ReleaseDependencySpec,
    type ReleaseDependencySpecInput,
} from './schemas.js';
export type {
    DependencyInstallWarning,
    DependencyInstallResult,
    SystemDependencyReport,
    InstallerEnvironment,
    SystemDependencyInstaller,
    CommandRunner,
    PathLookup,
    FetchLike,
} from './types.js';
export {
    SYSTEM_DEPENDENCY_INSTALLERS,
    parseSystemDependencies,
    installSystemDependencies,
    createInstallerEnvironment,
    type InstallSystemDependenciesOptions,
} from './installer.js';
export { formatDependencyWarning } from './results.js';
export { findOnPath } from './which.js';
export { resolveAssetName, releaseOsName, releaseArchName } from './platform.js';
export { NPM_TOOLCHAIN, GO_TOOLCHAIN, createToolchainInstaller, type Toolchain } from './cli-installer.js';
export { installReleaseAsset } from './release-installer.js';
