export * from './system-deps/index.js';
export * from './catalog/index.js';
export {
    PluginManager,
    withRef,
    type PluginManagerOptions,
    type PluginInstallOptions,
    type PluginInstallResult,
    type PluginRemoveResult,
    type PluginListing,
    type UpdateAllResult,
    type Introspector,
} from './plugin-manager.js';
export { CatalogError } from './errors.js';
export { CatalogErrorCode, InstallerErrorCode } from './error-codes.js';
