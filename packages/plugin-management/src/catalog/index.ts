export {
    PluginCatalog,
    loadPluginCatalog,
    resolveCatalogLocation,
    getBundledCatalogPath,
    getUserCatalogPath,
    CATALOG_ENV_VAR,
    CATALOG_FILE_NAME,
    type CatalogLocation,
    type CatalogOrigin,
    type LoadPluginCatalogOptions,
} from './catalog.js';
export {
    PLUGIN_TYPES,
    CatalogEntrySchema,
    BinarySourceSchema,
    PluginCatalogFileSchema,
    type PluginType,
    type CatalogEntry,
    type CatalogEntryInput,
    type BinarySource,
    type PluginCatalogFile,
} from './schemas.js';
