/**
 * Codes carried by dependency install warnings
 */
export enum InstallerErrorCode {
    TOOLCHAIN_MISSING = 'installer_toolchain_missing',
    COMMAND_FAILED = 'installer_command_failed',
    RELEASE_AUTH_REQUIRED = 'installer_release_auth_required',
    RELEASE_NOT_FOUND = 'installer_release_not_found',
    RELEASE_API_ERROR = 'installer_release_api_error',
    ASSET_NOT_FOUND = 'installer_asset_not_found',
    DOWNLOAD_FAILED = 'installer_download_failed',
    UNEXPECTED = 'installer_unexpected_error',
}

/**
 * Plugin catalog and plugin installation error codes
 */
export enum CatalogErrorCode {
    // Catalog file
    CATALOG_NOT_FOUND = 'catalog_not_found',
    CATALOG_READ_FAILED = 'catalog_read_failed',
    CATALOG_PARSE_FAILED = 'catalog_parse_failed',
    CATALOG_INVALID = 'catalog_invalid',

    // Lookup
    PLUGIN_NOT_FOUND = 'catalog_plugin_not_found',

    // Install / update / remove
    PACKAGE_MANAGER_MISSING = 'catalog_package_manager_missing',
    INSTALL_FAILED = 'catalog_install_failed',
    UNINSTALL_FAILED = 'catalog_uninstall_failed',
    BINARY_INSTALL_FAILED = 'catalog_binary_install_failed',
    SYSTEM_DEPENDENCIES_FAILED = 'catalog_system_dependencies_failed',
}
