import { FieldkitRuntimeError, ErrorScope, ErrorType } from '@fieldkit/core';
import { CatalogErrorCode } from './error-codes.js';

/**
 * Catalog error factory methods
 * Creates properly typed errors for catalog lookup and plugin installation
 */
export class CatalogError {
    // Catalog file errors
    static notFound(catalogPath: string, origin: string) {
        return new FieldkitRuntimeError(
            CatalogErrorCode.CATALOG_NOT_FOUND,
            ErrorScope.CATALOG,
            ErrorType.NOT_FOUND,
            `Plugin catalog not found at ${catalogPath} (from ${origin})`,
            { catalogPath, origin },
            'Check the path, or unset FIELDKIT_PLUGIN_CATALOG to use the bundled catalog'
        );
    }

    static readFailed(catalogPath: string, cause: string) {
        return new FieldkitRuntimeError(
            CatalogErrorCode.CATALOG_READ_FAILED,
            ErrorScope.CATALOG,
            ErrorType.SYSTEM,
            `Failed to read plugin catalog at ${catalogPath}: ${cause}`,
            { catalogPath, cause }
        );
    }

    static parseFailed(catalogPath: string, cause: string) {
        return new FieldkitRuntimeError(
            CatalogErrorCode.CATALOG_PARSE_FAILED,
            ErrorScope.CATALOG,
            ErrorType.USER,
            `Failed to parse plugin catalog at ${catalogPath}: ${cause}`,
            { catalogPath, cause },
            'Ensure the catalog is valid YAML'
        );
    }

    static invalid(catalogPath: string, issues: string[]) {
        return new FieldkitRuntimeError(
            CatalogErrorCode.CATALOG_INVALID,
            ErrorScope.CATALOG,
            ErrorType.USER,
            `Invalid plugin catalog at ${catalogPath}: ${issues.join('; ')}`,
            { catalogPath, issues }
        );
    }

    // Lookup errors
    static pluginNotFound(name: string, available: string[]) {
        return new FieldkitRuntimeError(
            CatalogErrorCode.PLUGIN_NOT_FOUND,
            ErrorScope.CATALOG,
            ErrorType.NOT_FOUND,
            `Plugin '${name}' not found in catalog`,
            { name, available },
            available.length > 0
                ? `Available plugins: ${available.join(', ')}`
                : 'The catalog is empty'
        );
    }

    // Install errors
    static packageManagerMissing(command: string) {
        return new FieldkitRuntimeError(
            CatalogErrorCode.PACKAGE_MANAGER_MISSING,
            ErrorScope.CATALOG,
            ErrorType.NOT_FOUND,
            `'${command}' command not found`,
            { command },
            'Install Node.js from https://nodejs.org/ and make sure npm is on PATH'
        );
    }

    static installFailed(name: string, cause: string, hint?: string) {
        return new FieldkitRuntimeError(
            CatalogErrorCode.INSTALL_FAILED,
            ErrorScope.CATALOG,
            ErrorType.THIRD_PARTY,
            `Failed to install plugin '${name}': ${cause}`,
            { name, cause },
            hint
        );
    }

    static uninstallFailed(name: string, cause: string) {
        return new FieldkitRuntimeError(
            CatalogErrorCode.UNINSTALL_FAILED,
            ErrorScope.CATALOG,
            ErrorType.THIRD_PARTY,
            `Failed to remove plugin '${name}': ${cause}`,
            { name, cause }
        );
    }

    static binaryInstallFailed(name: string, binary: string, cause: string) {
        return new FieldkitRuntimeError(
            CatalogErrorCode.BINARY_INSTALL_FAILED,
            ErrorScope.CATALOG,
            ErrorType.THIRD_PARTY,
            `Failed to install ${binary} for plugin '${name}': ${cause}`,
            { name, binary, cause }
        );
    }

    static systemDependenciesFailed(name: string, binaries: string[]) {
        return new FieldkitRuntimeError(
            CatalogErrorCode.SYSTEM_DEPENDENCIES_FAILED,
            ErrorScope.CATALOG,
            ErrorType.USER,
            `Plugin '${name}' installed but system dependencies failed: ${binaries.join(', ')}`,
            { name, binaries },
            'Install the listed binaries manually, or re-run without --strict'
        );
    }
}
