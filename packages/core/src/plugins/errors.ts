import { FieldkitRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { PluginErrorCode } from './error-codes.js';

/**
 * Plugin error factory methods.
 *
 * Argument and lookup errors use the USAGE scope: they abort the invocation
 * before plugin code runs. Load errors use PLUGIN scope and are logged and skipped.
 */
export class PluginError {
    static loadFailed(origin: string, cause: string) {
        return new FieldkitRuntimeError(
            PluginErrorCode.LOAD_FAILED,
            ErrorScope.PLUGIN,
            ErrorType.SYSTEM,
            `Failed to load plugin from '${origin}': ${cause}`,
            { origin, cause }
        );
    }

    static factoryFailed(origin: string, cause: string) {
        return new FieldkitRuntimeError(
            PluginErrorCode.LOAD_FACTORY_FAILED,
            ErrorScope.PLUGIN,
            ErrorType.THIRD_PARTY,
            `Plugin factory '${origin}' threw: ${cause}`,
            { origin, cause }
        );
    }

    static invalidShape(origin: string, problems: string[]) {
        return new FieldkitRuntimeError(
            PluginErrorCode.LOAD_INVALID_SHAPE,
            ErrorScope.PLUGIN,
            ErrorType.USER,
            `Plugin from '${origin}' does not implement the plugin contract: ${problems.join('; ')}`,
            { origin, problems }
        );
    }

    static invalidCapabilities(pluginName: string, violations: string[]) {
        return new FieldkitRuntimeError(
            PluginErrorCode.LOAD_INVALID_CAPABILITIES,
            ErrorScope.PLUGIN,
            ErrorType.USER,
            `Plugin '${pluginName}' declares invalid capabilities: ${violations.join('; ')}`,
            { pluginName, violations }
        );
    }

    static invalidMetadata(packageDir: string, cause: string) {
        return new FieldkitRuntimeError(
            PluginErrorCode.LOAD_INVALID_METADATA,
            ErrorScope.PLUGIN,
            ErrorType.USER,
            `Invalid plugin metadata in ${packageDir}/package.json: ${cause}`,
            { packageDir, cause }
        );
    }

    static duplicate(name: string, keptOrigin: string, droppedOrigin: string) {
        return new FieldkitRuntimeError(
            PluginErrorCode.DUPLICATE_PLUGIN,
            ErrorScope.REGISTRY,
            ErrorType.USER,
            `Plugin '${name}' from '${droppedOrigin}' ignored: already provided by '${keptOrigin}'`,
            { name, keptOrigin, droppedOrigin }
        );
    }

    static notFound(name: string, available: string[]) {
        return new FieldkitRuntimeError(
            PluginErrorCode.NOT_FOUND,
            ErrorScope.USAGE,
            ErrorType.NOT_FOUND,
            `Unknown plugin '${name}'`,
            { name, available },
            available.length > 0
                ? `Available plugins: ${available.join(', ')}`
                : 'No plugins are installed; see `fieldkit plugin list`'
        );
    }

    static missingArgument(capability: string) {
        return new FieldkitRuntimeError(
            PluginErrorCode.MISSING_ARGUMENT,
            ErrorScope.USAGE,
            ErrorType.USER,
            `Missing required argument '${capability}'`,
            { capability }
        );
    }

    static invalidArgument(capability: string, value: unknown, reason: string) {
        return new FieldkitRuntimeError(
            PluginErrorCode.INVALID_ARGUMENT,
            ErrorScope.USAGE,
            ErrorType.USER,
            `Invalid value ${JSON.stringify(value)} for '${capability}': ${reason}`,
            { capability, value, reason }
        );
    }

    static unknownArgument(argument: string, known: string[]) {
        return new FieldkitRuntimeError(
            PluginErrorCode.UNKNOWN_ARGUMENT,
            ErrorScope.USAGE,
            ErrorType.USER,
            `Unknown argument '${argument}'`,
            { argument, known },
            known.length > 0 ? `Accepted arguments: ${known.join(', ')}` : 'This plugin takes no arguments'
        );
    }

    static executionFailed(pluginName: string, cause: string) {
        return new FieldkitRuntimeError(
            PluginErrorCode.EXECUTION_FAILED,
            ErrorScope.PLUGIN,
            ErrorType.THIRD_PARTY,
            `Plugin '${pluginName}' failed: ${cause}`,
            { pluginName, cause }
        );
    }

    static invalidOutcome(pluginName: string, problems: string[]) {
        return new FieldkitRuntimeError(
            PluginErrorCode.INVALID_OUTCOME,
            ErrorScope.PLUGIN,
            ErrorType.THIRD_PARTY,
            `Plugin '${pluginName}' returned an invalid result: ${problems.join('; ')}`,
            { pluginName, problems }
        );
    }
}
