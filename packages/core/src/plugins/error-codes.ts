/**
 * Plugin-specific error codes
 * Used for plugin loading, validation, invocation and registration
 */
export enum PluginErrorCode {
    /** Module could not be imported or the export is missing */
    LOAD_FAILED = 'PLUGIN_LOAD_FAILED',

    /** Factory threw */
    LOAD_FACTORY_FAILED = 'PLUGIN_LOAD_FACTORY_FAILED',

    /** Factory result does not satisfy the ToolPlugin contract */
    LOAD_INVALID_SHAPE = 'PLUGIN_LOAD_INVALID_SHAPE',

    /** Capability list violates a descriptor invariant */
    LOAD_INVALID_CAPABILITIES = 'PLUGIN_LOAD_INVALID_CAPABILITIES',

    /** Package metadata is malformed */
    LOAD_INVALID_METADATA = 'PLUGIN_LOAD_INVALID_METADATA',

    /** Another plugin with the same name is already registered */
    DUPLICATE_PLUGIN = 'PLUGIN_DUPLICATE',

    /** Plugin name is not registered */
    NOT_FOUND = 'PLUGIN_NOT_FOUND',

    /** Required argument omitted */
    MISSING_ARGUMENT = 'PLUGIN_MISSING_ARGUMENT',

    /** Argument value cannot be coerced or is not allowed */
    INVALID_ARGUMENT = 'PLUGIN_INVALID_ARGUMENT',

    /** Argument does not match any capability */
    UNKNOWN_ARGUMENT = 'PLUGIN_UNKNOWN_ARGUMENT',

    /** run() threw */
    EXECUTION_FAILED = 'PLUGIN_EXECUTION_FAILED',

    /** run() resolved to something that is not a RunOutcome */
    INVALID_OUTCOME = 'PLUGIN_INVALID_OUTCOME',
}
