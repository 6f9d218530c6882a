/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    PLUGIN = 'plugin', // Plugin loading, shape validation, execution
    REGISTRY = 'registry', // Discovery and name-keyed registration
    PROCESS = 'process', // Process plugins and the stdio protocol
    INSTALLER = 'installer', // System dependency provisioning
    CATALOG = 'catalog', // Plugin catalog lookup and plugin installation
    CONFIG = 'config', // Configuration file operations, parsing, validation
    AUTH = 'auth', // Auth token acquisition
    USAGE = 'usage', // Bad invocation: unknown plugin, bad or missing arguments
}

/**
 * Error types describing the nature of the error
 */
export enum ErrorType {
    USER = 'user', // bad input, config errors, validation failures
    NOT_FOUND = 'not_found', // resource doesn't exist (plugin, binary, file)
    TIMEOUT = 'timeout', // operation timed out
    SYSTEM = 'system', // bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // upstream tool or API failures
    UNKNOWN = 'unknown', // unclassified errors, fallback
}

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: string;
    message: string;
    scope: ErrorScope | string;
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
