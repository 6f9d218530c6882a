/**
 * Logger Types and Interfaces
 *
 * Defines the core abstractions for the multi-transport logger architecture.
 */

/**
 * Log levels in order of severity
 * Following Winston convention: error < warn < info < debug < silly
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silly';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silly'];

/**
 * Component identifiers for structured logging
 * Mirrors ErrorScope where the two overlap
 */
export enum LogComponent {
    REGISTRY = 'registry',
    PLUGIN = 'plugin',
    PROCESS = 'process',
    INSTALLER = 'installer',
    CATALOG = 'catalog',
    DISPATCHER = 'dispatcher',
    CLI = 'cli',
    CONFIG = 'config',
    AUTH = 'auth',
}

/**
 * Structured log entry
 * All logs are converted to this format before being sent to transports
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    /** ISO timestamp */
    timestamp: string;
    component: LogComponent;
    context?: Record<string, unknown> | undefined;
}

/**
 * Logger type
 * All logger implementations must implement this shape.
 */
export type Logger = {
    debug(message: string, context?: Record<string, unknown>): void;

    /** Most verbose level, used for full protocol dumps */
    silly(message: string, context?: Record<string, unknown>): void;

    info(message: string, context?: Record<string, unknown>): void;

    warn(message: string, context?: Record<string, unknown>): void;

    error(message: string, context?: Record<string, unknown>): void;

    /**
     * Track exception with stack trace
     */
    trackException(error: Error, context?: Record<string, unknown>): void;

    /**
     * Create a child logger with a different component.
     * Shares the same transports and level but uses a different component identifier.
     */
    createChild(component: LogComponent): Logger;

    /**
     * Set the log level dynamically.
     * Affects this logger and all child loggers created from it (shared level reference)
     */
    setLevel(level: LogLevel): void;

    getLevel(): LogLevel;

    /**
     * @returns Log file path or null if file logging is not configured
     */
    getLogFilePath(): string | null;

    /**
     * Cleanup resources and close transports
     */
    destroy(): Promise<void>;
};

/**
 * Base transport interface
 */
export type LoggerTransport = {
    write(entry: LogEntry): void | Promise<void>;

    /**
     * Cleanup resources when logger is destroyed
     */
    destroy?(): void | Promise<void>;
};
