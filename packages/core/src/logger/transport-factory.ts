/**
 * Transport Factory
 *
 * Creates transport instances from validated configuration.
 */

import type { LoggerTransport, LogComponent } from './types.js';
import { LoggerConfigSchema, type LoggerTransportConfig } from './schemas.js';
import { SilentTransport } from './transports/silent-transport.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { FieldkitLogger } from './logger.js';

export function createTransport(config: LoggerTransportConfig): LoggerTransport {
    switch (config.type) {
        case 'silent':
            return new SilentTransport();

        case 'console':
            return new ConsoleTransport({ colorize: config.colorize });

        case 'file':
            return new FileTransport({
                path: config.path,
                maxSize: config.maxSize,
                maxFiles: config.maxFiles,
            });
    }
}

export function createTransports(configs: LoggerTransportConfig[]): LoggerTransport[] {
    return configs.map(createTransport);
}

/**
 * Build a logger from raw (unvalidated) configuration.
 * Throws a ZodError when the configuration is malformed.
 */
export function createLogger(config: unknown, component: LogComponent): FieldkitLogger {
    const parsed = LoggerConfigSchema.parse(config);
    return new FieldkitLogger({
        level: parsed.level,
        component,
        transports: createTransports(parsed.transports),
    });
}
