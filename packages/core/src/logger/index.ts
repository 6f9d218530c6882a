export type { Logger, LoggerTransport, LogEntry, LogLevel } from './types.js';
export { LogComponent, LOG_LEVELS } from './types.js';
export { FieldkitLogger, type FieldkitLoggerConfig } from './logger.js';
export {
    LoggerConfigSchema,
    LoggerTransportSchema,
    LogLevelSchema,
    type LoggerConfig,
    type LoggerConfigInput,
    type LoggerTransportConfig,
} from './schemas.js';
export { createTransport, createTransports, createLogger } from './transport-factory.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { FileTransport } from './transports/file-transport.js';
export { SilentTransport } from './transports/silent-transport.js';
