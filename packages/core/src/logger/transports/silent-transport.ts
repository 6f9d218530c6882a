import type { LoggerTransport, LogEntry } from '../types.js';

/**
 * Discards all log entries.
 */
export class SilentTransport implements LoggerTransport {
    write(_entry: LogEntry): void {}
}
