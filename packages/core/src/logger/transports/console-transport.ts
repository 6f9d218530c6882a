/**
 * Console Transport
 *
 * Writes to stderr with optional chalk coloring. stdout stays reserved for
 * plugin results so output can be piped.
 */

import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

export interface ConsoleTransportConfig {
    colorize?: boolean;
    /** Override for tests */
    stream?: Pick<NodeJS.WritableStream, 'write'>;
}

export class ConsoleTransport implements LoggerTransport {
    private colorize: boolean;
    private stream: Pick<NodeJS.WritableStream, 'write'>;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
        this.stream = config.stream ?? process.stderr;
    }

    write(entry: LogEntry): void {
        const levelLabel = `[${entry.level.toUpperCase()}]`;
        let message = `${levelLabel} [${entry.component}] ${entry.message}`;

        if (this.colorize) {
            message = this.getColorForLevel(entry.level)(message);
        }

        if (entry.context && Object.keys(entry.context).length > 0 && entry.level !== 'warn') {
            message += '\n' + JSON.stringify(entry.context, null, 2);
        }

        this.stream.write(message + '\n');
    }

    private getColorForLevel(level: LogLevel): (text: string) => string {
        switch (level) {
            case 'debug':
            case 'silly':
                return chalk.gray;
            case 'info':
                return chalk.cyan;
            case 'warn':
                return chalk.yellow;
            case 'error':
                return chalk.red;
        }
    }
}
