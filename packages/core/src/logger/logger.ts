/**
 * Fieldkit Logger
 *
 * Multi-transport logger with structured entries and component-based categorization.
 * Child loggers share transports and the level reference with their parent.
 */

import type { LogEntry, LogLevel, LogComponent, Logger, LoggerTransport } from './types.js';

export interface FieldkitLoggerConfig {
    level: LogLevel;
    component: LogComponent;
    transports: LoggerTransport[];
}

type LevelRef = { current: LogLevel };

export class FieldkitLogger implements Logger {
    private readonly levelRef: LevelRef;
    private readonly component: LogComponent;
    private readonly transports: LoggerTransport[];

    // Lower number = more severe. 'debug' logs error(0)..debug(3) but not silly(4)
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: FieldkitLoggerConfig, levelRef?: LevelRef) {
        this.levelRef = levelRef ?? { current: config.level };
        this.component = config.component;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log('debug', message, context);
    }

    silly(message: string, context?: Record<string, unknown>): void {
        this.log('silly', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log('error', message, context);
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            context,
        };

        for (const transport of this.transports) {
            try {
                const result = transport.write(entry);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // A broken transport must not break the caller
                console.error('Logger transport error:', error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return FieldkitLogger.LEVELS[level] <= FieldkitLogger.LEVELS[this.levelRef.current];
    }

    createChild(component: LogComponent): FieldkitLogger {
        return new FieldkitLogger(
            { level: this.levelRef.current, component, transports: this.transports },
            this.levelRef
        );
    }

    setLevel(level: LogLevel): void {
        this.levelRef.current = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.current;
    }

    getLogFilePath(): string | null {
        for (const transport of this.transports) {
            if ('getFilePath' in transport && typeof transport.getFilePath === 'function') {
                const filePath: unknown = transport.getFilePath();
                if (typeof filePath === 'string') {
                    return filePath;
                }
            }
        }
        return null;
    }

    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }
}
