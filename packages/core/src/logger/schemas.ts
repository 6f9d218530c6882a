/**
 * Logger Configuration Schemas
 *
 * Zod schemas for logger configuration with multi-transport support.
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silly']);

const SilentTransportSchema = z
    .object({
        type: z.literal('silent'),
    })
    .strict()
    .describe('Silent transport that discards all logs (used by tests)');

const ConsoleTransportSchema = z
    .object({
        type: z.literal('console'),
        colorize: z.boolean().default(true).describe('Enable colored output'),
    })
    .strict()
    .describe('Console transport for terminal output (written to stderr)');

/**
 * File transport configuration with rotation support
 */
const FileTransportSchema = z
    .object({
        type: z.literal('file'),
        path: z.string().describe('Absolute path to log file'),
        maxSize: z
            .number()
            .positive()
            .default(5 * 1024 * 1024)
            .describe('Max file size in bytes before rotation (default: 5MB)'),
        maxFiles: z
            .number()
            .int()
            .positive()
            .default(3)
            .describe('Max number of rotated files to keep (default: 3)'),
    })
    .strict()
    .describe('File transport with rotation support');

export const LoggerTransportSchema = z.discriminatedUnion('type', [
    SilentTransportSchema,
    ConsoleTransportSchema,
    FileTransportSchema,
]);

export type LoggerTransportConfig = z.output<typeof LoggerTransportSchema>;

export const LoggerConfigSchema = z
    .object({
        level: LogLevelSchema.default('warn').describe('Minimum log level to record'),
        transports: z
            .array(LoggerTransportSchema)
            .min(1)
            .default([{ type: 'console', colorize: true }])
            .describe('Log output destinations'),
    })
    .strict()
    .describe('Logger configuration with multi-transport support');

export type LoggerConfig = z.output<typeof LoggerConfigSchema>;
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;
