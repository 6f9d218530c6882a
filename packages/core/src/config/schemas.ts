import { z } from 'zod';
import { LogLevelSchema } from '../logger/schemas.js';

export const DEFAULT_RUN_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_INTROSPECT_TIMEOUT_MS = 10_000;
export const DEFAULT_KILL_GRACE_MS = 2_000;

export const AuthConfigSchema = z
    .object({
        tokenEnv: z
            .string()
            .default('FIELDKIT_TOKEN')
            .describe('Environment variable holding a pre-issued bearer token'),
        command: z
            .array(z.string())
            .min(1)
            .optional()
            .describe('Command whose trimmed stdout is the token, used when tokenEnv is unset'),
        timeoutMs: z.number().int().positive().default(30_000),
    })
    .strict();

export const RuntimeConfigSchema = z
    .object({
        runTimeoutMs: z.number().int().positive().default(DEFAULT_RUN_TIMEOUT_MS),
        introspectTimeoutMs: z.number().int().positive().default(DEFAULT_INTROSPECT_TIMEOUT_MS),
        killGraceMs: z.number().int().nonnegative().default(DEFAULT_KILL_GRACE_MS),
    })
    .strict();

export const UserConfigSchema = z
    .object({
        logLevel: LogLevelSchema.default('warn'),
        logFile: z
            .union([z.string(), z.literal(false)])
            .optional()
            .describe('Log file path, or false to disable file logging'),
        auth: AuthConfigSchema.default({}),
        runtime: RuntimeConfigSchema.default({}),
        tools: z
            .record(z.record(z.unknown()))
            .default({})
            .describe('Per-plugin configuration passed to the execution context'),
    })
    .strict();

export type AuthConfig = z.output<typeof AuthConfigSchema>;
export type RuntimeConfig = z.output<typeof RuntimeConfigSchema>;
export type UserConfig = z.output<typeof UserConfigSchema>;
