import * as path from 'path';
import dotenv from 'dotenv';
import { getFieldkitHome } from '@fieldkit/core';

/**
 * Layered environment loading, lowest priority first:
 * 1. `<fieldkit home>/.env`
 * 2. `.env` in the working directory
 * 3. Shell environment (always wins)
 */
export function loadEnvironmentVariables(cwd: string = process.cwd()): Record<string, string> {
    const env: Record<string, string> = {};

    for (const envPath of [path.join(getFieldkitHome(), '.env'), path.join(cwd, '.env')]) {
        // A missing file only sets result.error; dotenv does not throw for it.
        const result = dotenv.config({ path: envPath, processEnv: {} });
        if (result.parsed) {
            Object.assign(env, result.parsed);
        }
    }

    for (const [key, value] of Object.entries(process.env)) {
        if (value !== undefined && value !== '') {
            env[key] = value;
        }
    }

    return env;
}

/**
 * Apply layered loading to process.env. Called at CLI startup before config is read.
 */
export function applyLayeredEnvironmentLoading(cwd: string = process.cwd()): void {
    Object.assign(process.env, loadEnvironmentVariables(cwd));
}
