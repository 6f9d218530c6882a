import { promises as fs } from 'fs';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from './errors.js';
import { getConfigFilePath } from './paths.js';
import { UserConfigSchema, type UserConfig } from './schemas.js';
import { toErrorMessage } from '../errors/runtime-error.js';
import { formatZodIssues } from '../errors/zod-issues.js';

/**
 * Load `config.yaml` from the fieldkit home. A missing file yields defaults.
 *
 * @throws {FieldkitRuntimeError} PARSE_ERROR for invalid YAML, VALIDATION_ERROR for schema violations
 */
export async function loadUserConfig(configPath: string = getConfigFilePath()): Promise<UserConfig> {
    let fileContent: string;
    try {
        fileContent = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return UserConfigSchema.parse({});
        }
        throw ConfigError.fileReadError(configPath, toErrorMessage(error));
    }

    let raw: unknown;
    try {
        raw = parseYaml(fileContent);
    } catch (error) {
        throw ConfigError.parseError(configPath, toErrorMessage(error));
    }

    const result = UserConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw ConfigError.invalid(configPath, formatZodIssues(result.error.issues));
    }
    return result.data;
}
