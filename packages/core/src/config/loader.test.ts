import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadUserConfig } from './loader.js';
import { ConfigErrorCode } from './error-codes.js';
import { FieldkitRuntimeError } from '../errors/runtime-error.js';

describe('loadUserConfig', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fieldkit-config-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should return defaults when the file does not exist', async () => {
        const config = await loadUserConfig(path.join(tempDir, 'missing.yaml'));

        expect(config.logLevel).toBe('warn');
        expect(config.runtime).toEqual({
            runTimeoutMs: 1_800_000,
            introspectTimeoutMs: 10_000,
            killGraceMs: 2_000,
        });
        expect(config.auth.tokenEnv).toBe('FIELDKIT_TOKEN');
        expect(config.tools).toEqual({});
    });

    it('should parse YAML and keep per-tool sections', async () => {
        const configPath = path.join(tempDir, 'config.yaml');
        await fs.writeFile(
            configPath,
            ['logLevel: debug', 'runtime:', '  killGraceMs: 500', 'tools:', '  hello:', '    greeting: Hi'].join('\n')
        );

        const config = await loadUserConfig(configPath);

        expect(config.logLevel).toBe('debug');
        expect(config.runtime.killGraceMs).toBe(500);
        expect(config.runtime.runTimeoutMs).toBe(1_800_000);
        expect(config.tools).toEqual({ hello: { greeting: 'Hi' } });
    });

    it('should treat an empty file as defaults', async () => {
        const configPath = path.join(tempDir, 'config.yaml');
        await fs.writeFile(configPath, '');

        const config = await loadUserConfig(configPath);

        expect(config.logLevel).toBe('warn');
    });

    it('should reject an invalid log level with a validation error naming the field', async () => {
        const configPath = path.join(tempDir, 'config.yaml');
        await fs.writeFile(configPath, 'logLevel: loud\n');

        const error = await loadUserConfig(configPath).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(FieldkitRuntimeError);
        expect(error).toMatchObject({ code: ConfigErrorCode.VALIDATION_ERROR });
        expect(String(error instanceof Error ? error.message : '')).toContain('logLevel');
    });

    it('should report invalid YAML as a parse error', async () => {
        const configPath = path.join(tempDir, 'config.yaml');
        await fs.writeFile(configPath, 'tools: [unclosed\n');

        await expect(loadUserConfig(configPath)).rejects.toMatchObject({
            code: ConfigErrorCode.PARSE_ERROR,
        });
    });
});
