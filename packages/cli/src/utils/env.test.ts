import * as fs from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnvironmentVariables } from './env.js';

describe('loadEnvironmentVariables', () => {
    let homeDir: string;
    let projectDir: string;

    beforeEach(() => {
        homeDir = fs.mkdtempSync(path.join(tmpdir(), 'fieldkit-env-home-'));
        projectDir = fs.mkdtempSync(path.join(tmpdir(), 'fieldkit-env-project-'));
        vi.stubEnv('FIELDKIT_HOME', homeDir);
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        fs.rmSync(homeDir, { recursive: true, force: true });
        fs.rmSync(projectDir, { recursive: true, force: true });
    });

    it('should layer the global file, the project file and the shell', () => {
        fs.writeFileSync(
            path.join(homeDir, '.env'),
            'FIELDKIT_TEST_GLOBAL=global\nFIELDKIT_TEST_SHARED=global\n'
        );
        fs.writeFileSync(
            path.join(projectDir, '.env'),
            'FIELDKIT_TEST_SHARED=project\nFIELDKIT_TEST_SHELL=project\n'
        );
        vi.stubEnv('FIELDKIT_TEST_SHELL', 'shell');

        const env = loadEnvironmentVariables(projectDir);

        expect(env.FIELDKIT_TEST_GLOBAL).toBe('global');
        expect(env.FIELDKIT_TEST_SHARED).toBe('project');
        expect(env.FIELDKIT_TEST_SHELL).toBe('shell');
    });

    it('should not modify process.env', () => {
        fs.writeFileSync(path.join(projectDir, '.env'), 'FIELDKIT_TEST_ONLY_IN_FILE=1\n');

        const env = loadEnvironmentVariables(projectDir);

        expect(env.FIELDKIT_TEST_ONLY_IN_FILE).toBe('1');
        expect(process.env.FIELDKIT_TEST_ONLY_IN_FILE).toBeUndefined();
    });

    it('should tolerate missing files', () => {
        expect(() => loadEnvironmentVariables(projectDir)).not.toThrow();
    });
});
