import { describe, it, expect } from 'vitest';
import { runCommand } from './run-command.js';
import { ProcessErrorCode } from './error-codes.js';

describe('runCommand', () => {
    it('should capture stdout, stderr and the exit code', async () => {
        const result = await runCommand('/bin/sh', ['-c', 'echo out; echo err >&2; exit 4']);

        expect(result).toEqual({
            exitCode: 4,
            stdout: 'out\n',
            stderr: 'err\n',
            timedOut: false,
            cancelled: false,
        });
    });

    it('should kill commands that exceed the timeout', async () => {
        const result = await runCommand('/bin/sh', ['-c', 'sleep 30'], {
            timeoutMs: 200,
            killGraceMs: 100,
        });

        expect(result.timedOut).toBe(true);
    });

    it('should stop when the signal aborts', async () => {
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 100);

        const result = await runCommand('/bin/sh', ['-c', 'sleep 30'], {
            signal: controller.signal,
            killGraceMs: 100,
        });

        expect(result).toMatchObject({ cancelled: true, exitCode: 130 });
    });

    it('should reject with COMMAND_NOT_FOUND for missing executables', async () => {
        await expect(runCommand('fieldkit-no-such-binary', [])).rejects.toMatchObject({
            code: ProcessErrorCode.COMMAND_NOT_FOUND,
        });
    });
});
