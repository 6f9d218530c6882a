import { describe, it, expect, vi } from 'vitest';
import { createMockLogger } from '@fieldkit/core/test-utils';
import { createInterruptHandler } from './interrupt.js';

function setup(killed = 0) {
    const controller = new AbortController();
    const logger = createMockLogger();
    const killActive = vi.fn(() => killed);
    const exit = vi.fn<(code: number) => void>();
    const onInterrupt = createInterruptHandler({ controller, logger, killActive, exit });
    return { controller, logger, killActive, exit, onInterrupt };
}

describe('createInterruptHandler', () => {
    it('should abort on the first interrupt without exiting', () => {
        const { controller, killActive, exit, onInterrupt } = setup();

        onInterrupt();

        expect(controller.signal.aborted).toBe(true);
        expect(killActive).not.toHaveBeenCalled();
        expect(exit).not.toHaveBeenCalled();
    });

    it('should kill running process plugins before exiting on the second interrupt', () => {
        const { logger, killActive, exit, onInterrupt } = setup(2);

        onInterrupt();
        onInterrupt();

        expect(killActive).toHaveBeenCalledTimes(1);
        expect(exit).toHaveBeenCalledWith(130);
        expect(killActive.mock.invocationCallOrder[0]).toBeLessThan(
            exit.mock.invocationCallOrder[0] ?? 0
        );
        expect(logger.warn).toHaveBeenCalledWith('Killed 2 process plugin(s) on second interrupt');
    });
});
