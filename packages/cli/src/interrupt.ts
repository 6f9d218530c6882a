import type { Logger } from '@fieldkit/core';
import { EXIT_CODES } from './exit.js';

export interface InterruptHandlerOptions {
    controller: AbortController;
    logger: Logger;
    /** Force-kills whatever process plugins are still running */
    killActive: () => number;
    exit: (code: number) => void;
}

/**
 * SIGINT handler: the first interrupt aborts the running plugin, the second
 * kills any remaining process-plugin trees and exits 130.
 */
export function createInterruptHandler(options: InterruptHandlerOptions): () => void {
    const { controller, logger, killActive, exit } = options;
    return () => {
        if (!controller.signal.aborted) {
            logger.info('Interrupt received, cancelling');
            controller.abort();
            return;
        }
        const killed = killActive();
        if (killed > 0) {
            logger.warn(`Killed ${killed} process plugin(s) on second interrupt`);
        }
        exit(EXIT_CODES.cancelled);
    };
}
