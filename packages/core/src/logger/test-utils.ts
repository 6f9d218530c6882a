/**
 * Test utilities for logger mocking
 */

import { vi } from 'vitest';
import type { Logger, LogLevel } from './types.js';

/**
 * Creates a mock logger whose methods are all vi.fn() spies.
 * `createChild` returns the same instance so assertions see child output too.
 */
export function createMockLogger(): Logger {
    const mockLogger: Logger = {
        debug: vi.fn(),
        silly: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        trackException: vi.fn(),
        createChild: vi.fn(() => mockLogger),
        destroy: vi.fn(async () => {}),
        setLevel: vi.fn(),
        getLevel: vi.fn((): LogLevel => 'info'),
        getLogFilePath: vi.fn(() => null),
    };
    return mockLogger;
}

/**
 * Creates a silent mock logger with no-op functions.
 */
export function createSilentMockLogger(): Logger {
    const mockLogger: Logger = {
        debug: () => {},
        silly: () => {},
        info: () => {},
        warn: () => {},
        error: () => {},
        trackException: () => {},
        createChild: () => mockLogger,
        destroy: async () => {},
        setLevel: () => {},
        getLevel: () => 'info',
        getLogFilePath: () => null,
    };
    return mockLogger;
}
