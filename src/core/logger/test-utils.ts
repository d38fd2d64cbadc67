/**
 * Test utilities for logger mocking
 */

import { vi } from 'vitest';
import type { Logger, LogLevel } from './types.js';

/**
 * Creates a mock logger that satisfies the Logger type.
 * All methods are vi.fn() mocks that can be spied on.
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
 * Collects the messages passed to one level of a mock logger, in call order
 */
export function loggedMessages(
    logger: Logger,
    level: 'debug' | 'info' | 'warn' | 'error'
): string[] {
    return vi.mocked(logger[level]).mock.calls.map((call) => call[0]);
}
