/**
 * Test utilities for logger mocking
 */

import { vi } from 'vitest';
import type { Logger } from './types.js';

/**
 * Creates a mock logger that satisfies the Logger type.
 * All methods are vi.fn() mocks that can be spied on; children are the same mock.
 */
export function createMockLogger(): Logger {
    const mockLogger: Logger = {
        debug: vi.fn(),
        silly: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        createChild: vi.fn(() => mockLogger),
        destroy: vi.fn(async () => {}),
    };
    return mockLogger;
}
