import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConsoleTransport } from './console-transport.js';
import { CubbyLogComponent } from '../types.js';
import type { LogEntry } from '../types.js';

const entry = (overrides: Partial<LogEntry> = {}): LogEntry => ({
    level: 'info',
    message: 'Store opened',
    timestamp: '2030-01-01T12:00:00.000Z',
    component: CubbyLogComponent.STORE,
    name: 'uploads',
    ...overrides,
});

describe('ConsoleTransport', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('formats level, component and store name', () => {
        const transport = new ConsoleTransport({ colorize: false });
        const time = new Date('2030-01-01T12:00:00.000Z').toLocaleTimeString();

        expect(transport.format(entry())).toBe(`${time} [INFO] [store:uploads] Store opened`);
    });

    it('appends context as indented JSON', () => {
        const transport = new ConsoleTransport({ colorize: false });

        const output = transport.format(entry({ context: { id: 'abc' } }));

        expect(output.split('\n').slice(1)).toEqual(['{', '  "id": "abc"', '}']);
    });

    it('sends warnings and errors to stderr', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const transport = new ConsoleTransport({ colorize: false });

        transport.write(entry({ level: 'debug' }));
        transport.write(entry({ level: 'warn' }));
        transport.write(entry({ level: 'error' }));

        expect(log).toHaveBeenCalledTimes(1);
        expect(error).toHaveBeenCalledTimes(2);
    });
});
