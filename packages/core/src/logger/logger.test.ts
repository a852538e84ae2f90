import { afterEach, describe, expect, it, vi } from 'vitest';
import { CubbyLogger } from './logger.js';
import { CubbyLogComponent } from './types.js';
import type { LogEntry, LogLevel, LoggerTransport } from './types.js';

class CapturingTransport implements LoggerTransport {
    entries: LogEntry[] = [];
    destroyed = false;

    write(entry: LogEntry): void {
        this.entries.push(entry);
    }

    destroy(): void {
        this.destroyed = true;
    }
}

function createLogger(level: LogLevel = 'info') {
    const transport = new CapturingTransport();
    const logger = new CubbyLogger({
        level,
        component: CubbyLogComponent.STORE,
        name: 'uploads',
        transports: [transport],
    });
    return { logger, transport };
}

describe('CubbyLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('writes structured entries', () => {
        const { logger, transport } = createLogger();

        logger.info('Store opened', { autoCleanup: true });

        expect(transport.entries).toHaveLength(1);
        expect(transport.entries[0]).toMatchObject({
            level: 'info',
            message: 'Store opened',
            component: 'store',
            name: 'uploads',
            context: { autoCleanup: true },
        });
        expect(Number.isNaN(Date.parse(transport.entries[0]?.timestamp ?? ''))).toBe(false);
    });

    it('drops entries below the configured level', () => {
        const { logger, transport } = createLogger('warn');

        logger.silly('statement');
        logger.debug('detail');
        logger.info('progress');
        logger.warn('careful');
        logger.error('broken');

        expect(transport.entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('tags child entries with their component and keeps the level', () => {
        const { logger, transport } = createLogger('info');
        const child = logger.createChild(CubbyLogComponent.REAPER);

        child.debug('hidden');
        child.info('visible');

        expect(transport.entries).toHaveLength(1);
        expect(transport.entries[0]).toMatchObject({
            component: 'reaper',
            name: 'uploads',
            message: 'visible',
        });
    });

    it('keeps logging when a transport throws', () => {
        const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
        const healthy = new CapturingTransport();
        const logger = new CubbyLogger({
            level: 'info',
            component: CubbyLogComponent.STORE,
            name: 'uploads',
            transports: [
                {
                    write: () => {
                        throw new Error('disk full');
                    },
                },
                healthy,
            ],
        });

        logger.info('still here');

        expect(healthy.entries).toHaveLength(1);
        expect(consoleError).toHaveBeenCalledTimes(1);
    });

    it('destroys every transport', async () => {
        const { logger, transport } = createLogger();

        await logger.destroy();

        expect(transport.destroyed).toBe(true);
    });
});
