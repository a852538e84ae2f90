import type { Logger, RecordIndex } from '@cubby/core';
import { CubbyLogComponent } from '@cubby/core';

export const DEFAULT_CLEANUP_INTERVAL_MS = 60_000;

export interface ExpiryReaperOptions {
    index: RecordIndex;
    /** Unified delete path of the store; must treat an already-deleted item as success */
    deleteItem: (id: string) => Promise<void>;
    logger: Logger;
    /**
     * Pause between sweeps
     * @default 60000
     */
    intervalMs?: number;
    /** Clock used for the expiry cutoff */
    now?: () => Date;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
 */
function waitOrAbort(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        // an idle reaper must not keep the process alive
        timer.unref();
        signal.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Background loop that deletes expired items.
 *
 * Waits one interval, sweeps, repeats. A failed sweep is logged and the loop
 * carries on with the next interval.
 *
 * @example
 * ```typescript
 * const reaper = new ExpiryReaper({ index, deleteItem: (id) => store.delete(id), logger });
 * reaper.start();
 * // ... later
 * await reaper.stop();
 * ```
 */
export class ExpiryReaper {
    private index: RecordIndex;
    private deleteItem: (id: string) => Promise<void>;
    private logger: Logger;
    private intervalMs: number;
    private now: () => Date;
    private controller: AbortController | undefined = undefined;
    private loop: Promise<void> | undefined = undefined;

    constructor(options: ExpiryReaperOptions) {
        this.index = options.index;
        this.deleteItem = options.deleteItem;
        this.logger = options.logger.createChild(CubbyLogComponent.REAPER);
        this.intervalMs = options.intervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
        this.now = options.now ?? (() => new Date());

        if (!Number.isInteger(this.intervalMs) || this.intervalMs < 1) {
            throw new RangeError(`intervalMs must be a positive integer, got ${this.intervalMs}`);
        }
    }

    start(): void {
        if (this.controller) {
            return;
        }
        this.controller = new AbortController();
        this.loop = this.run(this.controller.signal);
        this.logger.debug(`Expiry reaper started (interval: ${this.intervalMs}ms)`);
    }

    /**
     * Signal the loop and wait for it to exit. A sweep already running completes first.
     */
    async stop(): Promise<void> {
        const controller = this.controller;
        const loop = this.loop;
        if (!controller || !loop) {
            return;
        }
        controller.abort();
        await loop;
        this.controller = undefined;
        this.loop = undefined;
    }

    isRunning(): boolean {
        return this.controller !== undefined;
    }

    /**
     * Delete every item whose expiry is strictly before now, oldest first.
     * Stops at the first failed deletion.
     * @returns number of items deleted
     */
    async sweep(): Promise<number> {
        const cutoff = this.now();
        const expired = await this.index.findExpiredBefore(cutoff);

        let removed = 0;
        for (const record of expired) {
            await this.deleteItem(record.id);
            removed++;
        }

        if (removed > 0) {
            this.logger.info(`Removed ${removed} expired item(s)`, {
                cutoff: cutoff.toISOString(),
            });
        }
        return removed;
    }

    private async run(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            await waitOrAbort(this.intervalMs, signal);
            if (signal.aborted) {
                break;
            }
            try {
                await this.sweep();
            } catch (error) {
                this.logger.error(
                    `Expired item sweep failed: ${error instanceof Error ? error.message : String(error)}`,
                    { error: error instanceof Error ? error.name : typeof error }
                );
            }
        }
        this.logger.debug('Expiry reaper stopped');
    }
}
