import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { vi } from 'vitest';
import type { ItemMetadata, ItemRecord, Logger } from '@cubby/core';
import { MemoryRecordIndex } from '../record-index/memory-record-index.js';

export function createMockLogger(): Logger {
    const logger: Logger = {
        debug: vi.fn(),
        silly: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        createChild: () => logger,
        destroy: vi.fn(async () => {}),
    };
    return logger;
}

export async function createTempDir(prefix = 'cubby-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Deterministic ID source: returns the given IDs in order, then throws.
 */
export function sequenceGenerator(ids: string[]): () => string {
    let next = 0;
    return () => {
        const id = ids[next++];
        if (id === undefined) {
            throw new Error('sequenceGenerator ran out of IDs');
        }
        return id;
    };
}

/**
 * Stream that emits `chunks` and then fails with `error`.
 */
export function failingStream(chunks: string[], error: Error): Readable {
    let index = 0;
    return new Readable({
        read() {
            const chunk = chunks[index++];
            if (chunk !== undefined) {
                this.push(chunk);
            } else {
                this.destroy(error);
            }
        },
    });
}

export async function readAll(stream: Readable): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(Buffer.from(chunk));
    }
    return Buffer.concat(chunks).toString('utf8');
}

export function record(id: string, expires: Date, metadata: ItemMetadata = {}): ItemRecord {
    return { id, expires, metadata };
}

/**
 * Record index whose lookups claim every ID is taken.
 */
export class AlwaysTakenRecordIndex extends MemoryRecordIndex {
    getCalls = 0;
    insertCalls = 0;

    override async get(id: string): Promise<ItemRecord | undefined> {
        this.getCalls++;
        return record(id, new Date(0));
    }

    override async insert(): Promise<void> {
        this.insertCalls++;
    }
}

/**
 * Record index whose expiry query waits until `release()` is called.
 */
export class GatedRecordIndex extends MemoryRecordIndex {
    readonly queryStarted: Promise<void>;
    private markStarted: () => void = () => {};
    private gate: Promise<void>;
    private openGate: () => void = () => {};

    constructor() {
        super();
        this.queryStarted = new Promise((resolve) => {
            this.markStarted = resolve;
        });
        this.gate = new Promise((resolve) => {
            this.openGate = resolve;
        });
    }

    release(): void {
        this.openGate();
    }

    override async findExpiredBefore(cutoff: Date): Promise<ItemRecord[]> {
        this.markStarted();
        await this.gate;
        return super.findExpiredBefore(cutoff);
    }
}
