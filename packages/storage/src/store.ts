import { promises as fs } from 'fs';
import path from 'path';
import type { Readable } from 'stream';
import type { BlobInput, BlobStore, ItemRecord, Logger, NewItem, RecordIndex } from '@cubby/core';
import {
    CubbyLogComponent,
    ErrorScope,
    NewItemSchema,
    StorageError,
    StorageErrorCode,
    createLogger,
    ensureOk,
    hasStorageErrorCode,
    zodToIssues,
} from '@cubby/core';
import { LocalBlobStore } from './blob/local-blob-store.js';
import { closeBlobInput } from './blob/blob-input.js';
import { parseStoreConfig } from './config.js';
import { IdAllocator, createIdGenerator, type IdGenerator } from './id/id-allocator.js';
import { ExpiryReaper } from './reaper/expiry-reaper.js';
import { createRecordIndex } from './record-index/factory.js';
import type { StoreConfig, StoreConfigInput } from './schemas.js';

/** Record index files live here, relative to `baseDir` */
export const DIR_DATABASE = 'db';
/** Blob files live here, relative to `baseDir` */
export const DIR_STORAGE = 'data';

/**
 * Collaborators normally built from configuration. Anything injected here is
 * owned by the caller until `close()`, which still disconnects it.
 */
export interface StoreDependencies {
    logger?: Logger;
    recordIndex?: RecordIndex;
    blobStore?: BlobStore;
    generateId?: IdGenerator;
    /** Clock used for expiry decisions */
    now?: () => Date;
}

export interface ReconcileResult {
    orphanBlobsRemoved: number;
    danglingRecordsRemoved: number;
}

interface StoreParts {
    config: StoreConfig;
    index: RecordIndex;
    blobs: BlobStore;
    logger: Logger;
    ownsLogger: boolean;
    generateId: IdGenerator;
    now: () => Date;
}

async function disconnectAfterFailedOpen(
    backends: Array<RecordIndex | BlobStore>,
    logger: Logger
): Promise<void> {
    for (const backend of backends) {
        try {
            await backend.disconnect();
        } catch (error) {
            logger.error(`Failed to disconnect ${backend.getStoreType()} after a failed open`, {
                reason: error instanceof Error ? error.message : String(error),
            });
        }
    }
}

async function ensureDirectory(directory: string): Promise<void> {
    try {
        await fs.mkdir(directory, { recursive: true, mode: 0o700 });
    } catch (error) {
        throw StorageError.directoryCreateFailed(directory, error);
    }
}

/**
 * Pairs item records with payload files and expires them.
 *
 * `put` writes the record before the blob and `delete` removes the record
 * before the blob, so a crash leaves at worst an orphan blob or a record whose
 * blob never arrived. `reconcile()` clears both.
 *
 * @example
 * ```typescript
 * const store = await Store.open({ baseDir: './uploads' });
 * const id = await store.put({ expires: new Date(Date.now() + 3_600_000) }, fileStream);
 * const stream = await store.getFile(id);
 * await store.close();
 * ```
 */
export class Store {
    private config: StoreConfig;
    private index: RecordIndex;
    private blobs: BlobStore;
    private allocator: IdAllocator;
    private reaper: ExpiryReaper | undefined = undefined;
    private logger: Logger;
    private ownsLogger: boolean;
    private now: () => Date;
    private closing: Promise<void> | undefined = undefined;

    private constructor(parts: StoreParts) {
        this.config = parts.config;
        this.index = parts.index;
        this.blobs = parts.blobs;
        this.logger = parts.logger;
        this.ownsLogger = parts.ownsLogger;
        this.now = parts.now;
        this.allocator = new IdAllocator(this.index, this.logger, {
            maxAttempts: parts.config.maxIdAttempts,
            generate: parts.generateId,
        });
    }

    /**
     * Validate configuration, create the directory layout, connect the backends,
     * reconcile (unless disabled) and start the expiry reaper when cleanup is on.
     *
     * @throws CubbyValidationError for invalid configuration
     */
    static async open(input: StoreConfigInput, deps: StoreDependencies = {}): Promise<Store> {
        const parsed = ensureOk(parseStoreConfig(input), deps.logger);
        const config: StoreConfig = { ...parsed, baseDir: path.resolve(parsed.baseDir) };

        const ownsLogger = deps.logger === undefined;
        const logger = (
            deps.logger ??
            createLogger({ config: config.logger, name: path.basename(config.baseDir) })
        ).createChild(CubbyLogComponent.STORE);

        const databaseDir = path.join(config.baseDir, DIR_DATABASE);
        const storageDir = path.join(config.baseDir, DIR_STORAGE);
        const connected: Array<RecordIndex | BlobStore> = [];
        let store: Store;
        try {
            await ensureDirectory(config.baseDir);
            await ensureDirectory(databaseDir);
            await ensureDirectory(storageDir);

            const index =
                deps.recordIndex ?? createRecordIndex(config.recordIndex, databaseDir, logger);
            const blobs = deps.blobStore ?? new LocalBlobStore(storageDir, logger);

            await index.connect();
            connected.push(index);
            await blobs.connect();
            connected.push(blobs);

            store = new Store({
                config,
                index,
                blobs,
                logger,
                ownsLogger,
                generateId: deps.generateId ?? createIdGenerator(config.idLength),
                now: deps.now ?? (() => new Date()),
            });

            if (config.reconcileOnOpen) {
                await store.reconcileItems();
            }
        } catch (error) {
            await disconnectAfterFailedOpen(connected, logger);
            if (ownsLogger) {
                await logger.destroy();
            }
            throw error;
        }

        const { index, blobs } = store;
        if (config.autoCleanup) {
            store.reaper = new ExpiryReaper({
                index,
                deleteItem: (id) => store.deleteItem(id),
                logger,
                intervalMs: config.cleanupIntervalMs,
                now: store.now,
            });
            store.reaper.start();
        }

        logger.info(`Store opened at ${config.baseDir}`, {
            recordIndex: index.getStoreType(),
            blobStore: blobs.getStoreType(),
            autoCleanup: config.autoCleanup,
        });
        return store;
    }

    /**
     * Store a new item and its payload.
     *
     * The payload is always closed, whether or not the put succeeds. If the
     * payload copy fails the record and any partial blob are removed again.
     *
     * @returns the ID assigned to the item
     * @throws CubbyValidationError for an invalid item
     * @throws StorageError.idAllocationExhausted when every drawn ID was taken
     */
    async put(item: NewItem, payload: BlobInput): Promise<string> {
        if (this.closing) {
            closeBlobInput(payload);
            throw StorageError.storeClosed('put');
        }

        const parsed = NewItemSchema.safeParse(item);
        if (!parsed.success) {
            closeBlobInput(payload);
            throw StorageError.invalidItem(
                zodToIssues(parsed.error, 'error', ErrorScope.STORAGE)
            );
        }

        let id: string;
        try {
            id = await this.insertRecord(parsed.data.expires, parsed.data.metadata);
        } catch (error) {
            closeBlobInput(payload);
            throw error;
        }

        try {
            const size = await this.blobs.write(id, payload);
            this.logger.debug(`Stored item ${id} (${size} bytes)`, {
                expires: parsed.data.expires.toISOString(),
            });
        } catch (error) {
            this.logger.warn(`Payload write failed for item ${id}, rolling back`);
            await this.rollback(id);
            throw error;
        }

        return id;
    }

    /**
     * @throws StorageError.itemNotFound when the item is absent, or expired with cleanup on
     */
    async get(id: string): Promise<ItemRecord> {
        this.assertOpen('get');

        const record = await this.index.get(id);
        if (!record) {
            throw StorageError.itemNotFound(id);
        }

        if (this.config.autoCleanup && record.expires.getTime() <= this.now().getTime()) {
            this.logger.debug(`Item ${id} expired at ${record.expires.toISOString()}, deleting`);
            await this.deleteItem(id);
            throw StorageError.itemNotFound(id);
        }

        return record;
    }

    /**
     * Open the payload for reading. No expiry check is made.
     * The caller must consume or destroy the stream.
     */
    async getFile(id: string): Promise<Readable> {
        this.assertOpen('getFile');
        return this.blobs.open(id);
    }

    /**
     * Remove an item and its payload. Deleting an item that is already gone succeeds.
     */
    async delete(id: string): Promise<void> {
        this.assertOpen('delete');
        await this.deleteItem(id);
    }

    /**
     * Remove blobs without a record and records without a blob.
     *
     * Puts running at the same time can lose their record, so only call this
     * while the store is otherwise idle.
     */
    async reconcile(): Promise<ReconcileResult> {
        this.assertOpen('reconcile');
        return this.reconcileItems();
    }

    /**
     * Direct access to the record index, for queries the store does not offer.
     */
    getRecordIndex(): RecordIndex {
        this.assertOpen('getRecordIndex');
        return this.index;
    }

    isClosed(): boolean {
        return this.closing !== undefined;
    }

    /**
     * Stop the reaper, waiting for a running sweep, then disconnect the backends.
     * Calling close again returns the same shutdown.
     */
    close(): Promise<void> {
        if (!this.closing) {
            this.closing = this.shutdown();
        }
        return this.closing;
    }

    private async shutdown(): Promise<void> {
        if (this.reaper) {
            await this.reaper.stop();
        }

        let firstError: unknown = undefined;
        for (const backend of [this.index, this.blobs]) {
            try {
                await backend.disconnect();
            } catch (error) {
                this.logger.error(
                    `Failed to disconnect ${backend.getStoreType()}: ${error instanceof Error ? error.message : String(error)}`
                );
                firstError ??= error;
            }
        }

        this.logger.info('Store closed');
        if (this.ownsLogger) {
            await this.logger.destroy();
        }

        if (firstError !== undefined) {
            throw firstError;
        }
    }

    /**
     * Allocate an ID and insert the record under it. An insert that loses a
     * race for the same ID draws again from the same attempt budget.
     */
    private async insertRecord(expires: Date, metadata: ItemRecord['metadata']): Promise<string> {
        let attempts = 0;
        for (;;) {
            const allocation = await this.allocator.allocate(attempts);
            attempts = allocation.attempts;
            try {
                await this.index.insert({ id: allocation.id, expires, metadata });
                return allocation.id;
            } catch (error) {
                if (!hasStorageErrorCode(error, StorageErrorCode.RECORD_ALREADY_EXISTS)) {
                    throw error;
                }
                this.logger.debug(`ID ${allocation.id} was taken by a concurrent put`);
            }
        }
    }

    private async rollback(id: string): Promise<void> {
        try {
            await this.index.delete(id);
        } catch (error) {
            if (!hasStorageErrorCode(error, StorageErrorCode.RECORD_NOT_FOUND)) {
                this.logger.error(`Rollback could not remove record ${id}`, {
                    reason: error instanceof Error ? error.message : String(error),
                });
            }
        }
        try {
            await this.blobs.remove(id);
        } catch (error) {
            this.logger.error(`Rollback could not remove blob ${id}`, {
                reason: error instanceof Error ? error.message : String(error),
            });
        }
    }

    // Shared by delete(), expired reads and the reaper. Absence at either step is not an error.
    private async deleteItem(id: string): Promise<void> {
        try {
            await this.index.delete(id);
        } catch (error) {
            if (!hasStorageErrorCode(error, StorageErrorCode.RECORD_NOT_FOUND)) {
                throw error;
            }
            this.logger.debug(`Record ${id} already deleted`);
        }

        const removed = await this.blobs.remove(id);
        if (!removed) {
            this.logger.debug(`Blob ${id} already removed`);
        }
    }

    private async reconcileItems(): Promise<ReconcileResult> {
        const [recordIds, blobIds] = await Promise.all([this.index.listIds(), this.blobs.list()]);
        const records = new Set(recordIds);
        const blobs = new Set(blobIds);

        let orphanBlobsRemoved = 0;
        for (const id of blobIds) {
            if (!records.has(id) && (await this.blobs.remove(id))) {
                orphanBlobsRemoved++;
            }
        }

        let danglingRecordsRemoved = 0;
        for (const id of recordIds) {
            if (blobs.has(id)) continue;
            try {
                await this.index.delete(id);
                danglingRecordsRemoved++;
            } catch (error) {
                if (!hasStorageErrorCode(error, StorageErrorCode.RECORD_NOT_FOUND)) {
                    throw error;
                }
            }
        }

        if (orphanBlobsRemoved > 0 || danglingRecordsRemoved > 0) {
            this.logger.warn('Reconciliation removed unpaired items', {
                orphanBlobsRemoved,
                danglingRecordsRemoved,
            });
        }
        return { orphanBlobsRemoved, danglingRecordsRemoved };
    }

    private assertOpen(method: string): void {
        if (this.closing) {
            throw StorageError.storeClosed(method);
        }
    }
}

export interface OpenStoreOptions extends Omit<StoreConfigInput, 'baseDir' | 'autoCleanup'> {
    deps?: StoreDependencies;
}

/**
 * Shorthand for `Store.open({ baseDir, autoCleanup, ...options })`.
 */
export function openStore(
    baseDir: string,
    autoCleanup: boolean,
    options: OpenStoreOptions = {}
): Promise<Store> {
    const { deps, ...config } = options;
    return Store.open({ ...config, baseDir, autoCleanup }, deps);
}
