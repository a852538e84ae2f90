import { Readable } from 'stream';
import type { BlobInput, BlobStore, Logger } from '@cubby/core';
import { CubbyLogComponent, StorageError, StorageErrorCode, hasStorageErrorCode } from '@cubby/core';
import { assertValidBlobId, closeBlobInput, readBlobInput } from './blob-input.js';

/**
 * In-memory blob store.
 *
 * Keeps every payload as a Buffer. Suitable for tests and for embedding the
 * store where persistence across restarts is not required.
 */
export class MemoryBlobStore implements BlobStore {
    private blobs = new Map<string, Buffer>();
    private connected = false;
    private logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger.createChild(CubbyLogComponent.BLOB);
    }

    async connect(): Promise<void> {
        if (this.connected) return;
        this.connected = true;
        this.logger.debug('MemoryBlobStore connected');
    }

    async disconnect(): Promise<void> {
        this.blobs.clear();
        this.connected = false;
        this.logger.debug('MemoryBlobStore disconnected');
    }

    isConnected(): boolean {
        return this.connected;
    }

    getStoreType(): string {
        return 'in-memory';
    }

    getStoragePath(): undefined {
        return undefined;
    }

    async write(id: string, input: BlobInput): Promise<number> {
        try {
            this.ensureConnected();
            assertValidBlobId(id);
        } catch (error) {
            closeBlobInput(input);
            throw error;
        }

        let data: Buffer;
        try {
            data = await readBlobInput(input);
        } catch (error) {
            if (hasStorageErrorCode(error, StorageErrorCode.BLOB_INVALID_INPUT)) {
                throw error;
            }
            throw StorageError.blobOperationFailed('write', 'in-memory', error);
        }

        this.blobs.set(id, data);
        this.logger.debug(`Stored blob ${id} (${data.length} bytes)`);
        return data.length;
    }

    async open(id: string): Promise<Readable> {
        this.ensureConnected();
        assertValidBlobId(id);
        const data = this.blobs.get(id);
        if (!data) {
            throw StorageError.blobNotFound(id);
        }
        return Readable.from([Buffer.from(data)]);
    }

    async exists(id: string): Promise<boolean> {
        this.ensureConnected();
        assertValidBlobId(id);
        return this.blobs.has(id);
    }

    async remove(id: string): Promise<boolean> {
        this.ensureConnected();
        assertValidBlobId(id);
        return this.blobs.delete(id);
    }

    async list(): Promise<string[]> {
        this.ensureConnected();
        return Array.from(this.blobs.keys()).sort();
    }

    private ensureConnected(): void {
        if (!this.connected) {
            throw StorageError.blobBackendNotConnected('in-memory');
        }
    }
}
