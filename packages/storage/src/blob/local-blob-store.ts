import { promises as fs, createWriteStream } from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { BlobInput, BlobStore, Logger } from '@cubby/core';
import { CubbyLogComponent, StorageError } from '@cubby/core';
import { assertValidBlobId, blobIdProblem, closeBlobInput, toReadable } from './blob-input.js';

function hasErrorCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Local filesystem blob store.
 *
 * Each payload is a single file named exactly by its item ID, directly under
 * `storePath`. Files are never shared between IDs.
 */
export class LocalBlobStore implements BlobStore {
    private storePath: string;
    private connected = false;
    private logger: Logger;

    constructor(storePath: string, logger: Logger) {
        this.storePath = storePath;
        this.logger = logger.createChild(CubbyLogComponent.BLOB);
    }

    async connect(): Promise<void> {
        if (this.connected) return;

        try {
            await fs.mkdir(this.storePath, { recursive: true, mode: 0o700 });
        } catch (error) {
            throw StorageError.directoryCreateFailed(this.storePath, error);
        }
        this.connected = true;
        this.logger.debug(`LocalBlobStore connected at: ${this.storePath}`);
    }

    async disconnect(): Promise<void> {
        this.connected = false;
        this.logger.debug('LocalBlobStore disconnected');
    }

    isConnected(): boolean {
        return this.connected;
    }

    getStoreType(): string {
        return 'local';
    }

    getStoragePath(): string {
        return this.storePath;
    }

    async write(id: string, input: BlobInput): Promise<number> {
        let filePath: string;
        try {
            this.ensureConnected();
            filePath = this.resolvePath(id);
        } catch (error) {
            closeBlobInput(input);
            throw error;
        }

        try {
            await pipeline(toReadable(input), createWriteStream(filePath, { mode: 0o600 }));
        } catch (error) {
            // pipeline has already destroyed both streams; drop whatever reached the disk
            await fs.rm(filePath, { force: true }).catch((cleanupError: unknown) => {
                this.logger.warn(`Failed to remove partial blob ${id}: ${String(cleanupError)}`);
            });
            throw StorageError.blobOperationFailed('write', 'local', error);
        }

        try {
            const { size } = await fs.stat(filePath);
            this.logger.debug(`Stored blob ${id} (${size} bytes)`);
            return size;
        } catch (error) {
            throw StorageError.blobOperationFailed('write', 'local', error);
        }
    }

    async open(id: string): Promise<Readable> {
        this.ensureConnected();
        const filePath = this.resolvePath(id);

        let handle: FileHandle;
        try {
            handle = await fs.open(filePath, 'r');
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                throw StorageError.blobNotFound(id);
            }
            throw StorageError.blobOperationFailed('open', 'local', error);
        }
        // the stream owns the handle and closes it on end or destroy
        return handle.createReadStream();
    }

    async exists(id: string): Promise<boolean> {
        this.ensureConnected();
        const filePath = this.resolvePath(id);
        try {
            await fs.access(filePath);
            return true;
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                return false;
            }
            throw StorageError.blobOperationFailed('exists', 'local', error);
        }
    }

    async remove(id: string): Promise<boolean> {
        this.ensureConnected();
        const filePath = this.resolvePath(id);
        try {
            await fs.unlink(filePath);
            this.logger.debug(`Removed blob ${id}`);
            return true;
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                return false;
            }
            throw StorageError.blobOperationFailed('remove', 'local', error);
        }
    }

    async list(): Promise<string[]> {
        this.ensureConnected();
        try {
            const entries = await fs.readdir(this.storePath, { withFileTypes: true });
            return entries
                .filter((entry) => entry.isFile() && blobIdProblem(entry.name) === undefined)
                .map((entry) => entry.name)
                .sort();
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                return [];
            }
            throw StorageError.blobOperationFailed('list', 'local', error);
        }
    }

    private resolvePath(id: string): string {
        assertValidBlobId(id);
        return path.join(this.storePath, id);
    }

    private ensureConnected(): void {
        if (!this.connected) {
            throw StorageError.blobBackendNotConnected('local');
        }
    }
}
