/**
 * Core types for Blob Storage
 *
 * A blob store keeps exactly one payload per item ID.
 */

import type { Readable } from 'stream';

/**
 * Input data for blob storage. Streams are consumed and closed by the store.
 */
export type BlobInput = Readable | Buffer | Uint8Array | string;

/**
 * BlobStore interface for storing and retrieving item payloads.
 *
 * This interface follows the storage module conventions where:
 * - Implementation names: MemoryBlobStore, LocalBlobStore, etc.
 * - Lifecycle methods: connect(), disconnect(), isConnected()
 * - Type identifier: getStoreType()
 */
export interface BlobStore {
    /**
     * Create the blob for `id` and copy `input` into it, replacing any previous content.
     * The source stream is closed whether or not the copy succeeds.
     * @returns number of bytes written
     */
    write(id: string, input: BlobInput): Promise<number>;

    /**
     * Open the blob for reading. The caller consumes or destroys the stream.
     * @throws StorageError.blobNotFound when there is no blob for `id`
     */
    open(id: string): Promise<Readable>;

    exists(id: string): Promise<boolean>;

    /**
     * @returns false when there was no blob to remove
     */
    remove(id: string): Promise<boolean>;

    /**
     * IDs of every stored blob, sorted
     */
    list(): Promise<string[]>;

    /**
     * Directory holding the blobs, undefined for non-filesystem stores
     */
    getStoragePath(): string | undefined;

    connect(): Promise<void>;
    disconnect(): Promise<void>;
    isConnected(): boolean;
    getStoreType(): string;
}
