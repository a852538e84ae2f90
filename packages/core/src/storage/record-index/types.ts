import type { ItemRecord } from '../types.js';

/**
 * RecordIndex is the indexed key-value engine holding item records.
 *
 * This interface follows the storage module conventions where:
 * - Implementation names: MemoryRecordIndex, SqliteRecordIndex, etc.
 * - Lifecycle methods: connect(), disconnect(), isConnected()
 * - Type identifier: getStoreType()
 *
 * Mutations on a single key are atomic. Nothing else is.
 */
export interface RecordIndex {
    /**
     * @returns the record, or undefined when the index holds no entry for `id`
     */
    get(id: string): Promise<ItemRecord | undefined>;

    /**
     * Insert a record under `record.id`.
     * @throws StorageError.recordAlreadyExists when the key is taken
     */
    insert(record: ItemRecord): Promise<void>;

    /**
     * Remove the record stored under `id`.
     * @throws StorageError.recordNotFound when there is nothing to remove
     */
    delete(id: string): Promise<void>;

    /**
     * All records whose `expires` is strictly earlier than `cutoff`, oldest first
     */
    findExpiredBefore(cutoff: Date): Promise<ItemRecord[]>;

    /**
     * Every key in the index, sorted. Used by reconciliation.
     */
    listIds(): Promise<string[]>;

    connect(): Promise<void>;
    disconnect(): Promise<void>;
    isConnected(): boolean;
    getStoreType(): string;
}
