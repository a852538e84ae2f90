import type { ItemRecord, RecordIndex } from '@cubby/core';
import { StorageError } from '@cubby/core';

/**
 * In-memory record index for development and testing.
 * Records are copied on the way in and out so callers never share state with the index.
 * Data is lost when the process restarts.
 */
export class MemoryRecordIndex implements RecordIndex {
    private records = new Map<string, ItemRecord>();
    private connected = false;

    async connect(): Promise<void> {
        this.connected = true;
    }

    async disconnect(): Promise<void> {
        this.connected = false;
        this.records.clear();
    }

    isConnected(): boolean {
        return this.connected;
    }

    getStoreType(): string {
        return 'in-memory';
    }

    async get(id: string): Promise<ItemRecord | undefined> {
        this.checkConnection();
        const record = this.records.get(id);
        return record ? structuredClone(record) : undefined;
    }

    async insert(record: ItemRecord): Promise<void> {
        this.checkConnection();
        if (this.records.has(record.id)) {
            throw StorageError.recordAlreadyExists(record.id);
        }
        try {
            this.records.set(record.id, structuredClone(record));
        } catch (error) {
            throw StorageError.writeFailed('insert', error, { id: record.id });
        }
    }

    async delete(id: string): Promise<void> {
        this.checkConnection();
        if (!this.records.delete(id)) {
            throw StorageError.recordNotFound(id);
        }
    }

    async findExpiredBefore(cutoff: Date): Promise<ItemRecord[]> {
        this.checkConnection();
        const limit = cutoff.getTime();
        return Array.from(this.records.values())
            .filter((record) => record.expires.getTime() < limit)
            .sort((a, b) => a.expires.getTime() - b.expires.getTime())
            .map((record) => structuredClone(record));
    }

    async listIds(): Promise<string[]> {
        this.checkConnection();
        return Array.from(this.records.keys()).sort();
    }

    private checkConnection(): void {
        if (!this.connected) {
            throw StorageError.notConnected('MemoryRecordIndex');
        }
    }
}
