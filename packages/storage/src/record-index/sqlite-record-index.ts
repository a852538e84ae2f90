import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { z } from 'zod';
import type BetterSqlite3 from 'better-sqlite3';
import type { ItemRecord, Logger, RecordIndex } from '@cubby/core';
import { CubbyLogComponent, ItemMetadataSchema, StorageError } from '@cubby/core';

type SqliteDatabaseConstructor = typeof BetterSqlite3;

// Loaded on first connect so the in-memory index works without the native module
let BetterSqlite3Database: SqliteDatabaseConstructor | undefined;

export interface SqliteRecordIndexOptions {
    /** Full path of the database file */
    path: string;
    /** Milliseconds to wait on a locked database */
    timeout?: number;
    /** Forward executed statements to the logger */
    verbose?: boolean;
}

const RecordRowSchema = z.object({
    id: z.string(),
    expires: z.number(),
    metadata: z.string(),
});

const IdRowSchema = z.object({ id: z.string() });

/**
 * SQLite record index.
 * One row per item in the `items` table, with a secondary index on `expires`
 * so expiry sweeps do not scan the whole table.
 */
export class SqliteRecordIndex implements RecordIndex {
    private db: BetterSqlite3.Database | null = null;
    private options: Required<SqliteRecordIndexOptions>;
    private logger: Logger;

    constructor(options: SqliteRecordIndexOptions, logger: Logger) {
        this.options = {
            path: options.path,
            timeout: options.timeout ?? 5000,
            verbose: options.verbose ?? false,
        };
        this.logger = logger.createChild(CubbyLogComponent.RECORD_INDEX);
    }

    private initializeTables(): void {
        const db = this.getDb();
        this.logger.debug('SQLite initializing record index schema...');

        try {
            db.exec(`
                CREATE TABLE IF NOT EXISTS items (
                    id TEXT PRIMARY KEY,
                    expires INTEGER NOT NULL,
                    metadata TEXT NOT NULL,
                    created_at INTEGER NOT NULL
                )
            `);
            db.exec('CREATE INDEX IF NOT EXISTS idx_items_expires ON items(expires)');

            this.logger.debug('SQLite record index schema initialized: items table with indexes');
        } catch (error) {
            throw StorageError.migrationFailed(
                error instanceof Error ? error.message : String(error),
                {
                    operation: 'table_initialization',
                    backend: 'sqlite',
                }
            );
        }
    }

    async connect(): Promise<void> {
        if (this.db) return;

        const { path, timeout, verbose } = this.options;
        this.logger.info(`SQLite using database file: ${path}`);

        try {
            mkdirSync(dirname(path), { recursive: true, mode: 0o700 });
        } catch (error) {
            throw StorageError.directoryCreateFailed(dirname(path), error);
        }

        if (!BetterSqlite3Database) {
            try {
                const module = await import('better-sqlite3');
                BetterSqlite3Database = module.default;
            } catch (error: unknown) {
                if (error instanceof Error && 'code' in error && error.code === 'ERR_MODULE_NOT_FOUND') {
                    throw StorageError.dependencyNotInstalled(
                        'SQLite',
                        'better-sqlite3',
                        'npm install better-sqlite3'
                    );
                }
                throw StorageError.connectionFailed(
                    `Failed to import better-sqlite3: ${error instanceof Error ? error.message : String(error)}`
                );
            }
        }

        try {
            this.db = new BetterSqlite3Database(path, {
                timeout,
                verbose: verbose
                    ? (message?: unknown) => {
                          this.logger.silly(String(message), { producer: 'sqlite' });
                      }
                    : undefined,
            });
            this.db.pragma('journal_mode = WAL');
        } catch (error) {
            this.db = null;
            throw StorageError.connectionFailed(
                error instanceof Error ? error.message : String(error),
                { path }
            );
        }

        this.initializeTables();
        this.logger.info(`SQLite record index connected: ${path}`);
    }

    async disconnect(): Promise<void> {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    isConnected(): boolean {
        return this.db !== null;
    }

    getStoreType(): string {
        return 'sqlite';
    }

    async get(id: string): Promise<ItemRecord | undefined> {
        const db = this.getDb();
        try {
            const row: unknown = db
                .prepare('SELECT id, expires, metadata FROM items WHERE id = ?')
                .get(id);
            return row === undefined ? undefined : this.toRecord(row);
        } catch (error) {
            throw StorageError.readFailed('get', error, { id });
        }
    }

    async insert(record: ItemRecord): Promise<void> {
        const db = this.getDb();
        let changes: number;
        try {
            const result = db
                .prepare(
                    'INSERT INTO items (id, expires, metadata, created_at) VALUES (?, ?, ?, ?) ON CONFLICT(id) DO NOTHING'
                )
                .run(
                    record.id,
                    record.expires.getTime(),
                    JSON.stringify(record.metadata),
                    Date.now()
                );
            changes = result.changes;
        } catch (error) {
            throw StorageError.writeFailed('insert', error, { id: record.id });
        }
        if (changes === 0) {
            throw StorageError.recordAlreadyExists(record.id);
        }
    }

    async delete(id: string): Promise<void> {
        const db = this.getDb();
        let changes: number;
        try {
            changes = db.prepare('DELETE FROM items WHERE id = ?').run(id).changes;
        } catch (error) {
            throw StorageError.deleteFailed('delete', error, { id });
        }
        if (changes === 0) {
            throw StorageError.recordNotFound(id);
        }
    }

    async findExpiredBefore(cutoff: Date): Promise<ItemRecord[]> {
        const db = this.getDb();
        try {
            const rows: unknown[] = db
                .prepare(
                    'SELECT id, expires, metadata FROM items WHERE expires < ? ORDER BY expires ASC'
                )
                .all(cutoff.getTime());
            return rows.map((row) => this.toRecord(row));
        } catch (error) {
            throw StorageError.queryFailed('findExpiredBefore', error, {
                cutoff: cutoff.toISOString(),
            });
        }
    }

    async listIds(): Promise<string[]> {
        const db = this.getDb();
        try {
            const rows: unknown[] = db.prepare('SELECT id FROM items ORDER BY id ASC').all();
            return rows.map((row) => IdRowSchema.parse(row).id);
        } catch (error) {
            throw StorageError.queryFailed('listIds', error);
        }
    }

    private toRecord(row: unknown): ItemRecord {
        const parsed = RecordRowSchema.parse(row);
        return {
            id: parsed.id,
            expires: new Date(parsed.expires),
            metadata: ItemMetadataSchema.parse(JSON.parse(parsed.metadata)),
        };
    }

    private getDb(): BetterSqlite3.Database {
        if (!this.db) {
            throw StorageError.notConnected('SqliteRecordIndex');
        }

        return this.db;
    }
}
