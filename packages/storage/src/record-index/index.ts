/**
 * Record Index Module
 *
 * ## Built-in backends
 * - `in-memory`: records in a Map (testing, embedding)
 * - `sqlite`: records in a local SQLite file through better-sqlite3
 */

export { createRecordIndex } from './factory.js';
export {
    RECORD_INDEX_TYPES,
    DEFAULT_SQLITE_FILE_NAME,
    RecordIndexConfigSchema,
    InMemoryRecordIndexSchema,
    SqliteRecordIndexSchema,
    type RecordIndexType,
    type RecordIndexConfig,
    type RecordIndexConfigInput,
    type InMemoryRecordIndexConfig,
    type SqliteRecordIndexConfig,
} from './schemas.js';
export { MemoryRecordIndex } from './memory-record-index.js';
export { SqliteRecordIndex } from './sqlite-record-index.js';
export type { SqliteRecordIndexOptions } from './sqlite-record-index.js';
