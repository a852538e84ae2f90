/**
 * @cubby/storage
 *
 * The `Store` facade plus its concrete backends, config schemas and helpers.
 *
 * Core keeps only the storage *interfaces* (`RecordIndex`, `BlobStore`) and item types.
 */

export { Store, openStore, DIR_DATABASE, DIR_STORAGE } from './store.js';
export type { StoreDependencies, ReconcileResult, OpenStoreOptions } from './store.js';

export { parseStoreConfig, loadStoreConfigFromEnv } from './config.js';
export type { LoadStoreConfigOptions } from './config.js';

export type { StoreConfig, StoreConfigInput } from './schemas.js';
export {
    StoreConfigSchema,
    RECORD_INDEX_TYPES,
    RecordIndexConfigSchema,
    InMemoryRecordIndexSchema,
    SqliteRecordIndexSchema,
} from './schemas.js';
export type {
    RecordIndexType,
    RecordIndexConfig,
    RecordIndexConfigInput,
    InMemoryRecordIndexConfig,
    SqliteRecordIndexConfig,
} from './schemas.js';

export {
    createRecordIndex,
    MemoryRecordIndex,
    SqliteRecordIndex,
    DEFAULT_SQLITE_FILE_NAME,
} from './record-index/index.js';
export type { SqliteRecordIndexOptions } from './record-index/index.js';

export { LocalBlobStore, MemoryBlobStore, assertValidBlobId, blobIdProblem } from './blob/index.js';

export {
    IdAllocator,
    createIdGenerator,
    ID_ALPHABET,
    DEFAULT_ID_LENGTH,
    MIN_ID_LENGTH,
    MAX_ID_LENGTH,
    DEFAULT_MAX_ID_ATTEMPTS,
} from './id/id-allocator.js';
export type { IdGenerator, IdAllocatorOptions } from './id/id-allocator.js';

export { ExpiryReaper, DEFAULT_CLEANUP_INTERVAL_MS } from './reaper/expiry-reaper.js';
export type { ExpiryReaperOptions } from './reaper/expiry-reaper.js';
