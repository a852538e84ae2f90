/**
 * Cubby storage contracts
 *
 * Core keeps only the storage *interfaces* (`RecordIndex`, `BlobStore`), item types and errors.
 * Concrete backends and the `Store` facade live in `@cubby/storage`.
 */

export type { ItemMetadata, ItemRecord, JsonValue, NewItem } from './types.js';
export { ItemMetadataSchema, NewItemSchema } from './types.js';
export type { RecordIndex } from './record-index/types.js';
export type { BlobStore, BlobInput } from './blob/types.js';
export { StorageErrorCode } from './error-codes.js';
export { StorageError, isItemNotFound, hasStorageErrorCode } from './errors.js';
