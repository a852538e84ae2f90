/**
 * Blob Storage Module
 *
 * One payload per item ID.
 *
 * ## Built-in backends
 * - `LocalBlobStore`: one file per ID under the store's data directory
 * - `MemoryBlobStore`: payloads held in RAM (testing, embedding)
 */

export { LocalBlobStore } from './local-blob-store.js';
export { MemoryBlobStore } from './memory-blob-store.js';
export { assertValidBlobId, blobIdProblem } from './blob-input.js';
