import { z } from 'zod';
import { LoggerConfigSchema } from '@cubby/core';
import { RecordIndexConfigSchema } from './record-index/schemas.js';
import {
    DEFAULT_ID_LENGTH,
    DEFAULT_MAX_ID_ATTEMPTS,
    MAX_ID_LENGTH,
    MIN_ID_LENGTH,
} from './id/id-allocator.js';
import { DEFAULT_CLEANUP_INTERVAL_MS } from './reaper/expiry-reaper.js';

export {
    RECORD_INDEX_TYPES,
    RecordIndexConfigSchema,
    InMemoryRecordIndexSchema,
    SqliteRecordIndexSchema,
    type RecordIndexType,
    type RecordIndexConfig,
    type RecordIndexConfigInput,
    type InMemoryRecordIndexConfig,
    type SqliteRecordIndexConfig,
} from './record-index/schemas.js';

/**
 * Top-level store configuration schema
 */
export const StoreConfigSchema = z
    .object({
        baseDir: z
            .string()
            .min(1)
            .describe('Root directory; records go to <baseDir>/db, payloads to <baseDir>/data'),
        autoCleanup: z
            .boolean()
            .default(true)
            .describe('Delete expired items on read and run the background reaper'),
        cleanupIntervalMs: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_CLEANUP_INTERVAL_MS)
            .describe('Pause between background sweeps'),
        maxIdAttempts: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_MAX_ID_ATTEMPTS)
            .describe('ID draws allowed per put before giving up'),
        idLength: z
            .number()
            .int()
            .min(MIN_ID_LENGTH)
            .max(MAX_ID_LENGTH)
            .default(DEFAULT_ID_LENGTH)
            .describe('Symbols per generated item ID'),
        reconcileOnOpen: z
            .boolean()
            .default(true)
            .describe('Remove orphan blobs and dangling records when the store opens'),
        recordIndex: RecordIndexConfigSchema.default({ type: 'sqlite' }),
        logger: LoggerConfigSchema.default({}),
    })
    .strict()
    .describe('Store configuration');

export type StoreConfigInput = z.input<typeof StoreConfigSchema>;
export type StoreConfig = z.output<typeof StoreConfigSchema>;
