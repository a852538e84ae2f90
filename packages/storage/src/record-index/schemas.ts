import { z } from 'zod';

export const RECORD_INDEX_TYPES = ['in-memory', 'sqlite'] as const;
export type RecordIndexType = (typeof RECORD_INDEX_TYPES)[number];

/** Database file created under `<baseDir>/db` unless configured otherwise */
export const DEFAULT_SQLITE_FILE_NAME = 'index.sqlite';

// In-memory record index - nothing to configure
export const InMemoryRecordIndexSchema = z
    .object({
        type: z.literal('in-memory'),
    })
    .strict();

export type InMemoryRecordIndexConfig = z.output<typeof InMemoryRecordIndexSchema>;

// SQLite record index configuration
export const SqliteRecordIndexSchema = z
    .object({
        type: z.literal('sqlite'),
        fileName: z
            .string()
            .min(1)
            .regex(/^[^/\\]+$/, 'fileName must not contain path separators')
            .default(DEFAULT_SQLITE_FILE_NAME)
            .describe('Database file name inside the store database directory'),
        timeout: z
            .number()
            .int()
            .positive()
            .default(5000)
            .describe('Milliseconds to wait on a locked database'),
        verbose: z
            .boolean()
            .default(false)
            .describe('Forward every executed statement to the logger at silly level'),
    })
    .strict();

export type SqliteRecordIndexConfig = z.output<typeof SqliteRecordIndexSchema>;

export const RecordIndexConfigSchema = z
    .discriminatedUnion('type', [InMemoryRecordIndexSchema, SqliteRecordIndexSchema])
    .describe('Record index backend');

export type RecordIndexConfigInput = z.input<typeof RecordIndexConfigSchema>;
export type RecordIndexConfig = z.output<typeof RecordIndexConfigSchema>;
