import { join } from 'path';
import type { Logger, RecordIndex } from '@cubby/core';
import { MemoryRecordIndex } from './memory-record-index.js';
import { SqliteRecordIndex } from './sqlite-record-index.js';
import type { RecordIndexConfig } from './schemas.js';

/**
 * Create a record index from validated configuration.
 *
 * better-sqlite3 is only loaded when a SQLite index connects.
 *
 * @param config - Record index configuration with a 'type' discriminator
 * @param databaseDir - Directory holding the index files (`<baseDir>/db`)
 *
 * @example
 * ```typescript
 * const index = createRecordIndex({ type: 'sqlite', fileName: 'index.sqlite', timeout: 5000, verbose: false }, '/srv/cubby/db', logger);
 * await index.connect();
 * ```
 */
export function createRecordIndex(
    config: RecordIndexConfig,
    databaseDir: string,
    logger: Logger
): RecordIndex {
    switch (config.type) {
        case 'in-memory':
            logger.info('Using in-memory record index');
            return new MemoryRecordIndex();
        case 'sqlite': {
            logger.info('Using SQLite record index');
            return new SqliteRecordIndex(
                {
                    path: join(databaseDir, config.fileName),
                    timeout: config.timeout,
                    verbose: config.verbose,
                },
                logger
            );
        }
    }
}
