import dotenv from 'dotenv';
import {
    ConfigError,
    ErrorScope,
    fail,
    ok,
    parseBooleanEnvValue,
    readIntegerEnv,
    zodToIssues,
} from '@cubby/core';
import type { Result } from '@cubby/core';
import { StoreConfigSchema, type StoreConfig } from './schemas.js';

type Env = Record<string, string | undefined>;

/**
 * Validate raw store configuration and apply defaults.
 *
 * @example
 * ```typescript
 * const config = ensureOk(parseStoreConfig({ baseDir: './data' }));
 * ```
 */
export function parseStoreConfig(input: unknown): Result<StoreConfig> {
    const parsed = StoreConfigSchema.safeParse(input);
    if (!parsed.success) {
        return fail(zodToIssues(parsed.error, 'error', ErrorScope.CONFIG));
    }
    return ok(parsed.data);
}

export interface LoadStoreConfigOptions {
    /** `.env` file to read. Variables already present in `env` take precedence. */
    envFile?: string;
}

/**
 * Build store configuration from `CUBBY_*` environment variables.
 *
 * | Variable                    | Field               |
 * |-----------------------------|---------------------|
 * | `CUBBY_BASE_DIR`            | `baseDir`           |
 * | `CUBBY_AUTO_CLEANUP`        | `autoCleanup`       |
 * | `CUBBY_CLEANUP_INTERVAL_MS` | `cleanupIntervalMs` |
 * | `CUBBY_MAX_ID_ATTEMPTS`     | `maxIdAttempts`     |
 * | `CUBBY_ID_LENGTH`           | `idLength`          |
 * | `CUBBY_RECORD_INDEX`        | `recordIndex.type`  |
 * | `CUBBY_LOG_LEVEL`           | `logger.level`      |
 * | `CUBBY_LOG_FILE`            | adds a file transport |
 *
 * Unset variables fall back to schema defaults. Malformed values are reported as issues.
 *
 * @throws ConfigError.envFileLoadFailed when `envFile` cannot be read
 */
export function loadStoreConfigFromEnv(
    env: Env = process.env,
    options: LoadStoreConfigOptions = {}
): Result<StoreConfig> {
    const vars: Env = {};

    if (options.envFile) {
        const fileResult = dotenv.config({ path: options.envFile, processEnv: {} });
        if (fileResult.error) {
            throw ConfigError.envFileLoadFailed(options.envFile, fileResult.error);
        }
        Object.assign(vars, fileResult.parsed);
    }

    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value !== '') {
            vars[key] = value;
        }
    }

    // Unparseable values go through as raw strings so the schema names the field
    const booleanVar = (name: string): boolean | string | undefined => {
        const raw = vars[name];
        if (raw === undefined) return undefined;
        return parseBooleanEnvValue(raw) ?? raw;
    };
    const integerVar = (name: string): number | string | undefined => {
        const raw = vars[name];
        if (raw === undefined) return undefined;
        return readIntegerEnv(name, vars) ?? raw;
    };

    const recordIndexType = vars['CUBBY_RECORD_INDEX'];
    const logLevel = vars['CUBBY_LOG_LEVEL'];
    const logFile = vars['CUBBY_LOG_FILE'];

    return parseStoreConfig({
        baseDir: vars['CUBBY_BASE_DIR'],
        autoCleanup: booleanVar('CUBBY_AUTO_CLEANUP'),
        cleanupIntervalMs: integerVar('CUBBY_CLEANUP_INTERVAL_MS'),
        maxIdAttempts: integerVar('CUBBY_MAX_ID_ATTEMPTS'),
        idLength: integerVar('CUBBY_ID_LENGTH'),
        recordIndex: recordIndexType ? { type: recordIndexType } : undefined,
        logger:
            logLevel || logFile
                ? {
                      level: logLevel,
                      transports: [
                          { type: 'console' },
                          ...(logFile ? [{ type: 'file', path: logFile }] : []),
                      ],
                  }
                : undefined,
    });
}
