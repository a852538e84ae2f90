import { CubbyRuntimeError } from '../errors/CubbyRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ConfigErrorCode } from './error-codes.js';

/**
 * Configuration error factory
 */
export class ConfigError {
    static envFileLoadFailed(path: string, error: unknown): CubbyRuntimeError {
        return new CubbyRuntimeError(
            ConfigErrorCode.ENV_FILE_LOAD_FAILED,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Failed to load env file: ${path}`,
            { path, originalError: error instanceof Error ? error.message : String(error) },
            { cause: error }
        );
    }
}
