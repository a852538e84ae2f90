import type { StorageErrorCode } from '../storage/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';
import type { ConfigErrorCode } from '../config/error-codes.js';

/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    STORAGE = 'storage', // Store facade, record index, blob store, reaper
    LOGGER = 'logger', // Logging system operations, transports, and configuration
    CONFIG = 'config', // Configuration parsing, env loading, validation
}

/**
 * Error types that map directly to HTTP status codes
 * Each type represents the nature of the error
 */
export enum ErrorType {
    USER = 'user', // 400 - bad input, config errors, validation failures
    FORBIDDEN = 'forbidden', // 403 - permission denied
    NOT_FOUND = 'not_found', // 404 - item, record or blob doesn't exist
    TIMEOUT = 'timeout', // 408 - operation timed out
    CONFLICT = 'conflict', // 409 - resource conflict, concurrent operation
    SYSTEM = 'system', // 500 - bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // 502 - storage engine or dependency failures
    UNKNOWN = 'unknown', // 500 - unclassified errors, fallback
}

/**
 * Union type for all error codes across domains
 */
export type CubbyErrorCode = StorageErrorCode | LoggerErrorCode | ConfigErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: CubbyErrorCode | string;
    message: string;
    scope: ErrorScope | string; // Domain that generated this issue
    type: ErrorType; // HTTP status mapping
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
