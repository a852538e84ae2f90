import { CubbyRuntimeError } from '../errors/CubbyRuntimeError.js';
import { CubbyValidationError } from '../errors/CubbyValidationError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import type { Issue } from '../errors/types.js';
import { StorageErrorCode } from './error-codes.js';

function reasonOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Storage error factory with typed methods for creating storage-specific errors
 * Includes store, record index, and blob storage errors
 * Each method creates a properly typed error with STORAGE scope
 */
export class StorageError {
    // ==================== Store Errors ====================

    /**
     * No live item for this ID (absent, or expired during the call)
     */
    static itemNotFound(id: string): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.ITEM_NOT_FOUND,
            ErrorScope.STORAGE,
            ErrorType.NOT_FOUND,
            `No item found for ID ${id}`,
            { id }
        );
    }

    /**
     * Every drawn ID collided within the retry bound
     */
    static idAllocationExhausted(attempts: number): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.ID_ALLOCATION_EXHAUSTED,
            ErrorScope.STORAGE,
            ErrorType.CONFLICT,
            `Failed to allocate an item ID after ${attempts} attempts`,
            { attempts }
        );
    }

    static invalidItem(issues: Issue[]): CubbyValidationError {
        return new CubbyValidationError(
            issues.map((issue) => ({
                ...issue,
                code: StorageErrorCode.INVALID_ITEM,
                scope: ErrorScope.STORAGE,
            }))
        );
    }

    static storeClosed(method: string): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.STORE_CLOSED,
            ErrorScope.STORAGE,
            ErrorType.USER,
            `Store is closed, cannot call ${method}()`,
            { method }
        );
    }

    static directoryCreateFailed(directory: string, error: unknown): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.DIRECTORY_CREATE_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Cannot create directory ${directory}`,
            { directory, originalError: reasonOf(error) },
            { cause: error }
        );
    }

    // ==================== Record Index Errors ====================

    /**
     * Connection failed error
     */
    static connectionFailed(reason: string, config?: Record<string, unknown>): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.CONNECTION_FAILED,
            ErrorScope.STORAGE,
            ErrorType.THIRD_PARTY,
            `Storage connection failed: ${reason}`,
            { reason, config }
        );
    }

    /**
     * Backend not connected error
     */
    static notConnected(backendType: string): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.CONNECTION_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `${backendType} not connected`,
            { backendType }
        );
    }

    /**
     * Required storage dependency not installed
     */
    static dependencyNotInstalled(
        backendType: string,
        packageName: string,
        installCommand: string
    ): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.DEPENDENCY_NOT_INSTALLED,
            ErrorScope.STORAGE,
            ErrorType.USER,
            `${backendType} record index configured but '${packageName}' package is not installed`,
            {
                backendType,
                packageName,
                hint: `Install with: ${installCommand}`,
                recovery: `Either install the package or change the record index type to 'in-memory'`,
            }
        );
    }

    static readFailed(operation: string, error: unknown, details?: Record<string, unknown>) {
        return new CubbyRuntimeError(
            StorageErrorCode.READ_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Storage read failed for ${operation}: ${reasonOf(error)}`,
            { operation, reason: reasonOf(error), ...details },
            { cause: error }
        );
    }

    static writeFailed(operation: string, error: unknown, details?: Record<string, unknown>) {
        return new CubbyRuntimeError(
            StorageErrorCode.WRITE_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Storage write failed for ${operation}: ${reasonOf(error)}`,
            { operation, reason: reasonOf(error), ...details },
            { cause: error }
        );
    }

    static deleteFailed(operation: string, error: unknown, details?: Record<string, unknown>) {
        return new CubbyRuntimeError(
            StorageErrorCode.DELETE_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Storage delete failed for ${operation}: ${reasonOf(error)}`,
            { operation, reason: reasonOf(error), ...details },
            { cause: error }
        );
    }

    static queryFailed(operation: string, error: unknown, details?: Record<string, unknown>) {
        return new CubbyRuntimeError(
            StorageErrorCode.QUERY_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Storage query failed for ${operation}: ${reasonOf(error)}`,
            { operation, reason: reasonOf(error), ...details },
            { cause: error }
        );
    }

    /**
     * Conditional insert found the key taken
     */
    static recordAlreadyExists(id: string): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.RECORD_ALREADY_EXISTS,
            ErrorScope.STORAGE,
            ErrorType.CONFLICT,
            `A record with ID ${id} already exists`,
            { id }
        );
    }

    /**
     * Delete of a key the index does not hold
     */
    static recordNotFound(id: string): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.RECORD_NOT_FOUND,
            ErrorScope.STORAGE,
            ErrorType.NOT_FOUND,
            `No record with ID ${id}`,
            { id }
        );
    }

    /**
     * Migration failed error
     */
    static migrationFailed(reason: string, details?: Record<string, unknown>) {
        return new CubbyRuntimeError(
            StorageErrorCode.MIGRATION_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Record index migration failed: ${reason}`,
            { reason, ...details }
        );
    }

    // ==================== Blob Storage Errors ====================

    static blobNotFound(reference: string): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.BLOB_NOT_FOUND,
            ErrorScope.STORAGE,
            ErrorType.NOT_FOUND,
            `Blob not found: ${reference}`,
            { reference }
        );
    }

    static blobInvalidReference(reference: string, reason: string): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.BLOB_INVALID_REFERENCE,
            ErrorScope.STORAGE,
            ErrorType.USER,
            `Invalid blob reference '${reference}': ${reason}`,
            { reference, reason }
        );
    }

    static blobInvalidInput(input: unknown, reason: string): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.BLOB_INVALID_INPUT,
            ErrorScope.STORAGE,
            ErrorType.USER,
            `Invalid blob input: ${reason}`,
            { inputType: typeof input, reason }
        );
    }

    static blobBackendNotConnected(backendType: string): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.BLOB_BACKEND_NOT_CONNECTED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Blob backend ${backendType} is not connected`,
            { backendType }
        );
    }

    static blobOperationFailed(
        operation: string,
        backendType: string,
        error: unknown
    ): CubbyRuntimeError {
        return new CubbyRuntimeError(
            StorageErrorCode.BLOB_OPERATION_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Blob ${operation} failed for backend ${backendType}`,
            {
                operation,
                backendType,
                originalError: reasonOf(error),
            },
            { cause: error }
        );
    }
}

/**
 * True for the one storage error callers should treat as routine
 */
export function isItemNotFound(error: unknown): error is CubbyRuntimeError {
    return error instanceof CubbyRuntimeError && error.code === StorageErrorCode.ITEM_NOT_FOUND;
}

export function hasStorageErrorCode(
    error: unknown,
    code: StorageErrorCode
): error is CubbyRuntimeError {
    return error instanceof CubbyRuntimeError && error.code === code;
}
