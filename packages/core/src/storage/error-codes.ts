/**
 * Storage-specific error codes
 * Covers the store facade, the record index and blob storage
 */
export enum StorageErrorCode {
    // Store facade
    ITEM_NOT_FOUND = 'storage_item_not_found',
    ID_ALLOCATION_EXHAUSTED = 'storage_id_allocation_exhausted',
    INVALID_ITEM = 'storage_invalid_item',
    STORE_CLOSED = 'storage_store_closed',
    DIRECTORY_CREATE_FAILED = 'storage_directory_create_failed',

    // Connection
    CONNECTION_FAILED = 'storage_connection_failed',
    DEPENDENCY_NOT_INSTALLED = 'storage_dependency_not_installed',

    // Record index operations
    READ_FAILED = 'storage_read_failed',
    WRITE_FAILED = 'storage_write_failed',
    DELETE_FAILED = 'storage_delete_failed',
    QUERY_FAILED = 'storage_query_failed',
    RECORD_ALREADY_EXISTS = 'storage_record_already_exists',
    RECORD_NOT_FOUND = 'storage_record_not_found',
    MIGRATION_FAILED = 'storage_migration_failed',

    // Blob storage
    BLOB_NOT_FOUND = 'BLOB_NOT_FOUND',
    BLOB_INVALID_REFERENCE = 'BLOB_INVALID_REFERENCE',
    BLOB_INVALID_INPUT = 'BLOB_INVALID_INPUT',
    BLOB_BACKEND_NOT_CONNECTED = 'BLOB_BACKEND_NOT_CONNECTED',
    BLOB_OPERATION_FAILED = 'BLOB_OPERATION_FAILED',
}
