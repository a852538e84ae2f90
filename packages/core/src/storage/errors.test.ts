import { describe, expect, it } from 'vitest';
import { StorageError, hasStorageErrorCode, isItemNotFound } from './errors.js';
import { StorageErrorCode } from './error-codes.js';
import { CubbyRuntimeError } from '../errors/CubbyRuntimeError.js';
import { CubbyValidationError } from '../errors/CubbyValidationError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { NewItemSchema } from './types.js';

describe('StorageError', () => {
    it('classifies a missing item as not found', () => {
        const error = StorageError.itemNotFound('k3Xy9Q');

        expect(error.code).toBe(StorageErrorCode.ITEM_NOT_FOUND);
        expect(error.type).toBe(ErrorType.NOT_FOUND);
        expect(error.scope).toBe(ErrorScope.STORAGE);
        expect(error.message).toBe('No item found for ID k3Xy9Q');
        expect(isItemNotFound(error)).toBe(true);
    });

    it('classifies allocation exhaustion as a conflict', () => {
        const error = StorageError.idAllocationExhausted(32);

        expect(error.type).toBe(ErrorType.CONFLICT);
        expect(error.context).toEqual({ attempts: 32 });
        expect(isItemNotFound(error)).toBe(false);
    });

    it('keeps the engine error as cause', () => {
        const cause = new Error('SQLITE_BUSY');
        const error = StorageError.writeFailed('insert', cause, { id: 'abc' });

        expect(error.cause).toBe(cause);
        expect(error.message).toBe('Storage write failed for insert: SQLITE_BUSY');
        expect(error.context).toEqual({ operation: 'insert', reason: 'SQLITE_BUSY', id: 'abc' });
    });

    it('rescopes item validation issues', () => {
        const error = StorageError.invalidItem([
            {
                code: 'schema_validation',
                message: 'expires must be a valid Date',
                scope: ErrorScope.CONFIG,
                type: ErrorType.USER,
                severity: 'error',
                path: ['expires'],
            },
        ]);

        expect(error).toBeInstanceOf(CubbyValidationError);
        expect(error.issues[0]).toMatchObject({
            code: StorageErrorCode.INVALID_ITEM,
            scope: ErrorScope.STORAGE,
            path: ['expires'],
        });
    });

    it('names the method refused by a closed store', () => {
        expect(StorageError.storeClosed('put').message).toBe('Store is closed, cannot call put()');
    });
});

describe('hasStorageErrorCode', () => {
    it('matches only runtime errors with the given code', () => {
        expect(
            hasStorageErrorCode(
                StorageError.recordNotFound('a'),
                StorageErrorCode.RECORD_NOT_FOUND
            )
        ).toBe(true);
        expect(
            hasStorageErrorCode(
                StorageError.recordAlreadyExists('a'),
                StorageErrorCode.RECORD_NOT_FOUND
            )
        ).toBe(false);
        expect(hasStorageErrorCode(new Error('plain'), StorageErrorCode.RECORD_NOT_FOUND)).toBe(
            false
        );
        expect(
            hasStorageErrorCode(
                new CubbyRuntimeError(
                    'storage_record_not_found',
                    ErrorScope.CONFIG,
                    ErrorType.USER,
                    'x'
                ),
                StorageErrorCode.RECORD_NOT_FOUND
            )
        ).toBe(true);
    });
});

describe('NewItemSchema', () => {
    it('strips a caller ID and defaults metadata', () => {
        expect(NewItemSchema.parse({ id: 'ignored', expires: new Date(0) })).toEqual({
            expires: new Date(0),
            metadata: {},
        });
    });

    it('rejects non-Date expiry and non-object metadata', () => {
        expect(NewItemSchema.safeParse({ expires: '2030-01-01' }).success).toBe(false);
        expect(NewItemSchema.safeParse({ expires: new Date(0), metadata: [1] }).success).toBe(
            false
        );
    });

    it('accepts nested JSON metadata', () => {
        const metadata = { name: 'a.txt', size: 3, tags: ['x', null], owner: { admin: false } };
        expect(NewItemSchema.parse({ expires: new Date(0), metadata })).toEqual({
            expires: new Date(0),
            metadata,
        });
    });

    it.each([
        ['a Date', { uploaded: new Date(0) }],
        ['NaN', { size: Number.NaN }],
        ['Infinity', { size: Number.POSITIVE_INFINITY }],
        ['a Set', { tags: new Set(['a']) }],
        ['undefined', { note: undefined }],
        ['a nested Map', { nested: { lookup: new Map() } }],
    ])('rejects metadata holding %s', (_label, metadata) => {
        expect(NewItemSchema.safeParse({ expires: new Date(0), metadata }).success).toBe(false);
    });
});
