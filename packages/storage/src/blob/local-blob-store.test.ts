import path from 'path';
import { promises as fs } from 'fs';
import { Readable } from 'stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageErrorCode } from '@cubby/core';
import { LocalBlobStore } from './local-blob-store.js';
import {
    createMockLogger,
    createTempDir,
    failingStream,
    readAll,
    removeTempDir,
} from '../__fixtures__/test-mocks.js';

describe('LocalBlobStore', () => {
    let dir: string;
    let storePath: string;
    let store: LocalBlobStore;

    beforeEach(async () => {
        dir = await createTempDir();
        storePath = path.join(dir, 'data');
        store = new LocalBlobStore(storePath, createMockLogger());
        await store.connect();
    });

    afterEach(async () => {
        await store.disconnect();
        await removeTempDir(dir);
    });

    it('creates the store directory on connect', async () => {
        const stat = await fs.stat(storePath);

        expect(stat.isDirectory()).toBe(true);
        expect(store.getStoragePath()).toBe(storePath);
    });

    it('writes a file named by the ID and reads it back', async () => {
        const size = await store.write('abc123', Readable.from(['hello ', 'world']));

        expect(size).toBe(11);
        expect(await fs.readFile(path.join(storePath, 'abc123'), 'utf8')).toBe('hello world');
        expect(await readAll(await store.open('abc123'))).toBe('hello world');
    });

    it('accepts buffers and strings', async () => {
        await store.write('buf', Buffer.from([1, 2, 3]));
        await store.write('str', 'plain text');

        expect(await fs.readFile(path.join(storePath, 'buf'))).toEqual(Buffer.from([1, 2, 3]));
        expect(await readAll(await store.open('str'))).toBe('plain text');
    });

    it('removes the partial file when the source fails mid-copy', async () => {
        const source = failingStream(['first chunk'], new Error('disk on fire'));

        await expect(store.write('broken', source)).rejects.toMatchObject({
            code: StorageErrorCode.BLOB_OPERATION_FAILED,
        });
        expect(await store.exists('broken')).toBe(false);
        expect(source.destroyed).toBe(true);
    });

    it('reports a missing blob as not found', async () => {
        await expect(store.open('missing')).rejects.toMatchObject({
            code: StorageErrorCode.BLOB_NOT_FOUND,
        });
    });

    it.each(['', '../etc/passwd', 'a/b', 'a\\b', '..', '.'])('rejects the ID %j', async (id) => {
        await expect(store.open(id)).rejects.toMatchObject({
            code: StorageErrorCode.BLOB_INVALID_REFERENCE,
        });
    });

    it('closes the source stream when the ID is rejected', async () => {
        const source = Readable.from(['data']);

        await expect(store.write('../x', source)).rejects.toMatchObject({
            code: StorageErrorCode.BLOB_INVALID_REFERENCE,
        });
        expect(source.destroyed).toBe(true);
    });

    it('removes blobs and reports when there was nothing to remove', async () => {
        await store.write('abc', 'x');

        expect(await store.remove('abc')).toBe(true);
        expect(await store.remove('abc')).toBe(false);
        expect(await store.exists('abc')).toBe(false);
    });

    it('lists stored IDs sorted', async () => {
        await store.write('b2', 'x');
        await store.write('a1', 'y');
        await fs.mkdir(path.join(storePath, 'subdir'));

        expect(await store.list()).toEqual(['a1', 'b2']);
    });

    it('refuses operations when disconnected', async () => {
        await store.disconnect();

        await expect(store.open('abc')).rejects.toMatchObject({
            code: StorageErrorCode.BLOB_BACKEND_NOT_CONNECTED,
        });
    });
});
