import { Readable } from 'stream';
import type { BlobInput } from '@cubby/core';
import { StorageError } from '@cubby/core';

/**
 * Blob IDs double as file names, so anything that could escape the store directory is refused.
 * @returns why `id` is unusable, or undefined when it is fine
 */
export function blobIdProblem(id: string): string | undefined {
    if (id.length === 0) return 'empty ID';
    if (id.includes('/') || id.includes('\\')) return 'ID contains a path separator';
    if (id === '.') return 'ID names the store directory itself';
    if (id.includes('..')) return "ID contains '..'";
    if (id.includes('\0')) return 'ID contains a NUL byte';
    return undefined;
}

export function assertValidBlobId(id: string): void {
    const problem = blobIdProblem(id);
    if (problem) {
        throw StorageError.blobInvalidReference(id, problem);
    }
}

export function toReadable(input: BlobInput): Readable {
    if (input instanceof Readable) {
        return input;
    }
    if (typeof input === 'string') {
        return Readable.from([Buffer.from(input, 'utf8')]);
    }
    return Readable.from([Buffer.from(input)]);
}

/**
 * Release a caller's stream that will never be consumed
 */
export function closeBlobInput(input: BlobInput): void {
    if (input instanceof Readable && !input.destroyed) {
        input.destroy();
    }
}

export async function readBlobInput(input: BlobInput): Promise<Buffer> {
    if (!(input instanceof Readable)) {
        return typeof input === 'string' ? Buffer.from(input, 'utf8') : Buffer.from(input);
    }

    const chunks: Buffer[] = [];
    for await (const chunk of input) {
        if (typeof chunk === 'string') {
            chunks.push(Buffer.from(chunk, 'utf8'));
        } else if (chunk instanceof Uint8Array) {
            chunks.push(Buffer.from(chunk));
        } else {
            input.destroy();
            throw StorageError.blobInvalidInput(chunk, 'stream produced a non-binary chunk');
        }
    }
    return Buffer.concat(chunks);
}
