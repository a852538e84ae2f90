import { customAlphabet } from 'nanoid';
import type { Logger, RecordIndex } from '@cubby/core';
import { CubbyLogComponent, StorageError } from '@cubby/core';

/**
 * Base58 alphabet: letters and digits without 0, O, I and l.
 * Every symbol is safe in URLs and file names on all platforms.
 */
export const ID_ALPHABET = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';

/** 58^6 ≈ 2^35 */
export const DEFAULT_ID_LENGTH = 6;
export const MIN_ID_LENGTH = 4;
export const MAX_ID_LENGTH = 21;
export const DEFAULT_MAX_ID_ATTEMPTS = 32;

export type IdGenerator = () => string;

export function createIdGenerator(length: number = DEFAULT_ID_LENGTH): IdGenerator {
    if (!Number.isInteger(length) || length < MIN_ID_LENGTH || length > MAX_ID_LENGTH) {
        throw new RangeError(
            `ID length must be an integer between ${MIN_ID_LENGTH} and ${MAX_ID_LENGTH}, got ${length}`
        );
    }
    return customAlphabet(ID_ALPHABET, length);
}

export interface IdAllocatorOptions {
    maxAttempts?: number;
    generate?: IdGenerator;
}

/**
 * Draws random IDs until one is absent from the record index.
 *
 * Only reads the index. A free ID can still be taken by a concurrent insert
 * before the caller writes it, so callers must treat `recordAlreadyExists`
 * on insert as another collision.
 */
export class IdAllocator {
    readonly maxAttempts: number;
    private generate: IdGenerator;
    private logger: Logger;

    constructor(
        private index: RecordIndex,
        logger: Logger,
        options: IdAllocatorOptions = {}
    ) {
        this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ID_ATTEMPTS;
        if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
            throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
        }
        this.generate = options.generate ?? createIdGenerator();
        this.logger = logger.createChild(CubbyLogComponent.ID_ALLOCATOR);
    }

    /**
     * @param attemptsUsed draws already spent by the caller on this allocation
     * @returns the free ID and the total number of draws spent
     */
    async allocate(attemptsUsed = 0): Promise<{ id: string; attempts: number }> {
        let attempts = attemptsUsed;
        while (attempts < this.maxAttempts) {
            attempts++;
            const id = this.generate();
            const existing = await this.index.get(id);
            if (existing === undefined) {
                return { id, attempts };
            }
            this.logger.debug(`ID collision on ${id} (attempt ${attempts}/${this.maxAttempts})`);
        }

        this.logger.warn(`ID allocation exhausted after ${this.maxAttempts} attempts`);
        throw StorageError.idAllocationExhausted(this.maxAttempts);
    }
}
