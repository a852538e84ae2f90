/**
 * Item types shared by the store facade and its backends
 */

import { z } from 'zod';

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/**
 * Caller-defined payload metadata. Opaque to the store, but limited to plain
 * JSON values so every record index returns exactly what was stored.
 */
export type ItemMetadata = { [key: string]: JsonValue };

/**
 * A stored item: the record half of a record+blob pair.
 */
export interface ItemRecord {
    /** Assigned by the store, never by callers */
    id: string;
    /** The item is stale once this instant has passed */
    expires: Date;
    metadata: ItemMetadata;
}

/**
 * Input to `Store.put()`. Any `id` a caller passes along is stripped.
 */
export interface NewItem {
    expires: Date;
    metadata?: ItemMetadata | undefined;
}

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number().finite(),
        z.boolean(),
        z.null(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema),
    ])
);

export const ItemMetadataSchema = z
    .record(JsonValueSchema)
    .describe('Caller-defined item metadata (JSON object)');

export const NewItemSchema = z
    .object({
        expires: z.date({ invalid_type_error: 'expires must be a valid Date' }),
        metadata: ItemMetadataSchema.default({}),
    })
    .describe('Item accepted by Store.put()');
