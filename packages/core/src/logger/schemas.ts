import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'silly'] as const;

export const DEFAULT_LOG_FILE_MAX_SIZE = 10 * 1024 * 1024;
export const DEFAULT_LOG_FILE_MAX_FILES = 5;

export const LoggerTransportSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('silent') }).strict().describe('Discards every entry'),
    z
        .object({
            type: z.literal('console'),
            colorize: z.boolean().default(true).describe('Colour lines by level'),
        })
        .strict()
        .describe('Human-readable lines on stdout, warnings and errors on stderr'),
    z
        .object({
            type: z.literal('file'),
            path: z.string().min(1).describe('Log file, created along with its directory'),
            maxSize: z
                .number()
                .int()
                .positive()
                .default(DEFAULT_LOG_FILE_MAX_SIZE)
                .describe('Bytes written before the file is rotated'),
            maxFiles: z
                .number()
                .int()
                .positive()
                .default(DEFAULT_LOG_FILE_MAX_FILES)
                .describe('Rotated files kept beside the active one'),
        })
        .strict()
        .describe('JSON lines in a size-rotated file'),
]);

export type LoggerTransportConfig = z.output<typeof LoggerTransportSchema>;

export const LoggerConfigSchema = z
    .object({
        level: z.enum(LOG_LEVELS).default('info'),
        transports: z
            .array(LoggerTransportSchema)
            .min(1)
            .default([{ type: 'console', colorize: true }]),
    })
    .strict()
    .describe('Where store logs go and how much of them');

export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;
export type LoggerConfig = z.output<typeof LoggerConfigSchema>;
