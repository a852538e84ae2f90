import { CubbyBaseError } from './CubbyBaseError.js';
import type { CubbyErrorCode, ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error with a typed code, the scope that raised it and an ErrorType
 * that hosts map to a status. Created through the per-scope factories
 * (`StorageError`, `LoggerError`, `ConfigError`), never ad hoc.
 */
export class CubbyRuntimeError<C = Record<string, unknown>> extends CubbyBaseError {
    readonly code: CubbyErrorCode | string;
    readonly scope: ErrorScope | string;
    readonly type: ErrorType;
    readonly context: C | undefined;

    constructor(
        code: CubbyErrorCode | string,
        scope: ErrorScope | string,
        type: ErrorType,
        message: string,
        context?: C,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.code = code;
        this.scope = scope;
        this.type = type;
        this.context = context;
    }

    toJSON(): Record<string, unknown> {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            ...(this.context !== undefined && { context: this.context }),
        };
    }
}
