/**
 * Base class for every error thrown by cubby packages.
 * Subclasses carry a serializable shape so hosts can forward them as-is.
 */
export abstract class CubbyBaseError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }

    abstract toJSON(): Record<string, unknown>;
}
