/**
 * Severity, most severe first. A logger set to a level records that level
 * and everything before it in this list.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silly';

/**
 * Part of the store an entry came from
 */
export enum CubbyLogComponent {
    STORE = 'store',
    RECORD_INDEX = 'record_index',
    BLOB = 'blob',
    ID_ALLOCATOR = 'id_allocator',
    REAPER = 'reaper',
    CONFIG = 'config',
}

export type LogContext = Record<string, unknown>;

/**
 * What transports receive for every recorded call
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    /** ISO-8601 */
    timestamp: string;
    component: CubbyLogComponent;
    /** Store name, so hosts running several stores can tell them apart */
    name: string;
    context?: LogContext | undefined;
}

export type Logger = {
    error(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    debug(message: string, context?: LogContext): void;
    /** Engine chatter such as SQL statements */
    silly(message: string, context?: LogContext): void;

    /**
     * Logger for another component, writing to the same transports at the same level
     */
    createChild(component: CubbyLogComponent): Logger;

    /** Flush and close every transport */
    destroy(): Promise<void>;
};

export type LoggerTransport = {
    write(entry: LogEntry): void | Promise<void>;
    destroy?(): void | Promise<void>;
};
