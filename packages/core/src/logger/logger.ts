/**
 * Cubby Logger
 *
 * Fans structured entries out to every configured transport.
 */

import type {
    CubbyLogComponent,
    LogContext,
    LogEntry,
    Logger,
    LogLevel,
    LoggerTransport,
} from './types.js';

export interface CubbyLoggerConfig {
    /** Least severe level still recorded */
    level: LogLevel;
    component: CubbyLogComponent;
    /** Store name written on every entry */
    name: string;
    transports: LoggerTransport[];
}

const SEVERITY: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
    silly: 4,
};

export class CubbyLogger implements Logger {
    private readonly threshold: number;

    constructor(private readonly config: CubbyLoggerConfig) {
        this.threshold = SEVERITY[config.level];
    }

    error(message: string, context?: LogContext): void {
        this.log('error', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warn', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    silly(message: string, context?: LogContext): void {
        this.log('silly', message, context);
    }

    createChild(component: CubbyLogComponent): CubbyLogger {
        return new CubbyLogger({ ...this.config, component });
    }

    async destroy(): Promise<void> {
        for (const transport of this.config.transports) {
            try {
                await transport.destroy?.();
            } catch (error) {
                console.error('Error destroying transport:', error);
            }
        }
    }

    private log(level: LogLevel, message: string, context: LogContext | undefined): void {
        if (SEVERITY[level] > this.threshold) {
            return;
        }

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.config.component,
            name: this.config.name,
            context,
        };

        // A failing transport must not stop the others
        for (const transport of this.config.transports) {
            try {
                const pending = transport.write(entry);
                if (pending instanceof Promise) {
                    pending.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                console.error('Logger transport error:', error);
            }
        }
    }
}
