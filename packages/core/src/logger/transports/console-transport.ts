import chalk from 'chalk';
import type { LogEntry, LogLevel, LoggerTransport } from '../types.js';

export interface ConsoleTransportConfig {
    colorize?: boolean;
}

const LEVEL_COLOURS: Record<LogLevel, (text: string) => string> = {
    error: chalk.red,
    warn: chalk.yellow,
    info: chalk.cyan,
    debug: chalk.gray,
    silly: chalk.gray,
};

/**
 * One line per entry: local time, level, `component:name`, message.
 * Context follows as indented JSON.
 */
export class ConsoleTransport implements LoggerTransport {
    private readonly colorize: boolean;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
    }

    write(entry: LogEntry): void {
        const text = this.format(entry);
        if (entry.level === 'error' || entry.level === 'warn') {
            console.error(text);
        } else {
            console.log(text);
        }
    }

    format(entry: LogEntry): string {
        const time = new Date(entry.timestamp).toLocaleTimeString();
        const head = `${time} [${entry.level.toUpperCase()}] [${entry.component}:${entry.name}] ${entry.message}`;
        const line = this.colorize ? LEVEL_COLOURS[entry.level](head) : head;

        const { context } = entry;
        if (!context || Object.keys(context).length === 0) {
            return line;
        }
        return `${line}\n${JSON.stringify(context, null, 2)}`;
    }
}
