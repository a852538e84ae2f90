/**
 * File Transport
 *
 * Logs to a file with automatic rotation based on file size.
 * Keeps a configurable number of rotated log files.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';

export interface FileTransportConfig {
    /** Absolute path to log file */
    path: string;
    /** Max file size in bytes before rotation (default: 10MB) */
    maxSize?: number;
    /** Max number of rotated files to keep (default: 5) */
    maxFiles?: number;
}

/**
 * File transport with size-based rotation
 */
export class FileTransport implements LoggerTransport {
    private filePath: string;
    private maxSize: number;
    private maxFiles: number;
    private writeStream: fs.WriteStream | null = null;
    private currentSize: number = 0;
    private isRotating: boolean = false;
    private pendingLogs: string[] = [];

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024; // 10MB default
        this.maxFiles = config.maxFiles ?? 5;

        const dir = path.dirname(this.filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }

        if (fs.existsSync(this.filePath)) {
            this.currentSize = fs.statSync(this.filePath).size;
        }

        this.createWriteStream();
    }

    private createWriteStream(): void {
        this.writeStream = fs.createWriteStream(this.filePath, {
            flags: 'a',
            encoding: 'utf8',
        });

        this.writeStream.on('error', (error) => {
            console.error('FileTransport write stream error:', error);
        });
    }

    write(entry: LogEntry): void {
        // One JSON document per line
        const line = JSON.stringify(entry) + '\n';
        const lineSize = Buffer.byteLength(line, 'utf8');

        // Buffer logs if not ready or rotating (prevents log loss)
        if (!this.writeStream || this.isRotating) {
            this.pendingLogs.push(line);
            return;
        }

        if (this.currentSize + lineSize > this.maxSize) {
            this.pendingLogs.push(line);
            void this.rotate(); // logs are buffered until rotation finishes
            return;
        }

        this.writeStream.write(line);
        this.currentSize += lineSize;
    }

    /**
     * Renames current file to .1, shifts existing rotated files up (.1 -> .2, etc.)
     * and drops the oldest, then flushes buffered logs
     */
    private async rotate(): Promise<void> {
        if (this.isRotating) {
            return;
        }

        this.isRotating = true;

        try {
            const stream = this.writeStream;
            if (stream) {
                await new Promise<void>((resolve) => {
                    stream.end(() => resolve());
                });
                this.writeStream = null;
            }

            await fs.promises.rm(`${this.filePath}.${this.maxFiles}`, { force: true });

            for (let i = this.maxFiles - 1; i >= 1; i--) {
                await this.renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
            }
            await this.renameIfExists(this.filePath, `${this.filePath}.1`);

            this.currentSize = 0;
            this.createWriteStream();
        } catch (error) {
            console.error('FileTransport rotation error:', error);
        } finally {
            this.isRotating = false;
        }

        await this.flushPendingLogs();
    }

    private async renameIfExists(from: string, to: string): Promise<void> {
        try {
            await fs.promises.rename(from, to);
        } catch (error) {
            if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
                throw error;
            }
        }
    }

    /**
     * Flush buffered logs to the write stream
     */
    private async flushPendingLogs(): Promise<void> {
        let line = this.pendingLogs.shift();
        while (line !== undefined && this.writeStream) {
            const lineSize = Buffer.byteLength(line, 'utf8');

            if (this.currentSize + lineSize > this.maxSize && this.currentSize > 0) {
                this.pendingLogs.unshift(line);
                await this.rotate();
                return;
            }

            this.writeStream.write(line);
            this.currentSize += lineSize;
            line = this.pendingLogs.shift();
        }
        if (line !== undefined) {
            this.pendingLogs.unshift(line);
        }
    }

    /**
     * Resolves once buffered data is flushed to disk
     */
    async destroy(): Promise<void> {
        const stream = this.writeStream;
        this.writeStream = null;
        if (stream) {
            await new Promise<void>((resolve) => {
                stream.end(() => resolve());
            });
        }
    }
}
