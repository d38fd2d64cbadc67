/**
 * File Transport
 *
 * Appends JSON lines to a log file, rotating it by size.
 * Keeps a configurable number of rotated log files.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';
import { LoggerError } from '../errors.js';

export interface FileTransportConfig {
    /** Absolute path to log file */
    path: string;
    /** Max file size in bytes before rotation (default: 10MB) */
    maxSize?: number;
    /** Max number of rotated files to keep (default: 5) */
    maxFiles?: number;
}

export class FileTransport implements LoggerTransport {
    private filePath: string;
    private maxSize: number;
    private maxFiles: number;
    private writeStream: fs.WriteStream | null = null;
    private currentSize: number = 0;
    /** Set while files are being shifted; lines written meanwhile wait in pendingLogs */
    private rotation: Promise<void> | null = null;
    private pendingLogs: string[] = [];

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 5;

        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
            if (fs.existsSync(this.filePath)) {
                this.currentSize = fs.statSync(this.filePath).size;
            }
        } catch (error) {
            throw LoggerError.transportInitializationFailed(
                'file',
                error instanceof Error ? error.message : String(error),
                { path: this.filePath }
            );
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
        const line = JSON.stringify(entry) + '\n';

        if (!this.writeStream || this.rotation) {
            this.pendingLogs.push(line);
            return;
        }

        if (this.exceedsLimit(line)) {
            this.pendingLogs.push(line);
            this.rotation = this.rotate().finally(() => {
                this.rotation = null;
            });
            return;
        }

        this.append(this.writeStream, line);
    }

    /** A line that alone exceeds the limit still goes into an empty file */
    private exceedsLimit(line: string): boolean {
        return (
            this.currentSize > 0 &&
            this.currentSize + Buffer.byteLength(line, 'utf8') > this.maxSize
        );
    }

    private append(stream: fs.WriteStream, line: string): void {
        stream.write(line);
        this.currentSize += Buffer.byteLength(line, 'utf8');
    }

    /**
     * Shift files until every pending line has been written
     */
    private async rotate(): Promise<void> {
        try {
            do {
                await this.shiftFiles();
            } while (this.flushPendingLogs());
        } catch (error) {
            console.error('FileTransport rotation error:', error);
            if (!this.writeStream) {
                this.createWriteStream();
            }
            const stream = this.writeStream;
            if (stream) {
                for (const line of this.pendingLogs.splice(0)) {
                    this.append(stream, line);
                }
            }
        }
    }

    /**
     * Renames current file to .1, shifts existing rotated files up (.1 -> .2, etc.)
     * and drops the oldest one
     */
    private async shiftFiles(): Promise<void> {
        const stream = this.writeStream;
        if (stream) {
            this.writeStream = null;
            await new Promise<void>((resolve) => {
                stream.end(() => resolve());
            });
        }

        await fs.promises.rm(`${this.filePath}.${this.maxFiles}`, { force: true });

        for (let i = this.maxFiles - 1; i >= 1; i--) {
            await this.renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
        }
        await this.renameIfExists(this.filePath, `${this.filePath}.1`);

        this.currentSize = 0;
        this.createWriteStream();
    }

    private async renameIfExists(from: string, to: string): Promise<void> {
        try {
            await fs.promises.rename(from, to);
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
                throw error;
            }
        }
    }

    /**
     * Write pending lines into the current file
     * @returns whether lines are left that need another rotation
     */
    private flushPendingLogs(): boolean {
        const stream = this.writeStream;
        if (!stream) {
            return false;
        }

        let line = this.pendingLogs.shift();
        while (line !== undefined) {
            if (this.exceedsLimit(line)) {
                this.pendingLogs.unshift(line);
                return true;
            }
            this.append(stream, line);
            line = this.pendingLogs.shift();
        }
        return false;
    }

    getFilePath(): string {
        return this.filePath;
    }

    /**
     * Waits for a running rotation, writes what is still pending and closes the file
     */
    async destroy(): Promise<void> {
        while (this.rotation) {
            await this.rotation;
        }

        const stream = this.writeStream;
        this.writeStream = null;
        if (!stream) {
            return;
        }
        for (const line of this.pendingLogs.splice(0)) {
            stream.write(line);
        }
        await new Promise<void>((resolve) => {
            stream.end(() => resolve());
        });
    }
}
