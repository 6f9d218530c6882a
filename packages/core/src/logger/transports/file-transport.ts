/**
 * File Transport
 *
 * Appends JSON lines to a file, rotating by size and keeping a bounded number
 * of rotated files (`fieldkit.log.1`, `fieldkit.log.2`, ...).
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';

export interface FileTransportConfig {
    /** Absolute path to log file */
    path: string;
    /** Max file size in bytes before rotation (default: 5MB) */
    maxSize?: number;
    /** Max number of rotated files to keep (default: 3) */
    maxFiles?: number;
}

async function exists(filePath: string): Promise<boolean> {
    return fs.promises.access(filePath).then(
        () => true,
        () => false
    );
}

export class FileTransport implements LoggerTransport {
    private filePath: string;
    private maxSize: number;
    private maxFiles: number;
    private writeStream: fs.WriteStream | null = null;
    private currentSize: number = 0;
    private rotation: Promise<void> | null = null;
    private pendingLogs: string[] = [];

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 5 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 3;

        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

        if (fs.existsSync(this.filePath)) {
            this.currentSize = fs.statSync(this.filePath).size;
        }

        this.writeStream = this.createWriteStream();
    }

    private createWriteStream(): fs.WriteStream {
        const stream = fs.createWriteStream(this.filePath, { flags: 'a', encoding: 'utf8' });
        stream.on('error', (error) => {
            console.error('FileTransport write stream error:', error);
        });
        return stream;
    }

    write(entry: LogEntry): void {
        const line = JSON.stringify(entry) + '\n';
        const lineSize = Buffer.byteLength(line, 'utf8');

        // Buffer while rotating so nothing is lost
        if (!this.writeStream || this.rotation) {
            this.pendingLogs.push(line);
            return;
        }

        if (this.currentSize + lineSize > this.maxSize) {
            this.pendingLogs.push(line);
            this.startRotation();
            return;
        }

        this.writeStream.write(line);
        this.currentSize += lineSize;
    }

    private startRotation(): void {
        if (this.rotation) {
            return;
        }
        this.rotation = this.rotate()
            .catch((error: unknown) => {
                console.error('FileTransport rotation error:', error);
            })
            .finally(() => {
                this.rotation = null;
                this.flushPendingLogs();
            });
    }

    /**
     * Shift `.1 → .2 → ...`, dropping the oldest, then reopen the base file.
     */
    private async rotate(): Promise<void> {
        const stream = this.writeStream;
        this.writeStream = null;
        if (stream) {
            await new Promise<void>((resolve) => stream.end(() => resolve()));
        }

        const oldestFile = `${this.filePath}.${this.maxFiles}`;
        if (await exists(oldestFile)) {
            await fs.promises.unlink(oldestFile);
        }

        for (let i = this.maxFiles - 1; i >= 1; i--) {
            const oldFile = `${this.filePath}.${i}`;
            if (await exists(oldFile)) {
                await fs.promises.rename(oldFile, `${this.filePath}.${i + 1}`);
            }
        }

        if (await exists(this.filePath)) {
            await fs.promises.rename(this.filePath, `${this.filePath}.1`);
        }

        this.currentSize = 0;
        this.writeStream = this.createWriteStream();
    }

    private flushPendingLogs(): void {
        const pending = this.pendingLogs;
        this.pendingLogs = [];
        for (const line of pending) {
            if (!this.writeStream || this.rotation) {
                this.pendingLogs.push(line);
                continue;
            }
            const lineSize = Buffer.byteLength(line, 'utf8');
            if (this.currentSize + lineSize > this.maxSize && this.currentSize > 0) {
                this.pendingLogs.push(line);
                this.startRotation();
                continue;
            }
            this.writeStream.write(line);
            this.currentSize += lineSize;
        }
    }

    getFilePath(): string {
        return this.filePath;
    }

    async destroy(): Promise<void> {
        if (this.rotation) {
            await this.rotation;
        }
        const stream = this.writeStream;
        this.writeStream = null;
        if (stream) {
            await new Promise<void>((resolve) => stream.end(() => resolve()));
        }
    }
}
