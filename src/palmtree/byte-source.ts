import * as fs from 'node:fs';
import { FileAccessError, FileNotFoundError } from './errors.js';

/**
 * Random-access, read-only bytes. Implementations may return fewer bytes than
 * requested at the end of the source.
 */
export interface ByteSource {
    readonly size: number;
    readonly label: string;
    readAt(position: number, length: number): Uint8Array;
    close(): void;
}

export class BufferByteSource implements ByteSource {
    readonly size: number;

    constructor(private readonly data: Uint8Array, readonly label: string = '<buffer>') {
        this.size = data.length;
    }

    readAt(position: number, length: number): Uint8Array {
        return this.data.subarray(position, Math.min(position + length, this.size));
    }

    close(): void {
        // nothing held
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/** Synchronous file descriptor reads; the caller owns the handle until close(). */
export class FileByteSource implements ByteSource {
    readonly size: number;
    private fd: number | null;

    private constructor(readonly label: string, fd: number, size: number) {
        this.fd = fd;
        this.size = size;
    }

    static open(filePath: string): FileByteSource {
        let fd: number;
        try {
            fd = fs.openSync(filePath, 'r');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                throw new FileNotFoundError(filePath, error);
            }
            throw new FileAccessError(filePath, error);
        }
        try {
            const stat = fs.fstatSync(fd);
            if (!stat.isFile()) throw new Error('not a regular file');
            return new FileByteSource(filePath, fd, stat.size);
        } catch (error) {
            fs.closeSync(fd);
            throw new FileAccessError(filePath, error);
        }
    }

    readAt(position: number, length: number): Uint8Array {
        if (this.fd === null) throw new FileAccessError(this.label, new Error('file already closed'));
        const wanted = Math.max(0, Math.min(length, this.size - position));
        const buffer = Buffer.allocUnsafe(wanted);
        let filled = 0;
        try {
            while (filled < wanted) {
                const n = fs.readSync(this.fd, buffer, filled, wanted - filled, position + filled);
                if (n === 0) break;
                filled += n;
            }
        } catch (error) {
            throw new FileAccessError(this.label, error);
        }
        return new Uint8Array(buffer.buffer, buffer.byteOffset, filled);
    }

    close(): void {
        if (this.fd === null) return;
        const fd = this.fd;
        this.fd = null;
        fs.closeSync(fd);
    }
}
