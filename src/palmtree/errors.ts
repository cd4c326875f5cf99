import type { PalmtreeHeader, PartialHeader } from './types.js';

export class PalmtreeError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'PalmtreeError';
    }
}

export class FileNotFoundError extends PalmtreeError {
    constructor(public readonly path: string, originalError?: unknown) {
        super(`Could not locate file at: '${path}'`, originalError);
        this.name = 'FileNotFoundError';
    }
}

export class FileAccessError extends PalmtreeError {
    constructor(public readonly path: string, originalError?: unknown) {
        super(`Could not access file at: '${path}'`, originalError);
        this.name = 'FileAccessError';
    }
}

/** The preamble ended before all of its fields could be read. */
export class TruncatedHeaderError extends FileAccessError {
    constructor(path: string, public readonly offset: number, public readonly needed: number) {
        super(path);
        this.message = `Header of '${path}' ends at offset ${offset}, ${needed} more byte(s) needed`;
        this.name = 'TruncatedHeaderError';
    }
}

export class UnsupportedVersionError extends PalmtreeError {
    constructor(public readonly header: PartialHeader) {
        super(`Unknown data version ${header.version}`);
        this.name = 'UnsupportedVersionError';
    }
}

export class MemoryExhaustedError extends PalmtreeError {
    constructor(
        public readonly bytesNeeded: number,
        public readonly bytesAvailable: number | null,
        originalError?: unknown
    ) {
        super(
            bytesAvailable === null
                ? `Not enough memory available to create array of ${bytesNeeded} bytes`
                : `Not enough memory available to create array: ${bytesNeeded} bytes needed, ${bytesAvailable} available`,
            originalError
        );
        this.name = 'MemoryExhaustedError';
    }
}

export class AllocationError extends PalmtreeError {
    constructor(public readonly header: PalmtreeHeader, cause: MemoryExhaustedError) {
        super(`Could not allocate sample matrix: ${cause.message}`, cause);
        this.name = 'AllocationError';
    }
}

export class TimelineError extends PalmtreeError {
    constructor(message: string) {
        super(message);
        this.name = 'TimelineError';
    }
}
