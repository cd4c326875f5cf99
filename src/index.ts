/**
 * Palmtree run data reader
 *
 * Loads source (.src) and pipeline (.dat) recordings into a header and a
 * samples x columns matrix.
 *
 * @module palmtree
 */

import { PalmtreeDecoder } from './palmtree/decode.js';
import { BufferByteSource, FileByteSource } from './palmtree/byte-source.js';
import type { ByteSource } from './palmtree/byte-source.js';
import { resolveRunDataPath } from './palmtree/run-files.js';
import type { RunDataKind } from './palmtree/run-files.js';
import { generateTimeline } from './palmtree/timeline.js';
import type { PalmtreeHeader, PalmtreeReadOptions, ReadResult } from './palmtree/types.js';

export type {
    PalmtreeHeader, HeaderV1, HeaderV2, HeaderV3, PartialHeader, StreamDescriptor,
    ReadResult, PalmtreeReadOptions as ReadOptions, PalmtreeLogger as Logger, MemoryProbe
} from './palmtree/types.js';
export { hasSourceInputTime } from './palmtree/types.js';
export type { FileKind, FormatVersion } from './palmtree/format.js';
export {
    PalmtreeError, FileNotFoundError, FileAccessError, TruncatedHeaderError, UnsupportedVersionError,
    MemoryExhaustedError, AllocationError, TimelineError
} from './palmtree/errors.js';
export { SampleMatrix } from './palmtree/matrix.js';
export type { ElementType, NumericArray } from './palmtree/matrix.js';
export { allocateMatrix, systemMemoryProbe } from './palmtree/memory-guard.js';
export type { AllocationResult, AllocationOptions } from './palmtree/memory-guard.js';
export { generateTimeline, TIMELINE_METHODS } from './palmtree/timeline.js';
export type { TimelineMethod } from './palmtree/timeline.js';
export { resolveRunDataPath } from './palmtree/run-files.js';
export type { RunDataKind } from './palmtree/run-files.js';
export { PalmtreeDecoder } from './palmtree/decode.js';
export type { ByteSource } from './palmtree/byte-source.js';
export { BufferByteSource, FileByteSource } from './palmtree/byte-source.js';

function withSource<T>(source: ByteSource, run: (decoder: PalmtreeDecoder) => T, options?: PalmtreeReadOptions): T {
    try {
        return run(new PalmtreeDecoder(source, options));
    } finally {
        source.close();
    }
}

/**
 * Reads the header of a run data file, including the package totals of
 * version 2 and 3 files. Never allocates the sample matrix.
 */
export function readHeader(filePath: string, options?: Omit<PalmtreeReadOptions, 'withData'>): PalmtreeHeader {
    return withSource(FileByteSource.open(filePath), (d) => d.readHeader(), options);
}

/**
 * Reads a run data file. `data` is null when `withData` is false.
 */
export function read(filePath: string, options?: PalmtreeReadOptions): ReadResult {
    return withSource(FileByteSource.open(filePath), (d) => d.read(), options);
}

/**
 * Decodes run data already held in memory.
 */
export function decode(bytes: Uint8Array, options?: PalmtreeReadOptions): ReadResult {
    return withSource(new BufferByteSource(bytes), (d) => d.read(), options);
}

/**
 * Reads the source (.src) or pipeline (.dat) file of a run, given the path of
 * any of the run's files.
 */
export function readRun(filePath: string, kind: RunDataKind, options?: PalmtreeReadOptions): ReadResult {
    return read(resolveRunDataPath(filePath, kind), options);
}

export const Palmtree = {
    readHeader,
    read,
    decode,
    readRun,
    timeline: generateTimeline,
    Decoder: PalmtreeDecoder,
};

export default Palmtree;
