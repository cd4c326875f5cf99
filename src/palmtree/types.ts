import type { FileKind } from './format.js';
import type { SampleMatrix, ElementType } from './matrix.js';

export type PalmtreeLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export interface StreamDescriptor {
    dataType: number;
    samplesPerPackage: number;
}

interface HeaderCommon {
    fileSize: number;
    /** Raw three-character file code as stored. */
    code: string;
    kind: FileKind;
    sampleRate: number;
    numPlaybackStreams: number;
    numColumns: number;
    columnNamesSize: number;
    columnNames: string[];
    /** Byte offset of the first row or package. */
    posDataStart: number;
}

export interface HeaderV1 extends HeaderCommon {
    version: 1;
    rowSize: number;
    numRows: number;
}

interface PackagedHeader extends HeaderCommon {
    runStartEpoch: bigint;
    fileStartEpoch: bigint;
    numStreams: number;
    streams: StreamDescriptor[];
    maxSamplesStream: number;
    totalSamples: number;
    totalPackages: number;
}

export interface HeaderV2 extends PackagedHeader {
    version: 2;
}

/**
 * `includesSourceInputTime` is only stored in version 3 source files; for every
 * other kind the key is absent.
 */
export type HeaderV3 = PackagedHeader & { version: 3 } & (
    | { kind: 'source'; includesSourceInputTime: boolean }
    | { kind: 'pipeline' | 'plugin' }
);

export type PalmtreeHeader = HeaderV1 | HeaderV2 | HeaderV3;
export type PackagedPalmtreeHeader = HeaderV2 | HeaderV3;

/** What is known when the version tag turns out to be unsupported. */
export interface PartialHeader {
    fileSize: number;
    version: number;
}

export interface ReadResult {
    header: PalmtreeHeader;
    /** Null when only the header was requested. */
    data: SampleMatrix | null;
    /** True when trailing package data was cut short and discarded. */
    truncated: boolean;
}

/** Returns the number of bytes currently available for a new allocation. */
export type MemoryProbe = () => number;

export type PalmtreeReadOptions = {
    /** Materialize the sample matrix. When false only the header (with scan totals) is returned. Default true. */
    withData?: boolean;
    /** Optional logger hook. Defaults to the package logger. */
    logger?: PalmtreeLogger | null;
    /** Check available memory before allocating the matrix. Default true unless PALMTREE_CHECK_MEMORY=off. */
    checkMemory?: boolean;
    /** Value of cells no package writes. Default NaN. */
    fillValue?: number;
    elementType?: ElementType;
    memoryProbe?: MemoryProbe;
};

export function hasSourceInputTime(header: PalmtreeHeader): boolean {
    return header.version === 3 && header.kind === 'source' && header.includesSourceInputTime;
}
