import type { ByteReader } from './byte-reader.js';
import {
    BASE_HEADER_COLUMNS, CHUNK_HEADER_SIZE, COLUMN_ELAPSED, COLUMN_PACKAGE_ID, COLUMN_SOURCE_INPUT_TIME,
    FLOAT64_SIZE, HEADER_COLUMNS_WITH_INPUT_TIME, PIPELINE_PACKAGE_HEADER_SIZE, SOURCE_PACKAGE_HEADER_SIZE,
    SOURCE_PACKAGE_HEADER_SIZE_WITH_INPUT_TIME
} from './format.js';
import { PalmtreeError } from './errors.js';
import type { SampleMatrix } from './matrix.js';
import type { PackagedPalmtreeHeader } from './types.js';

export interface PackageLayout {
    kind: 'source' | 'pipeline';
    /** Pipeline packages split into per-stream-group chunks. */
    chunked: boolean;
    includesSourceInputTime: boolean;
    packageHeaderSize: number;
    headerColumns: number;
    numStreams: number;
}

/** Returns null for kinds that have no package layout (plugin data). */
export function resolvePackageLayout(header: PackagedPalmtreeHeader): PackageLayout | null {
    if (header.kind === 'source') {
        const includesSourceInputTime = header.version === 3 && header.includesSourceInputTime;
        return {
            kind: 'source',
            chunked: false,
            includesSourceInputTime,
            packageHeaderSize: includesSourceInputTime ? SOURCE_PACKAGE_HEADER_SIZE_WITH_INPUT_TIME : SOURCE_PACKAGE_HEADER_SIZE,
            headerColumns: includesSourceInputTime ? HEADER_COLUMNS_WITH_INPUT_TIME : BASE_HEADER_COLUMNS,
            numStreams: header.numStreams,
        };
    }
    if (header.kind === 'pipeline') {
        return {
            kind: 'pipeline',
            chunked: header.maxSamplesStream > 1,
            includesSourceInputTime: false,
            packageHeaderSize: PIPELINE_PACKAGE_HEADER_SIZE,
            headerColumns: BASE_HEADER_COLUMNS,
            numStreams: header.numStreams,
        };
    }
    return null;
}

/** A run of streams [streamOffset, streamOffset + numStreams) over numSamples rows. */
export interface ValueBlock {
    streamOffset: number;
    numStreams: number;
    numSamples: number;
    /** Sample-major values, or null when the walk skipped over them. */
    values: Float64Array | null;
}

export interface SamplePackage {
    packageId: number;
    elapsed: number;
    sourceInputTime: number | null;
    /** Rows the package occupies: the widest block's sample count. */
    numSamples: number;
    blocks: ValueBlock[];
}

export interface PackageVisitor {
    /** When false the walk seeks over value bytes instead of decoding them. */
    readonly decodesValues: boolean;
    visit(pkg: SamplePackage): void;
}

export interface WalkResult {
    /** Why the walk stopped before the end of the file, if it did. */
    truncation: string | null;
}

type BodyResult = { blocks: ValueBlock[]; numSamples: number } | { truncation: string };

const TRUNCATED_CHUNK = 'Not all values in the last sample-chunk are written, discarding last sample-chunk and therefore sample-package. Stop reading.';
const TRUNCATED_PACKAGE_STREAMS = 'Not all streams in the last sample-package are written, discarding last sample-package. Stop reading.';
const TRUNCATED_PACKAGE_VALUES = 'Not all values in the last sample-package are written, discarding last sample-package. Stop reading.';

function readValues(reader: ByteReader, count: number, decode: boolean): Float64Array | null {
    if (decode) return reader.readFloat64Array(count);
    reader.skip(count * FLOAT64_SIZE);
    return null;
}

function readChunkedBody(reader: ByteReader, layout: PackageLayout, decode: boolean): BodyResult {
    const blocks: ValueBlock[] = [];
    let streamIndex = 0;
    let numSamples = 0;

    while (streamIndex < layout.numStreams && reader.has(CHUNK_HEADER_SIZE)) {
        const chunkStreams = reader.readUint16();
        const chunkSamples = reader.readUint16();
        const numValues = chunkStreams * chunkSamples;
        if (!reader.has(numValues * FLOAT64_SIZE)) {
            return { truncation: TRUNCATED_CHUNK };
        }
        blocks.push({
            streamOffset: streamIndex,
            numStreams: chunkStreams,
            numSamples: chunkSamples,
            values: readValues(reader, numValues, decode),
        });
        streamIndex += chunkStreams;
        numSamples = Math.max(numSamples, chunkSamples);
    }

    if (streamIndex !== layout.numStreams) {
        return { truncation: TRUNCATED_PACKAGE_STREAMS };
    }
    return { blocks, numSamples };
}

function readFlatBody(reader: ByteReader, layout: PackageLayout, decode: boolean): BodyResult {
    // the source sample count is the last field of the package header
    const numSamples = layout.kind === 'source' ? reader.readUint16() : 1;
    const numValues = layout.numStreams * numSamples;
    if (!reader.has(numValues * FLOAT64_SIZE)) {
        return { truncation: TRUNCATED_PACKAGE_VALUES };
    }
    const values = readValues(reader, numValues, decode);
    return { blocks: [{ streamOffset: 0, numStreams: layout.numStreams, numSamples, values }], numSamples };
}

/**
 * The single package walk shared by both passes. Starts at `posDataStart`
 * regardless of where the reader was left, and hands each complete package to
 * the visitor. A package cut short by the end of the file is never visited and
 * ends the walk.
 */
export function walkPackages(
    reader: ByteReader,
    header: PackagedPalmtreeHeader,
    layout: PackageLayout,
    visitor: PackageVisitor
): WalkResult {
    reader.seek(header.posDataStart);
    const decode = visitor.decodesValues;

    while (reader.has(layout.packageHeaderSize)) {
        const packageId = reader.readUint32();
        const elapsed = reader.readFloat64();
        const sourceInputTime = layout.includesSourceInputTime ? reader.readFloat64() : null;

        const body = layout.chunked ? readChunkedBody(reader, layout, decode) : readFlatBody(reader, layout, decode);
        if ('truncation' in body) {
            return { truncation: body.truncation };
        }
        visitor.visit({ packageId, elapsed, sourceInputTime, numSamples: body.numSamples, blocks: body.blocks });
    }
    return { truncation: null };
}

/** Pass 1: totals only. */
export class CountingVisitor implements PackageVisitor {
    readonly decodesValues = false;
    totalSamples = 0;
    totalPackages = 0;

    visit(pkg: SamplePackage): void {
        this.totalSamples += pkg.numSamples;
        this.totalPackages += 1;
    }
}

/** Pass 2: writes into a matrix sized from pass 1's totals. */
export class MaterializingVisitor implements PackageVisitor {
    readonly decodesValues = true;
    private rowIndex = 0;

    constructor(private readonly matrix: SampleMatrix, private readonly layout: PackageLayout) { }

    get rowsWritten(): number {
        return this.rowIndex;
    }

    visit(pkg: SamplePackage): void {
        const start = this.rowIndex;
        const end = start + pkg.numSamples;
        if (end > this.matrix.rows) {
            throw new PalmtreeError(`Package ${pkg.packageId} needs rows up to ${end}, matrix has ${this.matrix.rows}`);
        }

        this.matrix.fillColumn(COLUMN_PACKAGE_ID, start, end, pkg.packageId);
        this.matrix.fillColumn(COLUMN_ELAPSED, start, end, pkg.elapsed);
        if (pkg.sourceInputTime !== null) {
            this.matrix.fillColumn(COLUMN_SOURCE_INPUT_TIME, start, end, pkg.sourceInputTime);
        }

        for (const block of pkg.blocks) {
            if (block.values === null) {
                throw new PalmtreeError(`Package ${pkg.packageId} was walked without decoding its values`);
            }
            this.matrix.setBlock(start, this.layout.headerColumns + block.streamOffset, block.values, block.numSamples, block.numStreams);
        }
        this.rowIndex = end;
    }
}

export interface ScanResult {
    totalSamples: number;
    totalPackages: number;
    truncation: string | null;
}

export function scanPackages(reader: ByteReader, header: PackagedPalmtreeHeader, layout: PackageLayout): ScanResult {
    const counter = new CountingVisitor();
    const { truncation } = walkPackages(reader, header, layout, counter);
    return { totalSamples: counter.totalSamples, totalPackages: counter.totalPackages, truncation };
}

/** Returns the number of rows written; equals the scanned total for an unchanged file. */
export function materializePackages(
    reader: ByteReader,
    header: PackagedPalmtreeHeader,
    layout: PackageLayout,
    matrix: SampleMatrix
): number {
    const writer = new MaterializingVisitor(matrix, layout);
    walkPackages(reader, header, layout, writer);
    return writer.rowsWritten;
}
