import { ByteReader } from './byte-reader.js';
import type { ByteSource } from './byte-source.js';
import { readPreamble } from './header.js';
import { computeRowGeometry, decodeFixedRows } from './fixed-rows.js';
import { resolvePackageLayout, scanPackages, materializePackages } from './packages.js';
import type { PackageLayout } from './packages.js';
import { allocateMatrix, systemMemoryProbe } from './memory-guard.js';
import { AllocationError, PalmtreeError } from './errors.js';
import type { SampleMatrix } from './matrix.js';
import type {
    HeaderV1, PackagedPalmtreeHeader, PalmtreeHeader, PalmtreeLogger, PalmtreeReadOptions, ReadResult
} from './types.js';
import { defaultLogger } from '../logger.js';

function memoryCheckDefault(): boolean {
    const mode = process.env.PALMTREE_CHECK_MEMORY || 'on';
    return mode !== 'off';
}

/**
 * Decodes one Palmtree run data file. The decoder reads from the source but
 * never closes it; whoever opened the source closes it.
 */
export class PalmtreeDecoder {
    private readonly reader: ByteReader;
    private readonly options: Required<PalmtreeReadOptions>;
    private readonly log: PalmtreeLogger;

    constructor(source: ByteSource, options: PalmtreeReadOptions = {}) {
        this.reader = new ByteReader(source);
        const defaults: Required<PalmtreeReadOptions> = {
            withData: true,
            logger: null,
            checkMemory: memoryCheckDefault(),
            fillValue: Number.NaN,
            elementType: 'float64',
            memoryProbe: systemMemoryProbe,
        };
        this.options = { ...defaults, ...options };
        this.log = this.options.logger ?? defaultLogger;
    }

    /**
     * Reads the header and, for versions 2 and 3, runs the counting pass so the
     * scan totals are filled in. Never allocates the sample matrix.
     */
    readHeader(): PalmtreeHeader {
        return this.decode(false).header;
    }

    read(): ReadResult {
        return this.decode(this.options.withData);
    }

    private decode(withData: boolean): ReadResult {
        const header = readPreamble(this.reader);
        if (header.version === 1) {
            return this.decodeFixedRowFile(header, withData);
        }
        return this.decodePackagedFile(header, withData);
    }

    private decodeFixedRowFile(header: HeaderV1, withData: boolean): ReadResult {
        const { rowSize, numRows } = computeRowGeometry(header);
        header.rowSize = rowSize;
        header.numRows = numRows;
        if (!withData) return { header, data: null, truncated: false };

        const matrix = this.allocate(header, numRows, header.numColumns);
        decodeFixedRows(this.reader, header, matrix);
        return { header, data: matrix, truncated: false };
    }

    private decodePackagedFile(header: PackagedPalmtreeHeader, withData: boolean): ReadResult {
        const layout = resolvePackageLayout(header);
        if (layout === null) {
            // plugin data has no package layout; the header stands with zero totals
            this.log.error?.(`Could not determine package header size for '${header.code}' data, not reading data`);
            return { header, data: null, truncated: false };
        }

        // pass 1
        const scan = scanPackages(this.reader, header, layout);
        header.totalSamples = scan.totalSamples;
        header.totalPackages = scan.totalPackages;
        if (scan.truncation !== null) {
            this.log.warn?.(scan.truncation);
        }
        const truncated = scan.truncation !== null;
        if (!withData) return { header, data: null, truncated };

        // pass 2
        const matrix = this.allocate(header, header.totalSamples, layout.headerColumns + layout.numStreams);
        this.materialize(header, layout, matrix);
        return { header, data: matrix, truncated };
    }

    private materialize(header: PackagedPalmtreeHeader, layout: PackageLayout, matrix: SampleMatrix): void {
        const rows = materializePackages(this.reader, header, layout, matrix);
        if (rows !== header.totalSamples) {
            throw new PalmtreeError(`Data pass filled ${rows} rows, header pass counted ${header.totalSamples}`);
        }
    }

    private allocate(header: PalmtreeHeader, rows: number, columns: number): SampleMatrix {
        const result = allocateMatrix([rows, columns], this.options.fillValue, this.options.elementType, {
            checkMemory: this.options.checkMemory,
            memoryProbe: this.options.memoryProbe,
        });
        if (!result.ok) {
            this.log.error?.(result.error.message);
            throw new AllocationError(header, result.error);
        }
        return result.matrix;
    }
}
