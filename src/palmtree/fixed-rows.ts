import type { ByteReader } from './byte-reader.js';
import { FLOAT64_SIZE, ROW_ID_SIZE } from './format.js';
import type { FileKind } from './format.js';
import type { HeaderV1 } from './types.js';
import type { SampleMatrix } from './matrix.js';

export interface RowGeometry {
    rowSize: number;
    numRows: number;
}

export function rowSizeFor(kind: FileKind, numColumns: number): number {
    if (kind === 'plugin') return numColumns * FLOAT64_SIZE;
    return ROW_ID_SIZE + (numColumns - 1) * FLOAT64_SIZE;
}

/** A trailing partial row is not counted. */
export function computeRowGeometry(header: HeaderV1): RowGeometry {
    const rowSize = rowSizeFor(header.kind, header.numColumns);
    const numRows = rowSize > 0 ? Math.floor((header.fileSize - header.posDataStart) / rowSize) : 0;
    return { rowSize, numRows: Math.max(0, numRows) };
}

/**
 * Decodes `header.numRows` rows from `posDataStart` into `matrix`
 * (numRows x numColumns). Source and pipeline rows start with a u32 sample id;
 * plugin rows are float64 throughout.
 */
export function decodeFixedRows(reader: ByteReader, header: HeaderV1, matrix: SampleMatrix): void {
    reader.seek(header.posDataStart);
    const { numRows, numColumns } = header;
    const withId = header.kind !== 'plugin';

    for (let r = 0; r < numRows; r++) {
        const row = matrix.row(r);
        if (withId) {
            row[0] = reader.readUint32();
            reader.readFloat64Into(row, 1, numColumns - 1);
        } else {
            reader.readFloat64Into(row, 0, numColumns);
        }
    }
}
