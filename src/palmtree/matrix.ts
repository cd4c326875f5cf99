export type ElementType = 'float64' | 'float32';
export type NumericArray = Float64Array | Float32Array;

export const ELEMENT_BYTES: Record<ElementType, number> = {
    float64: 8,
    float32: 4,
};

/**
 * Row-major 2-D numeric buffer. Rows are samples, columns are the header
 * columns followed by one column per stream.
 */
export class SampleMatrix {
    constructor(
        public readonly rows: number,
        public readonly columns: number,
        public readonly values: NumericArray
    ) {
        if (values.length !== rows * columns) {
            throw new RangeError(`SampleMatrix: ${values.length} values do not fill ${rows}x${columns}`);
        }
    }

    get(row: number, column: number): number {
        return this.values[this.offset(row, column)];
    }

    set(row: number, column: number, value: number): void {
        this.values[this.offset(row, column)] = value;
    }

    /** View of one row; writes go through to the matrix. */
    row(row: number): NumericArray {
        const start = this.offset(row, 0);
        return this.values.subarray(start, start + this.columns);
    }

    /** Copy of one column. */
    column(column: number): Float64Array {
        const out = new Float64Array(this.rows);
        for (let r = 0; r < this.rows; r++) out[r] = this.values[r * this.columns + column];
        return out;
    }

    /** Writes `value` into `column` for rows [rowStart, rowEnd). */
    fillColumn(column: number, rowStart: number, rowEnd: number, value: number): void {
        for (let r = rowStart; r < rowEnd; r++) this.values[this.offset(r, column)] = value;
    }

    /**
     * Writes a flat samples x streams block (sample-major) at (rowStart, columnStart).
     */
    setBlock(rowStart: number, columnStart: number, block: Float64Array, numSamples: number, numStreams: number): void {
        if (block.length !== numSamples * numStreams) {
            throw new RangeError(`SampleMatrix: block of ${block.length} values is not ${numSamples}x${numStreams}`);
        }
        if (numStreams === 0) return;
        for (let s = 0; s < numSamples; s++) {
            const dst = this.offset(rowStart + s, columnStart);
            this.values.set(block.subarray(s * numStreams, (s + 1) * numStreams), dst);
        }
    }

    toArray(): number[][] {
        const out: number[][] = [];
        for (let r = 0; r < this.rows; r++) out.push(Array.from(this.row(r)));
        return out;
    }

    private offset(row: number, column: number): number {
        if (row < 0 || row >= this.rows || column < 0 || column >= this.columns) {
            throw new RangeError(`SampleMatrix: (${row}, ${column}) outside ${this.rows}x${this.columns}`);
        }
        return row * this.columns + column;
    }
}
