import * as os from 'node:os';
import { MemoryExhaustedError } from './errors.js';
import { SampleMatrix, ELEMENT_BYTES } from './matrix.js';
import type { ElementType } from './matrix.js';
import type { MemoryProbe } from './types.js';

export type AllocationResult =
    | { ok: true; matrix: SampleMatrix }
    | { ok: false; error: MemoryExhaustedError };

export interface AllocationOptions {
    /** Skip the free-memory check and rely on the typed-array constructor alone. */
    checkMemory?: boolean;
    memoryProbe?: MemoryProbe;
}

export const systemMemoryProbe: MemoryProbe = () => os.freemem();

/**
 * Allocates a fill-initialized rows x columns matrix. Available memory is
 * checked before anything is committed; a shortfall is returned as a failure
 * value instead of being thrown.
 */
export function allocateMatrix(
    shape: readonly [rows: number, columns: number],
    fillValue: number = Number.NaN,
    elementType: ElementType = 'float64',
    options: AllocationOptions = {}
): AllocationResult {
    const [rows, columns] = shape;
    if (!Number.isSafeInteger(rows) || !Number.isSafeInteger(columns) || rows < 0 || columns < 0) {
        throw new RangeError(`allocateMatrix: invalid shape ${rows}x${columns}`);
    }

    const length = rows * columns;
    const bytesNeeded = length * ELEMENT_BYTES[elementType];

    if (options.checkMemory ?? true) {
        const available = (options.memoryProbe ?? systemMemoryProbe)();
        if (available <= bytesNeeded) {
            return { ok: false, error: new MemoryExhaustedError(bytesNeeded, available) };
        }
    }

    try {
        const values = elementType === 'float32' ? new Float32Array(length) : new Float64Array(length);
        values.fill(fillValue);
        return { ok: true, matrix: new SampleMatrix(rows, columns, values) };
    } catch (error) {
        if (error instanceof RangeError) {
            return { ok: false, error: new MemoryExhaustedError(bytesNeeded, null, error) };
        }
        throw error;
    }
}
