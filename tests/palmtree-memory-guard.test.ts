import { describe, it, expect } from 'vitest';
import { allocateMatrix, decode, AllocationError, MemoryExhaustedError } from '../src/index.js';
import { writePreamble, flatStreams, recordingLogger } from './helpers/run-file-writer.js';

describe('Memory guard', () => {
    it('returns a NaN-filled matrix by default', () => {
        const result = allocateMatrix([2, 3]);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.matrix.rows).toBe(2);
        expect(result.matrix.columns).toBe(3);
        expect(result.matrix.values).toBeInstanceOf(Float64Array);
        expect(Array.from(result.matrix.values).every(Number.isNaN)).toBe(true);
    });

    it('honours the fill value and element type', () => {
        const result = allocateMatrix([1, 2], 7, 'float32');
        if (!result.ok) throw result.error;
        expect(result.matrix.values).toEqual(new Float32Array([7, 7]));
    });

    it('fails without allocating when the probe reports too little memory', () => {
        let probed = 0;
        const result = allocateMatrix([3, 5], Number.NaN, 'float64', { memoryProbe: () => { probed++; return 100; } });

        expect(probed).toBe(1);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(MemoryExhaustedError);
        expect(result.error.bytesNeeded).toBe(120);
        expect(result.error.bytesAvailable).toBe(100);
    });

    it('allocates when the probe reports enough memory', () => {
        const result = allocateMatrix([2, 5], Number.NaN, 'float64', { memoryProbe: () => 100 });
        expect(result.ok).toBe(true);
    });

    it('skips the probe when memory checks are off', () => {
        const result = allocateMatrix([2, 2], 0, 'float64', { checkMemory: false, memoryProbe: () => 0 });
        expect(result.ok).toBe(true);
    });

    it('turns an impossible typed-array length into a failure value', () => {
        const result = allocateMatrix([2 ** 26, 2 ** 26], 0, 'float64', { checkMemory: false });
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.bytesAvailable).toBeNull();
        expect(result.error.originalError).toBeInstanceOf(RangeError);
    });

    it('rejects shapes that are not whole numbers', () => {
        expect(() => allocateMatrix([1.5, 2])).toThrow(RangeError);
        expect(() => allocateMatrix([-1, 2])).toThrow(RangeError);
    });

    it('surfaces exhaustion as AllocationError carrying the scanned header', () => {
        const { logger, lines } = recordingLogger();
        const w = writePreamble({ version: 2, code: 'dat', streams: flatStreams(2) });
        w.u32(1).f64(1).f64(1, 2);

        try {
            decode(w.bytes(), { logger, memoryProbe: () => 8 });
            expect.unreachable('allocation must fail');
        } catch (e) {
            expect(e).toBeInstanceOf(AllocationError);
            if (!(e instanceof AllocationError)) return;
            expect(e.header).toMatchObject({ totalSamples: 1, totalPackages: 1 });
            expect(e.originalError).toBeInstanceOf(MemoryExhaustedError);
        }
        expect(lines).toEqual([{
            level: 'error',
            msg: 'Not enough memory available to create array: 32 bytes needed, 8 available',
        }]);
    });
});
