import { describe, it, expect } from 'vitest';
import { decode, UnsupportedVersionError, TruncatedHeaderError, hasSourceInputTime } from '../src/index.js';
import { writePreamble, flatStreams, ByteWriter } from './helpers/run-file-writer.js';

describe('Palmtree header', () => {
    it('parses a version 3 source preamble', () => {
        const w = writePreamble({
            version: 3,
            code: 'src',
            runStartEpoch: 1_700_000_000_000n,
            fileStartEpoch: 1_700_000_000_500n,
            includesSourceInputTime: true,
            sampleRate: 512,
            numPlaybackStreams: 0,
            streams: [{ dataType: 1, samplesPerPackage: 4 }, { dataType: 2, samplesPerPackage: 4 }],
            numColumns: 2,
            columnNames: ['ch1', 'ch2'],
        });
        const posDataStart = w.length;
        const { header, data, truncated } = decode(w.bytes());

        expect(header).toEqual({
            version: 3,
            fileSize: posDataStart,
            code: 'src',
            kind: 'source',
            runStartEpoch: 1_700_000_000_000n,
            fileStartEpoch: 1_700_000_000_500n,
            includesSourceInputTime: true,
            sampleRate: 512,
            numPlaybackStreams: 0,
            numStreams: 2,
            streams: [{ dataType: 1, samplesPerPackage: 4 }, { dataType: 2, samplesPerPackage: 4 }],
            maxSamplesStream: 4,
            numColumns: 2,
            columnNamesSize: 7,
            columnNames: ['ch1', 'ch2'],
            posDataStart,
            totalSamples: 0,
            totalPackages: 0,
        });
        expect(data?.rows).toBe(0);
        expect(truncated).toBe(false);
    });

    it('treats the file code case-insensitively', () => {
        const { header } = decode(writePreamble({ version: 2, code: 'DaT', streams: flatStreams(1) }).bytes(), { withData: false });
        expect(header.code).toBe('DaT');
        expect(header.kind).toBe('pipeline');
    });

    it('classifies unknown codes as plugin data', () => {
        const { header } = decode(writePreamble({ version: 1, code: 'plg', columnNames: ['a'] }).bytes(), { withData: false });
        expect(header.kind).toBe('plugin');
    });

    describe('gated fields', () => {
        it('has the source input time flag only for version 3 source files', () => {
            const v3src = decode(writePreamble({ version: 3, code: 'src', includesSourceInputTime: false }).bytes()).header;
            const v3dat = decode(writePreamble({ version: 3, code: 'dat' }).bytes()).header;
            const v2src = decode(writePreamble({ version: 2, code: 'src' }).bytes()).header;

            expect('includesSourceInputTime' in v3src).toBe(true);
            expect(hasSourceInputTime(v3src)).toBe(false);
            expect('includesSourceInputTime' in v3dat).toBe(false);
            expect('includesSourceInputTime' in v2src).toBe(false);
        });

        it('leaves epochs and stream details out of version 1 headers', () => {
            const { header } = decode(writePreamble({ version: 1, code: 'src', columnNames: ['id', 'v'] }).bytes(), { withData: false });
            expect('runStartEpoch' in header).toBe(false);
            expect('fileStartEpoch' in header).toBe(false);
            expect('numStreams' in header).toBe(false);
            expect('totalSamples' in header).toBe(false);
        });
    });

    it('rejects unknown versions with the partial header', () => {
        const bytes = new ByteWriter().u32(4).ascii('src').f64(1000).bytes();
        try {
            decode(bytes);
            expect.unreachable('version 4 must be rejected');
        } catch (e) {
            expect(e).toBeInstanceOf(UnsupportedVersionError);
            if (e instanceof UnsupportedVersionError) {
                expect(e.header).toEqual({ fileSize: 15, version: 4 });
                expect(e.message).toBe('Unknown data version 4');
            }
        }
    });

    it('fails on a preamble cut off before the column names', () => {
        const full = writePreamble({ version: 2, code: 'dat', streams: flatStreams(2), columnNames: ['a', 'b'] }).bytes();
        expect(() => decode(full.subarray(0, full.length - 1))).toThrow(TruncatedHeaderError);
    });

    it('splits column names on tabs', () => {
        const { header } = decode(writePreamble({ version: 2, code: 'dat', columnNames: ['Pipeline.in', 'Filter 1.out', ''] }).bytes());
        expect(header.columnNames).toEqual(['Pipeline.in', 'Filter 1.out', '']);
        expect(header.numColumns).toBe(3);
        expect(header.columnNamesSize).toBe(25);
    });
});
