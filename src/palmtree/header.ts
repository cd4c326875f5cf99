import type { ByteReader } from './byte-reader.js';
import { CODE_SIZE, isSupportedVersion, kindFromCode } from './format.js';
import type { FormatVersion } from './format.js';
import { TruncatedHeaderError, UnsupportedVersionError } from './errors.js';
import type { HeaderV1, PackagedPalmtreeHeader, PalmtreeHeader, StreamDescriptor } from './types.js';

function ensure(reader: ByteReader, length: number): void {
    if (!reader.has(length)) {
        throw new TruncatedHeaderError(reader.label, reader.position, length - reader.remaining);
    }
}

/**
 * Parses the preamble from offset 0 and leaves the reader at `posDataStart`.
 *
 * Derived fields (`rowSize`/`numRows` for version 1, scan totals for versions
 * 2 and 3) are initialised to zero here; the row decoder and package scanner
 * fill them in.
 */
export function readPreamble(reader: ByteReader): PalmtreeHeader {
    reader.seek(0);
    const fileSize = reader.size;

    ensure(reader, 4);
    const version = reader.readUint32();
    if (!isSupportedVersion(version)) {
        throw new UnsupportedVersionError({ fileSize, version });
    }

    ensure(reader, CODE_SIZE);
    const code = reader.readAscii(CODE_SIZE);
    const kind = kindFromCode(code);
    const packaged = version !== 1;

    let runStartEpoch = 0n;
    let fileStartEpoch = 0n;
    if (packaged) {
        ensure(reader, 16);
        runStartEpoch = reader.readBigUint64();
        fileStartEpoch = reader.readBigUint64();
    }

    let includesSourceInputTime: boolean | undefined;
    if (kind === 'source' && version === 3) {
        ensure(reader, 1);
        includesSourceInputTime = reader.readUint8() !== 0;
    }

    ensure(reader, 8 + 4);
    const sampleRate = reader.readFloat64();
    const numPlaybackStreams = reader.readUint32();

    const streams: StreamDescriptor[] = [];
    if (packaged) {
        ensure(reader, 4);
        const numStreams = reader.readUint32();
        ensure(reader, numStreams * 3);
        for (let i = 0; i < numStreams; i++) {
            const dataType = reader.readUint8();
            const samplesPerPackage = reader.readUint16();
            streams.push({ dataType, samplesPerPackage });
        }
    }

    ensure(reader, 4 + 4);
    const numColumns = reader.readUint32();
    const columnNamesSize = reader.readUint32();
    ensure(reader, columnNamesSize);
    const columnNames = reader.readAscii(columnNamesSize).split('\t');

    const common = {
        fileSize,
        code,
        kind,
        sampleRate,
        numPlaybackStreams,
        numColumns,
        columnNamesSize,
        columnNames,
        posDataStart: reader.position,
    };

    if (version === 1) {
        const header: HeaderV1 = { version: 1, ...common, rowSize: 0, numRows: 0 };
        return header;
    }

    return buildPackagedHeader(version, common, {
        runStartEpoch,
        fileStartEpoch,
        numStreams: streams.length,
        streams,
        maxSamplesStream: streams.reduce((max, s) => Math.max(max, s.samplesPerPackage), 0),
        totalSamples: 0,
        totalPackages: 0,
    }, includesSourceInputTime);
}

type CommonFields = Omit<HeaderV1, 'version' | 'rowSize' | 'numRows'>;
type PackagedFields = Omit<PackagedPalmtreeHeader, keyof CommonFields | 'version' | 'includesSourceInputTime'>;

function buildPackagedHeader(
    version: Exclude<FormatVersion, 1>,
    common: CommonFields,
    fields: PackagedFields,
    includesSourceInputTime: boolean | undefined
): PackagedPalmtreeHeader {
    if (version === 2) {
        return { version, ...common, ...fields };
    }
    if (common.kind === 'source') {
        return { version, ...common, kind: common.kind, ...fields, includesSourceInputTime: includesSourceInputTime ?? false };
    }
    return { version, ...common, kind: common.kind, ...fields };
}
