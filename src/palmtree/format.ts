export const SUPPORTED_VERSIONS = [1, 2, 3] as const;
export type FormatVersion = typeof SUPPORTED_VERSIONS[number];

export type FileKind = 'source' | 'pipeline' | 'plugin';

export const KIND_CODES: Partial<Record<string, FileKind>> = {
    src: 'source',
    dat: 'pipeline',
};

export function isSupportedVersion(version: number): version is FormatVersion {
    return version === 1 || version === 2 || version === 3;
}

/** Codes compare case-insensitively; anything unknown is plugin data. */
export function kindFromCode(code: string): FileKind {
    return KIND_CODES[code.toLowerCase()] ?? 'plugin';
}

export const CODE_SIZE = 3;

// Version 1 rows: [sampleId (u32)] [values (f64) x (numColumns - 1)]
// Plugin rows carry no id prefix: [values (f64) x numColumns]
export const ROW_ID_SIZE = 4;
export const FLOAT64_SIZE = 8;

// Package header layouts (versions 2 and 3):
// .src: [packageId (u32)] [elapsed (f64)] [sourceInputTime (f64), v3 + flag only] [numSamples (u16)]
// .dat: [packageId (u32)] [elapsed (f64)]
export const SOURCE_PACKAGE_HEADER_SIZE = 4 + 8 + 2;
export const SOURCE_PACKAGE_HEADER_SIZE_WITH_INPUT_TIME = 4 + 8 + 8 + 2;
export const PIPELINE_PACKAGE_HEADER_SIZE = 4 + 8;

// Chunk header inside a chunked pipeline package: [numStreams (u16)] [numSamples (u16)]
export const CHUNK_HEADER_SIZE = 2 + 2;

/** Leading matrix columns: sample id + elapsed, plus source input time when recorded. */
export const BASE_HEADER_COLUMNS = 2;
export const HEADER_COLUMNS_WITH_INPUT_TIME = 3;

export const COLUMN_PACKAGE_ID = 0;
export const COLUMN_ELAPSED = 1;
export const COLUMN_SOURCE_INPUT_TIME = 2;

export const RUN_FILE_EXTENSIONS: Record<'source' | 'pipeline', string> = {
    source: '.src',
    pipeline: '.dat',
};
