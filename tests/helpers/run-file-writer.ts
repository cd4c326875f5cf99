import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/** Little-endian byte builder for hand-made run data fixtures. */
export class ByteWriter {
    private readonly chunks: Buffer[] = [];
    private size = 0;

    get length(): number {
        return this.size;
    }

    u8(value: number): this {
        const b = Buffer.alloc(1);
        b.writeUInt8(value);
        return this.push(b);
    }

    u16(value: number): this {
        const b = Buffer.alloc(2);
        b.writeUInt16LE(value);
        return this.push(b);
    }

    u32(value: number): this {
        const b = Buffer.alloc(4);
        b.writeUInt32LE(value);
        return this.push(b);
    }

    u64(value: bigint): this {
        const b = Buffer.alloc(8);
        b.writeBigUInt64LE(value);
        return this.push(b);
    }

    f64(...values: number[]): this {
        for (const value of values) {
            const b = Buffer.alloc(8);
            b.writeDoubleLE(value);
            this.push(b);
        }
        return this;
    }

    ascii(text: string): this {
        return this.push(Buffer.from(text, 'ascii'));
    }

    raw(bytes: Uint8Array): this {
        return this.push(Buffer.from(bytes));
    }

    bytes(): Uint8Array {
        return new Uint8Array(Buffer.concat(this.chunks));
    }

    private push(b: Buffer): this {
        this.chunks.push(b);
        this.size += b.length;
        return this;
    }
}

export interface PreambleSpec {
    version: number;
    code: string;
    runStartEpoch?: bigint;
    fileStartEpoch?: bigint;
    includesSourceInputTime?: boolean;
    sampleRate?: number;
    numPlaybackStreams?: number;
    streams?: { dataType: number; samplesPerPackage: number }[];
    numColumns?: number;
    columnNames?: string[];
}

/** Writes a preamble laid out for the spec's version and code. */
export function writePreamble(spec: PreambleSpec, w: ByteWriter = new ByteWriter()): ByteWriter {
    const packaged = spec.version === 2 || spec.version === 3;
    const streams = spec.streams ?? [];
    const names = (spec.columnNames ?? []).join('\t');

    w.u32(spec.version).ascii(spec.code);
    if (packaged) {
        w.u64(spec.runStartEpoch ?? 0n).u64(spec.fileStartEpoch ?? 0n);
    }
    if (spec.code.toLowerCase() === 'src' && spec.version === 3) {
        w.u8(spec.includesSourceInputTime ? 1 : 0);
    }
    w.f64(spec.sampleRate ?? 1000).u32(spec.numPlaybackStreams ?? 0);
    if (packaged) {
        w.u32(streams.length);
        for (const s of streams) w.u8(s.dataType).u16(s.samplesPerPackage);
    }
    w.u32(spec.numColumns ?? spec.columnNames?.length ?? 0).u32(names.length).ascii(names);
    return w;
}

export function flatStreams(count: number, samplesPerPackage = 1): { dataType: number; samplesPerPackage: number }[] {
    return Array.from({ length: count }, () => ({ dataType: 1, samplesPerPackage }));
}

export function makeTempDir(prefix: string): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFixture(dir: string, name: string, bytes: Uint8Array): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, bytes);
    return filePath;
}

export function recordingLogger() {
    const lines: { level: 'info' | 'warn' | 'error'; msg: string }[] = [];
    return {
        lines,
        logger: {
            info: (msg: string) => { lines.push({ level: 'info', msg }); },
            warn: (msg: string) => { lines.push({ level: 'warn', msg }); },
            error: (msg: string) => { lines.push({ level: 'error', msg }); },
        },
    };
}
