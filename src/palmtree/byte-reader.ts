import type { ByteSource } from './byte-source.js';
import { FLOAT64_SIZE } from './format.js';

const WINDOW_SIZE = 64 * 1024;

/**
 * Little-endian cursor over a ByteSource. Reads are served from a read-ahead
 * window so row-by-row decoding does not issue one syscall per field.
 *
 * Reads past the end of the source throw a RangeError; callers check
 * `remaining` first where running out of bytes is an expected condition.
 */
export class ByteReader {
    private pos = 0;
    private window: Uint8Array = new Uint8Array(0);
    private windowStart = 0;

    constructor(private readonly source: ByteSource) { }

    get label(): string {
        return this.source.label;
    }

    get size(): number {
        return this.source.size;
    }

    get position(): number {
        return this.pos;
    }

    get remaining(): number {
        return this.source.size - this.pos;
    }

    /** Whether `length` more bytes are available from the cursor. */
    has(length: number): boolean {
        return this.pos + length <= this.source.size;
    }

    seek(position: number): void {
        if (position < 0 || position > this.source.size) {
            throw new RangeError(`ByteReader: seek to ${position} outside [0, ${this.source.size}]`);
        }
        this.pos = position;
    }

    skip(length: number): void {
        this.seek(this.pos + length);
    }

    readBytes(length: number): Uint8Array {
        const bytes = this.peek(length);
        this.pos += length;
        return bytes;
    }

    readUint8(): number {
        return this.readBytes(1)[0];
    }

    readUint16(): number {
        return this.view(2).getUint16(0, true);
    }

    readUint32(): number {
        return this.view(4).getUint32(0, true);
    }

    readBigUint64(): bigint {
        return this.view(8).getBigUint64(0, true);
    }

    readFloat64(): number {
        return this.view(8).getFloat64(0, true);
    }

    readAscii(length: number): string {
        const bytes = this.readBytes(length);
        let out = '';
        for (let i = 0; i < bytes.length; i++) out += String.fromCharCode(bytes[i]);
        return out;
    }

    /** Decodes `count` consecutive little-endian float64 values into `target` at `offset`. */
    readFloat64Into(target: Float64Array | Float32Array, offset: number, count: number): void {
        if (count === 0) return;
        const bytes = this.readBytes(count * FLOAT64_SIZE);
        const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
        for (let i = 0; i < count; i++) {
            target[offset + i] = view.getFloat64(i * FLOAT64_SIZE, true);
        }
    }

    readFloat64Array(count: number): Float64Array {
        const out = new Float64Array(count);
        this.readFloat64Into(out, 0, count);
        return out;
    }

    private view(length: number): DataView {
        const bytes = this.readBytes(length);
        return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    private peek(length: number): Uint8Array {
        if (!this.has(length)) {
            throw new RangeError(`ByteReader: ${length} byte(s) at ${this.pos} exceed size ${this.source.size}`);
        }
        const rel = this.pos - this.windowStart;
        if (rel >= 0 && rel + length <= this.window.length) {
            return this.window.subarray(rel, rel + length);
        }
        if (length > WINDOW_SIZE) {
            return this.checked(this.source.readAt(this.pos, length), length);
        }
        this.window = this.source.readAt(this.pos, WINDOW_SIZE);
        this.windowStart = this.pos;
        return this.checked(this.window, length).subarray(0, length);
    }

    private checked(bytes: Uint8Array, length: number): Uint8Array {
        if (bytes.length < length) {
            throw new RangeError(`ByteReader: short read of ${bytes.length}/${length} byte(s) at ${this.pos}`);
        }
        return bytes;
    }
}
