/**
 * Binary Codec
 *
 * Little-endian byte writer/reader plus composable field codecs.
 * Message schemas in `protocol/` are built from these; nothing here knows
 * about message kinds.
 */

import { MalformedMessageError } from '../errors';

const INITIAL_CAPACITY = 64;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Growable little-endian byte writer.
 */
export class BinaryWriter {
    private bytes: Uint8Array;
    private view: DataView;
    private offset: number = 0;

    constructor(initialCapacity: number = INITIAL_CAPACITY) {
        this.bytes = new Uint8Array(initialCapacity);
        this.view = new DataView(this.bytes.buffer);
    }

    get length(): number {
        return this.offset;
    }

    writeU8(value: number): void {
        this.reserve(1);
        this.view.setUint8(this.offset, value);
        this.offset += 1;
    }

    writeU16(value: number): void {
        this.reserve(2);
        this.view.setUint16(this.offset, value, true);
        this.offset += 2;
    }

    writeU32(value: number): void {
        this.reserve(4);
        this.view.setUint32(this.offset, value, true);
        this.offset += 4;
    }

    writeI32(value: number): void {
        this.reserve(4);
        this.view.setInt32(this.offset, value, true);
        this.offset += 4;
    }

    writeF32(value: number): void {
        this.reserve(4);
        this.view.setFloat32(this.offset, value, true);
        this.offset += 4;
    }

    writeBytes(data: Uint8Array): void {
        this.reserve(data.length);
        this.bytes.set(data, this.offset);
        this.offset += data.length;
    }

    /**
     * Copy of the written bytes (the internal buffer keeps growing capacity).
     */
    finish(): Uint8Array {
        return this.bytes.slice(0, this.offset);
    }

    private reserve(count: number): void {
        const required = this.offset + count;
        if (required <= this.bytes.length) return;

        let capacity = this.bytes.length * 2;
        while (capacity < required) capacity *= 2;

        const grown = new Uint8Array(capacity);
        grown.set(this.bytes.subarray(0, this.offset));
        this.bytes = grown;
        this.view = new DataView(grown.buffer);
    }
}

/**
 * Little-endian byte reader. Reading past the end throws MalformedMessageError.
 */
export class BinaryReader {
    private readonly view: DataView;
    private offset: number = 0;

    constructor(private readonly bytes: Uint8Array) {
        this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    get remaining(): number {
        return this.bytes.byteLength - this.offset;
    }

    readU8(): number {
        this.require(1);
        const value = this.view.getUint8(this.offset);
        this.offset += 1;
        return value;
    }

    readU16(): number {
        this.require(2);
        const value = this.view.getUint16(this.offset, true);
        this.offset += 2;
        return value;
    }

    readU32(): number {
        this.require(4);
        const value = this.view.getUint32(this.offset, true);
        this.offset += 4;
        return value;
    }

    readI32(): number {
        this.require(4);
        const value = this.view.getInt32(this.offset, true);
        this.offset += 4;
        return value;
    }

    readF32(): number {
        this.require(4);
        const value = this.view.getFloat32(this.offset, true);
        this.offset += 4;
        return value;
    }

    readBytes(count: number): Uint8Array {
        this.require(count);
        const value = this.bytes.slice(this.offset, this.offset + count);
        this.offset += count;
        return value;
    }

    private require(count: number): void {
        if (this.offset + count > this.bytes.byteLength) {
            throw new MalformedMessageError(
                `Unexpected end of data: need ${count} byte(s) at offset ${this.offset}, ` +
                `have ${this.bytes.byteLength - this.offset}`
            );
        }
    }
}

// ============================================
// Field codecs
// ============================================

export interface FieldCodec<T> {
    /** Short description used in error messages, e.g. 'u8' or 'list<u32>'. */
    readonly kind: string;
    write(writer: BinaryWriter, value: T): void;
    read(reader: BinaryReader): T;
}

export type Infer<C> = C extends FieldCodec<infer T> ? T : never;

export type StructSchema = Record<string, FieldCodec<unknown>>;

export type InferStruct<S extends StructSchema> = { [K in keyof S]: Infer<S[K]> };

function checkInteger(kind: string, value: number, min: number, max: number): void {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new MalformedMessageError(`Value ${value} does not fit ${kind} (${min}..${max})`);
    }
}

function checkNumber(kind: string, value: number): void {
    if (typeof value !== 'number' || Number.isNaN(value)) {
        throw new MalformedMessageError(`Value ${String(value)} is not a valid ${kind}`);
    }
}

function integerCodec(
    kind: string,
    min: number,
    max: number,
    write: (writer: BinaryWriter, value: number) => void,
    read: (reader: BinaryReader) => number
): FieldCodec<number> {
    return {
        kind,
        write(writer, value) {
            checkInteger(kind, value, min, max);
            write(writer, value);
        },
        read
    };
}

export const u8 = integerCodec('u8', 0, 0xff, (w, v) => w.writeU8(v), (r) => r.readU8());
export const u16 = integerCodec('u16', 0, 0xffff, (w, v) => w.writeU16(v), (r) => r.readU16());
export const u32 = integerCodec('u32', 0, 0xffffffff, (w, v) => w.writeU32(v), (r) => r.readU32());
export const i32 = integerCodec('i32', -0x80000000, 0x7fffffff, (w, v) => w.writeI32(v), (r) => r.readI32());

export const f32: FieldCodec<number> = {
    kind: 'f32',
    write(writer, value) {
        checkNumber('f32', value);
        writer.writeF32(value);
    },
    read: (reader) => reader.readF32()
};

/**
 * UTF-8 string with a u16 byte-length prefix.
 */
export const string: FieldCodec<string> = {
    kind: 'string',
    write(writer, value) {
        const encoded = textEncoder.encode(value);
        checkInteger('string length', encoded.length, 0, 0xffff);
        writer.writeU16(encoded.length);
        writer.writeBytes(encoded);
    },
    read(reader) {
        const length = reader.readU16();
        const bytes = reader.readBytes(length);
        try {
            return textDecoder.decode(bytes);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new MalformedMessageError(`Invalid UTF-8 in string field: ${reason}`);
        }
    }
};

/**
 * Variable-length list with a u16 count prefix.
 */
export function list<T>(of: FieldCodec<T>): FieldCodec<T[]> {
    const kind = `list<${of.kind}>`;
    return {
        kind,
        write(writer, values) {
            checkInteger(`${kind} length`, values.length, 0, 0xffff);
            writer.writeU16(values.length);
            for (const value of values) of.write(writer, value);
        },
        read(reader) {
            const count = reader.readU16();
            const values: T[] = [];
            for (let i = 0; i < count; i++) values.push(of.read(reader));
            return values;
        }
    };
}

/**
 * List of exactly `length` items, no count prefix on the wire.
 */
export function fixedList<T>(of: FieldCodec<T>, length: number): FieldCodec<T[]> {
    const kind = `${of.kind}[${length}]`;
    return {
        kind,
        write(writer, values) {
            if (values.length !== length) {
                throw new MalformedMessageError(`${kind} expects ${length} items, got ${values.length}`);
            }
            for (const value of values) of.write(writer, value);
        },
        read(reader) {
            const values: T[] = new Array(length);
            for (let i = 0; i < length; i++) values[i] = of.read(reader);
            return values;
        }
    };
}

/**
 * Nullable value behind a u8 presence flag (0 = null, 1 = present).
 */
export function optional<T>(of: FieldCodec<T>): FieldCodec<T | null> {
    return {
        kind: `${of.kind}?`,
        write(writer, value) {
            if (value === null) {
                writer.writeU8(0);
                return;
            }
            writer.writeU8(1);
            of.write(writer, value);
        },
        read(reader) {
            const flag = reader.readU8();
            if (flag === 0) return null;
            if (flag !== 1) {
                throw new MalformedMessageError(`Invalid presence flag ${flag} for ${of.kind}?`);
            }
            return of.read(reader);
        }
    };
}

/**
 * Fixed, ordered record of fields. Field order is the schema's key order.
 */
export function struct<S extends StructSchema>(schema: S): FieldCodec<InferStruct<S>> {
    const keys = Object.keys(schema);
    return {
        kind: `{${keys.join(',')}}`,
        write(writer, value) {
            const record: Readonly<Record<string, unknown>> = value;
            for (const key of keys) {
                schema[key].write(writer, record[key]);
            }
        },
        read(reader) {
            const out: Record<string, unknown> = {};
            for (const key of keys) {
                out[key] = schema[key].read(reader);
            }
            return out as InferStruct<S>;
        }
    };
}
