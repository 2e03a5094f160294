export type Endianness = 'big' | 'little';

export type IntegerBits = 8 | 16 | 32;

export type FloatBits = 32 | 64;

/** Parameters of a fixed-width numeric encoding. */
export type NumericFormat =
  | { kind: 'integer'; bits: IntegerBits; signed: boolean; endian: Endianness }
  | { kind: 'bigint'; signed: boolean; endian: Endianness }
  | { kind: 'float'; bits: FloatBits; endian: Endianness };

interface Accessors<V> {
  get(view: DataView, littleEndian: boolean): V;
  set(view: DataView, value: V, littleEndian: boolean): void;
}

/**
 * Fixed-width numeric codec, parametrized by kind, width, signedness and
 * endianness. Integers up to 32 bits and floats decode to `number`;
 * 64-bit integers decode to `bigint`.
 * @template V The TypeScript type this codec encodes/decodes.
 */
export class NumericCodec<V extends number | bigint> {
  /** Stable identifier such as 'uint16le' or 'float64be'. */
  readonly tag: string;
  /** Encoded size in bytes. */
  readonly byteSize: number;
  readonly format: NumericFormat;
  private readonly accessors: Accessors<V>;
  private readonly min: V | undefined;
  private readonly max: V | undefined;

  private constructor(
    format: NumericFormat,
    byteSize: number,
    accessors: Accessors<V>,
    range?: { min: V; max: V },
  ) {
    this.format = format;
    this.byteSize = byteSize;
    this.accessors = accessors;
    this.min = range?.min;
    this.max = range?.max;
    this.tag = NumericCodec.describe(format);
  }

  static integer(bits: IntegerBits, signed: boolean, endian: Endianness): NumericCodec<number> {
    const accessors: Record<IntegerBits, Accessors<number>> = {
      8: signed
        ? { get: v => v.getInt8(0), set: (v, x) => v.setInt8(0, x) }
        : { get: v => v.getUint8(0), set: (v, x) => v.setUint8(0, x) },
      16: signed
        ? { get: (v, le) => v.getInt16(0, le), set: (v, x, le) => v.setInt16(0, x, le) }
        : { get: (v, le) => v.getUint16(0, le), set: (v, x, le) => v.setUint16(0, x, le) },
      32: signed
        ? { get: (v, le) => v.getInt32(0, le), set: (v, x, le) => v.setInt32(0, x, le) }
        : { get: (v, le) => v.getUint32(0, le), set: (v, x, le) => v.setUint32(0, x, le) },
    };
    const range = signed
      ? { min: -(2 ** (bits - 1)), max: 2 ** (bits - 1) - 1 }
      : { min: 0, max: 2 ** bits - 1 };
    return new NumericCodec<number>(
      { kind: 'integer', bits, signed, endian },
      bits / 8,
      accessors[bits],
      range,
    );
  }

  static bigint(signed: boolean, endian: Endianness): NumericCodec<bigint> {
    const accessors: Accessors<bigint> = signed
      ? { get: (v, le) => v.getBigInt64(0, le), set: (v, x, le) => v.setBigInt64(0, x, le) }
      : { get: (v, le) => v.getBigUint64(0, le), set: (v, x, le) => v.setBigUint64(0, x, le) };
    const range = signed
      ? { min: -(2n ** 63n), max: 2n ** 63n - 1n }
      : { min: 0n, max: 2n ** 64n - 1n };
    return new NumericCodec<bigint>({ kind: 'bigint', signed, endian }, 8, accessors, range);
  }

  static float(bits: FloatBits, endian: Endianness): NumericCodec<number> {
    const accessors: Accessors<number> = bits === 32
      ? { get: (v, le) => v.getFloat32(0, le), set: (v, x, le) => v.setFloat32(0, x, le) }
      : { get: (v, le) => v.getFloat64(0, le), set: (v, x, le) => v.setFloat64(0, x, le) };
    return new NumericCodec<number>({ kind: 'float', bits, endian }, bits / 8, accessors);
  }

  private static describe(format: NumericFormat): string {
    const suffix = format.endian === 'big' ? 'be' : 'le';
    switch (format.kind) {
      case 'integer':
        return `${format.signed ? 'int' : 'uint'}${format.bits}${suffix}`;
      case 'bigint':
        return `${format.signed ? 'int' : 'uint'}64${suffix}`;
      case 'float':
        return `float${format.bits}${suffix}`;
    }
  }

  /** Whether `value` has this codec's TypeScript type. */
  isValueType(value: unknown): value is V {
    if (this.format.kind === 'bigint') return typeof value === 'bigint';
    return typeof value === 'number';
  }

  /** Whether `value` is representable without loss of range. */
  fits(value: V): boolean {
    switch (this.format.kind) {
      case 'integer':
        return Number.isInteger(value) && this.inRange(value);
      case 'bigint':
        return this.inRange(value);
      case 'float':
        if (this.format.bits === 64 || !Number.isFinite(value)) return true;
        // finite values beyond the float32 range would round to Infinity
        return Number.isFinite(Math.fround(Number(value)));
    }
  }

  /** Lower and upper bound, when the format has one. */
  get range(): { min: V; max: V } | undefined {
    if (this.min === undefined || this.max === undefined) return undefined;
    return { min: this.min, max: this.max };
  }

  encode(value: V): Uint8Array {
    const bytes = new Uint8Array(this.byteSize);
    this.accessors.set(new DataView(bytes.buffer), value, this.format.endian === 'little');
    return bytes;
  }

  decode(bytes: Uint8Array): V {
    if (bytes.length !== this.byteSize) {
      throw new Error(`${this.tag}: expected ${this.byteSize} bytes, got ${bytes.length}`);
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return this.accessors.get(view, this.format.endian === 'little');
  }

  private inRange(value: V): boolean {
    if (this.min === undefined || this.max === undefined) return true;
    return value >= this.min && value <= this.max;
  }
}
