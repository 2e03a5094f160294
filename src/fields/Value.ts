import { NumericCodec } from '../codecs/NumericCodec';
import { FieldTypeError, SizeExceededError } from '../errors';
import { byteSink, byteSource, hexString } from '../helpers';
import type { FieldReader, FieldWriter } from '../helpers';
import { Field } from './Field';
import type { AnyField, FieldUnit } from './Field';

/**
 * Fixed-width numeric leaf. The field keeps the encoded bytes and decodes
 * them on demand, so decoding and re-encoding reproduces the input exactly.
 */
export class Value<V extends number | bigint> extends Field<V> {
  readonly codec: NumericCodec<V>;
  private _bytes: Uint8Array;

  constructor(name: string, codec: NumericCodec<V>, value: V) {
    super(name);
    this.codec = codec;
    this._bytes = new Uint8Array(codec.byteSize);
    this.setValue(value);
  }

  get unit(): FieldUnit {
    return 'bytes';
  }

  size(): number {
    return this.codec.byteSize;
  }

  value(): V {
    return this.codec.decode(this._bytes);
  }

  setValue(value: V): void {
    if (!this.codec.isValueType(value)) {
      throw new FieldTypeError(
        `Field '${this.name}' (${this.codec.tag}) cannot hold a ${typeof value}`,
      );
    }
    if (!this.codec.fits(value)) {
      const range = this.codec.range;
      throw new SizeExceededError(
        this.name,
        range
          ? `${value} is outside [${range.min}, ${range.max}]`
          : `${value} is not representable as ${this.codec.tag}`,
      );
    }
    this._bytes = this.codec.encode(value);
  }

  /** The encoded bytes read as one big-endian unsigned integer. */
  hexValue(): bigint {
    let result = 0n;
    for (const byte of this._bytes) {
      result = (result << 8n) | BigInt(byte);
    }
    return result;
  }

  isSameKind(other: AnyField): boolean {
    const target = other.concrete();
    return super.isSameKind(other) && target instanceof Value && target.codec.tag === this.codec.tag;
  }

  read(stream: FieldReader): void {
    this._bytes = byteSource(stream, this).read(this.size());
  }

  write(stream: FieldWriter): void {
    byteSink(stream, this).write(this._bytes);
  }

  strValue(): string {
    return String(this.value());
  }

  strHexValue(): string {
    return hexString(this.hexValue(), this.size());
  }
}

/** Constructor of a concrete numeric field type such as UInt16. */
export interface NumericType<V extends number | bigint> {
  new (name: string, value?: V): Value<V>;
}

function numericType<V extends number | bigint>(codec: NumericCodec<V>, initial: V): NumericType<V> {
  return class extends Value<V> {
    constructor(name: string, value: V = initial) {
      super(name, codec, value);
    }
  };
}

export const Int8 = numericType(NumericCodec.integer(8, true, 'big'), 0);
export type Int8 = InstanceType<typeof Int8>;
export const UInt8 = numericType(NumericCodec.integer(8, false, 'big'), 0);
export type UInt8 = InstanceType<typeof UInt8>;

export const Int16BE = numericType(NumericCodec.integer(16, true, 'big'), 0);
export type Int16BE = InstanceType<typeof Int16BE>;
export const Int16LE = numericType(NumericCodec.integer(16, true, 'little'), 0);
export type Int16LE = InstanceType<typeof Int16LE>;
export const UInt16BE = numericType(NumericCodec.integer(16, false, 'big'), 0);
export type UInt16BE = InstanceType<typeof UInt16BE>;
export const UInt16LE = numericType(NumericCodec.integer(16, false, 'little'), 0);
export type UInt16LE = InstanceType<typeof UInt16LE>;

export const Int32BE = numericType(NumericCodec.integer(32, true, 'big'), 0);
export type Int32BE = InstanceType<typeof Int32BE>;
export const Int32LE = numericType(NumericCodec.integer(32, true, 'little'), 0);
export type Int32LE = InstanceType<typeof Int32LE>;
export const UInt32BE = numericType(NumericCodec.integer(32, false, 'big'), 0);
export type UInt32BE = InstanceType<typeof UInt32BE>;
export const UInt32LE = numericType(NumericCodec.integer(32, false, 'little'), 0);
export type UInt32LE = InstanceType<typeof UInt32LE>;

export const Int64BE = numericType(NumericCodec.bigint(true, 'big'), 0n);
export type Int64BE = InstanceType<typeof Int64BE>;
export const Int64LE = numericType(NumericCodec.bigint(true, 'little'), 0n);
export type Int64LE = InstanceType<typeof Int64LE>;
export const UInt64BE = numericType(NumericCodec.bigint(false, 'big'), 0n);
export type UInt64BE = InstanceType<typeof UInt64BE>;
export const UInt64LE = numericType(NumericCodec.bigint(false, 'little'), 0n);
export type UInt64LE = InstanceType<typeof UInt64LE>;

export const FloatBE = numericType(NumericCodec.float(32, 'big'), 0);
export type FloatBE = InstanceType<typeof FloatBE>;
export const FloatLE = numericType(NumericCodec.float(32, 'little'), 0);
export type FloatLE = InstanceType<typeof FloatLE>;
export const DoubleBE = numericType(NumericCodec.float(64, 'big'), 0);
export type DoubleBE = InstanceType<typeof DoubleBE>;
export const DoubleLE = numericType(NumericCodec.float(64, 'little'), 0);
export type DoubleLE = InstanceType<typeof DoubleLE>;

// Network byte order by default.
export const Int16 = Int16BE;
export type Int16 = Int16BE;
export const UInt16 = UInt16BE;
export type UInt16 = UInt16BE;
export const Int32 = Int32BE;
export type Int32 = Int32BE;
export const UInt32 = UInt32BE;
export type UInt32 = UInt32BE;
export const Int64 = Int64BE;
export type Int64 = Int64BE;
export const UInt64 = UInt64BE;
export type UInt64 = UInt64BE;
export const Float = FloatBE;
export type Float = FloatBE;
export const Double = DoubleBE;
export type Double = DoubleBE;
