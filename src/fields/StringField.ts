import { FieldTypeError, LengthMismatchError } from '../errors';
import { byteSink, byteSource, bytesToHexString, resolveCount } from '../helpers';
import type { FieldReader, FieldWriter, Resolver } from '../helpers';
import { Field } from './Field';
import type { Context, FieldUnit } from './Field';

export interface StringFieldOptions {
  /**
   * Byte length: a literal, or a function of the Context evaluated when the
   * field is decoded. Defaults to the length of the initial value.
   */
  length?: Resolver;
  /** Initial content; strings are stored as UTF-8. */
  value?: Uint8Array | string;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Copy of `value` as bytes; strings are encoded as UTF-8. */
export function toBytes(value: Uint8Array | string): Uint8Array {
  return typeof value === 'string' ? encoder.encode(value) : new Uint8Array(value);
}

/**
 * A run of bytes whose length is only known through another field, e.g.
 * `new StringField('payload', { length: ctx => ctx.numberAt('length') })`.
 */
export class StringField extends Field<Uint8Array> {
  private readonly length: Resolver;
  private _data: Uint8Array;

  constructor(name: string, options: StringFieldOptions = {}) {
    super(name);
    this._data = toBytes(options.value ?? new Uint8Array(0));
    this.length = options.length ?? this._data.length;
  }

  get unit(): FieldUnit {
    return 'bytes';
  }

  /** Size in bytes as currently resolved against root(). */
  size(): number {
    return this.resolvedLength(this.root());
  }

  value(): Uint8Array {
    return new Uint8Array(this._data);
  }

  /** The content decoded as UTF-8. */
  text(): string {
    return decoder.decode(this._data);
  }

  setValue(value: Uint8Array | string): void {
    if (typeof value !== 'string' && !(value instanceof Uint8Array)) {
      throw new FieldTypeError(`Field '${this.name}' holds bytes or a string`);
    }
    const bytes = toBytes(value);
    const expected = this.size();
    if (bytes.length !== expected) {
      throw new LengthMismatchError(this.name, expected, bytes.length);
    }
    this._data = bytes;
  }

  read(stream: FieldReader, context: Context): void {
    this._data = byteSource(stream, this).read(this.resolvedLength(context));
  }

  write(stream: FieldWriter, context: Context): void {
    const expected = this.resolvedLength(context);
    if (this._data.length !== expected) {
      throw new LengthMismatchError(this.name, expected, this._data.length);
    }
    byteSink(stream, this).write(this._data);
  }

  /** The content read as one big-endian unsigned integer. */
  hexValue(): bigint {
    let result = 0n;
    for (const byte of this._data) {
      result = (result << 8n) | BigInt(byte);
    }
    return result;
  }

  strValue(): string {
    return bytesToHexString(this._data);
  }

  strHexValue(): string {
    return this.strValue();
  }

  strEngValue(): string {
    return this.strValue();
  }

  private resolvedLength(context: Context): number {
    return resolveCount(this.length, context, this.name);
  }
}
