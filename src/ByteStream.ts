import { StreamLengthMismatchError } from './errors';

/** Sequential byte source with a forward-only cursor. */
export interface ByteSource {
  /** Read exactly `count` bytes or throw StreamLengthMismatchError. */
  read(count: number): Uint8Array;
}

/** Sequential byte sink. */
export interface ByteSink {
  write(bytes: Uint8Array): void;
}

/**
 * Byte cursor over an in-memory buffer.
 */
export class ByteReader implements ByteSource {
  private readonly _data: Uint8Array;
  private _offset: number;

  private constructor(data: Uint8Array) {
    this._data = data;
    this._offset = 0;
  }

  /** Wrap existing bytes for reading. The bytes are copied. */
  static from(data: Uint8Array): ByteReader {
    return new ByteReader(new Uint8Array(data));
  }

  /** Parse a hex string (whitespace allowed) into a reader. */
  static fromHex(hex: string): ByteReader {
    return new ByteReader(hexToBytes(hex));
  }

  /** Current cursor position in bytes. */
  get offset(): number {
    return this._offset;
  }

  /** Bytes remaining from cursor to end. */
  get remaining(): number {
    return this._data.length - this._offset;
  }

  read(count: number): Uint8Array {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`read: count must be a non-negative integer, got ${count}`);
    }
    if (count > this.remaining) {
      throw new StreamLengthMismatchError(count, this.remaining);
    }
    const result = this._data.slice(this._offset, this._offset + count);
    this._offset += count;
    return result;
  }
}

/**
 * Growable byte sink.
 */
export class ByteWriter implements ByteSink {
  private _data: Uint8Array;
  private _length: number;

  private constructor(data: Uint8Array) {
    this._data = data;
    this._length = 0;
  }

  /** Allocate a writer with optional initial byte capacity. */
  static alloc(initialByteCapacity = 256): ByteWriter {
    return new ByteWriter(new Uint8Array(Math.max(1, initialByteCapacity)));
  }

  /** Number of bytes written so far. */
  get length(): number {
    return this._length;
  }

  write(bytes: Uint8Array): void {
    this.ensureCapacity(this._length + bytes.length);
    this._data.set(bytes, this._length);
    this._length += bytes.length;
  }

  /** Return a compact copy of the written bytes. */
  toUint8Array(): Uint8Array {
    return this._data.slice(0, this._length);
  }

  /** Return hex string representation. */
  toHex(): string {
    return bytesToHex(this.toUint8Array());
  }

  private ensureCapacity(bytesNeeded: number): void {
    if (bytesNeeded <= this._data.length) return;
    let newSize = this._data.length;
    while (newSize < bytesNeeded) {
      newSize *= 2;
    }
    const newData = new Uint8Array(newSize);
    newData.set(this._data);
    this._data = newData;
  }
}

/** Lowercase hex, two digits per byte, no separators. */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('');
}

/** Parse hex digits into bytes. Whitespace is ignored. */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0 || /[^0-9a-fA-F]/.test(clean)) {
    throw new Error(`Invalid hex string: '${hex}'`);
  }
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
