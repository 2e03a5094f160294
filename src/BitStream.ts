import type { ByteSink, ByteSource } from './ByteStream';

/**
 * Bit-granular reader over a byte source.
 * Bits are consumed MSB-first within each byte (big-endian bit order).
 * The source is only ever read in whole bytes; a partially consumed byte
 * stays buffered until later reads use it or align() discards it.
 */
export class BitStreamReader {
  private readonly _source: ByteSource;
  private _bytes: Uint8Array;
  private _bitOffset: number;
  private _bitsRead: number;

  constructor(source: ByteSource) {
    this._source = source;
    this._bytes = new Uint8Array(0);
    this._bitOffset = 0;
    this._bitsRead = 0;
  }

  /** Number of bits consumed since construction. */
  get bitsRead(): number {
    return this._bitsRead;
  }

  /** Bits pulled from the source but not yet consumed. */
  get buffered(): number {
    return this._bytes.length * 8 - this._bitOffset;
  }

  /** Read a single bit. */
  readBit(): 0 | 1 {
    this.fill(1);
    const byteIndex = this._bitOffset >> 3;
    const bitIndex = 7 - (this._bitOffset & 7);
    this._bitOffset++;
    this._bitsRead++;
    return ((this._bytes[byteIndex] >> bitIndex) & 1) as 0 | 1;
  }

  /**
   * Read `count` bits and return as unsigned integer.
   * @param count  number of bits to read (0..32)
   */
  readBits(count: number): number {
    if (count === 0) return 0;
    if (count < 0 || count > 32) {
      throw new Error(`readBits: count must be 0..32, got ${count}`);
    }
    this.fill(count);
    let result = 0;
    for (let i = 0; i < count; i++) {
      result = (result << 1) | this.readBit();
    }
    return result >>> 0;
  }

  /** Read arbitrary-width bits into a bigint. */
  readBigBits(count: number): bigint {
    if (count === 0) return 0n;
    this.fill(count);
    let result = 0n;
    for (let i = 0; i < count; i++) {
      result = (result << 1n) | BigInt(this.readBit());
    }
    return result;
  }

  /**
   * Discard the unread bits of the current byte so that the underlying
   * source is byte-aligned again. Returns the number of bits discarded.
   */
  align(): number {
    const skipped = this.buffered;
    this._bytes = new Uint8Array(0);
    this._bitOffset = 0;
    return skipped;
  }

  private fill(count: number): void {
    const missing = count - this.buffered;
    if (missing <= 0) return;
    const fresh = this._source.read(Math.ceil(missing / 8));
    const keepFrom = this._bitOffset >> 3;
    const kept = this._bytes.length - keepFrom;
    const merged = new Uint8Array(kept + fresh.length);
    merged.set(this._bytes.subarray(keepFrom));
    merged.set(fresh, kept);
    this._bytes = merged;
    this._bitOffset &= 7;
  }
}

/**
 * Bit-granular writer over a byte sink.
 * Every completed byte is passed to the sink immediately; flush()
 * zero-pads and emits the final partial byte.
 */
export class BitStreamWriter {
  private readonly _sink: ByteSink;
  private _current: number;
  private _pendingBits: number;
  private _bitsWritten: number;

  constructor(sink: ByteSink) {
    this._sink = sink;
    this._current = 0;
    this._pendingBits = 0;
    this._bitsWritten = 0;
  }

  /** Number of bits written since construction, padding excluded. */
  get bitsWritten(): number {
    return this._bitsWritten;
  }

  /** Write a single bit. */
  writeBit(bit: 0 | 1): void {
    this._current = (this._current << 1) | bit;
    this._pendingBits++;
    this._bitsWritten++;
    if (this._pendingBits === 8) {
      this._sink.write(Uint8Array.of(this._current));
      this._current = 0;
      this._pendingBits = 0;
    }
  }

  /**
   * Write the lowest `count` bits of `value` (MSB first).
   * @param value  unsigned integer (0..2^32-1)
   * @param count  number of bits to write (0..32)
   */
  writeBits(value: number, count: number): void {
    if (count === 0) return;
    if (count < 0 || count > 32) {
      throw new Error(`writeBits: count must be 0..32, got ${count}`);
    }
    for (let i = count - 1; i >= 0; i--) {
      this.writeBit(((value >>> i) & 1) as 0 | 1);
    }
  }

  /** Write arbitrary-width bits from a bigint value (MSB first). */
  writeBigBits(value: bigint, count: number): void {
    if (count === 0) return;
    for (let i = count - 1; i >= 0; i--) {
      this.writeBit(Number((value >> BigInt(i)) & 1n) as 0 | 1);
    }
  }

  /**
   * Zero-pad the pending bits to a byte boundary and emit them.
   * Returns the number of padding bits written.
   */
  flush(): number {
    if (this._pendingBits === 0) return 0;
    const padding = 8 - this._pendingBits;
    this._sink.write(Uint8Array.of((this._current << padding) & 0xff));
    this._current = 0;
    this._pendingBits = 0;
    return padding;
  }
}
