import { ByteReader, ByteWriter, bytesToHex, hexToBytes } from '../src/ByteStream';
import { StreamLengthMismatchError } from '../src/errors';

describe('ByteReader', () => {
  it('reads bytes sequentially and tracks offset', () => {
    const reader = ByteReader.fromHex('01 02 03');
    expect(reader.read(2)).toEqual(Uint8Array.of(1, 2));
    expect(reader.offset).toBe(2);
    expect(reader.remaining).toBe(1);
    expect(reader.read(1)).toEqual(Uint8Array.of(3));
    expect(reader.remaining).toBe(0);
  });

  it('reads zero bytes without moving', () => {
    const reader = ByteReader.from(Uint8Array.of(9));
    expect(reader.read(0)).toEqual(new Uint8Array(0));
    expect(reader.offset).toBe(0);
  });

  it('throws StreamLengthMismatchError on a short read', () => {
    const reader = ByteReader.fromHex('0102');
    reader.read(1);
    expect(() => reader.read(2)).toThrow(StreamLengthMismatchError);
    expect(() => reader.read(2)).toThrow('Stream length mismatch (2 expected, 1 available)');
  });

  it('rejects negative counts', () => {
    const reader = ByteReader.fromHex('00');
    expect(() => reader.read(-1)).toThrow(RangeError);
  });

  it('copies the input bytes', () => {
    const data = Uint8Array.of(1, 2);
    const reader = ByteReader.from(data);
    data[0] = 0xff;
    expect(reader.read(1)).toEqual(Uint8Array.of(1));
  });
});

describe('ByteWriter', () => {
  it('grows past its initial capacity', () => {
    const writer = ByteWriter.alloc(1);
    writer.write(Uint8Array.of(0x0a, 0x0b));
    writer.write(Uint8Array.of(0x0c));
    expect(writer.length).toBe(3);
    expect(writer.toUint8Array()).toEqual(Uint8Array.of(0x0a, 0x0b, 0x0c));
    expect(writer.toHex()).toBe('0a0b0c');
  });
});

describe('hex helpers', () => {
  it('converts between bytes and hex', () => {
    expect(bytesToHex(Uint8Array.of(0, 0xab, 0x10))).toBe('00ab10');
    expect(hexToBytes('00 AB\n10')).toEqual(Uint8Array.of(0, 0xab, 0x10));
  });

  it('rejects malformed hex', () => {
    expect(() => hexToBytes('abc')).toThrow('Invalid hex string');
    expect(() => hexToBytes('zz')).toThrow('Invalid hex string');
  });
});
