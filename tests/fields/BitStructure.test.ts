import { NameConflictError, UnsupportedNestingError } from '../../src/errors';
import { BitField, BooleanField } from '../../src/fields/BitField';
import { BitStructure } from '../../src/fields/BitStructure';
import { Structure } from '../../src/fields/Structure';
import { UInt8 } from '../../src/fields/Value';

describe('BitStructure', () => {
  it('packs bit fields MSB first', () => {
    const first = new BitStructure('first');
    first.append(new BitField('version', 4, 4));
    first.append(new BitField('hlen', 4, 5));
    expect(first.encode()).toEqual(Uint8Array.of(0x45));
    expect(first.size()).toBe(1);
  });

  it('rounds 13 bits up to 2 bytes and pads with zeros', () => {
    const bits = new BitStructure('b');
    bits.append(new BitField('a', 13, 0x1fff));
    expect(bits.bitSize()).toBe(13);
    expect(bits.size()).toBe(2);
    expect(bits.encode()).toEqual(Uint8Array.of(0xff, 0xf8));
  });

  it('ignores padding bits when decoding', () => {
    const bits = new BitStructure('b');
    bits.append(new BitField('a', 13));
    bits.decode(Uint8Array.of(0xff, 0xff));
    expect(bits.get('a')).toBe(0x1fff);
    expect(bits.encode()).toEqual(Uint8Array.of(0xff, 0xf8));
  });

  it('sits between byte fields of a Structure', () => {
    const packet = new Structure('p');
    const bits = new BitStructure('bits');
    bits.append(new BooleanField('flag', true));
    bits.append(new BitField('n', 3, 5));
    packet.append(new UInt8('x', 1));
    packet.append(bits);
    packet.append(new UInt8('y', 2));
    expect(packet.size()).toBe(3);
    expect(packet.encode()).toEqual(Uint8Array.of(0x01, 0xd0, 0x02));

    const copy = new Structure('p');
    const copyBits = new BitStructure('bits');
    copyBits.append(new BooleanField('flag'));
    copyBits.append(new BitField('n', 3));
    copy.append(new UInt8('x'));
    copy.append(copyBits);
    copy.append(new UInt8('y'));
    copy.decode(Uint8Array.of(0x01, 0xd0, 0x02));
    expect(copy.value()).toEqual({ x: 1, bits: { flag: true, n: 5 }, y: 2 });
  });

  it('shares the bit stream with a nested BitStructure', () => {
    const outer = new BitStructure('outer');
    const inner = new BitStructure('inner');
    inner.append(new BitField('b', 4, 0x5));
    inner.append(new BitField('c', 4, 0xf));
    outer.append(new BitField('a', 4, 0xa));
    outer.append(inner);
    expect(inner.unit).toBe('bits');
    expect(inner.size()).toBe(8);
    expect(outer.unit).toBe('bytes');
    expect(outer.size()).toBe(2);
    expect(outer.encode()).toEqual(Uint8Array.of(0xa5, 0xf0));

    outer.decode(Uint8Array.of(0x12, 0x30));
    expect(outer.get('a')).toBe(1);
    expect(outer.get('inner.b')).toBe(2);
    expect(outer.get('inner.c')).toBe(3);
  });

  it('rejects byte fields', () => {
    const bits = new BitStructure('b');
    expect(() => bits.append(new UInt8('x'))).toThrow(UnsupportedNestingError);
    expect(() => bits.append(new Structure('s'))).toThrow(
      "Cannot nest 's': byte fields cannot be placed in bit container 'b'",
    );
  });

  it('lists its leaves', () => {
    const bits = new BitStructure('b');
    bits.append(new BooleanField('f'));
    bits.append(new BitField('n', 7));
    expect(bits.keys()).toEqual(['f', 'n']);
  });

  it('rejects a second field of the same name', () => {
    const bits = new BitStructure('b');
    bits.append(new BitField('a', 3));
    expect(() => bits.append(new BooleanField('a'))).toThrow(NameConflictError);
    expect(() => bits.append(new BooleanField('a'))).toThrow("Field 'a' already exists in 'b'");
    expect(bits.keys()).toEqual(['a']);
  });
});
