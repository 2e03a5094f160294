import {
  FieldTypeError,
  NameConflictError,
  NotMaterializedError,
  UnsupportedNestingError,
} from '../../src/errors';
import { BitField } from '../../src/fields/BitField';
import { BitStructure } from '../../src/fields/BitStructure';
import { MetaField } from '../../src/fields/MetaField';
import { Structure } from '../../src/fields/Structure';
import { UInt8, UInt16, UInt32 } from '../../src/fields/Value';

describe('MetaField', () => {
  it('fails every accessor before it is materialized', () => {
    const field = new MetaField('body', () => new UInt8('x'));
    expect(field.materialized).toBe(false);
    expect(field.name).toBe('body');
    expect(field.unit).toBe('bytes');
    expect(() => field.size()).toThrow(NotMaterializedError);
    expect(() => field.value()).toThrow(NotMaterializedError);
    expect(() => field.setValue(1)).toThrow(NotMaterializedError);
    expect(() => field.strValue()).toThrow(NotMaterializedError);
    expect(() => field.strHexValue()).toThrow(NotMaterializedError);
    expect(() => field.strEngValue()).toThrow(NotMaterializedError);
    expect(() => field.engValue()).toThrow(NotMaterializedError);
    expect(() => field.fields()).toThrow(NotMaterializedError);
    expect(() => field.field('a')).toThrow(NotMaterializedError);
    expect(() => field.encode()).toThrow(NotMaterializedError);
    expect(() => field.value()).toThrow("No field created for MetaField 'body'");
  });

  it('behaves as the built field after a decode', () => {
    const field = new MetaField('body', () => new UInt8('x'));
    field.decode(Uint8Array.of(0x2a));
    expect(field.materialized).toBe(true);
    expect(field.value()).toBe(42);
    expect(field.size()).toBe(1);
    expect(field.strValue()).toBe('42');
    expect(field.strHexValue()).toBe('0x2A');
    expect(field.delegate().name).toBe('body');
    field.setValue(7);
    expect(field.encode()).toEqual(Uint8Array.of(7));
  });

  it('chooses the field type from an earlier field', () => {
    const packet = new Structure('p');
    packet.append(new UInt8('kind'));
    packet.append(
      new MetaField('body', ctx => (ctx.numberAt('kind') === 1 ? new UInt16('body') : new UInt32('body'))),
    );

    packet.decode(Uint8Array.of(1, 0x01, 0x02));
    expect(packet.get('body')).toBe(0x0102);
    expect(packet.size()).toBe(3);

    packet.decode(Uint8Array.of(2, 0, 0, 0, 5));
    expect(packet.get('body')).toBe(5);
    expect(packet.size()).toBe(5);
    expect(packet.encode()).toEqual(Uint8Array.of(2, 0, 0, 0, 5));
  });

  it('exposes the children of a built structure', () => {
    const packet = new Structure('p');
    packet.append(new UInt8('n'));
    packet.append(
      new MetaField('body', () => {
        const body = new Structure('body');
        body.append(new UInt8('a'));
        body.append(new UInt8('b'));
        return body;
      }),
    );
    packet.decode(Uint8Array.of(1, 2, 3));
    expect(packet.keys()).toEqual(['n', 'body.a', 'body.b']);
    expect(packet.get('body.b')).toBe(3);
    packet.set('body.a', 9);
    expect(packet.encode()).toEqual(Uint8Array.of(1, 9, 3));
  });

  it('materializes on bind', () => {
    const field = new MetaField('body', () => new UInt8('x'));
    field.bind();
    field.setValue(9);
    expect(field.encode()).toEqual(Uint8Array.of(9));

    const adopted = new UInt8('y', 3);
    expect(field.bind(adopted)).toBe(adopted);
    expect(adopted.name).toBe('body');
    expect(field.value()).toBe(3);
  });

  it('refuses to bind a field of another kind', () => {
    const field = new MetaField('body', () => new UInt8('x'));
    expect(() => field.bind(new UInt16('z'))).toThrow(FieldTypeError);
    expect(field.materialized).toBe(false);
  });

  it('nests where its declared unit allows', () => {
    const bits = () => new MetaField('f', () => new BitField('f', 3), { unit: 'bits' });
    expect(() => new Structure('p').append(bits())).toThrow(UnsupportedNestingError);

    const flags = new BitStructure('flags');
    flags.append(bits());
    flags.decode(Uint8Array.of(0xa0));
    expect(flags.get('f')).toBe(5);
  });

  it('rejects a built field of the wrong unit', () => {
    const packet = new Structure('p');
    packet.append(new MetaField('g', () => new BitField('g', 3)));
    expect(() => packet.decode(Uint8Array.of(0))).toThrow(FieldTypeError);
    expect(() => packet.decode(Uint8Array.of(0))).toThrow(
      "Field built for MetaField 'g' does not measure in bytes",
    );
  });

  it('forgets its field on reset', () => {
    const packet = new Structure('p');
    const body = new MetaField('body', () => new UInt8('x'));
    packet.append(body);
    packet.decode(Uint8Array.of(1));
    packet.reset();
    expect(body.materialized).toBe(false);
  });

  it('compares kinds through its factory', () => {
    const field = new MetaField('body', () => new UInt8('x'));
    expect(field.isSameKind(new UInt8('y'))).toBe(true);
    expect(field.isSameKind(new UInt16('y'))).toBe(false);
  });

  it('takes a name of its own in the enclosing structure', () => {
    const packet = new Structure('p');
    packet.append(new UInt8('body'));
    expect(() => packet.append(new MetaField('body', () => new UInt16('x')))).toThrow(NameConflictError);
    expect(() => packet.append(new MetaField('body', () => new UInt16('x')))).toThrow(
      "Field 'body' already exists in 'p'",
    );
  });
});
