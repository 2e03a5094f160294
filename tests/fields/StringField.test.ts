import { FieldTypeError, LengthMismatchError } from '../../src/errors';
import { StringField } from '../../src/fields/StringField';
import { Structure } from '../../src/fields/Structure';
import { UInt8 } from '../../src/fields/Value';

describe('StringField', () => {
  it('takes its length from the initial value', () => {
    const field = new StringField('s', { value: 'ABC' });
    expect(field.size()).toBe(3);
    expect(field.encode()).toEqual(Uint8Array.of(0x41, 0x42, 0x43));
    expect(field.text()).toBe('ABC');
    expect(field.strValue()).toBe('0x414243');
    expect(field.hexValue()).toBe(0x414243n);
  });

  it('rejects content of another length', () => {
    const field = new StringField('s', { value: 'ABC' });
    expect(() => field.setValue('ABCD')).toThrow(LengthMismatchError);
    expect(() => field.setValue('ABCD')).toThrow("Length mismatch in 's' (3 expected, 4 given)");
    field.setValue(Uint8Array.of(1, 2, 3));
    expect(field.value()).toEqual(Uint8Array.of(1, 2, 3));
  });

  it('rejects other value types', () => {
    const packet = new Structure('p');
    packet.append(new StringField('s', { length: 1 }));
    expect(() => packet.set('s', 5)).toThrow(FieldTypeError);
  });

  it('renders empty content as an empty string', () => {
    expect(new StringField('s').strValue()).toBe('');
    expect(new StringField('s').size()).toBe(0);
  });

  describe('with a length resolver', () => {
    function packet(): { root: Structure; payload: StringField } {
      const root = new Structure('p');
      const payload = new StringField('S', { length: ctx => ctx.numberAt('L') });
      root.append(new UInt8('L'));
      root.append(payload);
      return { root, payload };
    }

    it('decodes the length first, then the content', () => {
      const { root, payload } = packet();
      const bytes = Uint8Array.of(0x03, 0x41, 0x42, 0x43);
      root.decode(bytes);
      expect(root.get('L')).toBe(3);
      expect(payload.text()).toBe('ABC');
      expect(root.encode()).toEqual(bytes);
    });

    it('follows the current length when assigning', () => {
      const { root, payload } = packet();
      expect(() => payload.setValue('hi')).toThrow("Length mismatch in 'S' (0 expected, 2 given)");
      root.set('L', 2);
      payload.setValue('hi');
      expect(root.encode()).toEqual(Uint8Array.of(2, 0x68, 0x69));
    });

    it('refuses to encode stale content', () => {
      const { root } = packet();
      root.set('L', 2);
      root.set('S', 'hi');
      root.set('L', 3);
      expect(() => root.encode()).toThrow("Length mismatch in 'S' (3 expected, 2 given)");
    });
  });
});
