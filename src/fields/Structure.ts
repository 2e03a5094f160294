import { byteSink, byteSource } from '../helpers';
import type { FieldReader, FieldWriter } from '../helpers';
import { Container } from './Container';
import type { FieldRecord } from './Container';
import type { Context, FieldUnit } from './Field';

/**
 * Byte-aligned container. Children are encoded back to back in declaration
 * order and decoded in the same order from one shared cursor, which is what
 * lets a later field's resolver read an earlier field's decoded value.
 *
 * Bit fields cannot be appended directly; group them in a BitStructure.
 *
 * @example
 * const ip = new Structure('ip');
 * ip.append(new UInt8('tos', 3));
 * ip.append(new UInt16('length', 146));
 * ip.encode(); // Uint8Array [0x03, 0x00, 0x92]
 */
export class Structure extends Container {
  get unit(): FieldUnit {
    return 'bytes';
  }

  protected get childUnit(): FieldUnit {
    return 'bytes';
  }

  value(): FieldRecord {
    return this.values();
  }

  setValue(value: FieldRecord): void {
    this.assign(value);
  }

  read(stream: FieldReader, context: Context): void {
    this.readChildren(byteSource(stream, this), context);
  }

  write(stream: FieldWriter, context: Context): void {
    this.writeChildren(byteSink(stream, this), context);
  }
}
