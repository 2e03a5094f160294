import { BitStreamReader, BitStreamWriter } from '../BitStream';
import { byteEnd } from '../helpers';
import type { FieldReader, FieldWriter } from '../helpers';
import { Container } from './Container';
import type { FieldRecord } from './Container';
import type { Context, FieldUnit } from './Field';

/**
 * Container of bit fields that presents itself as one byte-aligned field.
 *
 * Seen from a byte container its size is the bit total rounded up to whole
 * bytes; the trailing padding bits are written as zero and ignored when
 * decoding. Nested inside another BitStructure it shares the enclosing bit
 * stream and reports its exact bit size.
 *
 * @example
 * const first = new BitStructure('first');
 * first.append(new BitField('version', 4, 4));
 * first.append(new BitField('hlen', 4, 5));
 * first.encode(); // Uint8Array [0x45]
 */
export class BitStructure extends Container {
  get unit(): FieldUnit {
    return this.parent instanceof BitStructure ? 'bits' : 'bytes';
  }

  protected get childUnit(): FieldUnit {
    return 'bits';
  }

  /** A BitStructure fits both byte and bit containers. */
  nestsIn(): boolean {
    return true;
  }

  /** Exact number of bits of all children. */
  bitSize(): number {
    let bits = 0;
    for (const child of this.fields()) {
      bits += child.size();
    }
    return bits;
  }

  /** Bytes when enclosed by a byte container, bits when nested in bits. */
  size(): number {
    const bits = this.bitSize();
    return this.unit === 'bits' ? bits : byteEnd(bits);
  }

  value(): FieldRecord {
    return this.values();
  }

  setValue(value: FieldRecord): void {
    this.assign(value);
  }

  read(stream: FieldReader, context: Context): void {
    if (stream instanceof BitStreamReader) {
      this.readChildren(stream, context);
      return;
    }
    const bits = new BitStreamReader(stream);
    this.readChildren(bits, context);
    bits.align();
  }

  write(stream: FieldWriter, context: Context): void {
    if (stream instanceof BitStreamWriter) {
      this.writeChildren(stream, context);
      return;
    }
    const bits = new BitStreamWriter(stream);
    this.writeChildren(bits, context);
    bits.flush();
  }
}
