import { FieldTypeError, LayoutError, SizeExceededError } from '../errors';
import { bitReader, bitWriter, byteEnd, hexString } from '../helpers';
import type { FieldReader, FieldWriter } from '../helpers';
import { Field } from './Field';
import type { AnyField, FieldUnit } from './Field';

/** Widest bit field whose values stay exact as a JS number. */
export const MAX_BIT_FIELD_WIDTH = 53;

/**
 * Unsigned integer of 1..53 bits. Bit fields live inside a BitStructure,
 * which packs them into whole bytes.
 */
export class BitField extends Field<number> {
  private readonly width: number;
  private _value: number;

  constructor(name: string, width: number, value = 0) {
    super(name);
    if (!Number.isInteger(width) || width < 1 || width > MAX_BIT_FIELD_WIDTH) {
      throw new LayoutError(
        `BitField '${name}': width must be 1..${MAX_BIT_FIELD_WIDTH}, got ${width}`,
      );
    }
    this.width = width;
    this._value = 0;
    this.setValue(value);
  }

  get unit(): FieldUnit {
    return 'bits';
  }

  /** Size in bits. */
  size(): number {
    return this.width;
  }

  value(): number {
    return this._value;
  }

  setValue(value: number): void {
    if (typeof value !== 'number') {
      throw new FieldTypeError(`Field '${this.name}' cannot hold a ${typeof value}`);
    }
    if (!Number.isInteger(value) || value < 0) {
      throw new SizeExceededError(this.name, `${value} is not a non-negative integer`);
    }
    if (value >= 2 ** this.width) {
      throw new SizeExceededError(
        this.name,
        `${value} needs more than ${this.width} bit${this.width === 1 ? '' : 's'}`,
      );
    }
    this._value = value;
  }

  hexValue(): number {
    return this._value;
  }

  isSameKind(other: AnyField): boolean {
    return super.isSameKind(other) && other.concrete().size() === this.width;
  }

  read(stream: FieldReader): void {
    this._value = Number(bitReader(stream, this).readBigBits(this.width));
  }

  write(stream: FieldWriter): void {
    bitWriter(stream, this).writeBigBits(BigInt(this._value), this.width);
  }

  strValue(): string {
    return hexString(this._value, byteEnd(this.width));
  }

  strHexValue(): string {
    return hexString(this.hexValue(), byteEnd(this.width));
  }

  strEngValue(): string {
    const eng = this.engValue();
    if (typeof eng === 'number' && Number.isInteger(eng) && eng >= 0) {
      return hexString(eng, byteEnd(this.width));
    }
    return String(eng);
  }
}

/** Single-bit field holding a boolean. */
export class BooleanField extends Field<boolean> {
  private _value: boolean;

  constructor(name: string, value = false) {
    super(name);
    this._value = false;
    this.setValue(value);
  }

  get unit(): FieldUnit {
    return 'bits';
  }

  size(): number {
    return 1;
  }

  value(): boolean {
    return this._value;
  }

  setValue(value: boolean): void {
    if (typeof value !== 'boolean') {
      throw new FieldTypeError(`Field '${this.name}' cannot hold a ${typeof value}`);
    }
    this._value = value;
  }

  hexValue(): number {
    return this._value ? 1 : 0;
  }

  enable(): void {
    this.setValue(true);
  }

  disable(): void {
    this.setValue(false);
  }

  read(stream: FieldReader): void {
    this._value = bitReader(stream, this).readBit() === 1;
  }

  write(stream: FieldWriter): void {
    bitWriter(stream, this).writeBit(this._value ? 1 : 0);
  }

  strValue(): string {
    return this._value ? 'True' : 'False';
  }

  strHexValue(): string {
    return hexString(this.hexValue(), 1);
  }

  strEngValue(): string {
    const eng = this.engValue();
    if (typeof eng === 'boolean') return eng ? 'True' : 'False';
    return String(eng);
  }
}

/** Single-bit status flag. */
export class Flag extends BitField {
  static readonly INACTIVE = 0;
  static readonly ACTIVE = 1;

  constructor(name: string, value: number = Flag.INACTIVE) {
    super(name, 1, value);
  }

  get active(): boolean {
    return this.value() === Flag.ACTIVE;
  }

  activate(): void {
    this.setValue(Flag.ACTIVE);
  }

  deactivate(): void {
    this.setValue(Flag.INACTIVE);
  }

  strValue(): string {
    return this.active ? 'Active' : 'Inactive';
  }

  strEngValue(): string {
    return this.engValue() === Flag.ACTIVE ? 'Active' : 'Inactive';
  }
}
