import { NumericCodec } from '../codecs/NumericCodec';
import { KeyNotFoundError, LayoutError } from '../errors';
import { splitPath } from '../helpers';
import { BitField, BooleanField } from './BitField';
import type { AnyField } from './Field';
import { Value } from './Value';

/** Single-bit view of one mask of a MaskValue. */
export class Mask extends BitField {
  static readonly UNMASKED = 0;
  static readonly MASKED = 1;

  constructor(name: string, value: number = Mask.UNMASKED) {
    super(name, 1, value);
  }

  get masked(): boolean {
    return this.value() === Mask.MASKED;
  }

  strValue(): string {
    return this.masked ? 'Masked' : 'Unmasked';
  }

  strEngValue(): string {
    return this.engValue() === Mask.MASKED ? 'Masked' : 'Unmasked';
  }
}

/** Field that shows whether one mask is set. */
export type MaskBit = BitField | BooleanField;

/** Builds the field shown for the mask called `name`. */
export type MaskBitFactory = (name: string) => MaskBit;

/** Conversions between a mask's value type and the bigint used for bit operations. */
export interface MaskArithmetic<V extends number | bigint> {
  toBigInt(value: V): bigint;
  fromBigInt(value: bigint): V;
}

export interface MaskOptions<V extends number | bigint> {
  /** Initial value. Defaults to no mask set. */
  value?: V;
  /** Field type used for each mask. Defaults to Mask. */
  bit?: MaskBitFactory;
}

function isSet(bit: MaskBit): boolean {
  return bit instanceof BooleanField ? bit.value() : bit.value() !== 0;
}

/**
 * Unsigned integer made of named bit masks. Each mask is shown as a one-bit
 * child, in increasing mask order, and can be read or assigned by name:
 *
 * ```ts
 * const validity = new Mask8('validity', { position: 0x01, time: 0x02 });
 * validity.mask(validity.maskOf('time'));
 * validity.get('time'); // 1
 * validity.set('position', 1);
 * validity.value(); // 3
 * ```
 *
 * The integer is the only state; the children are refreshed from it.
 */
export class MaskValue<V extends number | bigint> extends Value<V> {
  private readonly arithmetic: MaskArithmetic<V>;
  private readonly masks = new Map<string, V>();
  private readonly bits = new Map<string, MaskBit>();

  constructor(
    name: string,
    codec: NumericCodec<V>,
    arithmetic: MaskArithmetic<V>,
    masks: Record<string, V>,
    options: MaskOptions<V> = {},
  ) {
    super(name, codec, options.value ?? arithmetic.fromBigInt(0n));
    this.arithmetic = arithmetic;
    const bitFactory = options.bit ?? ((maskName: string) => new Mask(maskName));
    const ordered = Object.entries(masks).sort(([, a], [, b]) => {
      const x = arithmetic.toBigInt(a);
      const y = arithmetic.toBigInt(b);
      return x < y ? -1 : x > y ? 1 : 0;
    });
    for (const [maskName, mask] of ordered) {
      if (!codec.fits(mask) || arithmetic.toBigInt(mask) === 0n) {
        throw new LayoutError(`Mask '${maskName}' of '${name}' must be a non-zero ${codec.tag}`);
      }
      const bit = bitFactory(maskName);
      bit.attach(this);
      this.masks.set(maskName, mask);
      this.bits.set(maskName, bit);
    }
  }

  /** The value of the mask called `name`. */
  maskOf(name: string): V {
    const mask = this.masks.get(name);
    if (mask === undefined) {
      throw new KeyNotFoundError(name, name, this.name);
    }
    return mask;
  }

  /** Whether every bit of `mask` is set. */
  isMasked(mask: V): boolean {
    const bits = this.arithmetic.toBigInt(mask);
    return (this.raw() & bits) === bits;
  }

  /** Set the bits of `mask`. */
  mask(mask: V): void {
    this.setValue(this.arithmetic.fromBigInt(this.raw() | this.arithmetic.toBigInt(mask)));
  }

  /** Clear the bits of `mask`. */
  unmask(mask: V): void {
    this.setValue(this.arithmetic.fromBigInt(this.raw() & ~this.arithmetic.toBigInt(mask)));
  }

  fields(): readonly AnyField[] {
    this.refresh();
    return [...this.bits.values()];
  }

  field(path: string): AnyField {
    const [head, rest] = splitPath(path);
    const bit = this.bit(head, path);
    this.refresh();
    return rest === undefined ? bit : bit.field(rest);
  }

  /** Assigning a mask's field sets or clears that mask. */
  set(path: string, value: unknown): void {
    const [head, rest] = splitPath(path);
    const bit = this.bit(head, path);
    if (rest !== undefined) {
      bit.set(rest, value);
      return;
    }
    const target: AnyField = bit;
    target.setValue(value);
    if (isSet(bit)) {
      this.mask(this.maskOf(head));
    } else {
      this.unmask(this.maskOf(head));
    }
  }

  strValue(): string {
    return this.strHexValue();
  }

  strEngValue(): string {
    return this.strHexValue();
  }

  private raw(): bigint {
    return this.arithmetic.toBigInt(this.value());
  }

  private bit(name: string, path: string): MaskBit {
    const bit = this.bits.get(name);
    if (bit === undefined) {
      throw new KeyNotFoundError(path, name, this.name);
    }
    return bit;
  }

  private refresh(): void {
    const raw = this.raw();
    for (const [name, bit] of this.bits) {
      const active = (raw & this.arithmetic.toBigInt(this.maskOf(name))) !== 0n;
      if (bit instanceof BooleanField) {
        bit.setValue(active);
      } else {
        bit.setValue(active ? 1 : 0);
      }
    }
  }
}

const NUMBER_MASKS: MaskArithmetic<number> = {
  toBigInt: value => BigInt(value),
  fromBigInt: value => Number(value),
};

const BIGINT_MASKS: MaskArithmetic<bigint> = {
  toBigInt: value => value,
  fromBigInt: value => value,
};

const MASK8_CODEC = NumericCodec.integer(8, false, 'big');
const MASK16_CODEC = NumericCodec.integer(16, false, 'big');
const MASK32_CODEC = NumericCodec.integer(32, false, 'big');
const MASK64_CODEC = NumericCodec.bigint(false, 'big');

export class Mask8 extends MaskValue<number> {
  constructor(name: string, masks: Record<string, number>, options: MaskOptions<number> = {}) {
    super(name, MASK8_CODEC, NUMBER_MASKS, masks, options);
  }
}

export class Mask16 extends MaskValue<number> {
  constructor(name: string, masks: Record<string, number>, options: MaskOptions<number> = {}) {
    super(name, MASK16_CODEC, NUMBER_MASKS, masks, options);
  }
}

export class Mask32 extends MaskValue<number> {
  constructor(name: string, masks: Record<string, number>, options: MaskOptions<number> = {}) {
    super(name, MASK32_CODEC, NUMBER_MASKS, masks, options);
  }
}

export class Mask64 extends MaskValue<bigint> {
  constructor(name: string, masks: Record<string, bigint>, options: MaskOptions<bigint> = {}) {
    super(name, MASK64_CODEC, BIGINT_MASKS, masks, options);
  }
}
