import { ByteReader, ByteWriter } from '../ByteStream';
import type { ByteSink, ByteSource } from '../ByteStream';
import { BitStreamReader, BitStreamWriter } from '../BitStream';
import { FieldTypeError, NotAContainerError } from '../errors';
import type { FieldReader, FieldWriter } from '../helpers';

/** Unit in which a field measures its size. */
export type FieldUnit = 'bits' | 'bytes';

/** Any field, whatever its value type. */
export type AnyField = Field<unknown>;

/**
 * The root of the tree being encoded or decoded. Every resolver and factory
 * receives it, so a nested field can depend on any field decoded before it.
 */
export type Context = AnyField;

/** Builds a new field instance, given the Context. */
export type FieldFactory<F extends AnyField = AnyField> = (context: Context) => F;

/**
 * Converts a raw field value into an engineering value (a temperature, an
 * angle...). Declared through a method signature so that a curve for a
 * Field<number> is usable wherever a curve for Field<unknown> is expected.
 */
export type CalibrationCurve<V> = { bivarianceHack(value: V): unknown }['bivarianceHack'];

/**
 * Abstract root of every node in a layout tree.
 *
 * A field has a name (unique within its parent), a size measured in its
 * `unit`, and a value. `read` and `write` consume or produce exactly
 * `size()` units of a stream; containers call them on their children in
 * declaration order, threading the same Context through the whole walk.
 *
 * @template V The domain type of the field's value.
 */
export abstract class Field<V> {
  private _name: string;
  private _parent: AnyField | undefined;
  private _calibration: CalibrationCurve<V> | undefined;

  constructor(name: string) {
    this._name = name;
    this._parent = undefined;
    this._calibration = undefined;
  }

  get name(): string {
    return this._name;
  }

  /** Enclosing field, or undefined for a root. Non-owning. */
  get parent(): AnyField | undefined {
    return this._parent;
  }

  /** Topmost ancestor; the Context used by encode() and decode(). */
  root(): AnyField {
    let node: AnyField = this;
    while (node.parent !== undefined) {
      node = node.parent;
    }
    return node;
  }

  abstract get unit(): FieldUnit;

  /** Size in this field's unit. */
  abstract size(): number;

  abstract value(): V;

  abstract setValue(value: V): void;

  /** Decode exactly size() units from the stream into this field. */
  abstract read(stream: FieldReader, context: Context): void;

  /** Encode this field as exactly size() units into the stream. */
  abstract write(stream: FieldWriter, context: Context): void;

  /** Human-readable value, for renderers. */
  abstract strValue(): string;

  /** Hexadecimal rendering of the in-memory representation, for renderers. */
  abstract strHexValue(): string;

  /** Human-readable engineering value, for renderers. */
  strEngValue(): string {
    return String(this.engValue());
  }

  /** Ordered children; empty for leaves. */
  fields(): readonly AnyField[] {
    return [];
  }

  /** Dotted paths of every leaf below this field; empty for leaves. */
  keys(): string[] {
    return [];
  }

  /** Resolve a dotted path below this field. Leaves have no children. */
  field(path: string): AnyField {
    throw new NotAContainerError(this.name, path);
  }

  /** Same as field(path).value(). */
  get(path: string): unknown {
    return this.field(path).value();
  }

  /** Same as field(path).setValue(value). */
  set(path: string, value: unknown): void {
    this.field(path).setValue(value);
  }

  /**
   * Numeric value at `path`, for resolvers: `ctx => ctx.numberAt('length')`.
   */
  numberAt(path: string): number {
    const value = this.get(path);
    if (typeof value === 'number') return value;
    if (typeof value === 'bigint') return Number(value);
    if (typeof value === 'boolean') return value ? 1 : 0;
    throw new FieldTypeError(`Field '${path}' does not hold a number`);
  }

  /** Whether this field can be a child of a container of the given unit. */
  nestsIn(unit: FieldUnit): boolean {
    return this.unit === unit;
  }

  /** The field this one stands for. Only MetaField differs from itself. */
  concrete(): AnyField {
    return this;
  }

  /** Whether `other` can take this field's place, e.g. as an array element. */
  isSameKind(other: AnyField): boolean {
    return other.concrete() instanceof this.constructor;
  }

  /** Drop dynamically materialized state. Fixed fields have none. */
  reset(): void {}

  calibrationCurve(): CalibrationCurve<V> | undefined {
    return this._calibration;
  }

  setCalibrationCurve(curve: CalibrationCurve<V> | undefined): void {
    this._calibration = curve;
  }

  /** The value after applying the calibration curve (identity by default). */
  engValue(): unknown {
    const value = this.value();
    return this._calibration ? this._calibration(value) : value;
  }

  /** Encode this field into a new byte array. */
  encode(): Uint8Array {
    const writer = ByteWriter.alloc();
    this.encodeTo(writer);
    return writer.toUint8Array();
  }

  /**
   * Encode this field into a byte sink, using root() as the Context.
   * A bit field encoded on its own is zero-padded to a whole byte.
   */
  encodeTo(sink: ByteSink): void {
    if (this.unit === 'bits') {
      const bits = new BitStreamWriter(sink);
      this.write(bits, this.root());
      bits.flush();
    } else {
      this.write(sink, this.root());
    }
  }

  /**
   * Decode this field from the start of `bytes`. Only the bytes the field
   * needs are consumed; trailing bytes are ignored.
   */
  decode(bytes: Uint8Array): void {
    this.decodeFrom(ByteReader.from(bytes));
  }

  /** Decode this field from a byte source, using root() as the Context. */
  decodeFrom(source: ByteSource): void {
    if (this.unit === 'bits') {
      const bits = new BitStreamReader(source);
      this.read(bits, this.root());
      bits.align();
    } else {
      this.read(source, this.root());
    }
  }

  /** Rename the field. Only for use before it is appended to a container. */
  rename(name: string): void {
    this._name = name;
  }

  /** Set the back-reference to the enclosing field. Used by containers. */
  attach(parent: AnyField | undefined): void {
    this._parent = parent;
  }
}
