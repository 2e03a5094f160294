import { FieldTypeError, NotMaterializedError } from '../errors';
import type { FieldReader, FieldWriter } from '../helpers';
import { Field } from './Field';
import type { AnyField, CalibrationCurve, Context, FieldFactory, FieldUnit } from './Field';

export interface MetaFieldOptions {
  /** Unit of the fields the factory builds; decides where this slot may nest. */
  unit?: FieldUnit;
}

/**
 * A slot whose concrete field is chosen when it is decoded, by calling the
 * factory with the Context:
 *
 * ```ts
 * packet.append(new UInt8('kind'));
 * packet.append(new MetaField('body', ctx =>
 *   ctx.numberAt('kind') === 1 ? new UInt16('body') : new UInt32('body')));
 * ```
 *
 * Until a decode or bind() has created the field, every accessor throws
 * NotMaterializedError. Each decode builds a new field.
 */
export class MetaField<F extends AnyField = AnyField> extends Field<unknown> {
  private readonly factory: FieldFactory<F>;
  private readonly declaredUnit: FieldUnit;
  private _delegate: F | undefined;

  constructor(name: string, factory: FieldFactory<F>, options: MetaFieldOptions = {}) {
    super(name);
    this.factory = factory;
    this.declaredUnit = options.unit ?? 'bytes';
    this._delegate = undefined;
  }

  get unit(): FieldUnit {
    return this.declaredUnit;
  }

  get materialized(): boolean {
    return this._delegate !== undefined;
  }

  /** The materialized field. */
  delegate(): F {
    if (this._delegate === undefined) {
      throw new NotMaterializedError(this.name);
    }
    return this._delegate;
  }

  /**
   * Materialize without decoding, e.g. to fill in values before encoding.
   * With no argument the factory builds the field from the current root;
   * a given field must be of the kind the factory builds.
   */
  bind(field?: F): F {
    if (field !== undefined && !this.factory(this.root()).isSameKind(field)) {
      throw new FieldTypeError(`Field '${field.name}' cannot be bound to MetaField '${this.name}'`);
    }
    const delegate = field ?? this.factory(this.root());
    this.adopt(delegate);
    return delegate;
  }

  size(): number {
    return this.delegate().size();
  }

  value(): unknown {
    return this.delegate().value();
  }

  setValue(value: unknown): void {
    this.delegate().setValue(value);
  }

  fields(): readonly AnyField[] {
    return this.delegate().fields();
  }

  keys(): string[] {
    return this.delegate().keys();
  }

  field(path: string): AnyField {
    return this.delegate().field(path);
  }

  set(path: string, value: unknown): void {
    this.delegate().set(path, value);
  }

  strValue(): string {
    return this.delegate().strValue();
  }

  strHexValue(): string {
    return this.delegate().strHexValue();
  }

  strEngValue(): string {
    return this.delegate().strEngValue();
  }

  engValue(): unknown {
    return this.delegate().engValue();
  }

  calibrationCurve(): CalibrationCurve<unknown> | undefined {
    return this.delegate().calibrationCurve();
  }

  setCalibrationCurve(curve: CalibrationCurve<unknown> | undefined): void {
    this.delegate().setCalibrationCurve(curve);
  }

  read(stream: FieldReader, context: Context): void {
    this._delegate = undefined;
    const delegate = this.factory(context);
    this.adopt(delegate);
    delegate.read(stream, context);
  }

  write(stream: FieldWriter, context: Context): void {
    this.delegate().write(stream, context);
  }

  nestsIn(unit: FieldUnit): boolean {
    return unit === this.declaredUnit;
  }

  /** The materialized field, or a fresh one from the factory. */
  concrete(): AnyField {
    return this._delegate ?? this.factory(this.root());
  }

  isSameKind(other: AnyField): boolean {
    return this.concrete().isSameKind(other);
  }

  reset(): void {
    this._delegate = undefined;
  }

  rename(name: string): void {
    super.rename(name);
    this._delegate?.rename(name);
  }

  attach(parent: AnyField | undefined): void {
    super.attach(parent);
    this._delegate?.attach(parent);
  }

  private adopt(delegate: F): void {
    if (!delegate.nestsIn(this.declaredUnit)) {
      throw new FieldTypeError(
        `Field built for MetaField '${this.name}' does not measure in ${this.declaredUnit}`,
      );
    }
    delegate.rename(this.name);
    delegate.attach(this.parent);
    this._delegate = delegate;
  }
}
