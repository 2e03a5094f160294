import {
  FieldTypeError,
  LayoutError,
  LengthMismatchError,
  SizeExceededError,
  ValueTooLongError,
} from '../errors';
import { byteSink, byteSource, resolveCount } from '../helpers';
import type { FieldReader, FieldWriter, Resolver } from '../helpers';
import { Container } from './Container';
import type { AnyField, Context, Field, FieldUnit } from './Field';
import { StringField, toBytes } from './StringField';

export interface DataOptions {
  /** Bytes per counted word: a literal or a resolver. Defaults to 1. */
  wordSize?: Resolver;
}

/** Name of the content child. */
export const DATA_FIELD_NAME = 'Data';

/**
 * A length field followed by the bytes it counts.
 *
 * The length field holds the number of words; the content is
 * `length × wordSize` bytes. Assigning the content updates the length field.
 *
 * @example
 * const data = new Data('payload', new UInt8('length'));
 * data.setValue('ABC');
 * data.encode(); // Uint8Array [0x03, 0x41, 0x42, 0x43]
 */
export class Data extends Container<Uint8Array> {
  private readonly lengthField: Field<number>;
  private readonly content: StringField;
  private readonly wordSize: Resolver;

  constructor(name: string, lengthField: Field<number>, options: DataOptions = {}) {
    super(name);
    this.wordSize = options.wordSize ?? 1;
    this.lengthField = lengthField;
    this.content = new StringField(DATA_FIELD_NAME, {
      length: context => lengthField.value() * this.resolvedWordSize(context),
    });
    this.insert(lengthField);
    this.insert(this.content);
  }

  get unit(): FieldUnit {
    return 'bytes';
  }

  protected get childUnit(): FieldUnit {
    return 'bytes';
  }

  /** A Data always has exactly its length field and its content. */
  append(field: AnyField): void {
    throw new LayoutError(`Cannot append '${field.name}' to Data '${this.name}'`);
  }

  value(): Uint8Array {
    return this.content.value();
  }

  /** The content decoded as UTF-8. */
  text(): string {
    return this.content.text();
  }

  setValue(value: Uint8Array | string): void {
    if (typeof value !== 'string' && !(value instanceof Uint8Array)) {
      throw new FieldTypeError(`Field '${this.name}' holds bytes or a string`);
    }
    const bytes = toBytes(value);
    const wordSize = this.resolvedWordSize(this.root());
    if (bytes.length % wordSize !== 0) {
      throw new LengthMismatchError(
        this.name,
        Math.ceil(bytes.length / wordSize) * wordSize,
        bytes.length,
      );
    }
    try {
      this.lengthField.setValue(bytes.length / wordSize);
    } catch (err) {
      if (err instanceof SizeExceededError) {
        throw new ValueTooLongError(this.name, bytes.length, err);
      }
      throw err;
    }
    this.content.setValue(bytes);
  }

  read(stream: FieldReader, context: Context): void {
    this.readChildren(byteSource(stream, this), context);
  }

  write(stream: FieldWriter, context: Context): void {
    this.writeChildren(byteSink(stream, this), context);
  }

  private resolvedWordSize(context: Context): number {
    const wordSize = resolveCount(this.wordSize, context, this.name);
    if (wordSize === 0) {
      throw new LayoutError(`Word size of '${this.name}' must be positive`);
    }
    return wordSize;
  }
}
