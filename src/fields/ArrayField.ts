import { LayoutError, LengthMismatchError, ReadOnlyFieldError } from '../errors';
import { byteSource, resolveCount, splitPath } from '../helpers';
import type { FieldReader, FieldWriter } from '../helpers';
import type { FieldRecord } from './Container';
import type { AnyField, Context, Field, FieldFactory } from './Field';
import { INDEX_PATTERN, RepeatedStructure } from './RepeatedStructure';

/**
 * Counted repeated group: a counter field followed by that many elements.
 *
 * The counter always equals the number of elements. Appending advances it;
 * decoding reads it and then builds exactly that many elements.
 *
 * @example
 * const values = new ArrayField('values', new UInt8('count'), () => new UInt32('value'));
 * values.decode(Uint8Array.of(0x02, 0, 0, 0, 0x0a, 0, 0, 0, 0x14));
 * values.get('1'); // 20
 */
export class ArrayField<E extends AnyField = AnyField> extends RepeatedStructure<E> {
  private readonly counter: Field<number>;

  constructor(name: string, counter: Field<number>, factory: FieldFactory<E>) {
    super(name, factory);
    if (INDEX_PATTERN.test(counter.name)) {
      throw new LayoutError(`Counter of '${name}' cannot be named like an element index ('${counter.name}')`);
    }
    this.counter = counter;
    counter.setValue(0);
    this.insert(counter);
  }

  set(path: string, value: unknown): void {
    const [head] = splitPath(path);
    if (head === this.counter.name) {
      throw new ReadOnlyFieldError(this.counter.name);
    }
    super.set(path, value);
  }

  /** Assign elements by index; the counter entry of a record is ignored. */
  setValue(value: FieldRecord): void {
    for (const [name, item] of Object.entries(value)) {
      if (name !== this.counter.name) {
        this.set(name, item);
      }
    }
  }

  reset(): void {
    super.reset();
    this.counter.setValue(0);
  }

  read(stream: FieldReader, context: Context): void {
    const source = byteSource(stream, this);
    this.reset();
    this.decodeScope(() => {
      this.readChild(this.counter, source, context);
      this.readElements(source, resolveCount(this.counter.value(), context, this.name), context);
    });
  }

  /** Encoding fails if the counter was changed behind the array's back. */
  write(stream: FieldWriter, context: Context): void {
    const count = this.counter.value();
    if (count !== this.length) {
      throw new LengthMismatchError(this.name, count, this.length);
    }
    super.write(stream, context);
  }

  protected elementsChanged(length: number): void {
    this.counter.setValue(length);
  }
}
