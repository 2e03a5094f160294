import { LengthMismatchError } from '../errors';
import { byteSource, resolveCount } from '../helpers';
import type { FieldReader, FieldWriter, Resolver } from '../helpers';
import type { AnyField, Context, FieldFactory } from './Field';
import { RepeatedStructure } from './RepeatedStructure';

/**
 * Repeated group whose element count comes from a resolver, typically the
 * value of a field decoded earlier:
 *
 * ```ts
 * packet.append(new UInt8('n'));
 * packet.append(new MetaStructure('items', ctx => ctx.numberAt('n'), () => new UInt16('item')));
 * ```
 */
export class MetaStructure<E extends AnyField = AnyField> extends RepeatedStructure<E> {
  private readonly countResolver: Resolver;

  constructor(name: string, count: Resolver, factory: FieldFactory<E>) {
    super(name, factory);
    this.countResolver = count;
  }

  read(stream: FieldReader, context: Context): void {
    const source = byteSource(stream, this);
    this.reset();
    const count = resolveCount(this.countResolver, context, this.name);
    this.decodeScope(() => this.readElements(source, count, context));
  }

  write(stream: FieldWriter, context: Context): void {
    const expected = resolveCount(this.countResolver, context, this.name);
    if (expected !== this.length) {
      throw new LengthMismatchError(this.name, expected, this.length);
    }
    super.write(stream, context);
  }
}
