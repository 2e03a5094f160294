import { FieldTypeError, IndexOutOfRangeError, KeyNotFoundError } from '../errors';
import { splitPath } from '../helpers';
import type { ByteSource } from '../ByteStream';
import type { AnyField, Context, FieldFactory } from './Field';
import { Structure } from './Structure';

/** Names given to elements: their zero-based index. */
export const INDEX_PATTERN = /^\d+$/;

/**
 * Structure whose trailing children are elements built by a factory and named
 * by their zero-based index ("0", "1", ...). Elements are recreated on every
 * decode.
 */
export abstract class RepeatedStructure<E extends AnyField = AnyField> extends Structure {
  private readonly factory: FieldFactory<E>;
  private _elements: E[] = [];

  constructor(name: string, factory: FieldFactory<E>) {
    super(name);
    this.factory = factory;
  }

  /** Number of elements. */
  get length(): number {
    return this._elements.length;
  }

  elements(): readonly E[] {
    return [...this._elements];
  }

  element(index: number): E {
    const element = this._elements[index];
    if (element === undefined) {
      throw new KeyNotFoundError(String(index), String(index), this.name);
    }
    return element;
  }

  /**
   * Append an element. It must be of the kind the factory builds; it is
   * renamed to its index.
   */
  append(field: E): void {
    const sample = this.factory(this.root());
    if (!sample.isSameKind(field)) {
      throw new FieldTypeError(
        `Field '${field.name}' is not of the element type of '${this.name}'`,
      );
    }
    this.elementsChanged(this._elements.length + 1);
    this.adopt(field);
  }

  /**
   * Assign by path. An index equal to the current length appends a new
   * element from the factory first; a larger index is rejected.
   */
  set(path: string, value: unknown): void {
    const [head] = splitPath(path);
    if (INDEX_PATTERN.test(head)) {
      const index = Number(head);
      if (index > this.length) {
        throw new IndexOutOfRangeError(index, this.length);
      }
      if (index === this.length) {
        this.append(this.factory(this.root()));
      }
    }
    super.set(path, value);
  }

  /** Drop every element. */
  reset(): void {
    this.truncate(this.count - this._elements.length);
    this._elements = [];
    super.reset();
  }

  /** Called with the new element count before an element is appended. */
  protected elementsChanged(length: number): void {}

  /** Build `count` elements from the factory, decoding each in turn. */
  protected readElements(source: ByteSource, count: number, context: Context): void {
    for (let i = 0; i < count; i++) {
      const element = this.factory(context);
      this.adopt(element);
      this.readChild(element, source, context);
    }
  }

  private adopt(element: E): void {
    element.rename(String(this._elements.length));
    this.insert(element);
    this._elements.push(element);
  }
}
