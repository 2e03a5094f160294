import { KeyNotFoundError, NameConflictError, UnsupportedNestingError } from '../errors';
import { FIELD_SEPARATOR, bytesToHexString, splitPath } from '../helpers';
import type { FieldReader, FieldWriter } from '../helpers';
import { Field } from './Field';
import type { AnyField, Context, FieldUnit } from './Field';

/** Plain-object view of a container's values, keyed by child name. */
export type FieldRecord = { [name: string]: unknown };

/**
 * Abstract ordered, name-indexed collection of fields that is itself a field.
 *
 * Children are kept in wire order; the index only speeds up lookup. A
 * container owns its children; each child points back to it through a
 * non-owning `parent` link used for path and Context resolution.
 */
export abstract class Container<V = FieldRecord> extends Field<V> {
  private readonly _fields: AnyField[] = [];
  private readonly _index = new Map<string, AnyField>();
  // Position of the child being decoded; undefined outside a decode.
  private _readCursor: number | undefined;

  /** Unit a child must nest in to be appended here. */
  protected abstract get childUnit(): FieldUnit;

  /** Append a field after the existing children. */
  append(field: AnyField): void {
    this.insert(field);
  }

  /** Ordered children. */
  fields(): readonly AnyField[] {
    return [...this._fields];
  }

  /** Number of children. */
  get count(): number {
    return this._fields.length;
  }

  /** Whether a direct child with this name exists. */
  has(name: string): boolean {
    return this._index.has(name);
  }

  /**
   * Resolve a dotted path ("a.b.c") one segment at a time, descending into
   * each named child.
   *
   * While this container is being decoded, children after the one in
   * progress are not visible, so a resolver can only see fields that were
   * decoded before it.
   */
  field(path: string): AnyField {
    const [head, rest] = splitPath(path);
    const child = this._index.get(head);
    if (child === undefined) {
      throw new KeyNotFoundError(path, head, this.name);
    }
    if (this._readCursor !== undefined) {
      const position = this._fields.indexOf(child);
      if (position > this._readCursor || (position === this._readCursor && rest === undefined)) {
        throw new KeyNotFoundError(path, head, this.name, 'not yet decoded');
      }
    }
    if (rest === undefined) {
      return child;
    }
    try {
      return child.field(rest);
    } catch (err) {
      if (err instanceof KeyNotFoundError) {
        throw err.under(head + FIELD_SEPARATOR);
      }
      throw err;
    }
  }

  /**
   * Assign by path, handing the rest of the path to the child so that
   * containers below can apply their own assignment rules.
   */
  set(path: string, value: unknown): void {
    const [head, rest] = splitPath(path);
    if (rest === undefined) {
      this.field(head).setValue(value);
    } else {
      this.field(head).set(rest, value);
    }
  }

  /** Dotted paths of every leaf below this container, in wire order. */
  keys(): string[] {
    const keys: string[] = [];
    for (const child of this._fields) {
      const nested = child.keys();
      if (nested.length === 0) {
        keys.push(child.name);
      }
      for (const key of nested) {
        keys.push(child.name + FIELD_SEPARATOR + key);
      }
    }
    return keys;
  }

  /** Sum of the children's sizes. */
  size(): number {
    let size = 0;
    for (const child of this._fields) {
      size += child.size();
    }
    return size;
  }

  /** Child values keyed by child name. */
  values(): FieldRecord {
    const result: FieldRecord = {};
    for (const child of this._fields) {
      result[child.name] = child.value();
    }
    return result;
  }

  /** Assign each entry of `record` to the child of the same name. */
  assign(record: FieldRecord): void {
    for (const [name, value] of Object.entries(record)) {
      this.set(name, value);
    }
  }

  reset(): void {
    for (const child of this._fields) {
      child.reset();
    }
  }

  /** Hex of the encoded container. */
  strValue(): string {
    return bytesToHexString(this.encode());
  }

  strHexValue(): string {
    return this.strValue();
  }

  strEngValue(): string {
    return this.strValue();
  }

  /** Add a child, enforcing unique names and unit compatibility. */
  protected insert(field: AnyField): void {
    if (!field.nestsIn(this.childUnit)) {
      throw new UnsupportedNestingError(
        field.name,
        this.childUnit === 'bits'
          ? `byte fields cannot be placed in bit container '${this.name}'`
          : `bit fields cannot be placed in '${this.name}' (hint: enclose it in a BitStructure)`,
      );
    }
    if (this._index.has(field.name)) {
      throw new NameConflictError(field.name, this.name);
    }
    this._index.set(field.name, field);
    this._fields.push(field);
    field.attach(this);
  }

  /** Remove every child from position `from` onwards. */
  protected truncate(from: number): void {
    for (const child of this._fields.splice(from)) {
      this._index.delete(child.name);
      child.attach(undefined);
    }
  }

  /**
   * Run a decode of this container's children. Children read through
   * readChild() become visible to path lookup one by one.
   */
  protected decodeScope(body: () => void): void {
    this._readCursor = 0;
    try {
      body();
    } finally {
      this._readCursor = undefined;
    }
  }

  protected readChild(child: AnyField, stream: FieldReader, context: Context): void {
    child.read(stream, context);
    if (this._readCursor !== undefined) {
      this._readCursor++;
    }
  }

  protected readChildren(stream: FieldReader, context: Context): void {
    this.decodeScope(() => {
      for (const child of this._fields) {
        this.readChild(child, stream, context);
      }
    });
  }

  protected writeChildren(stream: FieldWriter, context: Context): void {
    for (const child of this._fields) {
      child.write(stream, context);
    }
  }
}
