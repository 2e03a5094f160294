/**
 * Base class for every error raised while defining, encoding or decoding
 * a layout. Layout-definition mistakes that have no dedicated subclass
 * (zero-width bit fields, negative resolved lengths) throw it directly.
 */
export class LayoutError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A container already holds a child with the same name. */
export class NameConflictError extends LayoutError {
  constructor(readonly fieldName: string, readonly containerName: string) {
    super(`Field '${fieldName}' already exists in '${containerName}'`);
  }
}

/**
 * A dotted path names a segment that does not exist, or, during a decode,
 * one that has not been decoded yet.
 */
export class KeyNotFoundError extends LayoutError {
  constructor(
    readonly path: string,
    readonly segment: string,
    readonly containerName: string,
    readonly reason = 'missing',
  ) {
    super(`Field '${path}' does not exist in '${containerName}' (${reason} '${segment}')`);
  }

  /** The same error, with `prefix` put in front of the path. */
  under(prefix: string): KeyNotFoundError {
    return new KeyNotFoundError(
      prefix + this.path,
      this.segment,
      this.containerName,
      this.reason,
    );
  }
}

/** A non-terminal path segment names a leaf. */
export class NotAContainerError extends LayoutError {
  constructor(readonly fieldName: string, readonly path: string) {
    super(`Field '${fieldName}' is not a container (cannot resolve '${path}')`);
  }
}

/** A value does not fit in the field's declared width. */
export class SizeExceededError extends LayoutError {
  constructor(readonly fieldName: string, detail: string) {
    super(`Value does not fit in '${fieldName}': ${detail}`);
  }
}

/** A value's length differs from the length its resolver reports. */
export class LengthMismatchError extends LayoutError {
  constructor(readonly fieldName: string, readonly expected: number, readonly actual: number) {
    super(`Length mismatch in '${fieldName}' (${expected} expected, ${actual} given)`);
  }
}

/** Data content is longer than its length field can count. */
export class ValueTooLongError extends LayoutError {
  constructor(readonly fieldName: string, readonly length: number, cause?: unknown) {
    super(`Data length ${length} does not fit the length field of '${fieldName}'`, { cause });
  }
}

/** The byte source ran out before the requested count was read. */
export class StreamLengthMismatchError extends LayoutError {
  constructor(readonly expected: number, readonly actual: number) {
    super(`Stream length mismatch (${expected} expected, ${actual} available)`);
  }
}

/** A field or value is of the wrong concrete type. */
export class FieldTypeError extends LayoutError {}

/** A MetaField was accessed before decode or bind created its delegate. */
export class NotMaterializedError extends LayoutError {
  constructor(readonly fieldName: string) {
    super(`No field created for MetaField '${fieldName}'`);
  }
}

/** A field was placed in a container of the other unit. */
export class UnsupportedNestingError extends LayoutError {
  constructor(readonly fieldName: string, detail: string) {
    super(`Cannot nest '${fieldName}': ${detail}`);
  }
}

/** An element index lies beyond one past the end of the array. */
export class IndexOutOfRangeError extends LayoutError {
  constructor(readonly index: number, readonly length: number) {
    super(`Index ${index} must be <= ${length}`);
  }
}

/** A field derived from other state was assigned directly. */
export class ReadOnlyFieldError extends LayoutError {
  constructor(readonly fieldName: string) {
    super(`Field '${fieldName}' is maintained by its container and cannot be assigned`);
  }
}
