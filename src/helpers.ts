import type { ByteSink, ByteSource } from './ByteStream';
import { BitStreamReader, BitStreamWriter } from './BitStream';
import { LayoutError, UnsupportedNestingError } from './errors';
import type { AnyField, Context } from './fields/Field';

/** Separator between segments of a field path ("ip.header.version"). */
export const FIELD_SEPARATOR = '.';

/** Stream handed to Field.read(): whole bytes, or bits inside a BitStructure. */
export type FieldReader = ByteSource | BitStreamReader;

/** Stream handed to Field.write(): whole bytes, or bits inside a BitStructure. */
export type FieldWriter = ByteSink | BitStreamWriter;

/**
 * A length or count: either a literal, or a function of the Context that is
 * evaluated when the value is needed (typically mid-decode, after the fields
 * it reads have been decoded).
 */
export type Resolver = number | ((context: Context) => number);

/** Evaluate a resolver and check that it produced a usable length. */
export function resolveCount(resolver: Resolver, context: Context, fieldName: string): number {
  const count = typeof resolver === 'function' ? resolver(context) : resolver;
  if (!Number.isInteger(count) || count < 0) {
    throw new LayoutError(
      `Resolved length for '${fieldName}' must be a non-negative integer, got ${count}`,
    );
  }
  return count;
}

/** Number of bytes needed to hold `bitSize` bits. */
export function byteEnd(bitSize: number): number {
  return Math.ceil(bitSize / 8);
}

/** "0x" followed by uppercase hex digits, zero-padded to `byteSize` bytes. */
export function hexString(value: number | bigint, byteSize: number): string {
  return '0x' + value.toString(16).toUpperCase().padStart(byteSize * 2, '0');
}

/** "0x" followed by two uppercase hex digits per byte; empty for no bytes. */
export function bytesToHexString(bytes: Uint8Array): string {
  if (bytes.length === 0) return '';
  return '0x' + Array.from(bytes)
    .map(b => b.toString(16).toUpperCase().padStart(2, '0'))
    .join('');
}

/** Split a path into its first segment and the (possibly empty) rest. */
export function splitPath(path: string): [head: string, rest: string | undefined] {
  const sep = path.indexOf(FIELD_SEPARATOR);
  if (sep < 0) return [path, undefined];
  return [path.slice(0, sep), path.slice(sep + 1)];
}

export function byteSource(stream: FieldReader, field: AnyField): ByteSource {
  if (stream instanceof BitStreamReader) {
    throw new UnsupportedNestingError(field.name, 'byte fields cannot be read from a bit stream');
  }
  return stream;
}

export function byteSink(stream: FieldWriter, field: AnyField): ByteSink {
  if (stream instanceof BitStreamWriter) {
    throw new UnsupportedNestingError(field.name, 'byte fields cannot be written to a bit stream');
  }
  return stream;
}

export function bitReader(stream: FieldReader, field: AnyField): BitStreamReader {
  if (!(stream instanceof BitStreamReader)) {
    throw new UnsupportedNestingError(
      field.name,
      'bit fields need a bit stream (hint: enclose it in a BitStructure)',
    );
  }
  return stream;
}

export function bitWriter(stream: FieldWriter, field: AnyField): BitStreamWriter {
  if (!(stream instanceof BitStreamWriter)) {
    throw new UnsupportedNestingError(
      field.name,
      'bit fields need a bit stream (hint: enclose it in a BitStructure)',
    );
  }
  return stream;
}
