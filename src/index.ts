export { ByteReader, ByteWriter, bytesToHex, hexToBytes } from './ByteStream';
export type { ByteSink, ByteSource } from './ByteStream';
export { BitStreamReader, BitStreamWriter } from './BitStream';
export {
  FieldTypeError,
  IndexOutOfRangeError,
  KeyNotFoundError,
  LayoutError,
  LengthMismatchError,
  NameConflictError,
  NotAContainerError,
  NotMaterializedError,
  ReadOnlyFieldError,
  SizeExceededError,
  StreamLengthMismatchError,
  UnsupportedNestingError,
  ValueTooLongError,
} from './errors';
export { FIELD_SEPARATOR, byteEnd, hexString } from './helpers';
export type { FieldReader, FieldWriter, Resolver } from './helpers';
export { NumericCodec } from './codecs/NumericCodec';
export type { Endianness, FloatBits, IntegerBits, NumericFormat } from './codecs/NumericCodec';
export { Field } from './fields/Field';
export type { AnyField, CalibrationCurve, Context, FieldFactory, FieldUnit } from './fields/Field';
export {
  Value,
  Int8,
  UInt8,
  Int16,
  Int16BE,
  Int16LE,
  UInt16,
  UInt16BE,
  UInt16LE,
  Int32,
  Int32BE,
  Int32LE,
  UInt32,
  UInt32BE,
  UInt32LE,
  Int64,
  Int64BE,
  Int64LE,
  UInt64,
  UInt64BE,
  UInt64LE,
  Float,
  FloatBE,
  FloatLE,
  Double,
  DoubleBE,
  DoubleLE,
} from './fields/Value';
export type { NumericType } from './fields/Value';
export { BitField, BooleanField, Flag, MAX_BIT_FIELD_WIDTH } from './fields/BitField';
export { StringField } from './fields/StringField';
export type { StringFieldOptions } from './fields/StringField';
export { Container } from './fields/Container';
export type { FieldRecord } from './fields/Container';
export { Structure } from './fields/Structure';
export { BitStructure } from './fields/BitStructure';
export { Data, DATA_FIELD_NAME } from './fields/Data';
export type { DataOptions } from './fields/Data';
export { RepeatedStructure } from './fields/RepeatedStructure';
export { ArrayField } from './fields/ArrayField';
export { MetaStructure } from './fields/MetaStructure';
export { MetaField } from './fields/MetaField';
export type { MetaFieldOptions } from './fields/MetaField';
export { Mask, MaskValue, Mask8, Mask16, Mask32, Mask64 } from './fields/Mask';
export type { MaskArithmetic, MaskBit, MaskBitFactory, MaskOptions } from './fields/Mask';
