export { Binary, isBinary } from './Binary';
export type { BinarySource, BinaryStorage, FormatSpecifier, Ownership } from './Binary';
export type { Endianness, NumericType } from './primitives';
export { NUMERIC_WIDTHS } from './primitives';
export {
  IndexOutOfRangeError,
  RangeOutOfBoundsError,
  ReprParseError,
  isReprParseError,
} from './errors';
export type { ReprParseErrorKind } from './errors';
export { BinaryMap } from './collections/BinaryMap';
export { arrayRepresentation } from './repr/ArrayRepr';
export type { ArrayFormatOptions } from './repr/ArrayRepr';
export {
  formatByte,
  paddedWidthOf,
  prefixOf,
  radixFromPrefixChar,
  radixOf,
} from './repr/RadixFormat';
export type { RadixFormat, ByteSource } from './repr/RadixFormat';
export { parseArrayRepresentation } from './parser';
