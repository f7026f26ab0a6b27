export { arrayRepresentation } from './ArrayRepr';
export type { ArrayFormatOptions } from './ArrayRepr';
export { stringRepresentation } from './StringRepr';
export type { StringFormatOptions } from './StringRepr';
export {
  dumpRepresentation,
  classicHexDump,
  hexDump,
  asciiHexDump,
  lowerHexDump,
  octalDump,
  decimalDump,
  binaryDump,
  gutterChar,
  lineIndexWidth,
} from './DumpRepr';
export type { DumpFormatOptions, DumpColumnWidth, DumpIndexRadix } from './DumpRepr';
export { base64Representation } from './Base64Repr';
export type { Base64FormatOptions } from './Base64Repr';
export { format } from './format';
export type { BinaryFormat, BinaryStyle } from './format';
export {
  formatByte,
  formatDigits,
  paddedWidthOf,
  prefixOf,
  radixFromPrefixChar,
  radixOf,
} from './RadixFormat';
export type { RadixFormat, ByteSource } from './RadixFormat';
export { byteKindOf } from './color';
export type { ByteKind, ReprComponentKind } from './color';
export {
  parseArrayRepresentation,
  parseStringRepresentation,
  parseBase64Representation,
  parseRepresentation,
} from '../parser/ReprParser';
