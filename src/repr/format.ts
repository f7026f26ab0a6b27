import { arrayRepresentation } from './ArrayRepr';
import type { ArrayFormatOptions } from './ArrayRepr';
import { base64Representation } from './Base64Repr';
import type { Base64FormatOptions } from './Base64Repr';
import { dumpRepresentation } from './DumpRepr';
import type { DumpFormatOptions } from './DumpRepr';
import type { ByteSource } from './RadixFormat';
import { stringRepresentation } from './StringRepr';
import type { StringFormatOptions } from './StringRepr';

/** A layout together with its options. */
export type BinaryFormat =
  | ({ style: 'array' } & ArrayFormatOptions)
  | ({ style: 'string' } & StringFormatOptions)
  | ({ style: 'dump' } & DumpFormatOptions)
  | ({ style: 'base64' } & Base64FormatOptions);

export type BinaryStyle = BinaryFormat['style'];

/** Render `value` in whichever layout `spec` selects. */
export function format(value: ByteSource, spec: BinaryFormat): string {
  switch (spec.style) {
    case 'array':
      return arrayRepresentation(value, spec);
    case 'string':
      return stringRepresentation(value, spec);
    case 'dump':
      return dumpRepresentation(value, spec);
    case 'base64':
      return base64Representation(value, spec);
  }
}
