/**
 * String layout: bytes joined by underscores inside double quotes, after a
 * radix prefix.
 *
 *   padded:  0x"48_65_6c_6c_6f"
 *   compact: 0x"48656c6c6f"
 *
 * Compact output drops the underscores and the zero padding of each byte,
 * as the array layout does. Such a run reads back only when every byte has
 * the full width of its radix.
 */
import { paintByte, paintComponent } from './color';
import { formatByte, prefixOf, viewOf } from './RadixFormat';
import type { ByteSource, RadixFormat } from './RadixFormat';

export interface StringFormatOptions {
  /** Defaults to `upperHex`. */
  radix?: RadixFormat;
  compact?: boolean;
  colored?: boolean;
}

export function stringRepresentation(value: ByteSource, options: StringFormatOptions = {}): string {
  const radix = options.radix ?? 'upperHex';
  const compact = options.compact ?? false;
  const colored = options.colored ?? false;

  const prefix = paintComponent('prefix', prefixOf(radix), colored);
  const quote = paintComponent('delimiter', '"', colored);
  const underscore = compact ? '' : paintComponent('separator', '_', colored);

  const items = Array.from(viewOf(value), byte =>
    paintByte(byte, formatByte(byte, radix, compact), colored)
  );
  return `${prefix}${quote}${items.join(underscore)}${quote}`;
}

export { parseStringRepresentation } from '../parser/ReprParser';
