/**
 * Array layout: bytes separated by commas inside square brackets, after a
 * radix prefix.
 *
 *   padded:  0x[48, 65, 6c, 6c, 6f]
 *   compact: 0x[48,65,6c,6c,6f]
 *
 * Compact output has no whitespace and drops leading zeros from each byte.
 */
import { paintByte, paintComponent } from './color';
import { formatByte, prefixOf, viewOf } from './RadixFormat';
import type { ByteSource, RadixFormat } from './RadixFormat';

export interface ArrayFormatOptions {
  /** Defaults to `upperHex`. */
  radix?: RadixFormat;
  compact?: boolean;
  colored?: boolean;
}

export function arrayRepresentation(value: ByteSource, options: ArrayFormatOptions = {}): string {
  const radix = options.radix ?? 'upperHex';
  const compact = options.compact ?? false;
  const colored = options.colored ?? false;

  const prefix = paintComponent('prefix', prefixOf(radix), colored);
  const open = paintComponent('delimiter', '[', colored);
  const close = paintComponent('delimiter', ']', colored);
  const comma = paintComponent('separator', ',', colored) + (compact ? '' : ' ');

  const items = Array.from(viewOf(value), byte =>
    paintByte(byte, formatByte(byte, radix, compact), colored)
  );
  return `${prefix}${open}${items.join(comma)}${close}`;
}
