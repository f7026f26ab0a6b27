import type { Binary } from '../Binary';

/** Number base used to render each byte. */
export type RadixFormat = 'binary' | 'octal' | 'decimal' | 'lowerHex' | 'upperHex';

/** Anything a representation can be rendered from. */
export type ByteSource = Binary | Uint8Array;

interface RadixInfo {
  radix: number;
  width: number;
  prefix: string;
  upper: boolean;
}

const RADIX_INFO: Readonly<Record<RadixFormat, RadixInfo>> = {
  binary: { radix: 2, width: 8, prefix: '0b', upper: false },
  octal: { radix: 8, width: 3, prefix: '0o', upper: false },
  decimal: { radix: 10, width: 3, prefix: '0d', upper: false },
  lowerHex: { radix: 16, width: 2, prefix: '0x', upper: false },
  upperHex: { radix: 16, width: 2, prefix: '0X', upper: true },
};

/** Bytes of a source without copying. */
export function viewOf(source: ByteSource): Uint8Array {
  return 'asView' in source ? source.asView() : source;
}

/** Numeric radix: 2, 8, 10 or 16. */
export function radixOf(format: RadixFormat): number {
  return RADIX_INFO[format].radix;
}

/** Digits needed for the largest byte value: 8, 3, 3 or 2. */
export function paddedWidthOf(format: RadixFormat): number {
  return RADIX_INFO[format].width;
}

/** Radix prefix: `0b`, `0o`, `0d`, `0x` or `0X`. */
export function prefixOf(format: RadixFormat): string {
  return RADIX_INFO[format].prefix;
}

/** Map the character after a leading `0` back to its radix format. */
export function radixFromPrefixChar(char: string): RadixFormat | undefined {
  switch (char) {
    case 'b': return 'binary';
    case 'o': return 'octal';
    case 'd': return 'decimal';
    case 'x': return 'lowerHex';
    case 'X': return 'upperHex';
    default: return undefined;
  }
}

/**
 * Render a non-negative integer in the given radix.
 * Padded output is zero-filled to `width`; compact output has no leading zeros.
 */
export function formatDigits(value: number, format: RadixFormat, compact: boolean, width = paddedWidthOf(format)): string {
  const info = RADIX_INFO[format];
  const digits = value.toString(info.radix);
  const cased = info.upper ? digits.toUpperCase() : digits;
  return compact ? cased : cased.padStart(width, '0');
}

/** Render one byte (0..255), e.g. 0x21 as `00100001`, `041`, `033` or `21`. */
export function formatByte(byte: number, format: RadixFormat, compact: boolean): string {
  return formatDigits(byte, format, compact);
}
