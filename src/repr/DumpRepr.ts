/**
 * Dump layout: one line per row of bytes, each prefixed with its offset and
 * followed by a character gutter.
 *
 *   0X       00 01 02 03 04 05 06 07 - 08 09 0A 0B 0C 0D 0E 0F
 *   000000:  48 65 6C 6C 6F 20 57 6F - 72 6C 64 21              |Hello World!|
 *
 * The header line lists column indices in the byte radix. Offsets use the
 * index radix, zero-filled to 6 hex or 8 decimal/octal digits. Gutter
 * characters outside printable ASCII render as `.`, or with `extendedAscii`
 * as Unicode control pictures and Latin-1 glyphs.
 *
 * `headerUnderline` draws a rule under the column indices, and `lineNumbers:
 * false` drops the offset column.
 *
 * Compact output drops the header, the column separator, the alignment
 * padding and the leading zeros of each byte.
 */
import { paintByte, paintComponent } from './color';
import { formatByte, formatDigits, paddedWidthOf, prefixOf, viewOf } from './RadixFormat';
import type { ByteSource, RadixFormat } from './RadixFormat';

/** Offsets are never rendered in binary; the lines would be unreadably wide. */
export type DumpIndexRadix = Exclude<RadixFormat, 'binary'>;

export type DumpColumnWidth = 8 | 16 | 32;

export interface DumpFormatOptions {
  /** Byte radix. Defaults to `upperHex`. */
  radix?: RadixFormat;
  /** Offset radix. Defaults to `upperHex`. */
  indexRadix?: DumpIndexRadix;
  /** Bytes per column. Defaults to 8. */
  columnWidth?: DumpColumnWidth;
  /** Two columns per line. Defaults to true. */
  twoColumns?: boolean;
  /** Column index header. Defaults to true. */
  headerLine?: boolean;
  /** Character repeated under the column index header, e.g. `─`. Defaults to null (no rule). */
  headerUnderline?: string | null;
  /** Offset at the start of each line. Defaults to true. */
  lineNumbers?: boolean;
  /** Character gutter after the bytes. Defaults to true. */
  asciiGutter?: boolean;
  /** Render control bytes and Latin-1 in the gutter instead of `.`. */
  extendedAscii?: boolean;
  /** Character between the two columns. Defaults to `-`. */
  columnSeparator?: string;
  compact?: boolean;
  colored?: boolean;
}

type ResolvedDumpOptions = Required<DumpFormatOptions>;

const PLACEHOLDER = '.';
const CONTROL_PICTURES_BASE = 0x2400;
const DELETE_PICTURE = '␡';
const NBSP_PICTURE = '⍽';

function resolve(options: DumpFormatOptions): ResolvedDumpOptions {
  return {
    radix: options.radix ?? 'upperHex',
    indexRadix: options.indexRadix ?? 'upperHex',
    columnWidth: options.columnWidth ?? 8,
    twoColumns: options.twoColumns ?? true,
    headerLine: options.headerLine ?? true,
    headerUnderline: options.headerUnderline ?? null,
    lineNumbers: options.lineNumbers ?? true,
    asciiGutter: options.asciiGutter ?? true,
    extendedAscii: options.extendedAscii ?? false,
    columnSeparator: options.columnSeparator ?? '-',
    compact: options.compact ?? false,
    colored: options.colored ?? false,
  };
}

/** Terminal columns taken by `text`, counting each code point once. */
function displayWidth(text: string): number {
  return [...text].length;
}

/** Offset digits: 6 for hex, 8 for decimal and octal. */
export function lineIndexWidth(indexRadix: DumpIndexRadix): number {
  return indexRadix === 'lowerHex' || indexRadix === 'upperHex' ? 6 : 8;
}

/** Gutter glyph for a byte. */
export function gutterChar(byte: number, extendedAscii: boolean): string {
  if (byte >= 0x20 && byte <= 0x7e && !(extendedAscii && byte === 0x20)) {
    return String.fromCharCode(byte);
  }
  if (!extendedAscii) return PLACEHOLDER;
  if (byte <= 0x20) return String.fromCharCode(CONTROL_PICTURES_BASE + byte);
  if (byte === 0x7f) return DELETE_PICTURE;
  if (byte === 0xa0) return NBSP_PICTURE;
  if (byte > 0xa0 && byte !== 0xad) return String.fromCharCode(byte);
  return PLACEHOLDER;
}

class DumpWriter {
  private readonly opts: ResolvedDumpOptions;
  private readonly columns: number;
  private readonly bytesPerLine: number;

  constructor(opts: ResolvedDumpOptions) {
    this.opts = opts;
    this.columns = opts.twoColumns && !opts.compact ? 2 : 1;
    this.bytesPerLine = opts.columnWidth * (opts.twoColumns ? 2 : 1);
  }

  write(bytes: Uint8Array): string {
    const lines: string[] = [];
    if (this.opts.headerLine && !this.opts.compact) {
      lines.push(this.headerLine());
      const underline = this.headerUnderline();
      if (underline !== null) lines.push(underline);
    }
    for (let offset = 0; offset < bytes.length; offset += this.bytesPerLine) {
      lines.push(this.dataLine(offset, bytes.subarray(offset, offset + this.bytesPerLine)));
    }
    return lines.join('\n');
  }

  private get separator(): string {
    const { columnSeparator, colored } = this.opts;
    return ` ${paintComponent('separator', columnSeparator, colored)} `;
  }

  /** Plain-text width of a full row of values, used to align the gutter. */
  private get valueAreaWidth(): number {
    const { columnWidth, radix, columnSeparator } = this.opts;
    const columnText = columnWidth * paddedWidthOf(radix) + (columnWidth - 1);
    return this.columns === 2 ? columnText * 2 + displayWidth(columnSeparator) + 2 : columnText;
  }

  /** Blank space standing in for the offset label on header lines. */
  private get labelIndent(): string {
    const { indexRadix, lineNumbers } = this.opts;
    return lineNumbers ? ' '.repeat(lineIndexWidth(indexRadix) + 3) : '';
  }

  private headerLine(): string {
    const { radix, indexRadix, columnWidth, colored } = this.opts;
    const indices = Array.from({ length: this.bytesPerLine }, (_, i) =>
      paintComponent('index', formatDigits(i, radix, false), colored)
    );
    const area = this.joinColumns(indices, columnWidth);
    if (!this.opts.lineNumbers) return area;
    const label = prefixOf(radix).padEnd(lineIndexWidth(indexRadix) + 1);
    return `${paintComponent('prefix', label, colored)}  ${area}`;
  }

  private headerUnderline(): string | null {
    const { headerUnderline, columnWidth, radix, colored } = this.opts;
    if (!headerUnderline) return null;
    const char = [...headerUnderline][0];
    const width = columnWidth * paddedWidthOf(radix) + (columnWidth - 1);
    const rule = paintComponent('separator', char.repeat(width), colored);
    const rules = this.columns === 2 ? [rule, rule] : [rule];
    return this.labelIndent + rules.join(this.separator);
  }

  private dataLine(offset: number, row: Uint8Array): string {
    const { radix, indexRadix, columnWidth, asciiGutter, extendedAscii, lineNumbers, compact, colored } = this.opts;
    const index = formatDigits(offset, indexRadix, false, lineIndexWidth(indexRadix));
    const label = paintComponent('index', `${index}:`, colored);

    const values = Array.from(row, byte => paintByte(byte, formatByte(byte, radix, compact), colored));
    if (compact) {
      const body = lineNumbers ? `${label} ${values.join(' ')}` : values.join(' ');
      return asciiGutter ? `${body} ${this.gutter(row, extendedAscii)}` : body;
    }

    const lead = lineNumbers ? `${label}  ` : '';
    const area = this.joinColumns(values, columnWidth);
    if (!asciiGutter) return `${lead}${area}`;
    const plainWidth = this.plainAreaWidth(row.length);
    const padding = ' '.repeat(this.valueAreaWidth - plainWidth);
    return `${lead}${area}${padding}  ${this.gutter(row, extendedAscii)}`;
  }

  private joinColumns(tokens: string[], columnWidth: number): string {
    const first = tokens.slice(0, columnWidth).join(' ');
    if (this.columns === 1 || tokens.length <= columnWidth) return first;
    return first + this.separator + tokens.slice(columnWidth).join(' ');
  }

  private plainAreaWidth(count: number): number {
    const { columnWidth, radix, columnSeparator } = this.opts;
    const width = paddedWidthOf(radix);
    const textWidth = (n: number): number => (n === 0 ? 0 : n * width + (n - 1));
    if (this.columns === 1 || count <= columnWidth) return textWidth(count);
    return textWidth(columnWidth) + displayWidth(columnSeparator) + 2 + textWidth(count - columnWidth);
  }

  private gutter(row: Uint8Array, extendedAscii: boolean): string {
    const { colored } = this.opts;
    const bar = paintComponent('delimiter', '|', colored);
    const chars = Array.from(row, byte => paintByte(byte, gutterChar(byte, extendedAscii), colored));
    return `${bar}${chars.join('')}${bar}`;
  }
}

export function dumpRepresentation(value: ByteSource, options: DumpFormatOptions = {}): string {
  return new DumpWriter(resolve(options)).write(viewOf(value));
}

// -- Presets --

/** Upper hex bytes and offsets, two columns of 8, no gutter. */
export function classicHexDump(): DumpFormatOptions {
  return { radix: 'upperHex', indexRadix: 'upperHex', columnWidth: 8, twoColumns: true, asciiGutter: false };
}

/** Upper hex bytes and offsets, two columns of 8, with gutter. */
export function hexDump(): DumpFormatOptions {
  return { radix: 'upperHex', indexRadix: 'upperHex', columnWidth: 8, twoColumns: true, asciiGutter: true };
}

/** Hex dump whose gutter shows control pictures and Latin-1 glyphs. */
export function asciiHexDump(): DumpFormatOptions {
  return { ...hexDump(), extendedAscii: true };
}

export function lowerHexDump(): DumpFormatOptions {
  return { ...hexDump(), radix: 'lowerHex', indexRadix: 'lowerHex' };
}

export function octalDump(): DumpFormatOptions {
  return { ...hexDump(), radix: 'octal', indexRadix: 'octal' };
}

export function decimalDump(): DumpFormatOptions {
  return { ...hexDump(), radix: 'decimal', indexRadix: 'decimal' };
}

/** Binary bytes with hex offsets, one column of 8. */
export function binaryDump(): DumpFormatOptions {
  return { ...hexDump(), radix: 'binary', twoColumns: false };
}
