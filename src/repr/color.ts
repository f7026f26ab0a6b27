import chalk from 'chalk';

/** How a byte reads when taken as an ISO 8859-1 character. */
export type ByteKind = 'control' | 'printable' | 'printableExtended' | 'undefined';

/** Structural parts of a representation other than byte values. */
export type ReprComponentKind = 'prefix' | 'delimiter' | 'separator' | 'index';

// Fixed at 16-color ANSI so output is identical on every terminal and in CI.
const ansi = new chalk.Instance({ level: 1 });

const BYTE_STYLES: Readonly<Record<ByteKind, chalk.Chalk>> = {
  control: ansi.redBright.bold,
  printable: ansi.green.bold,
  printableExtended: ansi.green,
  undefined: ansi.yellow,
};

const COMPONENT_STYLES: Readonly<Record<ReprComponentKind, chalk.Chalk | null>> = {
  prefix: null,
  delimiter: ansi.dim,
  separator: ansi.dim,
  index: ansi.dim,
};

export function byteKindOf(byte: number): ByteKind {
  if (byte <= 0x20 || byte === 0x7f || byte === 0xa0 || byte === 0xad) return 'control';
  if (byte < 0x7f) return 'printable';
  if (byte < 0xa0) return 'undefined';
  return 'printableExtended';
}

/** Wrap a rendered byte token in the color of its byte kind. */
export function paintByte(byte: number, text: string, colored: boolean): string {
  return colored ? BYTE_STYLES[byteKindOf(byte)](text) : text;
}

/** Wrap a structural token (bracket, separator, index...) in its color. */
export function paintComponent(kind: ReprComponentKind, text: string, colored: boolean): string {
  const style = COMPONENT_STYLES[kind];
  return colored && style ? style(text) : text;
}
