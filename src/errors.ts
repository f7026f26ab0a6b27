/**
 * Thrown when a single-byte access falls outside `[0, length)`.
 */
export class IndexOutOfRangeError extends RangeError {
  readonly index: number;
  readonly length: number;

  constructor(operation: string, index: number, length: number) {
    super(`${operation}: index ${index} out of range [0, ${length})`);
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.length = length;
  }
}

/**
 * Thrown when a sub-range has a bound outside `[0, length]` or starts after it ends.
 */
export class RangeOutOfBoundsError extends RangeError {
  readonly start: number;
  readonly end: number;
  readonly length: number;

  constructor(operation: string, start: number, end: number, length: number) {
    super(`${operation}: range [${start}, ${end}) out of bounds [0, ${length}]`);
    this.name = 'RangeOutOfBoundsError';
    this.start = start;
    this.end = end;
    this.length = length;
  }
}

export type ReprParseErrorKind =
  | 'InvalidRepresentation'
  | 'MissingRadixPrefix'
  | 'InvalidRadixPrefix'
  | 'InvalidStringQuotes'
  | 'InvalidArrayBrackets'
  | 'InvalidByteRepresentation';

const PARSE_ERROR_MESSAGES: Record<ReprParseErrorKind, string> = {
  InvalidRepresentation: 'The binary representation is invalid.',
  MissingRadixPrefix: 'The binary representation is missing a radix prefix.',
  InvalidRadixPrefix: 'The binary representation has an invalid radix prefix.',
  InvalidStringQuotes: 'The string representation must be enclosed in double quotes.',
  InvalidArrayBrackets: 'The array representation must be enclosed in brackets.',
  InvalidByteRepresentation: 'A byte value could not be parsed.',
};

/** Failure to read a textual representation back into bytes. */
export class ReprParseError extends Error {
  readonly kind: ReprParseErrorKind;

  constructor(kind: ReprParseErrorKind, detail?: string, options?: { cause?: unknown }) {
    const base = PARSE_ERROR_MESSAGES[kind];
    super(detail ? `${base} ${detail}` : base, options);
    this.name = 'ReprParseError';
    this.kind = kind;
  }
}

/** Type guard: checks if a value is a ReprParseError of the given kind. */
export function isReprParseError(value: unknown, kind?: ReprParseErrorKind): value is ReprParseError {
  return value instanceof ReprParseError && (kind === undefined || value.kind === kind);
}
