import peggy from 'peggy';
import { base64, base64nopad } from '@scure/base';
import { Binary } from '../Binary';
import { ReprParseError } from '../errors';
import { paddedWidthOf, radixFromPrefixChar, radixOf } from '../repr/RadixFormat';
import type { RadixFormat } from '../repr/RadixFormat';
import { REPR_GRAMMAR, REPR_START_RULES } from './grammar';
import type { ReprStartRule } from './grammar';

let cachedParser: peggy.Parser | null = null;

function getParser(): peggy.Parser {
  if (!cachedParser) {
    cachedParser = peggy.generate(REPR_GRAMMAR, { allowedStartRules: [...REPR_START_RULES] });
  }
  return cachedParser;
}

const DIGIT_PATTERNS: Readonly<Record<RadixFormat, RegExp>> = {
  binary: /^[01]+$/,
  octal: /^[0-7]+$/,
  decimal: /^[0-9]+$/,
  lowerHex: /^[0-9a-fA-F]+$/,
  upperHex: /^[0-9a-fA-F]+$/,
};

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/** Run one of the body rules, mapping grammar failures to a byte error. */
function tokenize(body: string, startRule: ReprStartRule): string[] {
  let result: unknown;
  try {
    result = getParser().parse(body, { startRule });
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ReprParseError('InvalidByteRepresentation', detail, { cause: err });
  }
  if (!isStringArray(result)) {
    throw new ReprParseError('InvalidRepresentation', `unexpected ${startRule} parse result`);
  }
  return result;
}

function parseByte(token: string, radix: RadixFormat): number {
  if (!DIGIT_PATTERNS[radix].test(token)) {
    throw new ReprParseError('InvalidByteRepresentation', `invalid digit in "${token}"`);
  }
  const value = parseInt(token, radixOf(radix));
  if (value > 0xff) {
    throw new ReprParseError('InvalidByteRepresentation', `"${token}" does not fit in a byte`);
  }
  return value;
}

/**
 * Split off the `0<radix>` prefix and the enclosing delimiters.
 * @returns the radix and the text between the delimiters
 */
function unwrap(
  text: string, open: string, close: string, delimiterError: 'InvalidArrayBrackets' | 'InvalidStringQuotes'
): { radix: RadixFormat; body: string } {
  if (!text.startsWith('0')) {
    throw new ReprParseError('MissingRadixPrefix');
  }
  const radix = radixFromPrefixChar(text.charAt(1));
  if (radix === undefined) {
    throw new ReprParseError('InvalidRadixPrefix', `got "${text.slice(0, 2)}"`);
  }
  const rest = text.slice(2);
  if (rest.length < 2 || !rest.startsWith(open) || !rest.endsWith(close)) {
    throw new ReprParseError(delimiterError);
  }
  return { radix, body: rest.slice(1, -1) };
}

/**
 * Parse the array layout, padded or compact, e.g. `0x[48, 65]` or `0d[72,101]`.
 * Whitespace around each byte is ignored.
 * @throws ReprParseError
 */
export function parseArrayRepresentation(text: string): Binary {
  const { radix, body } = unwrap(text, '[', ']', 'InvalidArrayBrackets');
  const tokens = tokenize(body, 'ArrayItems');
  return Binary.fromIterable(tokens.map(token => parseByte(token, radix)));
}

/**
 * Parse the string layout. With underscores, each group is one byte of any
 * width; without, the digits are read in fixed-width groups for the radix.
 * @throws ReprParseError
 */
export function parseStringRepresentation(text: string): Binary {
  const { radix, body } = unwrap(text, '"', '"', 'InvalidStringQuotes');
  if (body.length === 0) return Binary.empty();

  const tokens = tokenize(body, 'StringItems');
  if (tokens.length > 1) {
    return Binary.fromIterable(tokens.map(token => parseByte(token, radix)));
  }

  const run = tokens[0];
  const width = paddedWidthOf(radix);
  if (run.length % width !== 0) {
    throw new ReprParseError(
      'InvalidRepresentation',
      `${run.length} digits cannot be split into bytes of ${width} digits`
    );
  }
  const values: number[] = [];
  for (let i = 0; i < run.length; i += width) {
    values.push(parseByte(run.slice(i, i + width), radix));
  }
  return Binary.fromIterable(values);
}

/**
 * Parse standard-alphabet base64, with or without `=` padding.
 * @throws ReprParseError
 */
export function parseBase64Representation(text: string): Binary {
  const codec = text.length % 4 === 0 ? base64 : base64nopad;
  try {
    return Binary.own(codec.decode(text));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ReprParseError('InvalidRepresentation', detail, { cause: err });
  }
}

/**
 * Parse either the array or the string layout, chosen by the delimiter that
 * follows the radix prefix.
 * @throws ReprParseError
 */
export function parseRepresentation(text: string): Binary {
  const delimiter = text.charAt(2);
  if (delimiter === '[') return parseArrayRepresentation(text);
  if (delimiter === '"') return parseStringRepresentation(text);
  throw new ReprParseError('InvalidRepresentation', 'expected "[" or \'"\' after the radix prefix');
}
