import { Binary } from '../../src/Binary';
import { isReprParseError } from '../../src/errors';
import type { ReprParseErrorKind } from '../../src/errors';
import {
  parseArrayRepresentation,
  parseRepresentation,
  parseStringRepresentation,
} from '../../src/parser/ReprParser';
import { arrayRepresentation } from '../../src/repr/ArrayRepr';
import type { RadixFormat } from '../../src/repr/RadixFormat';

const SAMPLE = new Uint8Array([0, 1, 9, 10, 15, 16, 127, 128, 255]);
const RADIXES: RadixFormat[] = ['binary', 'octal', 'decimal', 'lowerHex', 'upperHex'];

function expectParseError(parse: () => unknown, kind: ReprParseErrorKind): void {
  let caught: unknown;
  try {
    parse();
  } catch (err) {
    caught = err;
  }
  expect(isReprParseError(caught) ? caught.kind : caught).toBe(kind);
}

describe('parseArrayRepresentation', () => {
  it('reads padded and compact lower hex', () => {
    expect(parseArrayRepresentation('0x[48, 65, 6c]').equals(Binary.fromString('Hel'))).toBe(true);
    expect(parseArrayRepresentation('0x[48,65,6c]').equals(Binary.fromString('Hel'))).toBe(true);
  });

  it('returns owned storage', () => {
    expect(parseArrayRepresentation('0d[1]').isOwned()).toBe(true);
  });

  it('reads what arrayRepresentation writes in every radix', () => {
    for (const radix of RADIXES) {
      for (const compact of [false, true]) {
        const text = arrayRepresentation(SAMPLE, { radix, compact });
        expect(parseArrayRepresentation(text).equals(SAMPLE)).toBe(true);
      }
    }
  });

  it('accepts either digit case in hex', () => {
    expect([...parseArrayRepresentation('0X[ab, CD]')]).toEqual([0xab, 0xcd]);
  });

  it('ignores whitespace around bytes', () => {
    expect([...parseArrayRepresentation('0x[ 01 , 02 ]')]).toEqual([1, 2]);
    expect([...parseArrayRepresentation('0x[\n  01,\n  02\n]')]).toEqual([1, 2]);
  });

  it('reads empty brackets as an empty value', () => {
    expect(parseArrayRepresentation('0X[]').isEmpty()).toBe(true);
    expect(parseArrayRepresentation('0b[ ]').isEmpty()).toBe(true);
  });

  it('requires a leading 0', () => {
    expectParseError(() => parseArrayRepresentation('[]'), 'MissingRadixPrefix');
    expectParseError(() => parseArrayRepresentation(' 0x[]'), 'MissingRadixPrefix');
    expectParseError(() => parseArrayRepresentation(''), 'MissingRadixPrefix');
  });

  it('requires a known radix character', () => {
    expectParseError(() => parseArrayRepresentation('0[]'), 'InvalidRadixPrefix');
    expectParseError(() => parseArrayRepresentation('0c[]'), 'InvalidRadixPrefix');
    expectParseError(() => parseArrayRepresentation('0B[]'), 'InvalidRadixPrefix');
  });

  it('requires brackets', () => {
    expectParseError(() => parseArrayRepresentation('0x00, ff]'), 'InvalidArrayBrackets');
    expectParseError(() => parseArrayRepresentation('0x[00, ff'), 'InvalidArrayBrackets');
    expectParseError(() => parseArrayRepresentation('0x'), 'InvalidArrayBrackets');
    expectParseError(() => parseArrayRepresentation('0x"00"'), 'InvalidArrayBrackets');
  });

  it('rejects malformed bytes', () => {
    expectParseError(() => parseArrayRepresentation('0x[0x]'), 'InvalidByteRepresentation');
    expectParseError(() => parseArrayRepresentation('0x[1ff]'), 'InvalidByteRepresentation');
    expectParseError(() => parseArrayRepresentation('0x[1 ff]'), 'InvalidByteRepresentation');
    expectParseError(() => parseArrayRepresentation('0x[01,]'), 'InvalidByteRepresentation');
    expectParseError(() => parseArrayRepresentation('0b[102]'), 'InvalidByteRepresentation');
    expectParseError(() => parseArrayRepresentation('0d[256]'), 'InvalidByteRepresentation');
  });

  it('keeps the grammar error as the cause', () => {
    let caught: unknown;
    try {
      parseArrayRepresentation('0x[1 ff]');
    } catch (err) {
      caught = err;
    }
    expect(isReprParseError(caught) && caught.cause !== undefined).toBe(true);
  });
});

describe('parseStringRepresentation', () => {
  it('reads underscore-separated bytes', () => {
    expect([...parseStringRepresentation('0x"48_65"')]).toEqual([0x48, 0x65]);
    expect([...parseStringRepresentation('0b"00100001_101"')]).toEqual([0x21, 0x05]);
  });

  it('splits an unseparated run into fixed-width bytes', () => {
    expect([...parseStringRepresentation('0x"4865"')]).toEqual([0x48, 0x65]);
    expect([...parseStringRepresentation('0d"072101"')]).toEqual([72, 101]);
    expect([...parseStringRepresentation('0b"0010000100000101"')]).toEqual([0x21, 0x05]);
  });

  it('reads empty quotes as an empty value', () => {
    expect(parseStringRepresentation('0X""').isEmpty()).toBe(true);
  });

  it('requires a radix prefix', () => {
    expectParseError(() => parseStringRepresentation('""'), 'MissingRadixPrefix');
    expectParseError(() => parseStringRepresentation('0c""'), 'InvalidRadixPrefix');
  });

  it('requires double quotes', () => {
    expectParseError(() => parseStringRepresentation('0x00_ff"'), 'InvalidStringQuotes');
    expectParseError(() => parseStringRepresentation('0x"00_ff'), 'InvalidStringQuotes');
    expectParseError(() => parseStringRepresentation('0x"'), 'InvalidStringQuotes');
    expectParseError(() => parseStringRepresentation('0x[00]'), 'InvalidStringQuotes');
  });

  it('rejects a run that does not split evenly', () => {
    expectParseError(() => parseStringRepresentation('0x"1ff"'), 'InvalidRepresentation');
    expectParseError(() => parseStringRepresentation('0o"0010"'), 'InvalidRepresentation');
  });

  it('rejects malformed bytes', () => {
    expectParseError(() => parseStringRepresentation('0x"0x"'), 'InvalidByteRepresentation');
    expectParseError(() => parseStringRepresentation('0x"0 ff"'), 'InvalidByteRepresentation');
    expectParseError(() => parseStringRepresentation('0x"00__ff"'), 'InvalidByteRepresentation');
    expectParseError(() => parseStringRepresentation('0o"777"'), 'InvalidByteRepresentation');
  });
});

describe('parseRepresentation', () => {
  it('chooses the layout from the delimiter', () => {
    expect([...parseRepresentation('0x[01, 02]')]).toEqual([1, 2]);
    expect([...parseRepresentation('0x"01_02"')]).toEqual([1, 2]);
  });

  it('rejects anything else', () => {
    expectParseError(() => parseRepresentation('SGk='), 'InvalidRepresentation');
    expectParseError(() => parseRepresentation(''), 'InvalidRepresentation');
  });
});
