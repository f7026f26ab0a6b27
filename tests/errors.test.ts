import {
  IndexOutOfRangeError,
  isReprParseError,
  RangeOutOfBoundsError,
  ReprParseError,
} from '../src/errors';

describe('errors', () => {
  it('IndexOutOfRangeError is a RangeError carrying the index and length', () => {
    const err = new IndexOutOfRangeError('byteAt', 5, 3);
    expect(err).toBeInstanceOf(RangeError);
    expect(err.name).toBe('IndexOutOfRangeError');
    expect(err.message).toBe('byteAt: index 5 out of range [0, 3)');
    expect(err.index).toBe(5);
    expect(err.length).toBe(3);
  });

  it('RangeOutOfBoundsError is a RangeError carrying both bounds', () => {
    const err = new RangeOutOfBoundsError('subarray', 3, 2, 4);
    expect(err).toBeInstanceOf(RangeError);
    expect(err.message).toBe('subarray: range [3, 2) out of bounds [0, 4]');
    expect(err.start).toBe(3);
    expect(err.end).toBe(2);
  });

  it('ReprParseError has a fixed message per kind', () => {
    const err = new ReprParseError('MissingRadixPrefix');
    expect(err.kind).toBe('MissingRadixPrefix');
    expect(err.message).toBe('The binary representation is missing a radix prefix.');
  });

  it('ReprParseError appends detail and keeps the cause', () => {
    const cause = new Error('inner');
    const err = new ReprParseError('InvalidRadixPrefix', 'got "0c"', { cause });
    expect(err.message).toBe('The binary representation has an invalid radix prefix. got "0c"');
    expect(err.cause).toBe(cause);
  });

  it('isReprParseError narrows by kind', () => {
    const err = new ReprParseError('InvalidStringQuotes');
    expect(isReprParseError(err)).toBe(true);
    expect(isReprParseError(err, 'InvalidStringQuotes')).toBe(true);
    expect(isReprParseError(err, 'InvalidArrayBrackets')).toBe(false);
    expect(isReprParseError(new Error('x'))).toBe(false);
  });
});
