import { parseArgs, renderBytes, toBinaryFormat } from '../../cli/render-file';

describe('render-file CLI', () => {
  describe('parseArgs', () => {
    it('defaults to an upper hex dump', () => {
      expect(parseArgs(['in.bin'])).toEqual({
        inputPath: 'in.bin',
        style: 'dump',
        radix: 'upperHex',
        compact: false,
        colored: false,
      });
    });

    it('reads every option', () => {
      expect(parseArgs(['--style', 'array', '--radix', 'o', '--compact', '--color', 'in.bin'])).toEqual({
        inputPath: 'in.bin',
        style: 'array',
        radix: 'octal',
        compact: true,
        colored: true,
      });
    });

    it('rejects bad input', () => {
      expect(() => parseArgs([])).toThrow('Missing input file');
      expect(() => parseArgs(['--style', 'xml', 'in.bin'])).toThrow("Unknown style: 'xml'");
      expect(() => parseArgs(['--style'])).toThrow("Unknown style: ''");
      expect(() => parseArgs(['--radix', 'q', 'in.bin'])).toThrow("Unknown radix: 'q'");
      expect(() => parseArgs(['--verbose', 'in.bin'])).toThrow('Unknown option: --verbose');
      expect(() => parseArgs(['a.bin', 'b.bin'])).toThrow('Unexpected argument: b.bin');
    });
  });

  it('drops radix and color for base64', () => {
    expect(toBinaryFormat(parseArgs(['--style', 'base64', '--color', 'in.bin']))).toEqual({
      style: 'base64',
      compact: false,
    });
  });

  it('renders bytes in the chosen layout', () => {
    const bytes = new Uint8Array([0x48, 0x69]);
    expect(renderBytes(bytes, parseArgs(['--style', 'array', '--radix', 'x', 'in.bin']))).toBe('0x[48, 69]');
    expect(renderBytes(bytes, parseArgs(['--style', 'string', '--compact', 'in.bin']))).toBe('0X"4869"');
    expect(renderBytes(bytes, parseArgs(['--style', 'base64', '--compact', 'in.bin']))).toBe('SGk');
  });
});
