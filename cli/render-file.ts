#!/usr/bin/env npx tsx
/**
 * CLI tool to print a file's bytes in one of the binary representations.
 *
 * Usage:
 *   npx tsx cli/render-file.ts <input> [--style array|string|dump|base64]
 *                                      [--radix b|o|d|x|X] [--compact] [--color]
 *
 * The default style is `dump` with upper hex bytes.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Binary } from '../src/Binary';
import { format } from '../src/repr/format';
import type { BinaryFormat, BinaryStyle } from '../src/repr/format';
import { radixFromPrefixChar } from '../src/repr/RadixFormat';
import type { RadixFormat } from '../src/repr/RadixFormat';

const USAGE =
  'Usage: npx tsx cli/render-file.ts <input> [--style array|string|dump|base64] [--radix b|o|d|x|X] [--compact] [--color]';

const STYLES: readonly BinaryStyle[] = ['array', 'string', 'dump', 'base64'];

export interface RenderFileArgs {
  inputPath: string;
  style: BinaryStyle;
  radix: RadixFormat;
  compact: boolean;
  colored: boolean;
}

function isStyle(value: string): value is BinaryStyle {
  return STYLES.some(style => style === value);
}

/** Parse command-line arguments. Throws with a message suitable for the user. */
export function parseArgs(argv: readonly string[]): RenderFileArgs {
  let inputPath: string | null = null;
  let style: BinaryStyle = 'dump';
  let radix: RadixFormat = 'upperHex';
  let compact = false;
  let colored = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--style': {
        const value = argv[++i] ?? '';
        if (!isStyle(value)) throw new Error(`Unknown style: '${value}'`);
        style = value;
        break;
      }
      case '--radix': {
        const value = argv[++i] ?? '';
        const parsed = radixFromPrefixChar(value);
        if (parsed === undefined) throw new Error(`Unknown radix: '${value}'`);
        radix = parsed;
        break;
      }
      case '--compact':
        compact = true;
        break;
      case '--color':
        colored = true;
        break;
      default:
        if (arg.startsWith('--')) throw new Error(`Unknown option: ${arg}`);
        if (inputPath !== null) throw new Error(`Unexpected argument: ${arg}`);
        inputPath = arg;
    }
  }

  if (inputPath === null) throw new Error('Missing input file');
  return { inputPath, style, radix, compact, colored };
}

/** Build the format for the parsed arguments. Base64 ignores radix and color. */
export function toBinaryFormat(args: RenderFileArgs): BinaryFormat {
  const { style, radix, compact, colored } = args;
  if (style === 'base64') return { style, compact };
  return { style, radix, compact, colored };
}

export function renderBytes(bytes: Uint8Array, args: RenderFileArgs): string {
  return format(Binary.borrow(bytes), toBinaryFormat(args));
}

function main(): void {
  let args: RenderFileArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    process.exit(1);
  }

  const inputPath = path.resolve(args.inputPath);
  if (!fs.existsSync(inputPath)) {
    console.error(`Error: input file not found: ${inputPath}`);
    process.exit(1);
  }

  const bytes = fs.readFileSync(inputPath);
  process.stdout.write(renderBytes(bytes, args) + '\n');
}

if (require.main === module) {
  main();
}
