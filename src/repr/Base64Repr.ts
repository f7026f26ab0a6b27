import { base64, base64nopad } from '@scure/base';
import { viewOf } from './RadixFormat';
import type { ByteSource } from './RadixFormat';

export interface Base64FormatOptions {
  /** Omit the trailing `=` padding. */
  compact?: boolean;
}

/** Standard-alphabet base64 on a single line. */
export function base64Representation(value: ByteSource, options: Base64FormatOptions = {}): string {
  const codec = options.compact ? base64nopad : base64;
  return codec.encode(viewOf(value));
}

export { parseBase64Representation } from '../parser/ReprParser';
