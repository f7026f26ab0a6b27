/**
 * Fixed-width encodings of numeric primitives.
 *
 * Every writer is total: out-of-range values wrap the way the `DataView`
 * setters wrap them, and bigint values are reduced modulo 2^width.
 */

export type Endianness = 'big' | 'little';

export type NumericType =
  | 'uint8' | 'int8'
  | 'uint16' | 'int16'
  | 'uint32' | 'int32'
  | 'uint64' | 'int64'
  | 'uint128' | 'int128'
  | 'float32' | 'float64';

/** Byte width of each numeric type. */
export const NUMERIC_WIDTHS: Readonly<Record<NumericType, number>> = {
  uint8: 1,
  int8: 1,
  uint16: 2,
  int16: 2,
  uint32: 4,
  int32: 4,
  uint64: 8,
  int64: 8,
  uint128: 16,
  int128: 16,
  float32: 4,
  float64: 8,
};

const UINT64_MASK = (1n << 64n) - 1n;

function allocate(type: NumericType): { bytes: Uint8Array; view: DataView } {
  const bytes = new Uint8Array(NUMERIC_WIDTHS[type]);
  return { bytes, view: new DataView(bytes.buffer) };
}

/** Encode a number-valued primitive (8/16/32-bit integers, floats). */
export function encodeNumber(
  type: Exclude<NumericType, 'uint64' | 'int64' | 'uint128' | 'int128'>,
  value: number,
  endianness: Endianness = 'big'
): Uint8Array {
  const { bytes, view } = allocate(type);
  const littleEndian = endianness === 'little';
  switch (type) {
    case 'uint8':
      view.setUint8(0, value);
      break;
    case 'int8':
      view.setInt8(0, value);
      break;
    case 'uint16':
      view.setUint16(0, value, littleEndian);
      break;
    case 'int16':
      view.setInt16(0, value, littleEndian);
      break;
    case 'uint32':
      view.setUint32(0, value, littleEndian);
      break;
    case 'int32':
      view.setInt32(0, value, littleEndian);
      break;
    case 'float32':
      view.setFloat32(0, value, littleEndian);
      break;
    case 'float64':
      view.setFloat64(0, value, littleEndian);
      break;
  }
  return bytes;
}

/** Encode a bigint-valued primitive (64 and 128-bit integers). */
export function encodeBigInt(
  type: 'uint64' | 'int64' | 'uint128' | 'int128',
  value: bigint,
  endianness: Endianness = 'big'
): Uint8Array {
  const { bytes, view } = allocate(type);
  const littleEndian = endianness === 'little';
  if (type === 'uint64' || type === 'int64') {
    // Two's complement bit pattern is identical for both signs.
    view.setBigUint64(0, BigInt.asUintN(64, value), littleEndian);
    return bytes;
  }
  const wide = BigInt.asUintN(128, value);
  const high = wide >> 64n;
  const low = wide & UINT64_MASK;
  if (littleEndian) {
    view.setBigUint64(0, low, true);
    view.setBigUint64(8, high, true);
  } else {
    view.setBigUint64(0, high, false);
    view.setBigUint64(8, low, false);
  }
  return bytes;
}

/**
 * Encode a single character as four bytes: its UTF-8 sequence followed by
 * zero fill. Only the first code point of `char` is used; an empty string
 * encodes as four zero bytes.
 */
export function encodeChar(char: string): Uint8Array {
  const bytes = new Uint8Array(4);
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined) return bytes;
  bytes.set(new TextEncoder().encode(String.fromCodePoint(codePoint)));
  return bytes;
}
