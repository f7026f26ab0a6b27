import { inspect } from 'util';
import { IndexOutOfRangeError, RangeOutOfBoundsError } from './errors';
import { encodeBigInt, encodeChar, encodeNumber } from './primitives';
import type { Endianness } from './primitives';
import { arrayRepresentation } from './repr/ArrayRepr';
import type { RadixFormat } from './repr/RadixFormat';

/**
 * Backing storage of a Binary.
 *
 * `borrowed` views bytes that belong to someone else; `owned` holds a buffer
 * that was handed to the Binary and is referenced nowhere else.
 */
export type BinaryStorage =
  | { readonly kind: 'borrowed'; readonly view: Uint8Array }
  | { readonly kind: 'owned'; readonly buffer: Uint8Array };

export type Ownership = BinaryStorage['kind'];

/** Everything `Binary.from` accepts. */
export type BinarySource = Binary | Uint8Array | ArrayBuffer | string | boolean | Iterable<number>;

/** Array-layout format specifier used by `format` and `toString`. */
export interface FormatSpecifier {
  /** Per-byte radix. Defaults to `decimal`. */
  radix?: RadixFormat;
  /** Drop zero padding and the space after each comma. */
  compact?: boolean;
  /** Wrap each token in ANSI color escapes. */
  colored?: boolean;
}

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function isInteger(value: number): boolean {
  return Number.isInteger(value);
}

/**
 * An immutable byte sequence whose storage is either borrowed or owned.
 *
 * Content never changes after construction. Equality, ordering and hashing
 * look only at the bytes, never at the storage kind.
 *
 * A borrowed Binary is only as valid as the bytes it views: the owner must
 * not write to or recycle them while the Binary is in use. Nothing checks
 * this at run time.
 */
export class Binary implements Iterable<number> {
  private readonly storage: BinaryStorage;

  private constructor(storage: BinaryStorage) {
    this.storage = storage;
  }

  // -- Construction --

  /** Borrow a byte view. No copy is made. */
  static borrow(view: Uint8Array): Binary {
    return new Binary({ kind: 'borrowed', view });
  }

  /**
   * Borrow a region of an array buffer. No copy is made.
   *
   * `byteOffset` and `byteOffset + length` must lie inside the buffer. A
   * region outside it throws the `RangeError` of the `Uint8Array` constructor;
   * this is the one constructor with a precondition.
   * @param length - Defaults to the rest of the buffer after `byteOffset`.
   */
  static borrowArrayBuffer(buffer: ArrayBufferLike, byteOffset = 0, length?: number): Binary {
    return Binary.borrow(new Uint8Array(buffer, byteOffset, length));
  }

  /**
   * Take ownership of a buffer. No copy is made: the caller hands the buffer
   * over and must not touch it afterwards.
   */
  static own(buffer: Uint8Array): Binary {
    return new Binary({ kind: 'owned', buffer });
  }

  /** An owned, zero-length Binary. */
  static empty(): Binary {
    return Binary.own(new Uint8Array(0));
  }

  /** UTF-8 bytes of `text`, verbatim (no normalization). */
  static fromString(text: string): Binary {
    return Binary.own(new TextEncoder().encode(text));
  }

  /** UTF-8 bytes of `text` followed by a terminating NUL byte. */
  static fromCString(text: string): Binary {
    const encoded = new TextEncoder().encode(text);
    const buffer = new Uint8Array(encoded.length + 1);
    buffer.set(encoded);
    return Binary.own(buffer);
  }

  /** Collect byte values into an owned buffer; each value is reduced modulo 256. */
  static fromIterable(values: Iterable<number>): Binary {
    return Binary.own(Uint8Array.from(values));
  }

  static fromUint8(value: number): Binary {
    return Binary.own(encodeNumber('uint8', value));
  }

  static fromInt8(value: number): Binary {
    return Binary.own(encodeNumber('int8', value));
  }

  static fromUint16(value: number, endianness: Endianness = 'big'): Binary {
    return Binary.own(encodeNumber('uint16', value, endianness));
  }

  static fromInt16(value: number, endianness: Endianness = 'big'): Binary {
    return Binary.own(encodeNumber('int16', value, endianness));
  }

  static fromUint32(value: number, endianness: Endianness = 'big'): Binary {
    return Binary.own(encodeNumber('uint32', value, endianness));
  }

  static fromInt32(value: number, endianness: Endianness = 'big'): Binary {
    return Binary.own(encodeNumber('int32', value, endianness));
  }

  static fromUint64(value: bigint, endianness: Endianness = 'big'): Binary {
    return Binary.own(encodeBigInt('uint64', value, endianness));
  }

  static fromInt64(value: bigint, endianness: Endianness = 'big'): Binary {
    return Binary.own(encodeBigInt('int64', value, endianness));
  }

  static fromUint128(value: bigint, endianness: Endianness = 'big'): Binary {
    return Binary.own(encodeBigInt('uint128', value, endianness));
  }

  static fromInt128(value: bigint, endianness: Endianness = 'big'): Binary {
    return Binary.own(encodeBigInt('int128', value, endianness));
  }

  static fromFloat32(value: number, endianness: Endianness = 'big'): Binary {
    return Binary.own(encodeNumber('float32', value, endianness));
  }

  static fromFloat64(value: number, endianness: Endianness = 'big'): Binary {
    return Binary.own(encodeNumber('float64', value, endianness));
  }

  /** A single byte, 1 for true and 0 for false. */
  static fromBoolean(value: boolean): Binary {
    return Binary.fromUint8(value ? 1 : 0);
  }

  /** Four bytes: the UTF-8 sequence of the first code point, zero filled. */
  static fromChar(char: string): Binary {
    return Binary.own(encodeChar(char));
  }

  /**
   * Convert any supported source. Views and array buffers are borrowed,
   * text and iterables produce owned storage, a Binary is returned as is.
   */
  static from(source: BinarySource): Binary {
    if (source instanceof Binary) return source;
    if (source instanceof Uint8Array) return Binary.borrow(source);
    if (source instanceof ArrayBuffer) return Binary.borrowArrayBuffer(source);
    if (typeof source === 'string') return Binary.fromString(source);
    if (typeof source === 'boolean') return Binary.fromBoolean(source);
    return Binary.fromIterable(source);
  }

  // -- Storage --

  get ownership(): Ownership {
    return this.storage.kind;
  }

  isBorrowed(): boolean {
    return this.storage.kind === 'borrowed';
  }

  isOwned(): boolean {
    return this.storage.kind === 'owned';
  }

  /** The content as a view. Never copies; callers must not write through it. */
  asView(): Uint8Array {
    return this.storage.kind === 'borrowed' ? this.storage.view : this.storage.buffer;
  }

  /**
   * The content as an owned buffer. A borrowed Binary is copied; an owned
   * one hands over its buffer, after which this Binary should be dropped.
   */
  intoOwned(): Uint8Array {
    return this.storage.kind === 'owned' ? this.storage.buffer : this.storage.view.slice();
  }

  /** A fresh copy of the content. */
  toBytes(): Uint8Array {
    return this.asView().slice();
  }

  /** An owned Binary with the same content: itself when already owned. */
  toOwned(): Binary {
    return this.storage.kind === 'owned' ? this : Binary.own(this.storage.view.slice());
  }

  // -- Queries --

  get length(): number {
    return this.asView().length;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  /** Byte at `index`. Throws IndexOutOfRangeError outside `[0, length)`. */
  byteAt(index: number): number {
    const view = this.asView();
    if (!isInteger(index) || index < 0 || index >= view.length) {
      throw new IndexOutOfRangeError('byteAt', index, view.length);
    }
    return view[index];
  }

  /**
   * Borrowed Binary over `[start, end)` of this content, sharing its memory.
   * Throws RangeOutOfBoundsError when a bound lies outside `[0, length]` or
   * `start > end`.
   */
  subarray(start: number, end: number = this.length): Binary {
    const view = this.asView();
    if (
      !isInteger(start) || !isInteger(end) ||
      start < 0 || end > view.length || start > end
    ) {
      throw new RangeOutOfBoundsError('subarray', start, end, view.length);
    }
    return Binary.borrow(view.subarray(start, end));
  }

  [Symbol.iterator](): Iterator<number> {
    return this.asView()[Symbol.iterator]();
  }

  // -- Derivation --

  /** New owned Binary with this content followed by each of `others`. */
  concat(...others: Array<Binary | Uint8Array>): Binary {
    const parts = [this.asView(), ...others.map(o => (o instanceof Binary ? o.asView() : o))];
    const total = parts.reduce((sum, part) => sum + part.length, 0);
    const buffer = new Uint8Array(total);
    let offset = 0;
    for (const part of parts) {
      buffer.set(part, offset);
      offset += part.length;
    }
    return Binary.own(buffer);
  }

  /** New owned Binary with the byte at `index` replaced (value reduced modulo 256). */
  withByteAt(index: number, value: number): Binary {
    const view = this.asView();
    if (!isInteger(index) || index < 0 || index >= view.length) {
      throw new IndexOutOfRangeError('withByteAt', index, view.length);
    }
    const buffer = view.slice();
    buffer[index] = value;
    return Binary.own(buffer);
  }

  // -- Equality, ordering, hashing --

  equals(other: Binary | Uint8Array): boolean {
    return Binary.compare(this, other) === 0;
  }

  compare(other: Binary | Uint8Array): -1 | 0 | 1 {
    return Binary.compare(this, other);
  }

  /**
   * Lexicographic unsigned byte order; a proper prefix sorts first.
   * Suitable as an `Array.prototype.sort` comparator.
   */
  static compare(a: Binary | Uint8Array, b: Binary | Uint8Array): -1 | 0 | 1 {
    const left = a instanceof Binary ? a.asView() : a;
    const right = b instanceof Binary ? b.asView() : b;
    const common = Math.min(left.length, right.length);
    for (let i = 0; i < common; i++) {
      if (left[i] !== right[i]) return left[i] < right[i] ? -1 : 1;
    }
    if (left.length === right.length) return 0;
    return left.length < right.length ? -1 : 1;
  }

  /** 32-bit FNV-1a hash of the content. */
  hashCode(): number {
    let hash = FNV_OFFSET_BASIS;
    for (const byte of this.asView()) {
      hash ^= byte;
      hash = Math.imul(hash, FNV_PRIME);
    }
    return hash >>> 0;
  }

  // -- Rendering --

  /** Array layout, e.g. `0x[48, 65]`. */
  format(spec: FormatSpecifier = {}): string {
    return arrayRepresentation(this, {
      radix: spec.radix ?? 'decimal',
      compact: spec.compact,
      colored: spec.colored,
    });
  }

  /** Padded decimal array layout, e.g. `0d[072, 101]`. */
  toString(): string {
    return this.format();
  }

  [inspect.custom](): string {
    return `Binary<${this.storage.kind}> ${this.format({ radix: 'lowerHex' })}`;
  }
}

/** Type guard: checks if a value is a Binary instance. */
export function isBinary(value: unknown): value is Binary {
  return value instanceof Binary;
}
