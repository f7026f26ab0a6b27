import { Binary } from '../Binary';

/**
 * Map keyed by Binary content rather than object identity.
 * Borrowed and owned keys with equal bytes address the same entry.
 *
 * Keys are stored as given; a borrowed key must stay valid for as long as
 * the entry exists. Use `key.toOwned()` when that cannot be guaranteed.
 */
export class BinaryMap<V> implements Iterable<[Binary, V]> {
  private readonly buckets = new Map<number, Array<[Binary, V]>>();
  private _size = 0;

  constructor(entries?: Iterable<readonly [Binary, V]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this._size;
  }

  get(key: Binary): V | undefined {
    return this.find(key)?.[1];
  }

  has(key: Binary): boolean {
    return this.find(key) !== undefined;
  }

  /** Insert or replace. The key of an existing entry is kept. */
  set(key: Binary, value: V): this {
    const entry = this.find(key);
    if (entry) {
      entry[1] = value;
      return this;
    }
    const hash = key.hashCode();
    const bucket = this.buckets.get(hash);
    if (bucket) {
      bucket.push([key, value]);
    } else {
      this.buckets.set(hash, [[key, value]]);
    }
    this._size++;
    return this;
  }

  delete(key: Binary): boolean {
    const hash = key.hashCode();
    const bucket = this.buckets.get(hash);
    if (!bucket) return false;
    const index = bucket.findIndex(([k]) => k.equals(key));
    if (index < 0) return false;
    bucket.splice(index, 1);
    if (bucket.length === 0) this.buckets.delete(hash);
    this._size--;
    return true;
  }

  clear(): void {
    this.buckets.clear();
    this._size = 0;
  }

  *keys(): IterableIterator<Binary> {
    for (const [key] of this) yield key;
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this) yield value;
  }

  *[Symbol.iterator](): IterableIterator<[Binary, V]> {
    for (const bucket of this.buckets.values()) {
      for (const [key, value] of bucket) yield [key, value];
    }
  }

  private find(key: Binary): [Binary, V] | undefined {
    return this.buckets.get(key.hashCode())?.find(([k]) => k.equals(key));
  }
}
