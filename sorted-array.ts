import type { ISortedSet } from './interfaces';

/** A super-inefficient sorted set for testing purposes */
export default class SortedArray<K> implements ISortedSet<K>
{
  a: K[];
  cmp: (a: K, b: K) => number;

  public constructor(keys: Iterable<K> | undefined, compare: (a: K, b: K) => number) {
    this.cmp = compare;
    this.a = [];
    if (keys !== undefined)
      for (const k of keys)
        this.add(k);
  }

  get size() { return this.a.length; }
  add(key: K): boolean {
    const i = this.indexOf(key, -1);
    if (i <= -1)
      this.a.splice(~i, 0, key);
    return i <= -1;
  }
  has(key: K): boolean {
    return this.indexOf(key, -1) >= 0;
  }
  delete(key: K): boolean {
    const i = this.indexOf(key, -1);
    if (i > -1)
      this.a.splice(i, 1);
    return i > -1;
  }
  clear() { this.a = []; }
  getArray() { return this.a; }
  minKey(): K | undefined { return this.a[0]; }
  maxKey(): K | undefined { return this.a[this.a.length - 1]; }
  forEach(callbackFn: (key: K) => void) {
    this.a.forEach(key => callbackFn(key));
  }

  [Symbol.iterator](): IterableIterator<K> { return this.a.values(); }
  keys(): IterableIterator<K> { return this.a.values(); }

  indexOf(key: K, failXor: number): number {
    let lo = 0, hi = this.a.length, mid = hi >> 1;
    while (lo < hi) {
      const c = this.cmp(this.a[mid], key);
      if (c < 0)
        lo = mid + 1;
      else if (c > 0) // a[mid] > key
        hi = mid;
      else if (c === 0)
        return mid;
      else
        throw new Error("Problem: compare failed");
      mid = (lo + hi) >> 1;
    }
    return mid ^ failXor;
  }
}
