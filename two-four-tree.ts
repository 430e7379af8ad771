// 2-4 tree sorted set with diagnostics. License: MIT
import type { ISortedSet, ITreeView } from './interfaces';
import { TreeNode } from './internal/nodes';
import { check } from './internal/assert';
import { TreeIterator } from './iterator';
import { findViolations, validate } from './diagnostics/validate';
import { render, type RenderOptions } from './diagnostics/layout';
import type { DiagnosticSink } from './diagnostics/log';

export { MaxKeys, MaxChildren } from './interfaces';
export type { ITreeNode, ITreeView, ISortedSetSource, ISortedSet } from './interfaces';
export { TreeNode } from './internal/nodes';
export { TreeIterator } from './iterator';
export * from './diagnostics';

/**
 * Types that TwoFourTree supports by default
 */
export type DefaultComparable = number | string | boolean | Date | null | undefined |
               { valueOf: () => number | string | boolean | Date | null | undefined };

/**
 * Compares DefaultComparables to form a total ordering.
 *
 * Objects are compared by their `valueOf()`. NaN equals NaN and sorts
 * below every other number; -0 equals +0. Values of different types are
 * ordered by the name of their type, so `number`s come before `string`s.
 * Two objects whose `valueOf()` is still an object (e.g. arrays) compare
 * equal only if they are the same object, and are otherwise unordered (NaN).
 */
export function defaultComparator<T>(a: T, b: T): number {
  const x = primitiveOf(a), y = primitiveOf(b);
  // Special case numbers first for performance.
  if (typeof x === 'number' && typeof y === 'number') {
    if (x === y)
      return 0;
    if (Number.isNaN(x))
      return Number.isNaN(y) ? 0 : -1;
    if (Number.isNaN(y))
      return 1;
    return x < y ? -1 : 1;
  }

  // The default < and > operators are not totally ordered. To allow types
  // to be mixed in a single collection, order values of different types by type.
  const tx = typeof x, ty = typeof y;
  if (tx !== ty)
    return tx < ty ? -1 : 1;
  if (typeof x === 'string' && typeof y === 'string')
    return x < y ? -1 : x > y ? 1 : 0;
  if (typeof x === 'boolean' && typeof y === 'boolean')
    return x === y ? 0 : x ? 1 : -1;
  // standardized JavaScript bug: null is not an object, but typeof says it is
  if (x === null || y === null)
    return x === y ? 0 : x === null ? -1 : 1;
  return x === y ? 0 : Number.NaN;
}

function primitiveOf(value: unknown): unknown {
  return value !== null && typeof value === 'object' ? value.valueOf() : value;
}

/**
 * Compares items using the < and > operators. Unlike defaultComparator, this
 * comparator doesn't support mixed types, i.e. use it with `TwoFourTree<string>`
 * or `TwoFourTree<number>` but not `TwoFourTree<string|number>`. NaN is not
 * supported.
 */
export function simpleComparator(a: string, b: string): number;
export function simpleComparator(a: number, b: number): number;
export function simpleComparator(a: Date, b: Date): number;
export function simpleComparator(a: string | number | Date, b: string | number | Date): number {
  return a > b ? 1 : a < b ? -1 : 0;
}

/**
 * A sorted set stored in a 2-4 tree: a balanced search tree in which each
 * node holds one to three keys and every internal node has one more child
 * than it has keys. All leaves are at the same depth.
 *
 * Besides the usual set operations, the tree can check its own structure
 * (`validate`, `checkValid`) and draw itself as text (`render`):
 *
 *     const tree = new TwoFourTree([7, 10, 12, 15, 3]);
 *     console.log(tree.render());
 *     //      [10]
 *     // [3, 7] [12, 15]
 *
 * Nodes keep a reference to their parent, which iterators use to move
 * between leaves and ancestors.
 */
export default class TwoFourTree<K = DefaultComparable> implements ISortedSet<K>, ITreeView<K> {
  _root: TreeNode<K> | undefined = undefined;
  _size = 0;
  _compare: (a: K, b: K) => number;

  /**
   * Initializes a tree.
   * @param keys Keys to add.
   * @param compare Custom function to compare keys. Must be a total order:
   *   negative if `a < b`, positive if `a > b`, zero if they are equal.
   *   Defaults to `defaultComparator`.
   */
  public constructor(keys?: Iterable<K>, compare?: (a: K, b: K) => number) {
    this._compare = compare ?? defaultComparator;
    if (keys !== undefined)
      for (const key of keys)
        this.add(key);
  }

  /////////////////////////////////////////////////////////////////////////////
  // ES6 Set methods //////////////////////////////////////////////////////////

  /** Gets the number of keys in the tree. */
  get size() { return this._size; }
  /** Returns true iff the tree contains no keys. */
  get isEmpty() { return this._size === 0; }
  /** The root node, or undefined when the tree is empty. */
  get root(): TreeNode<K> | undefined { return this._root; }
  /** The comparator that orders keys in this tree. */
  get compare() { return this._compare; }

  /** Releases the tree so that its size is 0. */
  clear() {
    this._root = undefined;
    this._size = 0;
  }

  /** Runs a function for each key in the tree, in ascending order. */
  forEach(callback: (key: K) => void): void {
    for (const key of this.keys())
      callback(key);
  }

  /** Returns true iff `key` is in the tree. */
  has(key: K): boolean {
    return this.find(key).isValid;
  }

  /**
   * Adds a key to the tree.
   * @returns true if the key was added, false if it was already present.
   */
  add(key: K): boolean {
    let node = this._root;
    if (node === undefined) {
      this._root = new TreeNode([key]);
      this._size = 1;
      return true;
    }
    for (;;) {
      const i: number = node.indexOf(key, -1, this._compare);
      if (i >= 0)
        return false;
      if (node.isLeaf) {
        node.insertAt(~i, key);
        break;
      }
      node = node.children[~i];
    }
    this._size++;

    // Split overfull nodes on the way back up
    while (node.isOverfull) {
      const { promoted, right } = node.splitOffRightSide();
      const parent: TreeNode<K> | undefined = node.parent;
      if (parent === undefined) {
        this._root = new TreeNode([promoted], [node, right]);
        break;
      }
      parent.insertAt(parent.slotOf(node), promoted, right);
      node = parent;
    }
    return true;
  }

  /**
   * Removes a key from the tree.
   * @returns true if the key was found and removed, false if it was not in the tree.
   */
  delete(key: K): boolean {
    const at = this.find(key);
    let node = at.node, i = at.index;
    if (node === undefined || !at.isValid)
      return false;
    if (!node.isLeaf) {
      // Replace with the in-order predecessor, which is always in a leaf
      const leaf = node.children[i].lastLeaf();
      node.keys[i] = leaf.keys[leaf.keys.length - 1];
      node = leaf;
      i = leaf.keys.length - 1;
    }
    node.keys.splice(i, 1);
    this._size--;
    this.repairEmptyNode(node);
    return true;
  }

  // After a deletion, a node may be left without keys. Borrow a key from an
  // adjacent sibling that can spare one; otherwise merge with a sibling,
  // which takes a key from the parent and may leave the parent empty.
  private repairEmptyNode(node: TreeNode<K>) {
    while (node.keys.length === 0) {
      const parent = node.parent;
      if (parent === undefined) {
        const only = node.childAt(0);
        if (only !== undefined)
          only.parent = undefined;
        this._root = only;
        return;
      }
      const i = parent.slotOf(node);
      check(i >= 0, 'node is missing from its parent', parent.keys);
      if (i > 0 && parent.children[i - 1].keys.length > 1) {
        parent.borrowFromLeft(i);
        return;
      }
      if (i < parent.keys.length && parent.children[i + 1].keys.length > 1) {
        parent.borrowFromRight(i);
        return;
      }
      parent.mergeChildren(i > 0 ? i - 1 : i);
      node = parent;
    }
  }

  /////////////////////////////////////////////////////////////////////////////
  // Iterators ////////////////////////////////////////////////////////////////

  /** Iterator at the smallest key (a null iterator if the tree is empty). */
  begin(): TreeIterator<K> {
    return this._root === undefined
      ? new TreeIterator<K>(undefined, 0)
      : new TreeIterator(this._root.firstLeaf(), 0);
  }

  /** Iterator just past the largest key (a null iterator if the tree is empty). */
  end(): TreeIterator<K> {
    if (this._root === undefined)
      return new TreeIterator<K>(undefined, 0);
    const leaf = this._root.lastLeaf();
    return new TreeIterator(leaf, leaf.keyCount());
  }

  /** Iterator at `key`, or `end()` if the key is not in the tree. */
  find(key: K): TreeIterator<K> {
    let node = this._root;
    while (node !== undefined) {
      const i = node.indexOf(key, -1, this._compare);
      if (i >= 0)
        return new TreeIterator(node, i);
      node = node.childAt(~i);
    }
    return this.end();
  }

  /** Returns an iterator that provides the keys in ascending order. */
  keys(): IterableIterator<K> {
    let it = this.begin();
    return iterator<K>(() => {
      if (!it.isValid)
        return { done: true, value: undefined };
      const key = it.key;
      it = it.next();
      return { done: false, value: key };
    });
  }

  /** Returns an iterator that provides the keys in descending order. */
  keysReversed(): IterableIterator<K> {
    let it = this.end().prev();
    return iterator<K>(() => {
      if (!it.isValid)
        return { done: true, value: undefined };
      const key = it.key;
      it = it.prev();
      return { done: false, value: key };
    });
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this.keys();
  }

  /** Returns the keys in ascending order, as an array. */
  toArray(): K[] {
    const results: K[] = [];
    for (const key of this.keys())
      results.push(key);
    return results;
  }

  toString() {
    return this.toArray().toString();
  }

  /** Gets the lowest key in the tree. Complexity: O(log size) */
  minKey(): K | undefined {
    return this._root?.firstLeaf().minKey();
  }

  /** Gets the highest key in the tree. Complexity: O(log size) */
  maxKey(): K | undefined {
    return this._root?.lastLeaf().maxKey();
  }

  /////////////////////////////////////////////////////////////////////////////
  // Diagnostics //////////////////////////////////////////////////////////////

  /**
   * Walks the whole tree checking parent links, key order and node shape,
   * sending a message to `sink` for every problem found.
   * @returns true if no problem was found.
   */
  validate(sink?: DiagnosticSink): boolean {
    return validate(this, sink);
  }

  /** Scans the tree for signs of serious bugs and throws an Error describing
   *  all of them (including a mismatch between `size` and the number of
   *  keys actually stored). Computational complexity: O(size). */
  checkValid() {
    const problems = findViolations(this).map(v => v.message);
    check(problems.length === 0, 'is invalid:\n' + problems.join('\n'));
    let counted = 0;
    for (let it = this.begin(); it.isValid; it = it.next())
      counted++;
    check(counted === this._size, 'size mismatch: counted', counted, 'but stored', this._size);
  }

  /** Draws the tree as text, one line per level. */
  render(options?: RenderOptions<K>): string {
    return render(this, options);
  }
}

function iterator<T>(next: () => IteratorResult<T>): IterableIterator<T> {
  const result: IterableIterator<T> = {
    next,
    [Symbol.iterator]() { return result; }
  };
  return result;
}
