import type { TreeNode } from './internal/nodes';
import { check } from './internal/assert';
import { describeIterator } from './diagnostics/labels';

/**
 * A position within a 2-4 tree: key `index` of `node`. Besides positions
 * on a key there are three special states:
 * - null: no node (e.g. `begin()` of an empty tree)
 * - before-begin: `index === -1` on the first leaf
 * - end: `index === node.keyCount()` on the last leaf
 *
 * Iterators are immutable; `next()` and `prev()` return new ones. They
 * are invalidated by any change to the tree.
 */
export class TreeIterator<K> {
  readonly node: TreeNode<K> | undefined;
  readonly index: number;

  constructor(node: TreeNode<K> | undefined, index: number) {
    this.node = node;
    this.index = index;
  }

  get isNull() { return this.node === undefined; }
  get isBeforeBegin() { return this.node !== undefined && this.index === -1; }
  get isEnd() { return this.node !== undefined && this.index === this.node.keyCount(); }
  /** True if the iterator points at a key. */
  get isValid() { return this.node !== undefined && this.index >= 0 && this.index < this.node.keyCount(); }

  /** The key at this position. Throws if the iterator is not on a key. */
  get key(): K {
    check(this.node !== undefined && this.index >= 0 && this.index < this.node.keyCount(),
      'no key at', this.toString());
    return this.node.keys[this.index];
  }

  /** Iterator at the next larger key, or the end state after the last one. */
  next(): TreeIterator<K> {
    const node = this.node, i = this.index;
    if (node === undefined || i === node.keyCount())
      return this;
    if (!node.isLeaf)
      return new TreeIterator(node.children[i + 1].firstLeaf(), 0);
    if (i + 1 < node.keyCount())
      return new TreeIterator(node, i + 1);
    // Climb while we are the last child; the first ancestor reached from
    // a lower slot holds the successor.
    let child = node, parent = node.parent;
    while (parent !== undefined) {
      const slot = parent.slotOf(child);
      if (slot < parent.keyCount())
        return new TreeIterator(parent, slot);
      child = parent;
      parent = parent.parent;
    }
    return new TreeIterator(node, node.keyCount());
  }

  /** Iterator at the next smaller key, or the before-begin state. */
  prev(): TreeIterator<K> {
    const node = this.node, i = this.index;
    if (node === undefined || i === -1)
      return this;
    if (!node.isLeaf) {
      const leaf = node.children[i].lastLeaf();
      return new TreeIterator(leaf, leaf.keyCount() - 1);
    }
    if (i > 0)
      return new TreeIterator(node, i - 1);
    let child = node, parent = node.parent;
    while (parent !== undefined) {
      const slot = parent.slotOf(child);
      if (slot > 0)
        return new TreeIterator(parent, slot - 1);
      child = parent;
      parent = parent.parent;
    }
    return new TreeIterator(node, -1);
  }

  equals(other: TreeIterator<K>): boolean {
    return this.node === other.node && this.index === other.index;
  }

  toString(): string {
    return describeIterator(this.node, this.index);
  }
}
