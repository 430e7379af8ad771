import { MaxKeys, type ITreeNode } from '../interfaces';
import { check } from './assert';

type index = number;

/**
 * A node of a 2-4 tree. A leaf has no children; an internal node owns
 * exactly `keys.length + 1` children in `children`, and every child's
 * `parent` points back here.
 */
export class TreeNode<K> implements ITreeNode<K> {
  keys: K[];
  // Dense: empty for a leaf. Slot i holds keys below keys[i]; the last
  // slot holds keys above the last key.
  children: TreeNode<K>[];
  parent: TreeNode<K> | undefined;

  get isLeaf() { return this.children.length === 0; }

  constructor(keys: K[] = [], children: TreeNode<K>[] = []) {
    this.keys = keys;
    this.children = children;
    this.parent = undefined;
    for (const child of children)
      child.parent = this;
  }

  keyCount(): number {
    return this.keys.length;
  }

  keyAt(i: index): K {
    return this.keys[i];
  }

  childAt(i: index): TreeNode<K> | undefined {
    return this.children[i];
  }

  minKey(): K | undefined {
    return this.keys[0];
  }

  maxKey(): K | undefined {
    return this.keys[this.keys.length - 1];
  }

  /** Slot that `child` occupies in this node, or -1 if it is not a child. */
  slotOf(child: TreeNode<K>): index {
    return this.children.indexOf(child);
  }

  // If key not found, returns i^failXor where i is the insertion index.
  // Callers that don't care whether there was a match will set failXor=0.
  indexOf(key: K, failXor: number, cmp: (a: K, b: K) => number): index {
    const keys = this.keys;
    let lo = 0, hi = keys.length, mid = hi >> 1;
    while (lo < hi) {
      const c = cmp(keys[mid], key);
      if (c < 0)
        lo = mid + 1;
      else if (c > 0) // key < keys[mid]
        hi = mid;
      else if (c === 0)
        return mid;
      else
        throw new Error('2-4 tree: NaN was used as a key');
      mid = (lo + hi) >> 1;
    }
    return mid ^ failXor;
  }

  /** Leftmost leaf of this subtree. */
  firstLeaf(): TreeNode<K> {
    let node: TreeNode<K> = this;
    while (!node.isLeaf)
      node = node.children[0];
    return node;
  }

  /** Rightmost leaf of this subtree. */
  lastLeaf(): TreeNode<K> {
    let node: TreeNode<K> = this;
    while (!node.isLeaf)
      node = node.children[node.children.length - 1];
    return node;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Insertion & node splitting ///////////////////////////////////////////////

  /** Inserts `key` at index `i`, with `rightChild` (if any) just after it. */
  insertAt(i: index, key: K, rightChild?: TreeNode<K>) {
    this.keys.splice(i, 0, key);
    if (rightChild !== undefined) {
      this.children.splice(i + 1, 0, rightChild);
      rightChild.parent = this;
    }
  }

  get isOverfull() { return this.keys.length > MaxKeys; }

  /**
   * Splits a node holding four keys `[k0, k1, k2, k3]`: this node keeps
   * `[k0]` (and its first two children), the new right sibling receives
   * `[k2, k3]` (and the last three children), and `k1` is returned for
   * promotion into the parent.
   */
  splitOffRightSide(): { promoted: K, right: TreeNode<K> } {
    check(this.keys.length === MaxKeys + 1, 'split of a node with', this.keys.length, 'keys');
    const promoted = this.keys[1];
    const rightKeys = this.keys.splice(1).slice(1);
    const rightChildren = this.isLeaf ? [] : this.children.splice(2);
    return { promoted, right: new TreeNode<K>(rightKeys, rightChildren) };
  }

  /////////////////////////////////////////////////////////////////////////////
  // Deletion: borrowing & merging ////////////////////////////////////////////
  // Each of these is called on the parent, to repair its child at `i`
  // after that child lost its last key.

  /** Rotates the last key of `children[i-1]` through `keys[i-1]` into `children[i]`. */
  borrowFromLeft(i: index) {
    const node = this.children[i], left = this.children[i - 1];
    node.keys.unshift(this.keys[i - 1]);
    this.keys[i - 1] = left.keys[left.keys.length - 1];
    left.keys.length--;
    if (!left.isLeaf) {
      const moved = left.children[left.children.length - 1];
      left.children.length--;
      node.children.unshift(moved);
      moved.parent = node;
    }
  }

  /** Rotates the first key of `children[i+1]` through `keys[i]` into `children[i]`. */
  borrowFromRight(i: index) {
    const node = this.children[i], right = this.children[i + 1];
    node.keys.push(this.keys[i]);
    this.keys[i] = right.keys[0];
    right.keys.splice(0, 1);
    if (!right.isLeaf) {
      const moved = right.children[0];
      right.children.splice(0, 1);
      node.children.push(moved);
      moved.parent = node;
    }
  }

  /**
   * Merges `children[i+1]` into `children[i]`, pulling `keys[i]` down
   * between them. The parent loses one key and one child.
   */
  mergeChildren(i: index) {
    const left = this.children[i], right = this.children[i + 1];
    left.keys.push(this.keys[i], ...right.keys);
    for (const child of right.children) {
      left.children.push(child);
      child.parent = left;
    }
    this.keys.splice(i, 1);
    this.children.splice(i + 1, 1);
    right.parent = undefined;
  }
}
