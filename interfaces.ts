/** Maximum number of keys a node of a 2-4 tree can hold. */
export const MaxKeys = 3;
/** Maximum number of child slots (the fanout) of a 2-4 tree node. */
export const MaxChildren = MaxKeys + 1;

/**
 * Read-only view of one node of a 2-4 tree. This is everything the
 * validator and the printer need; they never mutate a node.
 *
 * Keys are dense in `[0, keyCount())`. Child slots run from 0 to
 * `MaxChildren - 1` and each is either empty (`undefined`) or holds the
 * child node owned by this node.
 */
export interface ITreeNode<K> {
  /** True iff the node holds zero children. */
  readonly isLeaf: boolean;
  /** Back-reference to the node that owns this one; `undefined` at the root. */
  readonly parent: ITreeNode<K> | undefined;
  keyCount(): number;
  keyAt(i: number): K;
  childAt(i: number): ITreeNode<K> | undefined;
}

/** A tree that can be inspected: its root (none when empty) and key order. */
export interface ITreeView<K> {
  readonly root: ITreeNode<K> | undefined;
  readonly compare: (a: K, b: K) => number;
}

/** Read-only interface of a sorted set. */
export interface ISortedSetSource<K> {
  /** Returns the number of keys in the collection. */
  readonly size: number;
  /** Returns true if the key exists in the collection. */
  has(key: K): boolean;
  /** Returns the smallest key, or undefined if the collection is empty. */
  minKey(): K | undefined;
  /** Returns the largest key, or undefined if the collection is empty. */
  maxKey(): K | undefined;
  /** Returns an iterator that provides the keys in ascending order. */
  keys(): IterableIterator<K>;
  /** Calls the callback once for each key, in ascending order. */
  forEach(callbackFn: (key: K) => void): void;
}

/** Mutable sorted set. */
export interface ISortedSet<K> extends ISortedSetSource<K> {
  /** Adds a key. Returns false if the key was already present. */
  add(key: K): boolean;
  /** Removes a key. Returns true if the key was present. */
  delete(key: K): boolean;
  /** Removes all keys. */
  clear(): void;
}
