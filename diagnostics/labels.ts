import type { ITreeNode } from '../interfaces';

/** Converts one key to the text shown inside a node label. */
export type KeyFormatter<K> = (key: K) => string;

/**
 * Formats the keys of a node as `[k0, k1, k2]`, or `[]` for a node
 * without keys.
 */
export function formatNode<K>(node: ITreeNode<K>, formatKey: KeyFormatter<K> = String): string {
  const parts: string[] = [];
  for (let i = 0, n = node.keyCount(); i < n; i++)
    parts.push(formatKey(node.keyAt(i)));
  return '[' + parts.join(', ') + ']';
}

/** Like `formatNode`, but `none` when there is no node. */
export function formatOptionalNode<K>(node: ITreeNode<K> | undefined, formatKey?: KeyFormatter<K>): string {
  return node === undefined ? 'none' : formatNode(node, formatKey);
}

/**
 * Debug description of an iterator positioned at `index` within `node`:
 * - `Iterator(null)` when there is no node
 * - `Iterator(before-begin, [..])` when `index` is -1
 * - `Iterator(end, [..])` when `index` equals the node's key count
 * - `Iterator([..], index)` otherwise
 */
export function describeIterator<K>(node: ITreeNode<K> | undefined, index: number, formatKey?: KeyFormatter<K>): string {
  if (node === undefined)
    return 'Iterator(null)';
  const label = formatNode(node, formatKey);
  if (index === -1)
    return `Iterator(before-begin, ${label})`;
  if (index === node.keyCount())
    return `Iterator(end, ${label})`;
  return `Iterator(${label}, ${index})`;
}
