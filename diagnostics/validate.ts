import { MaxChildren, type ITreeNode, type ITreeView } from '../interfaces';
import { formatNode, formatOptionalNode } from './labels';
import { LayoutError, render } from './layout';
import { getDiagnosticSink, type DiagnosticSink } from './log';

/** Which structural rule a violation breaks. */
export type ViolationKind =
  /** `parent` does not point at the node that owns this one */
  | 'parent'
  /** two keys of one node are not strictly ascending */
  | 'order'
  /** a child left of key `i` holds a key above `keys[i]` */
  | 'left-bound'
  /** the rightmost child holds a key below the last key */
  | 'right-bound'
  /** a child sits in a slot past `keyCount` */
  | 'stray-child'
  /** an internal node does not have `keyCount + 1` children */
  | 'shape'
  /** the same node is owned by more than one slot */
  | 'revisit';

export interface Violation<K> {
  kind: ViolationKind;
  node: ITreeNode<K>;
  message: string;
}

/**
 * Checks every node of the tree and reports each violation to `sink` as
 * soon as it is found. Does not stop at the first problem. Returns true
 * if the tree is structurally sound. A tree without a root has nothing to
 * check and passes.
 */
export function validate<K>(tree: ITreeView<K>, sink: DiagnosticSink = getDiagnosticSink()): boolean {
  let ok = true;
  walk(tree, v => {
    ok = false;
    sink(v.message);
  });
  return ok;
}

/** Like `validate`, but collects the violations instead of reporting them. */
export function findViolations<K>(tree: ITreeView<K>): Violation<K>[] {
  const found: Violation<K>[] = [];
  walk(tree, v => { found.push(v); });
  return found;
}

function walk<K>(tree: ITreeView<K>, report: (v: Violation<K>) => void) {
  const root = tree.root;
  if (root === undefined)
    return;
  const cmp = tree.compare;
  const seen = new Set<ITreeNode<K>>([root]);
  const queue: [ITreeNode<K> | undefined, ITreeNode<K>][] = [[undefined, root]];
  for (let head = 0; head < queue.length; head++) {
    const [expectedParent, node] = queue[head];
    const keyCount = node.keyCount();

    if (node.parent !== expectedParent) {
      report({ kind: 'parent', node, message:
        `parent mismatch at ${formatNode(node)}: expected parent ${formatOptionalNode(expectedParent)}, ` +
        `actual parent ${formatOptionalNode(node.parent)}` });
    }

    for (let i = 1; i < keyCount; i++) {
      const a = node.keyAt(i - 1), b = node.keyAt(i);
      if (!(cmp(a, b) < 0)) {
        report({ kind: 'order', node, message:
          `keys out of order in ${formatNode(node)}: ${String(a)} is not less than ${String(b)}\n` +
          diagramOf(tree) });
      }
    }

    let children = 0;
    for (let i = 0; i < MaxChildren; i++) {
      const child = node.childAt(i);
      if (child === undefined)
        continue;
      if (i < keyCount) {
        children++;
        const max = maxKeyOf(child);
        if (max !== undefined && cmp(max.key, node.keyAt(i)) > 0) {
          report({ kind: 'left-bound', node, message:
            `child ${i} of ${formatNode(node)} holds ${String(max.key)}, above key ${String(node.keyAt(i))}` });
        }
      } else if (i === keyCount) {
        children++;
        const min = minKeyOf(child);
        if (keyCount > 0 && min !== undefined && cmp(min.key, node.keyAt(keyCount - 1)) < 0) {
          report({ kind: 'right-bound', node, message:
            `rightmost child of ${formatNode(node)} holds ${String(min.key)}, ` +
            `below key ${String(node.keyAt(keyCount - 1))}` });
        }
      } else {
        report({ kind: 'stray-child', node, message:
          `${formatNode(node)} has child ${formatNode(child)} in slot ${i}, past its ${keyCount} keys` });
      }

      if (seen.has(child)) {
        report({ kind: 'revisit', node, message:
          `${formatNode(child)} in slot ${i} of ${formatNode(node)} was already reached through another slot` });
      } else {
        seen.add(child);
        queue.push([node, child]);
      }
    }

    if (!node.isLeaf && children !== keyCount + 1) {
      const listing: string[] = [];
      for (let i = 0; i < MaxChildren; i++) {
        const child = node.childAt(i);
        if (child !== undefined)
          listing.push(`  slot ${i}: ${formatNode(child)}`);
      }
      report({ kind: 'shape', node, message:
        `${formatNode(node)} has ${keyCount} keys but ${children} children (expected ${keyCount + 1})\n` +
        listing.join('\n') });
    }
  }
}

// Boxed so that an `undefined` key is distinguishable from "no keys".
function maxKeyOf<K>(node: ITreeNode<K>): { key: K } | undefined {
  const n = node.keyCount();
  return n === 0 ? undefined : { key: node.keyAt(n - 1) };
}

function minKeyOf<K>(node: ITreeNode<K>): { key: K } | undefined {
  return node.keyCount() === 0 ? undefined : { key: node.keyAt(0) };
}

function diagramOf<K>(tree: ITreeView<K>): string {
  try {
    return render(tree);
  } catch (e) {
    if (e instanceof LayoutError)
      return `(no diagram: ${e.message})`;
    throw e;
  }
}
