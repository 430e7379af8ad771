import { MaxChildren, type ITreeNode, type ITreeView } from '../interfaces';
import { formatNode, type KeyFormatter } from './labels';

/**
 * Raised when the printer's own bookkeeping is inconsistent (a node with
 * no registered span, a span that never got resolved, or a span too narrow
 * for its label). A malformed tree is reported by the validator instead;
 * this error means the layout itself went wrong.
 */
export class LayoutError extends Error {
  constructor(message: string) {
    super('2-4 tree layout: ' + message);
    this.name = 'LayoutError';
  }
}

/**
 * Horizontal text columns `[begin, end)` allotted to one node, plus the
 * structural position (`owner`, `slot`) it was reached through.
 */
export interface Span<K> {
  node: ITreeNode<K>;
  label: string;
  begin: number;
  end: number;
  hasBegin: boolean;
  hasEnd: boolean;
  owner: ITreeNode<K> | undefined;
  slot: number;
}

/** Spans of every node of one tree, valid for a single render. */
export type SpanTable<K> = Map<ITreeNode<K>, Span<K>>;

export interface RenderOptions<K> {
  /** Converts keys to label text. Defaults to `String`. */
  formatKey?: KeyFormatter<K>;
}

/**
 * Draws the tree as text, one line per level with the root on top. Leaves
 * are packed left to right; each internal node is centered over the
 * columns of its subtree. Returns "" for an empty tree.
 *
 * @example
 * ```
 *      [10]
 * [3, 7] [12, 15]
 * ```
 */
export function render<K>(tree: Pick<ITreeView<K>, 'root'>, options: RenderOptions<K> = {}): string {
  const root = tree.root;
  if (root === undefined)
    return '';
  const spans = computeSpans(root, options.formatKey);
  return renderLevels(root, spans);
}

/**
 * First pass: visits the tree breadth-first, giving each leaf the next
 * free columns and pushing its `begin` up through ancestors it is the
 * first child of, and its `end` up through ancestors it is the last child
 * of. An ancestor whose label is wider than that is widened to fit it,
 * and the leaves after it move right.
 */
export function computeSpans<K>(root: ITreeNode<K>, formatKey?: KeyFormatter<K>): SpanTable<K> {
  const spans: SpanTable<K> = new Map();
  spans.set(root, newSpan(root, undefined, -1, formatKey));
  let offset = 0;
  forEachLevel(root, node => {
    const span = lookup(spans, node);
    if (node.isLeaf) {
      span.begin = offset;
      span.hasBegin = true;
      propagateBegin(spans, span);
      span.end = span.begin + span.label.length + 1;
      span.hasEnd = true;
      offset = propagateEnd(spans, span);
    }
  }, (child, owner, slot) => {
    spans.set(child, newSpan(child, owner, slot, formatKey));
  });
  return spans;
}

/** Second pass: emits one line per level using the spans from `computeSpans`. */
export function renderLevels<K>(root: ITreeNode<K>, spans: SpanTable<K>): string {
  let out = '', line = '', depth = 0;
  forEachLevel(root, (node, level) => {
    if (level !== depth) {
      out += line + '\n';
      line = '';
      depth = level;
    }
    const span = lookup(spans, node);
    if (span.begin > line.length)
      line += ' '.repeat(span.begin - line.length);
    line += node.isLeaf ? span.label + ' ' : centered(span);
  });
  return out + line + '\n';
}

function newSpan<K>(node: ITreeNode<K>, owner: ITreeNode<K> | undefined, slot: number, formatKey?: KeyFormatter<K>): Span<K> {
  // Internal nodes keep the (0,0) placeholder until a descendant leaf
  // resolves them.
  return { node, label: formatNode(node, formatKey), begin: 0, end: 0, hasBegin: false, hasEnd: false, owner, slot };
}

function lookup<K>(spans: SpanTable<K>, node: ITreeNode<K>): Span<K> {
  const span = spans.get(node);
  if (span === undefined)
    throw new LayoutError(`no span registered for ${formatNode(node)}`);
  return span;
}

function propagateBegin<K>(spans: SpanTable<K>, span: Span<K>) {
  while (span.owner !== undefined && span.slot === 0) {
    const ownerSpan = lookup(spans, span.owner);
    ownerSpan.begin = span.begin;
    ownerSpan.hasBegin = true;
    span = ownerSpan;
  }
}

// Returns the rightmost column claimed, which is where the next leaf starts.
function propagateEnd<K>(spans: SpanTable<K>, span: Span<K>): number {
  let right = span.end;
  while (span.owner !== undefined && span.slot === span.owner.keyCount()) {
    const ownerSpan = lookup(spans, span.owner);
    ownerSpan.end = Math.max(span.end - trailingWhitespace(span),
                             ownerSpan.begin + ownerSpan.label.length + 1);
    ownerSpan.hasEnd = true;
    right = Math.max(right, ownerSpan.end);
    span = ownerSpan;
  }
  return right;
}

/** Blank columns printed after the label of a node (see `centered`). */
function trailingWhitespace<K>(span: Span<K>): number {
  if (span.node.isLeaf)
    return 0;
  return ((span.end - span.begin) >> 1) - ((span.label.length + 1) >> 1);
}

/**
 * Text of an internal node: its label right-justified in the left half of
 * the span plus half the label width, then blanks to fill the rest.
 */
function centered<K>(span: Span<K>): string {
  if (!span.hasBegin || !span.hasEnd)
    throw new LayoutError(`span of ${span.label} was never resolved`);
  const width = span.end - span.begin, text = span.label + ' ';
  if (width < text.length)
    throw new LayoutError(`span [${span.begin}, ${span.end}) is narrower than ${span.label}`);
  return text.padStart((width >> 1) + (text.length >> 1)) + ' '.repeat((width >> 1) - (text.length >> 1));
}

/**
 * Breadth-first walk that handles one level at a time, so only the current
 * and next levels are ever queued. `onChild` sees each present child (in
 * slot order) before it is queued. A node reached a second time means the
 * structure is not a tree; the walk refuses to loop.
 */
function forEachLevel<K>(
  root: ITreeNode<K>,
  visit: (node: ITreeNode<K>, level: number) => void,
  onChild?: (child: ITreeNode<K>, owner: ITreeNode<K>, slot: number) => void
) {
  const visited = new Set<ITreeNode<K>>();
  let current: ITreeNode<K>[] = [root];
  for (let level = 0; current.length > 0; level++) {
    const next: ITreeNode<K>[] = [];
    for (const node of current) {
      if (visited.has(node))
        throw new LayoutError(`${formatNode(node)} is reachable more than once`);
      visited.add(node);
      visit(node, level);
      for (let i = 0; i < MaxChildren; i++) {
        const child = node.childAt(i);
        if (child !== undefined) {
          onChild?.(child, node, i);
          next.push(child);
        }
      }
    }
    current = next;
  }
}
