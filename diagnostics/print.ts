import type { ITreeNode } from '../interfaces';
import { LayoutError, render, type RenderOptions } from './layout';
import { getDiagnosticSink, getVerbosity, type DiagnosticSink } from './log';

/**
 * Prints the whole tree that `node` belongs to, if the current verbosity
 * is at least `verbosityThreshold`. Climbs `parent` links to find the root.
 * Returns the diagram that was printed, or undefined if nothing was.
 */
export function printFromRoot<K>(
  node: ITreeNode<K>,
  verbosityThreshold: number,
  sink: DiagnosticSink = getDiagnosticSink(),
  options?: RenderOptions<K>
): string | undefined {
  if (getVerbosity() < verbosityThreshold)
    return undefined;
  let root = node;
  const seen = new Set<ITreeNode<K>>([root]);
  for (let up = root.parent; up !== undefined; up = up.parent) {
    if (seen.has(up))
      throw new LayoutError('parent links form a cycle');
    seen.add(up);
    root = up;
  }
  const diagram = render({ root }, options);
  sink(diagram);
  return diagram;
}
