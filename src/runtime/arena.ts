import type { ViewNode } from '../ast/types';
import { nodeFacets, type Facet, type NodeRef } from './facets';

/**
 * Flattened view tree. A node's ref is its pre-order position, so refs stay
 * stable for as long as the tree shape does, and sorting refs gives
 * pre-order.
 */
export interface ArenaNode {
  readonly ref: NodeRef;
  readonly node: ViewNode;
  readonly parent: NodeRef | null;
  readonly children: readonly NodeRef[];
  /** Child indices from the root, for diagnostics. */
  readonly path: readonly number[];
  readonly facets: readonly Facet[];
}

export function buildArena(root: ViewNode | undefined): ArenaNode[] {
  const nodes: ArenaNode[] = [];
  if (!root) return nodes;

  const visit = (
    node: ViewNode,
    parent: NodeRef | null,
    path: readonly number[]
  ): NodeRef => {
    const ref = nodes.length;
    const children: NodeRef[] = [];
    nodes.push({ ref, node, parent, children, path, facets: nodeFacets(node) });
    node.children.forEach((child, i) => {
      children.push(visit(child, ref, [...path, i]));
    });
    return ref;
  };

  visit(root, null, []);
  return nodes;
}

export function describeNode(entry: ArenaNode): string {
  const path = entry.path.length ? entry.path.join('.') : 'root';
  return `${entry.node.kind}@${path}`;
}
