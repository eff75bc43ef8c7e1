/**
 * Facets: the independently resolvable aspects of one view node.
 *
 * Order within a node is fixed (text, visible, value, then properties in
 * declaration order) so that patches for one node always come out in the
 * same sequence.
 */

import {
  BIND_PROP,
  VISIBLE_PROP,
  isHandlerProp,
  type ViewNode,
} from '../ast/types';

export type Facet = 'text' | 'visible' | 'value' | `prop:${string}`;

export type NodeRef = number;

export interface FacetRef {
  readonly ref: NodeRef;
  readonly facet: Facet;
}

export function propFacet(name: string): Facet {
  return `prop:${name}`;
}

/** Property name carried by a `prop:` facet, or null for the built-in ones. */
export function facetProp(facet: Facet): string | null {
  return facet.startsWith('prop:') ? facet.slice(5) : null;
}

export function isPlainProp(name: string): boolean {
  return name !== VISIBLE_PROP && name !== BIND_PROP && !isHandlerProp(name);
}

export function nodeFacets(node: ViewNode): Facet[] {
  const facets: Facet[] = [];
  if (node.text) facets.push('text');
  facets.push('visible');
  if (BIND_PROP in node.props) facets.push('value');
  for (const name of Object.keys(node.props)) {
    if (isPlainProp(name)) facets.push(propFacet(name));
  }
  return facets;
}
