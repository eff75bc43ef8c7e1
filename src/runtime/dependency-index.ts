/**
 * Dependency index
 *
 * Built once from the immutable view arena: for every place a state
 * variable is read (text interpolation, `visible`, `bind`, any other
 * dynamic property) it records one entry per occurrence. The index is
 * never rebuilt; lookups are proportional to the number of changed
 * variables and their readers.
 */

import {
  BIND_PROP,
  VISIBLE_PROP,
  type PropValue,
} from '../ast/types';
import { LoadError } from '../common/errors';
import { freeVariables } from '../evaluator/analyze';
import { describeNode, type ArenaNode } from './arena';
import {
  isPlainProp,
  propFacet,
  type Facet,
  type FacetRef,
  type NodeRef,
} from './facets';

export type ReadKind = 'interpolation' | 'visible' | 'bind' | 'prop';

export interface DependencyEntry {
  readonly variable: string;
  readonly ref: NodeRef;
  readonly facet: Facet;
  readonly readKind: ReadKind;
}

function readsOf(value: PropValue): string[] {
  switch (value.kind) {
    case 'expr':
      return freeVariables(value.expr);
    case 'ident':
      return [value.name];
    case 'literal':
    case 'color':
      return [];
  }
}

export class DependencyIndex {
  private readonly byVariable = new Map<string, DependencyEntry[]>();
  private readonly nodes: readonly ArenaNode[];

  private constructor(nodes: readonly ArenaNode[]) {
    this.nodes = nodes;
  }

  /**
   * Walk the arena and record every read. Throws UNRESOLVED_IDENTIFIER
   * for a read of an undeclared variable.
   */
  static build(
    nodes: readonly ArenaNode[],
    declared: ReadonlySet<string>
  ): DependencyIndex {
    const index = new DependencyIndex(nodes);

    for (const entry of nodes) {
      const { node, ref } = entry;
      const record = (variable: string, facet: Facet, readKind: ReadKind) => {
        if (!declared.has(variable)) {
          throw new LoadError(
            'UNRESOLVED_IDENTIFIER',
            `Unknown state variable "${variable}" read by ${describeNode(entry)}`
          );
        }
        index.add({ variable, ref, facet, readKind });
      };

      for (const span of node.text ?? []) {
        if (span.kind === 'var') record(span.name, 'text', 'interpolation');
      }

      for (const [name, value] of Object.entries(node.props)) {
        if (name === VISIBLE_PROP) {
          for (const v of readsOf(value)) record(v, 'visible', 'visible');
        } else if (name === BIND_PROP) {
          for (const v of readsOf(value)) record(v, 'value', 'bind');
        } else if (isPlainProp(name)) {
          for (const v of readsOf(value)) record(v, propFacet(name), 'prop');
        }
      }
    }

    return index;
  }

  private add(entry: DependencyEntry): void {
    const list = this.byVariable.get(entry.variable);
    if (list) list.push(entry);
    else this.byVariable.set(entry.variable, [entry]);
  }

  entriesFor(variable: string): readonly DependencyEntry[] {
    return this.byVariable.get(variable) ?? [];
  }

  /** Variables with at least one reader. */
  variables(): string[] {
    return [...this.byVariable.keys()];
  }

  /**
   * Facets reading any of `variables`, deduplicated, in pre-order and in
   * each node's facet order.
   */
  dependentsOf(variables: Iterable<string>): FacetRef[] {
    const touched = new Map<NodeRef, Set<Facet>>();
    for (const variable of variables) {
      for (const { ref, facet } of this.entriesFor(variable)) {
        const set = touched.get(ref);
        if (set) set.add(facet);
        else touched.set(ref, new Set([facet]));
      }
    }

    const refs = [...touched.keys()].sort((a, b) => a - b);
    const out: FacetRef[] = [];
    for (const ref of refs) {
      const wanted = touched.get(ref);
      if (!wanted) continue;
      for (const facet of this.nodes[ref].facets) {
        if (wanted.has(facet)) out.push({ ref, facet });
      }
    }
    return out;
  }

  nodesOf(variables: Iterable<string>): Set<NodeRef> {
    const refs = new Set<NodeRef>();
    for (const variable of variables) {
      for (const { ref } of this.entriesFor(variable)) refs.add(ref);
    }
    return refs;
  }
}
