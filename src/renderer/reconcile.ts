/**
 * View materializer and differ
 *
 * First build resolves every facet of every node and describes the whole
 * tree as patches. After that, reconcile() recomputes only the facets the
 * dependency index names for the dirty variables; every other node object
 * is carried over from the previous tree untouched. Each recomputed facet is
 * compared with its previous value and only real changes become patches,
 * in pre-order.
 */

import {
  BIND_PROP,
  VISIBLE_PROP,
  isHandlerProp,
  type PropValue,
} from '../ast/types';
import { EvalError } from '../common/errors';
import { logger } from '../dev/logger';
import { evaluate, type Snapshot } from '../evaluator/evaluate';
import type { ArenaNode } from '../runtime/arena';
import { facetProp, type Facet, type FacetRef } from '../runtime/facets';
import type { LoadedProgram } from '../runtime/program';
import {
  sizeOfNodeShell,
  sizeOfString,
  sizeOfValue,
  type MemoryMeter,
} from '../sandbox/memory';
import { colorsEqual } from '../value/color';
import {
  NULL,
  isTruthy,
  toText,
  valuesIdentical,
  type Value,
} from '../value/value';
import type {
  MaterializedNode,
  MaterializedTree,
  PatchOp,
  PropOutput,
  ReconcileOptions,
  Reconciliation,
} from './types';

export interface MaterializeOptions extends ReconcileOptions {
  meter?: MemoryMeter;
}

type FacetValue = string | boolean | PropOutput;

function readVariable(name: string, snapshot: Snapshot): Value {
  return evaluate({ kind: 'ident', name }, snapshot);
}

function computeFacet(
  entry: ArenaNode,
  facet: Facet,
  snapshot: Snapshot
): FacetValue {
  const { node } = entry;
  switch (facet) {
    case 'text': {
      let out = '';
      for (const span of node.text ?? []) {
        out +=
          span.kind === 'literal'
            ? span.text
            : toText(readVariable(span.name, snapshot));
      }
      return out;
    }
    case 'visible': {
      const value = node.props[VISIBLE_PROP];
      if (!value) return true;
      return isTruthy(resolveValueProp(value, snapshot, 'visible'));
    }
    case 'value': {
      const value = node.props[BIND_PROP];
      return value ? resolveValueProp(value, snapshot, 'bind') : NULL;
    }
    default: {
      const name = facetProp(facet);
      const value = name === null ? undefined : node.props[name];
      return value ? resolveProp(value, snapshot) : NULL;
    }
  }
}

function resolveProp(value: PropValue, snapshot: Snapshot): PropOutput {
  switch (value.kind) {
    case 'literal':
      return value.value;
    case 'color':
      return value.color;
    case 'expr':
      return evaluate(value.expr, snapshot);
    case 'ident':
      return readVariable(value.name, snapshot);
  }
}

/** `visible` and `bind` only ever hold runtime values. */
function resolveValueProp(
  value: PropValue,
  snapshot: Snapshot,
  where: string
): Value {
  const out = resolveProp(value, snapshot);
  if (out.kind === 'color') {
    throw new EvalError('TypeMismatch', `${where} cannot hold a color`);
  }
  return out;
}

function fallbackFor(facet: Facet): FacetValue {
  switch (facet) {
    case 'text':
      return '';
    case 'visible':
      return false;
    default:
      return NULL;
  }
}

function sameFacetValue(a: FacetValue, b: FacetValue): boolean {
  if (typeof a !== 'object' || typeof b !== 'object') return a === b;
  if (a.kind === 'color' || b.kind === 'color') {
    return a.kind === 'color' && b.kind === 'color' && colorsEqual(a, b);
  }
  return valuesIdentical(a, b);
}

function sizeOfOutput(v: PropOutput): number {
  return v.kind === 'color' ? 24 : sizeOfValue(v);
}

export function sizeOfNode(node: MaterializedNode): number {
  let bytes = sizeOfNodeShell(node.children.length);
  if (node.text !== undefined) bytes += sizeOfString(node.text);
  if (node.value !== undefined) bytes += sizeOfValue(node.value);
  for (const [name, value] of Object.entries(node.props)) {
    bytes += sizeOfString(name) + sizeOfOutput(value);
  }
  return bytes;
}

class FacetResolver {
  private readonly snapshot: Snapshot;
  private readonly options: MaterializeOptions;

  constructor(snapshot: Snapshot, options: MaterializeOptions) {
    this.snapshot = snapshot;
    this.options = options;
  }

  resolve(entry: ArenaNode, facet: Facet): FacetValue {
    this.options.trace?.(entry.ref, facet);
    try {
      return computeFacet(entry, facet, this.snapshot);
    } catch (error) {
      if (!(error instanceof EvalError)) throw error;
      if (this.options.onFacetError) {
        this.options.onFacetError(entry.ref, facet, error);
      } else {
        logger.warn(
          `Could not resolve ${facet} of node ${entry.ref} (${entry.node.kind}):`,
          error.message
        );
      }
      return fallbackFor(facet);
    }
  }
}

/** Apply one facet value to a node under construction. */
function writeFacet(
  draft: DraftNode,
  facet: Facet,
  value: FacetValue
): void {
  if (facet === 'text') draft.text = String(value);
  else if (facet === 'visible') draft.visible = value === true;
  else if (typeof value === 'object') {
    if (facet === 'value') {
      if (value.kind !== 'color') draft.value = value;
    } else {
      const name = facetProp(facet);
      if (name !== null) draft.props[name] = value;
    }
  }
}

function toPatch(ref: number, facet: Facet, value: FacetValue): PatchOp {
  if (facet === 'text') return { op: 'set-text', ref, text: String(value) };
  if (facet === 'visible') {
    return { op: 'set-visible', ref, visible: value === true };
  }
  const name = facet === 'value' ? 'value' : (facetProp(facet) ?? facet);
  const out: PropOutput = typeof value === 'object' ? value : NULL;
  return { op: 'set-prop', ref, name, value: out };
}

function readFacet(node: MaterializedNode, facet: Facet): FacetValue {
  if (facet === 'text') return node.text ?? '';
  if (facet === 'visible') return node.visible;
  if (facet === 'value') return node.value ?? NULL;
  const name = facetProp(facet);
  return (name !== null ? node.props[name] : undefined) ?? NULL;
}

interface DraftNode {
  ref: number;
  kind: string;
  parent: number | null;
  children: readonly number[];
  text?: string;
  visible: boolean;
  value?: Value;
  props: Record<string, PropOutput>;
  handlers: Readonly<Record<string, string>>;
  binding?: string;
}

function shellOf(entry: ArenaNode): DraftNode {
  const handlers: Record<string, string> = {};
  let binding: string | undefined;
  for (const [name, value] of Object.entries(entry.node.props)) {
    if (value.kind !== 'ident') continue;
    if (isHandlerProp(name)) handlers[name] = value.name;
    else if (name === BIND_PROP) binding = value.name;
  }
  const draft: DraftNode = {
    ref: entry.ref,
    kind: entry.node.kind,
    parent: entry.parent,
    children: entry.children,
    visible: true,
    props: {},
    handlers,
  };
  if (binding !== undefined) draft.binding = binding;
  return draft;
}

/**
 * Build the full tree for `snapshot`. The patch list describes the whole
 * initial layout: every facet of every node, in pre-order.
 */
export function materialize(
  program: LoadedProgram,
  snapshot: Snapshot,
  options: MaterializeOptions = {}
): Reconciliation {
  const resolver = new FacetResolver(snapshot, options);
  const nodes: MaterializedNode[] = [];
  const patches: PatchOp[] = [];

  for (const entry of program.nodes) {
    const draft = shellOf(entry);
    for (const facet of entry.facets) {
      const value = resolver.resolve(entry, facet);
      writeFacet(draft, facet, value);
      patches.push(toPatch(entry.ref, facet, value));
    }
    const node: MaterializedNode = draft;
    options.meter?.allocate(sizeOfNode(node), 'view materialization');
    nodes.push(node);
  }

  return { tree: { nodes }, patches };
}

function groupByRef(dirty: readonly FacetRef[]): Map<number, Facet[]> {
  const grouped = new Map<number, Facet[]>();
  for (const { ref, facet } of dirty) {
    const list = grouped.get(ref);
    if (list) list.push(facet);
    else grouped.set(ref, [facet]);
  }
  return grouped;
}

/**
 * Recompute the facets that read `dirtyVars` and diff them against
 * `previous`. With no previous tree this is a first build.
 */
export function reconcile(
  program: LoadedProgram,
  snapshot: Snapshot,
  previous: MaterializedTree | null,
  dirtyVars: Iterable<string>,
  options: MaterializeOptions = {}
): Reconciliation {
  if (!previous) return materialize(program, snapshot, options);

  const dirty = program.index.dependentsOf(dirtyVars);
  if (dirty.length === 0) return { tree: previous, patches: [] };

  const resolver = new FacetResolver(snapshot, options);
  // Pointer copy; untouched entries keep their previous node objects
  const nodes = previous.nodes.slice();
  const patches: PatchOp[] = [];

  for (const [ref, facets] of groupByRef(dirty)) {
    const entry = program.nodes[ref];
    const before = previous.nodes[ref];
    const draft: DraftNode = { ...before, props: { ...before.props } };
    let changed = false;

    for (const facet of facets) {
      const value = resolver.resolve(entry, facet);
      if (sameFacetValue(readFacet(before, facet), value)) continue;
      writeFacet(draft, facet, value);
      patches.push(toPatch(ref, facet, value));
      changed = true;
    }

    if (!changed) continue;
    const after: MaterializedNode = draft;
    options.meter?.allocate(sizeOfNode(after), 'view update');
    options.meter?.release(sizeOfNode(before));
    nodes[ref] = after;
  }

  return { tree: { nodes }, patches };
}
