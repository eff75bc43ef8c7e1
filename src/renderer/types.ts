import type { Color } from '../value/color';
import type { Value } from '../value/value';
import type { Facet, NodeRef } from '../runtime/facets';

/** A resolved property: a runtime value, or a color passed through as-is. */
export type PropOutput = Value | Color;

export interface MaterializedNode {
  readonly ref: NodeRef;
  readonly kind: string;
  readonly parent: NodeRef | null;
  readonly children: readonly NodeRef[];
  /** Substituted text; present only on nodes with a text template. */
  readonly text?: string;
  readonly visible: boolean;
  /** Current value of the `bind` target; present only on bound nodes. */
  readonly value?: Value;
  readonly props: Readonly<Record<string, PropOutput>>;
  /** Handler property -> action name, for event dispatch. */
  readonly handlers: Readonly<Record<string, string>>;
  /** Bound state variable, for input events. */
  readonly binding?: string;
}

/** Mirrors the view arena 1:1; `nodes[ref]` is the node with that ref. */
export interface MaterializedTree {
  readonly nodes: readonly MaterializedNode[];
}

export type PatchOp =
  | { readonly op: 'set-text'; readonly ref: NodeRef; readonly text: string }
  | {
      readonly op: 'set-visible';
      readonly ref: NodeRef;
      readonly visible: boolean;
    }
  | {
      readonly op: 'set-prop';
      readonly ref: NodeRef;
      readonly name: string;
      readonly value: PropOutput;
    };

export interface Reconciliation {
  readonly tree: MaterializedTree;
  readonly patches: readonly PatchOp[];
}

export interface ReconcileOptions {
  /** Called once per recomputed facet. */
  trace?: (ref: NodeRef, facet: Facet) => void;
  /** Receives facet evaluation failures; defaults to the shared logger. */
  onFacetError?: (ref: NodeRef, facet: Facet, error: Error) => void;
}

/** Anything that consumes patches: a DOM sink, a rasterizer, a test spy. */
export interface PatchSink {
  mount(tree: MaterializedTree, patches: readonly PatchOp[]): void;
  apply(patches: readonly PatchOp[], tree: MaterializedTree): void;
}

/** Input fed back from the renderer after it hit-tests a node. */
export type UserEvent =
  | { readonly type: 'click' }
  | { readonly type: 'change' }
  | { readonly type: 'input'; readonly value: string }
  | { readonly type: 'key'; readonly key: string }
  | { readonly type: 'backspace' };
