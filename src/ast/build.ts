/**
 * AST builders for hosts and tests that construct documents without a parser
 *
 * @example
 * ```ts
 * const app = program({
 *   app: 'Counter',
 *   state: { count: 0 },
 *   view: node('column', {}, [
 *     text('Count: {count}'),
 *     node('button', { on_click: prop.ident('increment') }),
 *   ]),
 *   actions: [action('increment', { count: binary('+', ident('count'), lit(1)) })],
 * });
 * ```
 */

import type {
  ActionDecl,
  BinaryOp,
  Expr,
  Program,
  PropValue,
  TextSpan,
  ViewNode,
} from './types';
import { fromHost, type Value } from '../value/value';
import { parseColor } from '../value/color';
import { LoadError } from '../common/errors';

type HostLiteral = string | number | bigint | boolean | null;

function isValue(input: unknown): input is Value {
  return typeof input === 'object' && input !== null && 'kind' in input;
}

function toValue(input: HostLiteral | Value): Value {
  return isValue(input) ? input : fromHost(input);
}

export function lit(value: HostLiteral | Value): Expr {
  return { kind: 'literal', value: toValue(value) };
}

export function ident(name: string): Expr {
  return { kind: 'ident', name };
}

export function binary(op: BinaryOp, left: Expr, right: Expr): Expr {
  return { kind: 'binary', op, left, right };
}

export function not(operand: Expr): Expr {
  return { kind: 'unary', op: 'not', operand };
}

export function neg(operand: Expr): Expr {
  return { kind: 'unary', op: 'neg', operand };
}

export function call(callee: string, ...args: Expr[]): Expr {
  return { kind: 'call', callee, args };
}

export const prop = {
  lit: (value: HostLiteral | Value): PropValue => ({
    kind: 'literal',
    value: toValue(value),
  }),
  expr: (expr: Expr): PropValue => ({ kind: 'expr', expr }),
  ident: (name: string): PropValue => ({ kind: 'ident', name }),
  color: (input: string): PropValue => {
    const color = parseColor(input);
    if (!color) {
      throw new LoadError('GRAMMAR', `Invalid color "${input}"`);
    }
    return { kind: 'color', color };
  },
};

const PLACEHOLDER = /\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}/g;

/** Split `"Hello, {name}!"` into literal and variable spans. */
export function template(source: string): TextSpan[] {
  const spans: TextSpan[] = [];
  let last = 0;
  for (const match of source.matchAll(PLACEHOLDER)) {
    const start = match.index ?? 0;
    if (start > last) {
      spans.push({ kind: 'literal', text: source.slice(last, start) });
    }
    spans.push({ kind: 'var', name: match[1] });
    last = start + match[0].length;
  }
  if (last < source.length) {
    spans.push({ kind: 'literal', text: source.slice(last) });
  }
  return spans;
}

export function node(
  kind: string,
  props: Record<string, PropValue> = {},
  children: ViewNode[] = []
): ViewNode {
  return { kind, props, children };
}

export function text(
  source: string,
  props: Record<string, PropValue> = {}
): ViewNode {
  return { kind: 'text', props, children: [], text: template(source) };
}

export function action(
  name: string,
  mutations: Record<string, Expr> | Array<[string, Expr]>
): ActionDecl {
  const entries = Array.isArray(mutations)
    ? mutations
    : Object.entries(mutations);
  return {
    name,
    mutations: entries.map(([target, expr]) => ({ target, expr })),
  };
}

export interface ProgramInit {
  app: string;
  version?: number;
  state?: Record<string, HostLiteral | Value>;
  view?: ViewNode;
  actions?: ActionDecl[];
}

export function program(init: ProgramInit): Program {
  return {
    directives: { app: init.app, version: init.version ?? 1 },
    state: Object.entries(init.state ?? {}).map(([name, initial]) => ({
      name,
      initial: toValue(initial),
    })),
    view: init.view,
    actions: init.actions ?? [],
  };
}
