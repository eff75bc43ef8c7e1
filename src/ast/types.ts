/**
 * Document AST as handed over by the parser.
 *
 * The core never parses source text. It receives these shapes already
 * well-formed (precedence resolved, literals typed) and only validates
 * names and directives before the runtime starts.
 */

import type { Value } from '../value/value';
import type { Color } from '../value/color';

export type BinaryOp =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '**'
  | '<'
  | '>'
  | '<='
  | '>='
  | '=='
  | '!='
  | 'and'
  | 'or'
  | '??';

export type UnaryOp = 'not' | 'neg';

export type Expr =
  | { readonly kind: 'literal'; readonly value: Value }
  | { readonly kind: 'ident'; readonly name: string }
  | { readonly kind: 'unary'; readonly op: UnaryOp; readonly operand: Expr }
  | {
      readonly kind: 'binary';
      readonly op: BinaryOp;
      readonly left: Expr;
      readonly right: Expr;
    }
  | {
      readonly kind: 'call';
      readonly callee: string;
      readonly args: readonly Expr[];
    };

export type TextSpan =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'var'; readonly name: string };

/**
 * A bare identifier names an action on handler properties (`on_*`) and a
 * state variable everywhere else.
 */
export type PropValue =
  | { readonly kind: 'literal'; readonly value: Value }
  | { readonly kind: 'color'; readonly color: Color }
  | { readonly kind: 'expr'; readonly expr: Expr }
  | { readonly kind: 'ident'; readonly name: string };

export interface ViewNode {
  readonly kind: string;
  readonly props: Readonly<Record<string, PropValue>>;
  readonly children: readonly ViewNode[];
  readonly text?: readonly TextSpan[];
}

export interface Mutation {
  readonly target: string;
  readonly expr: Expr;
}

export interface ActionDecl {
  readonly name: string;
  readonly mutations: readonly Mutation[];
}

export interface StateDecl {
  readonly name: string;
  readonly initial: Value;
}

export interface Directives {
  readonly app: string;
  readonly version: number;
}

export interface Program {
  readonly directives: Directives;
  readonly state: readonly StateDecl[];
  readonly view?: ViewNode;
  readonly actions: readonly ActionDecl[];
}

export const VISIBLE_PROP = 'visible';
export const BIND_PROP = 'bind';

export function isHandlerProp(name: string): boolean {
  return name.startsWith('on_');
}
