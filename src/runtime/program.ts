/**
 * Load-time validation
 *
 * Turns a parser-produced Program into the immutable structures the
 * runtime works from. Everything that can be decided statically is decided
 * here, so a document that loads can only fail at run time through value
 * errors (type mismatch, division by zero), never through bad names.
 */

import {
  BIND_PROP,
  VISIBLE_PROP,
  isHandlerProp,
  type ActionDecl,
  type Expr,
  type Program,
  type PropValue,
} from '../ast/types';
import { LoadError } from '../common/errors';
import { callSites, freeVariables } from '../evaluator/analyze';
import { getBuiltin } from '../evaluator/builtins';
import type { Value } from '../value/value';
import { buildArena, describeNode, type ArenaNode } from './arena';
import { DependencyIndex } from './dependency-index';

export interface LoadedProgram {
  readonly name: string;
  readonly version: number;
  readonly nodes: readonly ArenaNode[];
  readonly actions: ReadonlyMap<string, ActionDecl>;
  readonly initialState: ReadonlyMap<string, Value>;
  readonly index: DependencyIndex;
}

function checkDirectives(program: Program): void {
  const { app, version } = program.directives;
  if (typeof app !== 'string' || app.trim() === '') {
    throw new LoadError(
      'MISSING_DIRECTIVE',
      '@app must name the application'
    );
  }
  if (!Number.isInteger(version) || version < 1) {
    throw new LoadError(
      'MISSING_DIRECTIVE',
      `@version must be a positive integer, got ${String(version)}`
    );
  }
}

function checkCalls(expr: Expr, where: string): void {
  for (const site of callSites(expr)) {
    const builtin = getBuiltin(site.callee);
    if (!builtin) {
      throw new LoadError(
        'UNKNOWN_FUNCTION',
        `Unknown function "${site.callee}" in ${where}`
      );
    }
    if (site.arity < builtin.minArgs || site.arity > builtin.maxArgs) {
      const expected =
        builtin.minArgs === builtin.maxArgs
          ? `${builtin.minArgs}`
          : `${builtin.minArgs}-${builtin.maxArgs}`;
      throw new LoadError(
        'ARITY',
        `${site.callee}() takes ${expected} argument(s), got ${site.arity} in ${where}`
      );
    }
  }
}

function checkExpr(
  expr: Expr,
  declared: ReadonlySet<string>,
  where: string
): void {
  for (const name of freeVariables(expr)) {
    if (!declared.has(name)) {
      throw new LoadError(
        'UNRESOLVED_IDENTIFIER',
        `Unknown state variable "${name}" in ${where}`
      );
    }
  }
  checkCalls(expr, where);
}

function collectState(program: Program): Map<string, Value> {
  const state = new Map<string, Value>();
  for (const decl of program.state) {
    if (state.has(decl.name)) {
      throw new LoadError(
        'DUPLICATE_VARIABLE',
        `State variable "${decl.name}" is declared more than once`
      );
    }
    state.set(decl.name, decl.initial);
  }
  return state;
}

function collectActions(
  program: Program,
  declared: ReadonlySet<string>
): Map<string, ActionDecl> {
  const actions = new Map<string, ActionDecl>();
  for (const decl of program.actions) {
    if (actions.has(decl.name)) {
      throw new LoadError(
        'DUPLICATE_ACTION',
        `Action "${decl.name}" is declared more than once`
      );
    }
    for (const mutation of decl.mutations) {
      const where = `action "${decl.name}"`;
      if (!declared.has(mutation.target)) {
        throw new LoadError(
          'UNRESOLVED_IDENTIFIER',
          `Action "${decl.name}" assigns undeclared variable "${mutation.target}"`
        );
      }
      checkExpr(mutation.expr, declared, where);
    }
    actions.set(decl.name, decl);
  }
  return actions;
}

function checkProp(
  entry: ArenaNode,
  name: string,
  value: PropValue,
  declared: ReadonlySet<string>,
  actions: ReadonlyMap<string, ActionDecl>
): void {
  const where = `${describeNode(entry)}.${name}`;

  if (isHandlerProp(name)) {
    if (value.kind !== 'ident') {
      throw new LoadError('GRAMMAR', `${where} must name an action`);
    }
    if (!actions.has(value.name)) {
      throw new LoadError(
        'UNRESOLVED_IDENTIFIER',
        `${where} refers to unknown action "${value.name}"`
      );
    }
    return;
  }

  if (name === BIND_PROP && value.kind !== 'ident') {
    throw new LoadError('GRAMMAR', `${where} must name a state variable`);
  }

  if (name === VISIBLE_PROP && value.kind === 'color') {
    throw new LoadError('GRAMMAR', `${where} cannot be a color`);
  }

  if (value.kind === 'expr') checkExpr(value.expr, declared, where);
}

export function loadProgram(program: Program): LoadedProgram {
  checkDirectives(program);

  const initialState = collectState(program);
  const declared = new Set(initialState.keys());
  const actions = collectActions(program, declared);

  const nodes = buildArena(program.view);
  for (const entry of nodes) {
    for (const [name, value] of Object.entries(entry.node.props)) {
      checkProp(entry, name, value, declared, actions);
    }
  }

  return {
    name: program.directives.app,
    version: program.directives.version,
    nodes,
    actions,
    initialState,
    index: DependencyIndex.build(nodes, declared),
  };
}
