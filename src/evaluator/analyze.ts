import type { Expr } from '../ast/types';
import { assertNever } from '../dev/invariant';

export interface CallSite {
  readonly callee: string;
  readonly arity: number;
}

/** Every identifier read by `expr`, one entry per occurrence, left to right. */
export function freeVariables(expr: Expr, out: string[] = []): string[] {
  switch (expr.kind) {
    case 'literal':
      return out;
    case 'ident':
      out.push(expr.name);
      return out;
    case 'unary':
      return freeVariables(expr.operand, out);
    case 'binary':
      freeVariables(expr.left, out);
      return freeVariables(expr.right, out);
    case 'call':
      for (const arg of expr.args) freeVariables(arg, out);
      return out;
    default:
      return assertNever(expr, 'freeVariables');
  }
}

export function callSites(expr: Expr, out: CallSite[] = []): CallSite[] {
  switch (expr.kind) {
    case 'literal':
    case 'ident':
      return out;
    case 'unary':
      return callSites(expr.operand, out);
    case 'binary':
      callSites(expr.left, out);
      return callSites(expr.right, out);
    case 'call':
      out.push({ callee: expr.callee, arity: expr.args.length });
      for (const arg of expr.args) callSites(arg, out);
      return out;
    default:
      return assertNever(expr, 'callSites');
  }
}
