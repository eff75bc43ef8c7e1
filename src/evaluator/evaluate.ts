/**
 * Expression evaluator
 *
 * evaluate(expr, snapshot) walks an already precedence-resolved tree and
 * returns a Value or throws EvalError. It never mutates the snapshot.
 *
 * Type rules:
 * - Int op Int stays Int for + - * %; `/` always yields Float
 * - `**` keeps Int for a non-negative Int exponent, wrapping like `*`
 * - any Float operand promotes to Float
 * - `+` with a string operand concatenates canonical text
 * - `==`/`!=` never throw; mismatched kinds compare unequal
 * - relational operators need numbers; `and`/`or`/`not` need Bool
 * - `and`/`or` short-circuit, and so does `??`, which yields its right
 *   operand only when the left one is Null
 */

import type { BinaryOp, Expr, UnaryOp } from '../ast/types';
import { EvalError } from '../common/errors';
import { assertNever } from '../dev/invariant';
import {
  bool,
  float,
  int,
  isNumeric,
  kindName,
  str,
  toNumber,
  toText,
  valuesEqual,
  type BoolValue,
  type NumericValue,
  type Value,
} from '../value/value';
import { getBuiltin } from './builtins';

export type Snapshot = ReadonlyMap<string, Value>;

export function evaluate(expr: Expr, snapshot: Snapshot): Value {
  switch (expr.kind) {
    case 'literal':
      return expr.value;
    case 'ident': {
      const value = snapshot.get(expr.name);
      if (value === undefined) {
        throw new EvalError(
          'UndefinedVariable',
          `Undefined variable "${expr.name}"`
        );
      }
      return value;
    }
    case 'unary':
      return evaluateUnary(expr.op, evaluate(expr.operand, snapshot));
    case 'binary':
      return evaluateBinary(expr.op, expr.left, expr.right, snapshot);
    case 'call': {
      const builtin = getBuiltin(expr.callee);
      if (!builtin) {
        // Load-time validation rejects unknown callees; this only guards
        // hand-built expressions evaluated directly.
        throw new EvalError(
          'UndefinedVariable',
          `Unknown function "${expr.callee}"`
        );
      }
      return builtin.call(expr.args.map((arg) => evaluate(arg, snapshot)));
    }
    default:
      return assertNever(expr, 'evaluate');
  }
}

function mismatch(op: string, left: Value, right?: Value): EvalError {
  const operands = right
    ? `${kindName(left)} and ${kindName(right)}`
    : kindName(left);
  return new EvalError(
    'TypeMismatch',
    `Operator "${op}" cannot be applied to ${operands}`
  );
}

function evaluateUnary(op: UnaryOp, operand: Value): Value {
  switch (op) {
    case 'not':
      if (operand.kind !== 'bool') throw mismatch('not', operand);
      return bool(!operand.value);
    case 'neg':
      if (operand.kind === 'int') return int(-operand.value);
      if (operand.kind === 'float') return float(-operand.value);
      throw mismatch('-', operand);
    default:
      return assertNever(op, 'evaluateUnary');
  }
}

function expectBool(op: string, value: Value, other?: Value): BoolValue {
  if (value.kind !== 'bool') throw mismatch(op, value, other);
  return value;
}

function evaluateBinary(
  op: BinaryOp,
  leftExpr: Expr,
  rightExpr: Expr,
  snapshot: Snapshot
): Value {
  // Logical operators decide before touching the right operand
  if (op === 'and' || op === 'or') {
    const left = expectBool(op, evaluate(leftExpr, snapshot));
    if (op === 'and' && !left.value) return left;
    if (op === 'or' && left.value) return left;
    const right = evaluate(rightExpr, snapshot);
    return expectBool(op, right, left);
  }

  if (op === '??') {
    const value = evaluate(leftExpr, snapshot);
    return value.kind === 'null' ? evaluate(rightExpr, snapshot) : value;
  }

  const left = evaluate(leftExpr, snapshot);
  const right = evaluate(rightExpr, snapshot);

  switch (op) {
    case '==':
      return bool(valuesEqual(left, right));
    case '!=':
      return bool(!valuesEqual(left, right));
    case '<':
    case '>':
    case '<=':
    case '>=':
      return compare(op, left, right);
    case '+':
      if (left.kind === 'str' || right.kind === 'str') {
        return str(toText(left) + toText(right));
      }
      return arithmetic(op, left, right);
    case '-':
    case '*':
    case '/':
    case '%':
      return arithmetic(op, left, right);
    case '**':
      return power(left, right);
    default:
      return assertNever(op, 'evaluateBinary');
  }
}

function compare(
  op: '<' | '>' | '<=' | '>=',
  left: Value,
  right: Value
): Value {
  if (!isNumeric(left) || !isNumeric(right)) {
    throw mismatch(op, left, right);
  }
  const order =
    left.kind === 'int' && right.kind === 'int'
      ? compareBigInt(left.value, right.value)
      : compareNumber(toNumber(left), toNumber(right));
  // NaN is unordered: every relational test is false
  if (order === null) return bool(false);
  switch (op) {
    case '<':
      return bool(order < 0);
    case '>':
      return bool(order > 0);
    case '<=':
      return bool(order <= 0);
    case '>=':
      return bool(order >= 0);
  }
}

function compareBigInt(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareNumber(a: number, b: number): number | null {
  if (Number.isNaN(a) || Number.isNaN(b)) return null;
  return a < b ? -1 : a > b ? 1 : 0;
}

function isZero(v: NumericValue): boolean {
  return v.kind === 'int' ? v.value === 0n : v.value === 0;
}

function arithmetic(
  op: '+' | '-' | '*' | '/' | '%',
  left: Value,
  right: Value
): Value {
  if (!isNumeric(left) || !isNumeric(right)) {
    throw mismatch(op, left, right);
  }

  if ((op === '/' || op === '%') && isZero(right)) {
    throw new EvalError('DivisionByZero', `Division by zero in "${op}"`);
  }

  if (op === '/') return float(toNumber(left) / toNumber(right));

  if (left.kind === 'int' && right.kind === 'int') {
    const a = left.value;
    const b = right.value;
    switch (op) {
      case '+':
        return int(a + b);
      case '-':
        return int(a - b);
      case '*':
        return int(a * b);
      case '%':
        return int(a % b);
    }
  }

  const a = toNumber(left);
  const b = toNumber(right);
  switch (op) {
    case '+':
      return float(a + b);
    case '-':
      return float(a - b);
    case '*':
      return float(a * b);
    case '%':
      return float(a % b);
  }
}

/** base ** exp modulo 2^64, by repeated squaring. */
function wrappingPow(base: bigint, exp: bigint): bigint {
  let result = 1n;
  let b = BigInt.asIntN(64, base);
  let e = exp;
  while (e > 0n) {
    if ((e & 1n) === 1n) result = BigInt.asIntN(64, result * b);
    b = BigInt.asIntN(64, b * b);
    e >>= 1n;
  }
  return result;
}

function power(left: Value, right: Value): Value {
  if (!isNumeric(left) || !isNumeric(right)) {
    throw mismatch('**', left, right);
  }
  if (left.kind === 'int' && right.kind === 'int' && right.value >= 0n) {
    return int(wrappingPow(left.value, right.value));
  }
  return float(toNumber(left) ** toNumber(right));
}
