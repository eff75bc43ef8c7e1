/**
 * Pure builtin functions callable from expressions.
 *
 * Arity is checked when the document loads, so implementations may index
 * `args` freely; argument kinds are checked here and reported as
 * `TypeMismatch`.
 */

import { EvalError, SandboxError } from '../common/errors';
import { MEMORY_LIMIT_BYTES } from '../sandbox/limits';
import {
  bool,
  float,
  int,
  isNumeric,
  isTruthy,
  kindName,
  str,
  toNumber,
  toText,
  type IntValue,
  type NumericValue,
  type Value,
} from '../value/value';

export interface Builtin {
  readonly minArgs: number;
  readonly maxArgs: number;
  call(args: readonly Value[]): Value;
}

function expectNumeric(fn: string, v: Value): NumericValue {
  if (!isNumeric(v)) {
    throw new EvalError(
      'TypeMismatch',
      `${fn}() expects a number, got ${kindName(v)}`
    );
  }
  return v;
}

function expectString(fn: string, v: Value): string {
  if (v.kind !== 'str') {
    throw new EvalError(
      'TypeMismatch',
      `${fn}() expects a string, got ${kindName(v)}`
    );
  }
  return v.value;
}

const INT_MAX = 2n ** 63n - 1n;
const INT_MIN = -(2n ** 63n);
const INT_RANGE_END = 2 ** 63;

/** Float to Int truncation that saturates at the 64-bit range. */
function toIntChecked(fn: string, n: number): IntValue {
  if (Number.isNaN(n)) {
    throw new EvalError('TypeMismatch', `${fn}() cannot convert NaN to int`);
  }
  if (n >= INT_RANGE_END) return int(INT_MAX);
  if (n <= -INT_RANGE_END) return int(INT_MIN);
  return int(n);
}

function clampBigInt(n: bigint): IntValue {
  if (n > INT_MAX) return int(INT_MAX);
  if (n < INT_MIN) return int(INT_MIN);
  return int(n);
}

function rounding(name: string, op: (n: number) => number): Builtin {
  return {
    minArgs: 1,
    maxArgs: 1,
    call: ([v]) => {
      const n = expectNumeric(name, v);
      return n.kind === 'int' ? n : toIntChecked(name, op(n.value));
    },
  };
}

/** Halves round away from zero: round(-2.5) is -3. */
function roundHalfAway(n: number): number {
  return Math.sign(n) * Math.round(Math.abs(n));
}

function pick(name: string, wantSmaller: boolean): Builtin {
  return {
    minArgs: 2,
    maxArgs: 2,
    call: ([a, b]) => {
      const x = expectNumeric(name, a);
      const y = expectNumeric(name, b);
      if (x.kind === 'int' && y.kind === 'int') {
        const takeLeft = wantSmaller ? x.value <= y.value : x.value >= y.value;
        return takeLeft ? x : y;
      }
      const l = toNumber(x);
      const r = toNumber(y);
      const takeLeft = wantSmaller ? l <= r : l >= r;
      return float(takeLeft ? l : r);
    },
  };
}

function stringFn(name: string, op: (s: string) => string): Builtin {
  return {
    minArgs: 1,
    maxArgs: 1,
    call: ([v]) => str(op(expectString(name, v))),
  };
}

function stringTest(
  name: string,
  test: (s: string, part: string) => boolean
): Builtin {
  return {
    minArgs: 2,
    maxArgs: 2,
    call: ([s, part]) =>
      bool(test(expectString(name, s), expectString(name, part))),
  };
}

function expectInt(fn: string, v: Value): bigint {
  if (v.kind !== 'int') {
    throw new EvalError(
      'TypeMismatch',
      `${fn}() expects an int, got ${kindName(v)}`
    );
  }
  return v.value;
}

function padding(name: string, atStart: boolean): Builtin {
  return {
    minArgs: 2,
    maxArgs: 3,
    call: ([v, width, fill]) => {
      const s = expectString(name, v);
      const target = expectInt(name, width);
      const pad = fill === undefined ? ' ' : expectString(name, fill);
      if (target > BigInt(MEMORY_LIMIT_BYTES)) {
        throw new SandboxError(
          'MEMORY_EXCEEDED',
          `${name}() width ${target} exceeds the memory limit`
        );
      }
      const chars = [...s].length;
      const missing = Number(target) - chars;
      if (missing <= 0) return str(s);
      // Pads with the first code point of the fill string
      const unit = [...pad][0] ?? ' ';
      const fillText = unit.repeat(missing);
      return str(atStart ? fillText + s : s + fillText);
    },
  };
}

const INT_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const SPECIAL_FLOATS: Readonly<Record<string, number>> = {
  inf: Infinity,
  '-inf': -Infinity,
  NaN: NaN,
};

function parseFloatText(text: string): number | undefined {
  if (FLOAT_TEXT.test(text)) return Number(text);
  return Object.prototype.hasOwnProperty.call(SPECIAL_FLOATS, text)
    ? SPECIAL_FLOATS[text]
    : undefined;
}

function notConvertible(fn: string, v: Value): EvalError {
  const shown = v.kind === 'str' ? `"${v.value}"` : kindName(v);
  return new EvalError('TypeMismatch', `${fn}() cannot convert ${shown}`);
}

function toInt(v: Value): IntValue {
  switch (v.kind) {
    case 'int':
      return v;
    case 'float':
      return toIntChecked('int', Math.trunc(v.value));
    case 'bool':
      return int(v.value ? 1n : 0n);
    case 'str': {
      const text = v.value.trim();
      if (INT_TEXT.test(text)) return clampBigInt(BigInt(text));
      const n = parseFloatText(text);
      if (n === undefined) throw notConvertible('int', v);
      return toIntChecked('int', Math.trunc(n));
    }
    case 'null':
      throw notConvertible('int', v);
  }
}

function toFloat(v: Value): Value {
  switch (v.kind) {
    case 'int':
      return float(Number(v.value));
    case 'float':
      return v;
    case 'bool':
      return float(v.value ? 1 : 0);
    case 'str': {
      const n = parseFloatText(v.value.trim());
      if (n === undefined) throw notConvertible('float', v);
      return float(n);
    }
    case 'null':
      throw notConvertible('float', v);
  }
}

/** `from` replaced everywhere in `s`; an empty `from` goes between code points. */
function replaceAll(s: string, from: string, to: string): string {
  if (from !== '') return s.split(from).join(to);
  if (s === '') return to;
  return to + [...s].join(to) + to;
}

export const BUILTINS: Readonly<Record<string, Builtin>> = {
  abs: {
    minArgs: 1,
    maxArgs: 1,
    call: ([v]) => {
      const n = expectNumeric('abs', v);
      if (n.kind === 'float') return float(Math.abs(n.value));
      return n.value < 0n ? int(-n.value) : n;
    },
  },
  min: pick('min', true),
  max: pick('max', false),
  floor: rounding('floor', Math.floor),
  ceil: rounding('ceil', Math.ceil),
  round: rounding('round', roundHalfAway),
  sqrt: {
    minArgs: 1,
    maxArgs: 1,
    call: ([v]) => float(Math.sqrt(toNumber(expectNumeric('sqrt', v)))),
  },
  len: {
    minArgs: 1,
    maxArgs: 1,
    // Counts code points, not UTF-16 units
    call: ([v]) => int([...expectString('len', v)].length),
  },
  str: {
    minArgs: 1,
    maxArgs: 1,
    call: ([v]) => str(toText(v)),
  },
  upper: stringFn('upper', (s) => s.toUpperCase()),
  lower: stringFn('lower', (s) => s.toLowerCase()),
  trim: stringFn('trim', (s) => s.trim()),
  contains: stringTest('contains', (s, part) => s.includes(part)),
  starts_with: stringTest('starts_with', (s, part) => s.startsWith(part)),
  ends_with: stringTest('ends_with', (s, part) => s.endsWith(part)),
  replace: {
    minArgs: 3,
    maxArgs: 3,
    call: ([s, from, to]) =>
      str(
        replaceAll(
          expectString('replace', s),
          expectString('replace', from),
          expectString('replace', to)
        )
      ),
  },
  pad_start: padding('pad_start', true),
  pad_end: padding('pad_end', false),
  int: { minArgs: 1, maxArgs: 1, call: ([v]) => toInt(v) },
  float: { minArgs: 1, maxArgs: 1, call: ([v]) => toFloat(v) },
  bool: { minArgs: 1, maxArgs: 1, call: ([v]) => bool(isTruthy(v)) },
  is_null: {
    minArgs: 1,
    maxArgs: 1,
    call: ([v]) => bool(v.kind === 'null'),
  },
  type: {
    minArgs: 1,
    maxArgs: 1,
    call: ([v]) => str(kindName(v)),
  },
};

export function getBuiltin(name: string): Builtin | undefined {
  return Object.prototype.hasOwnProperty.call(BUILTINS, name)
    ? BUILTINS[name]
    : undefined;
}
