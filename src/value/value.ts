/**
 * Runtime values
 *
 * A closed tagged union of five kinds. Every consumer switches on `kind`
 * exhaustively; values are never mutated after construction.
 */

export type IntValue = { readonly kind: 'int'; readonly value: bigint };
export type FloatValue = { readonly kind: 'float'; readonly value: number };
export type StrValue = { readonly kind: 'str'; readonly value: string };
export type BoolValue = { readonly kind: 'bool'; readonly value: boolean };
export type NullValue = { readonly kind: 'null' };

export type Value = IntValue | FloatValue | StrValue | BoolValue | NullValue;
export type ValueKind = Value['kind'];
export type NumericValue = IntValue | FloatValue;

/** Wraps to 64-bit two's complement, like the integer type it models. */
export function int(value: bigint | number): IntValue {
  const n = typeof value === 'number' ? BigInt(Math.trunc(value)) : value;
  return { kind: 'int', value: BigInt.asIntN(64, n) };
}

export function float(value: number): FloatValue {
  return { kind: 'float', value };
}

export function str(value: string): StrValue {
  return { kind: 'str', value };
}

export const TRUE: BoolValue = Object.freeze({ kind: 'bool', value: true });
export const FALSE: BoolValue = Object.freeze({ kind: 'bool', value: false });
export const NULL: NullValue = Object.freeze({ kind: 'null' });

export function bool(value: boolean): BoolValue {
  return value ? TRUE : FALSE;
}

export function isNumeric(v: Value): v is NumericValue {
  return v.kind === 'int' || v.kind === 'float';
}

export function toNumber(v: NumericValue): number {
  return v.kind === 'int' ? Number(v.value) : v.value;
}

function formatFloat(f: number): string {
  if (Number.isNaN(f)) return 'NaN';
  if (f === Infinity) return 'inf';
  if (f === -Infinity) return '-inf';
  if (Number.isInteger(f)) return f.toFixed(0);
  return String(f);
}

/**
 * Canonical textual form, used by interpolation and string concatenation.
 * Null renders as the empty string.
 */
export function toText(v: Value): string {
  switch (v.kind) {
    case 'int':
      return v.value.toString();
    case 'float':
      return formatFloat(v.value);
    case 'str':
      return v.value;
    case 'bool':
      return v.value ? 'true' : 'false';
    case 'null':
      return '';
  }
}

function floatsClose(a: number, b: number): boolean {
  if (a === b) return true;
  return Math.abs(a - b) < Number.EPSILON;
}

/**
 * Same kind and same payload. This is the change-detection equality: an
 * Int replaced by an equal Float still counts as a change.
 */
export function valuesIdentical(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'int':
      return b.kind === 'int' && a.value === b.value;
    case 'float':
      return b.kind === 'float' && floatsClose(a.value, b.value);
    case 'str':
      return b.kind === 'str' && a.value === b.value;
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'null':
      return b.kind === 'null';
  }
}

/**
 * Equality behind `==` and `!=`. Int and Float compare numerically; every
 * other cross-kind pair is unequal. Never throws.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  if (a.kind === 'int' && b.kind === 'int') return a.value === b.value;
  if (isNumeric(a) && isNumeric(b)) {
    return floatsClose(toNumber(a), toNumber(b));
  }
  return valuesIdentical(a, b);
}

export function isTruthy(v: Value): boolean {
  switch (v.kind) {
    case 'bool':
      return v.value;
    case 'int':
      return v.value !== 0n;
    case 'float':
      return v.value !== 0 && !Number.isNaN(v.value);
    case 'str':
      return v.value.length > 0;
    case 'null':
      return false;
  }
}

/** Human-readable kind name for diagnostics and the `type()` builtin. */
export function kindName(v: Value): string {
  switch (v.kind) {
    case 'int':
      return 'int';
    case 'float':
      return 'float';
    case 'str':
      return 'string';
    case 'bool':
      return 'bool';
    case 'null':
      return 'null';
  }
}

/**
 * Lift a host literal into a Value. Integral numbers become Int, so use
 * `float()` directly for a Float with no fractional part.
 */
export function fromHost(
  input: string | number | bigint | boolean | null
): Value {
  if (input === null) return NULL;
  switch (typeof input) {
    case 'string':
      return str(input);
    case 'bigint':
      return int(input);
    case 'boolean':
      return bool(input);
    case 'number':
      return Number.isInteger(input) ? int(input) : float(input);
  }
}
