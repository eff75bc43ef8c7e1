/**
 * Invariant assertion utilities for correctness checking
 *
 * Core principle: fail fast when invariants are violated
 * All functions throw descriptive errors for debugging
 */

/**
 * Assert a condition; throw with context if false
 * @internal
 */
export function invariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    const contextStr = context
      ? '\n' + JSON.stringify(context, stringifyBigInt, 2)
      : '';
    throw new Error(`[Prism Invariant] ${message}${contextStr}`);
  }
}

function stringifyBigInt(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Exhaustiveness guard for closed unions
 * @internal
 */
export function assertNever(value: never, context: string): never {
  throw new Error(
    `[Prism Invariant] Unhandled variant in ${context}: ${JSON.stringify(value, stringifyBigInt)}`
  );
}

/**
 * Assert scheduling precondition (not reentering, not during flush, etc)
 * @internal
 */
export function assertSchedulingPrecondition(
  condition: boolean,
  violationMessage: string
): asserts condition {
  invariant(condition, `[Scheduler Precondition] ${violationMessage}`);
}

/**
 * Assert state precondition
 * @internal
 */
export function assertStatePrecondition(
  condition: boolean,
  violationMessage: string
): asserts condition {
  invariant(condition, `[State Precondition] ${violationMessage}`);
}
