/**
 * Common call contracts: error taxonomy
 *
 * - LoadError: the document is rejected wholesale, the app never starts
 * - EvalError: an expression could not produce a value
 * - ActionError: an action aborted; committed state is unchanged
 * - SandboxError: a resource or capability limit was hit; fatal
 */

export type LoadErrorCode =
  | 'UNREADABLE'
  | 'GRAMMAR'
  | 'MISSING_DIRECTIVE'
  | 'UNRESOLVED_IDENTIFIER'
  | 'DUPLICATE_VARIABLE'
  | 'DUPLICATE_ACTION'
  | 'UNKNOWN_FUNCTION'
  | 'ARITY';

export class LoadError extends Error {
  readonly code: LoadErrorCode;
  constructor(code: LoadErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = 'LoadError';
    Object.setPrototypeOf(this, LoadError.prototype);
  }
}

export type EvalErrorKind =
  | 'TypeMismatch'
  | 'UndefinedVariable'
  | 'DivisionByZero';

export class EvalError extends Error {
  readonly kind: EvalErrorKind;
  constructor(kind: EvalErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = 'EvalError';
    Object.setPrototypeOf(this, EvalError.prototype);
  }
}

export type ActionErrorCode = 'UNKNOWN_ACTION' | 'EVALUATION';

export class ActionError extends Error {
  readonly code: ActionErrorCode;
  readonly action: string;
  /** Variable whose mutation failed; set for EVALUATION errors. */
  readonly target: string | undefined;
  readonly evalError: EvalError | undefined;

  constructor(
    code: ActionErrorCode,
    action: string,
    message: string,
    target?: string,
    evalError?: EvalError
  ) {
    super(message, evalError ? { cause: evalError } : undefined);
    this.code = code;
    this.action = action;
    this.target = target;
    this.evalError = evalError;
    this.name = 'ActionError';
    Object.setPrototypeOf(this, ActionError.prototype);
  }

  static unknownAction(action: string): ActionError {
    return new ActionError(
      'UNKNOWN_ACTION',
      action,
      `Unknown action "${action}"`
    );
  }

  static evaluation(
    action: string,
    target: string,
    cause: EvalError
  ): ActionError {
    return new ActionError(
      'EVALUATION',
      action,
      `Action "${action}" aborted while assigning "${target}": ${cause.message}`,
      target,
      cause
    );
  }
}

export type SandboxErrorCode =
  | 'PATH_REJECTED'
  | 'FILE_TOO_LARGE'
  | 'MEMORY_EXCEEDED';

export class SandboxError extends Error {
  readonly code: SandboxErrorCode;
  constructor(code: SandboxErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'SandboxError';
    Object.setPrototypeOf(this, SandboxError.prototype);
  }
}

export function isSandboxError(error: unknown): error is SandboxError {
  return error instanceof SandboxError;
}

export function isActionError(error: unknown): error is ActionError {
  return error instanceof ActionError;
}
