/**
 * Prism: reactive core for declarative UI documents
 *
 * Public API surface. A host parses a document into a `Program` (the
 * `build` namespace has constructors for every node), hands it to
 * `createRuntime` or `loadApp`, and feeds user events back through
 * `Runtime.dispatch`.
 */

// Bootstrap
export { Runtime, createRuntime, loadApp } from './app/createRuntime';
export type {
  EventOutcome,
  ExecuteResult,
  LoadAppOptions,
  MemoryStats,
  RuntimeOptions,
} from './app/createRuntime';

// Document model
export * from './ast/types';
export * as build from './ast/build';

// Values
export * from './value/value';
export * from './value/color';

// Evaluation
export { evaluate } from './evaluator/evaluate';
export type { Snapshot } from './evaluator/evaluate';
export { BUILTINS, getBuiltin } from './evaluator/builtins';
export type { Builtin } from './evaluator/builtins';
export { freeVariables, callSites } from './evaluator/analyze';

// Reactive core
export { loadProgram } from './runtime/program';
export type { LoadedProgram } from './runtime/program';
export { DependencyIndex } from './runtime/dependency-index';
export type { DependencyEntry, ReadKind } from './runtime/dependency-index';
export { StateStore } from './runtime/store';
export { executeAction } from './runtime/actions';
export { Scheduler, MAX_FLUSH_DEPTH } from './runtime/scheduler';
export type { ArenaNode } from './runtime/arena';
export type { Facet, FacetRef, NodeRef } from './runtime/facets';

// Rendering
export * from './renderer';

// Sandbox
export {
  validatePath,
  checkSourceSize,
  parseSource,
  loadSource,
} from './sandbox/loader';
export type { LoadOptions, ParseFn } from './sandbox/loader';
export { MemoryMeter } from './sandbox/memory';
export {
  MAX_SOURCE_BYTES,
  MEMORY_LIMIT_BYTES,
  SOURCE_EXTENSION,
} from './sandbox/limits';

// Errors and diagnostics
export {
  LoadError,
  EvalError,
  ActionError,
  SandboxError,
  isActionError,
  isSandboxError,
} from './common/errors';
export type {
  LoadErrorCode,
  EvalErrorKind,
  ActionErrorCode,
  SandboxErrorCode,
} from './common/errors';
export { logger } from './dev/logger';
export type { Logger } from './dev/logger';
