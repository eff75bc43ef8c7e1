/**
 * Runtime bootstrap and event loop
 *
 * One Runtime owns everything an application instance needs: the loaded
 * program, its store, the current materialized tree, a memory meter and a
 * scheduler. Nothing is shared between instances.
 */

import type { Program } from '../ast/types';
import {
  isActionError,
  isSandboxError,
  type ActionError,
  type SandboxError,
} from '../common/errors';
import { logger as defaultLogger, type Logger } from '../dev/logger';
import { materialize, reconcile } from '../renderer/reconcile';
import type {
  MaterializedTree,
  PatchOp,
  PatchSink,
  UserEvent,
} from '../renderer/types';
import { executeAction } from '../runtime/actions';
import type { NodeRef } from '../runtime/facets';
import { loadProgram, type LoadedProgram } from '../runtime/program';
import { MAX_FLUSH_DEPTH, Scheduler } from '../runtime/scheduler';
import { StateStore } from '../runtime/store';
import type { Snapshot } from '../evaluator/evaluate';
import { loadSource, type LoadOptions } from '../sandbox/loader';
import { MemoryMeter } from '../sandbox/memory';
import { str, toText, type Value } from '../value/value';

export interface RuntimeOptions {
  /** Byte budget for state and the materialized tree. */
  memoryLimit?: number;
  /** Receives the initial layout on creation and every later patch list. */
  renderer?: PatchSink;
  logger?: Logger;
  maxFlushDepth?: number;
}

export interface ExecuteResult {
  readonly dirty: ReadonlySet<string>;
  readonly patches: readonly PatchOp[];
  readonly tree: MaterializedTree;
}

export type EventOutcome =
  | {
      readonly status: 'applied';
      readonly ref: NodeRef;
      readonly event: UserEvent;
      readonly dirty: ReadonlySet<string>;
      readonly patches: readonly PatchOp[];
    }
  | {
      readonly status: 'ignored';
      readonly ref: NodeRef;
      readonly event: UserEvent;
      readonly reason: string;
    }
  | {
      readonly status: 'failed';
      readonly ref: NodeRef;
      readonly event: UserEvent;
      readonly error: ActionError;
    };

export interface MemoryStats {
  readonly usage: number;
  readonly peak: number;
  readonly limit: number;
}

function handlerFor(event: UserEvent): 'on_click' | 'on_change' | null {
  if (event.type === 'click') return 'on_click';
  if (event.type === 'change') return 'on_change';
  return null;
}

function editableText(value: Value | undefined): string {
  if (!value || value.kind === 'null') return '';
  return toText(value);
}

export class Runtime {
  readonly program: LoadedProgram;

  private readonly store: StateStore;
  private readonly meter: MemoryMeter;
  private readonly scheduler: Scheduler;
  private readonly renderer: PatchSink | undefined;
  private readonly log: Logger;

  private current: MaterializedTree;
  private pending: EventOutcome[] = [];
  private fatal: SandboxError | null = null;

  constructor(program: LoadedProgram, options: RuntimeOptions = {}) {
    this.program = program;
    this.log = options.logger ?? defaultLogger;
    this.renderer = options.renderer;
    this.meter = new MemoryMeter(options.memoryLimit);
    this.scheduler = new Scheduler(options.maxFlushDepth ?? MAX_FLUSH_DEPTH);

    this.store = new StateStore(program.initialState, this.meter);
    const initial = materialize(program, this.store.snapshot(), {
      meter: this.meter,
      onFacetError: this.facetError,
    });
    this.current = initial.tree;
    this.renderer?.mount(initial.tree, initial.patches);

    this.log.debug(
      `Application "${program.name}" v${program.version} started with ${program.nodes.length} nodes`
    );
  }

  get name(): string {
    return this.program.name;
  }

  get tree(): MaterializedTree {
    return this.current;
  }

  /** The committed state snapshot. Later commits never modify it. */
  get snapshot(): Snapshot {
    return this.store.snapshot();
  }

  get memory(): MemoryStats {
    return {
      usage: this.meter.usage,
      peak: this.meter.peak,
      limit: this.meter.limit,
    };
  }

  /** The error that ended this runtime, if any. */
  get terminated(): SandboxError | null {
    return this.fatal;
  }

  get(name: string): Value | undefined {
    return this.store.get(name);
  }

  /**
   * Run one action by name. An ActionError leaves state unchanged and is
   * rethrown to the caller.
   */
  execute(name: string): ExecuteResult {
    this.ensureAlive();
    try {
      const dirty = executeAction(this.program.actions, name, this.store);
      return { dirty, ...this.refresh(dirty) };
    } catch (error) {
      throw this.escalate(
        error,
        isSandboxError(error) ? this.scheduler.clear() : 0
      );
    }
  }

  /**
   * Queue a user event for `ref` and run the queue. Returns the outcome of
   * every event that ran; an event dispatched from inside a running flush
   * returns nothing here and runs after the current one.
   */
  dispatch(ref: NodeRef, event: UserEvent): EventOutcome[] {
    this.ensureAlive();
    this.scheduler.enqueue(() => {
      this.pending.push(this.handleEvent(ref, event));
    });
    if (this.scheduler.isRunning()) return [];

    try {
      this.scheduler.flush();
    } catch (error) {
      // A flush that aborts leaves no event half-queued for the next dispatch
      this.pending = [];
      throw this.escalate(error, this.scheduler.clear());
    }
    return this.pending.splice(0);
  }

  private handleEvent(ref: NodeRef, event: UserEvent): EventOutcome {
    const node = this.current.nodes[ref];
    if (!node) return { status: 'ignored', ref, event, reason: 'no such node' };
    if (!node.visible) {
      return { status: 'ignored', ref, event, reason: 'node is hidden' };
    }

    const handler = handlerFor(event);
    let run: () => Set<string>;

    if (handler) {
      const action = node.handlers[handler];
      if (action === undefined) {
        return { status: 'ignored', ref, event, reason: `no ${handler} handler` };
      }
      run = () => executeAction(this.program.actions, action, this.store);
    } else {
      const target = node.binding;
      if (target === undefined) {
        return { status: 'ignored', ref, event, reason: 'node is not bound' };
      }
      const next = this.editedText(target, event);
      run = () => this.store.assign(target, str(next));
    }

    try {
      const dirty = run();
      const { patches } = this.refresh(dirty);
      return { status: 'applied', ref, event, dirty, patches };
    } catch (error) {
      if (!isActionError(error)) throw error;
      this.log.warn(error.message);
      return { status: 'failed', ref, event, error };
    }
  }

  private editedText(target: string, event: UserEvent): string {
    const text = editableText(this.store.get(target));
    switch (event.type) {
      case 'input':
        return event.value;
      case 'key':
        return text + event.key;
      case 'backspace':
        return [...text].slice(0, -1).join('');
      default:
        return text;
    }
  }

  private refresh(dirty: ReadonlySet<string>): {
    patches: readonly PatchOp[];
    tree: MaterializedTree;
  } {
    const { tree, patches } = reconcile(
      this.program,
      this.store.snapshot(),
      this.current,
      dirty,
      {
        meter: this.meter,
        onFacetError: this.facetError,
      }
    );
    this.current = tree;
    if (patches.length > 0) {
      this.log.debug(
        `Reconciled ${dirty.size} variable(s) into ${patches.length} patch(es)`
      );
      this.renderer?.apply(patches, tree);
    }
    return { patches, tree };
  }

  private readonly facetError = (
    ref: NodeRef,
    facet: string,
    error: Error
  ): void => {
    this.log.warn(`Could not resolve ${facet} of node ${ref}:`, error.message);
  };

  private ensureAlive(): void {
    if (this.fatal) throw this.fatal;
  }

  /** Sandbox violations end the runtime; everything else passes through. */
  private escalate(error: unknown, dropped: number): unknown {
    const note = dropped > 0 ? `(${dropped} queued event(s) dropped)` : '';
    if (isSandboxError(error)) {
      if (this.fatal !== error) {
        this.fatal = error;
        this.log.error(
          `Application "${this.program.name}" terminated:`,
          error.message,
          note
        );
      }
    } else if (dropped > 0) {
      this.log.error(
        'Event queue aborted:',
        error instanceof Error ? error.message : String(error),
        note
      );
    }
    return error;
  }
}

/** Validate a parsed program and start a runtime for it. */
export function createRuntime(
  program: Program,
  options: RuntimeOptions = {}
): Runtime {
  const loaded = loadProgram(program);
  try {
    return new Runtime(loaded, options);
  } catch (error) {
    if (isSandboxError(error)) {
      (options.logger ?? defaultLogger).error(
        `Application "${loaded.name}" failed to start:`,
        error.message
      );
    }
    throw error;
  }
}

export type LoadAppOptions = LoadOptions<Program> & RuntimeOptions;

/** Load `requested` through the sandbox guard, then start it. */
export function loadApp(requested: string, options: LoadAppOptions): Runtime {
  const program = loadSource(requested, options);
  return createRuntime(program, options);
}
