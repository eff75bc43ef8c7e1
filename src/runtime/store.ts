/**
 * Reactive state store
 *
 * INVARIANTS ENFORCED:
 * - committed snapshots are never mutated; a commit installs a new map
 * - mutations within one action run in order against a working copy, so
 *   each one sees the results of the ones before it
 * - any failure discards the working copy; the committed snapshot is
 *   untouched (all-or-nothing)
 * - only variables whose value actually changed are reported dirty
 * - transactions do not nest
 */

import type { ActionDecl, Expr } from '../ast/types';
import { ActionError, EvalError } from '../common/errors';
import { assertStatePrecondition } from '../dev/invariant';
import { evaluate, type Snapshot } from '../evaluator/evaluate';
import { sizeOfEntry, sizeOfValue, type MemoryMeter } from '../sandbox/memory';
import { valuesIdentical, type Value } from '../value/value';

interface Step {
  readonly target: string;
  compute(working: Snapshot): Value;
}

/** Frozen read-only view over a committed map; exposes no mutators. */
class SnapshotView implements ReadonlyMap<string, Value> {
  private readonly source: ReadonlyMap<string, Value>;

  constructor(entries: ReadonlyMap<string, Value>) {
    this.source = entries;
    Object.freeze(this);
  }

  get size(): number {
    return this.source.size;
  }

  get(name: string): Value | undefined {
    return this.source.get(name);
  }

  has(name: string): boolean {
    return this.source.has(name);
  }

  forEach(
    callback: (value: Value, key: string, map: ReadonlyMap<string, Value>) => void
  ): void {
    this.source.forEach((value, key) => callback(value, key, this));
  }

  entries(): MapIterator<[string, Value]> {
    return this.source.entries();
  }

  keys(): MapIterator<string> {
    return this.source.keys();
  }

  values(): MapIterator<Value> {
    return this.source.values();
  }

  [Symbol.iterator](): MapIterator<[string, Value]> {
    return this.source[Symbol.iterator]();
  }
}

export class StateStore {
  private committed: ReadonlyMap<string, Value>;
  private view: SnapshotView;
  private readonly meter: MemoryMeter | undefined;
  private inTransaction = false;

  constructor(initial: ReadonlyMap<string, Value>, meter?: MemoryMeter) {
    this.meter = meter;
    let bytes = 0;
    for (const [name, value] of initial) bytes += sizeOfEntry(name, value);
    meter?.allocate(bytes, 'initial state');
    this.committed = new Map(initial);
    this.view = new SnapshotView(this.committed);
  }

  get(name: string): Value | undefined {
    return this.committed.get(name);
  }

  has(name: string): boolean {
    return this.committed.has(name);
  }

  names(): string[] {
    return [...this.committed.keys()];
  }

  /**
   * Frozen view of the committed state. Stays valid (and unchanged) after
   * later commits; the same view is returned until the next commit.
   */
  snapshot(): Snapshot {
    return this.view;
  }

  /**
   * Run an action's mutations as one transaction.
   * Returns the variables whose committed value changed.
   */
  apply(action: ActionDecl): Set<string> {
    return this.transact(
      action.name,
      action.mutations.map(({ target, expr }) => ({
        target,
        compute: (working: Snapshot) => evaluate(expr, working),
      }))
    );
  }

  /** One-step transaction for input bindings and host writes. */
  assign(name: string, value: Value): Set<string> {
    return this.transact(`bind:${name}`, [
      { target: name, compute: () => value },
    ]);
  }

  /** Evaluate `expr` against the committed snapshot without changing it. */
  read(expr: Expr): Value {
    return evaluate(expr, this.committed);
  }

  private transact(label: string, steps: readonly Step[]): Set<string> {
    assertStatePrecondition(
      !this.inTransaction,
      `transaction "${label}" started while another is running`
    );
    this.inTransaction = true;

    const working = new Map(this.committed);
    let charged = 0;

    try {
      for (const step of steps) {
        assertStatePrecondition(
          working.has(step.target),
          `transaction "${label}" assigns undeclared variable "${step.target}"`
        );

        let value: Value;
        try {
          value = step.compute(working);
        } catch (error) {
          if (error instanceof EvalError) {
            throw ActionError.evaluation(label, step.target, error);
          }
          throw error;
        }

        const bytes = sizeOfValue(value);
        this.meter?.allocate(bytes, `action "${label}"`);
        charged += bytes;
        working.set(step.target, value);
      }
    } catch (error) {
      this.meter?.release(charged);
      this.inTransaction = false;
      throw error;
    }

    try {
      return this.commit(working, steps, charged);
    } finally {
      this.inTransaction = false;
    }
  }

  private commit(
    working: Map<string, Value>,
    steps: readonly Step[],
    charged: number
  ): Set<string> {
    const dirty = new Set<string>();
    let delta = 0;

    for (const target of new Set(steps.map((s) => s.target))) {
      const before = this.committed.get(target);
      const after = working.get(target);
      if (before === undefined || after === undefined) continue;
      if (!valuesIdentical(before, after)) dirty.add(target);
      delta += sizeOfValue(after) - sizeOfValue(before);
    }

    // Swap the transient working-copy charge for the net change in live state
    if (this.meter) {
      this.meter.release(charged);
      if (delta > 0) this.meter.allocate(delta, 'state commit');
      else this.meter.release(-delta);
    }

    if (dirty.size > 0) {
      this.committed = working;
      this.view = new SnapshotView(working);
    }
    return dirty;
  }
}
