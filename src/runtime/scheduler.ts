/**
 * Serialized event scheduler
 *
 * Key ideas:
 * - Every user event becomes one task; tasks run one at a time, to
 *   completion, in arrival order.
 * - `flush()` is explicit and non-reentrant. A task enqueued while a flush
 *   is running (a renderer reacting to a patch by dispatching again) waits
 *   behind the current task instead of interleaving with it.
 * - No microtasks or timers: nothing runs unless the host flushes.
 */

import { assertSchedulingPrecondition, invariant } from '../dev/invariant';

export const MAX_FLUSH_DEPTH = 50;

export type Task = () => void;

export class Scheduler {
  private q: Task[] = [];
  private head = 0;

  private running = false;
  private depth = 0;

  // Monotonic flush version increments at end of each flush
  private flushVersion = 0;

  private readonly maxFlushDepth: number;

  constructor(maxFlushDepth: number = MAX_FLUSH_DEPTH) {
    this.maxFlushDepth = maxFlushDepth;
  }

  enqueue(task: Task): void {
    assertSchedulingPrecondition(
      typeof task === 'function',
      'enqueue() requires a function'
    );
    this.q.push(task);
  }

  flush(): void {
    invariant(!this.running, '[Scheduler] flush() called while already running');

    this.running = true;
    this.depth = 0;
    let fatal: unknown = null;

    try {
      while (this.head < this.q.length) {
        this.depth++;
        if (this.depth > this.maxFlushDepth) {
          throw new Error(
            `[Scheduler] exceeded MAX_FLUSH_DEPTH (${this.maxFlushDepth}). Likely an event feedback loop.`
          );
        }

        const task = this.q[this.head++];
        try {
          task();
        } catch (err) {
          fatal = err;
          break;
        }
      }
    } finally {
      this.running = false;
      this.depth = 0;
      this.compact();
      this.flushVersion++;
    }

    if (fatal) throw fatal;
  }

  /** Drop every pending task; returns how many were dropped. */
  clear(): number {
    const remaining = this.q.length - this.head;
    this.q.length = 0;
    this.head = 0;
    return remaining;
  }

  isRunning(): boolean {
    return this.running;
  }

  getState() {
    return {
      queueLength: this.q.length - this.head,
      running: this.running,
      depth: this.depth,
      flushVersion: this.flushVersion,
    };
  }

  private compact(): void {
    if (this.head >= this.q.length) {
      this.q.length = 0;
      this.head = 0;
    } else if (this.head > 0) {
      this.q = this.q.slice(this.head);
      this.head = 0;
    }
  }
}
