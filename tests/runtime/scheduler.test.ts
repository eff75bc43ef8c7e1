import { describe, it, expect } from 'vitest';
import { Scheduler } from '../../src/runtime/scheduler';

describe('scheduler (SCHEDULER)', () => {
  it('should run tasks in the order enqueued', () => {
    const scheduler = new Scheduler();
    const order: number[] = [];
    scheduler.enqueue(() => order.push(1));
    scheduler.enqueue(() => order.push(2));
    scheduler.enqueue(() => order.push(3));

    scheduler.flush();

    expect(order).toEqual([1, 2, 3]);
    expect(scheduler.getState()).toEqual({
      queueLength: 0,
      running: false,
      depth: 0,
      flushVersion: 1,
    });
  });

  it('should run a task enqueued during a flush after the current task', () => {
    const scheduler = new Scheduler();
    const order: string[] = [];
    scheduler.enqueue(() => {
      order.push('outer:start');
      scheduler.enqueue(() => order.push('inner'));
      order.push('outer:end');
    });
    scheduler.enqueue(() => order.push('second'));

    scheduler.flush();

    expect(order).toEqual(['outer:start', 'outer:end', 'second', 'inner']);
  });

  it('should refuse to flush reentrantly', () => {
    const scheduler = new Scheduler();
    let nested: unknown;
    scheduler.enqueue(() => {
      try {
        scheduler.flush();
      } catch (error) {
        nested = error;
      }
    });

    scheduler.flush();

    expect(nested).toBeInstanceOf(Error);
    expect(String(nested)).toContain('flush() called while already running');
  });

  it('should stop at the first failing task and keep the rest queued', () => {
    const scheduler = new Scheduler();
    const order: number[] = [];
    scheduler.enqueue(() => order.push(1));
    scheduler.enqueue(() => {
      throw new Error('boom');
    });
    scheduler.enqueue(() => order.push(3));

    expect(() => scheduler.flush()).toThrow('boom');
    expect(order).toEqual([1]);
    expect(scheduler.getState().queueLength).toBe(1);

    scheduler.flush();
    expect(order).toEqual([1, 3]);
  });

  it('should abort a feedback loop past the flush depth limit', () => {
    const scheduler = new Scheduler(5);
    let runs = 0;
    const loop = (): void => {
      runs++;
      scheduler.enqueue(loop);
    };
    scheduler.enqueue(loop);

    expect(() => scheduler.flush()).toThrow('exceeded MAX_FLUSH_DEPTH (5)');
    expect(runs).toBe(5);
    expect(scheduler.isRunning()).toBe(false);
  });

  it('should drop pending tasks given clear()', () => {
    const scheduler = new Scheduler();
    const order: number[] = [];
    scheduler.enqueue(() => order.push(1));
    scheduler.enqueue(() => order.push(2));

    expect(scheduler.clear()).toBe(2);
    scheduler.flush();
    expect(order).toEqual([]);
  });
});
