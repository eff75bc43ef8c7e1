import { describe, it, expect, vi } from 'vitest';
import { ActionError, SandboxError } from '../../src/common/errors';
import { createRuntime, type Runtime } from '../../src/app/createRuntime';
import type { PatchSink } from '../../src/renderer/types';
import { int, str } from '../../src/value/value';
import {
  abortProgram,
  counterProgram,
  formProgram,
} from '../fixtures/programs';

function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('runtime (RUNTIME)', () => {
  describe('execute', () => {
    it('should commit an action and return its dirty set and patches', () => {
      const runtime = createRuntime(counterProgram());

      const result = runtime.execute('increment');

      expect(result.dirty).toEqual(new Set(['count']));
      expect(result.patches).toEqual([
        { op: 'set-text', ref: 1, text: 'Count: 1' },
        { op: 'set-visible', ref: 4, visible: true },
      ]);
      expect(result.tree).toBe(runtime.tree);
      expect(runtime.get('count')).toEqual(int(1));
    });

    it('should hand the initial layout and later patches to the renderer', () => {
      const sink: PatchSink = { mount: vi.fn(), apply: vi.fn() };
      const runtime = createRuntime(counterProgram(), { renderer: sink });

      expect(sink.mount).toHaveBeenCalledTimes(1);
      expect(vi.mocked(sink.mount).mock.calls[0][1]).toHaveLength(9);

      runtime.execute('increment');
      expect(sink.apply).toHaveBeenCalledWith(
        [
          { op: 'set-text', ref: 1, text: 'Count: 1' },
          { op: 'set-visible', ref: 4, visible: true },
        ],
        runtime.tree
      );
    });

    it('should not call the renderer given a commit with no visible effect', () => {
      const sink: PatchSink = { mount: vi.fn(), apply: vi.fn() };
      const runtime = createRuntime(counterProgram(), { renderer: sink });

      expect(runtime.execute('reset').patches).toEqual([]);
      expect(sink.apply).not.toHaveBeenCalled();
    });

    it('should rethrow action errors and keep state and tree intact', () => {
      const runtime = createRuntime(abortProgram());
      const tree = runtime.tree;
      const snapshot = runtime.snapshot;

      expect(() => runtime.execute('explode')).toThrow(ActionError);
      expect(() => runtime.execute('missing')).toThrow('Unknown action "missing"');

      expect(runtime.tree).toBe(tree);
      expect(runtime.snapshot).toBe(snapshot);
      expect(runtime.tree.nodes[1].text).toBe('before: 5');
      expect(runtime.terminated).toBeNull();
    });
  });

  describe('dispatch', () => {
    it('should run the click handler of the target node', () => {
      const runtime = createRuntime(counterProgram());

      const outcomes = runtime.dispatch(2, { type: 'click' });

      expect(outcomes).toEqual([
        {
          status: 'applied',
          ref: 2,
          event: { type: 'click' },
          dirty: new Set(['count']),
          patches: [
            { op: 'set-text', ref: 1, text: 'Count: 1' },
            { op: 'set-visible', ref: 4, visible: true },
          ],
        },
      ]);
    });

    it('should ignore events the target cannot handle', () => {
      const runtime = createRuntime(counterProgram());

      expect(runtime.dispatch(1, { type: 'click' })).toEqual([
        {
          status: 'ignored',
          ref: 1,
          event: { type: 'click' },
          reason: 'no on_click handler',
        },
      ]);
      expect(runtime.dispatch(2, { type: 'key', key: 'a' })[0]).toMatchObject({
        status: 'ignored',
        reason: 'node is not bound',
      });
      expect(runtime.dispatch(99, { type: 'click' })[0]).toMatchObject({
        status: 'ignored',
        reason: 'no such node',
      });
    });

    it('should ignore events on hidden nodes', () => {
      const runtime = createRuntime(counterProgram());
      expect(runtime.dispatch(4, { type: 'click' })[0]).toMatchObject({
        status: 'ignored',
        reason: 'node is hidden',
      });
    });

    it('should log a failed action and keep running', () => {
      const logger = recordingLogger();
      const runtime = createRuntime(abortProgram(), { logger });

      const [outcome] = runtime.dispatch(2, { type: 'click' });

      expect(outcome.status).toBe('failed');
      if (outcome.status !== 'failed') return;
      expect(outcome.error.code).toBe('EVALUATION');
      expect(logger.warn).toHaveBeenCalledWith(
        'Action "explode" aborted while assigning "count": Division by zero in "/"'
      );
      expect(runtime.get('label')).toEqual(str('before'));
      expect(runtime.terminated).toBeNull();
    });

    it('should edit bound text given input, key and backspace events', () => {
      const runtime = createRuntime(formProgram());

      runtime.dispatch(1, { type: 'input', value: 'Ad' });
      runtime.dispatch(1, { type: 'key', key: 'a' });
      runtime.dispatch(1, { type: 'key', key: 'm' });
      runtime.dispatch(1, { type: 'backspace' });

      expect(runtime.get('name')).toEqual(str('Ada'));
      expect(runtime.tree.nodes[2].text).toBe('Hello, Ada!');
      expect(runtime.tree.nodes[1].value).toEqual(str('Ada'));
    });

    it('should remove a whole code point given backspace', () => {
      const runtime = createRuntime(formProgram());
      runtime.dispatch(1, { type: 'input', value: 'ok🙂' });
      runtime.dispatch(1, { type: 'backspace' });
      expect(runtime.get('name')).toEqual(str('ok'));
    });

    it('should queue an event dispatched while another is running', () => {
      let runtime: Runtime | null = null;
      let nested: unknown[] | null = null;
      const sink: PatchSink = {
        mount: () => {},
        apply: () => {
          if (nested === null && runtime) {
            nested = runtime.dispatch(2, { type: 'click' });
            // The nested event has not run yet
            expect(runtime.get('count')).toEqual(int(1));
          }
        },
      };
      runtime = createRuntime(counterProgram(), { renderer: sink });

      const outcomes = runtime.dispatch(2, { type: 'click' });

      expect(nested).toEqual([]);
      expect(outcomes.map((o) => o.status)).toEqual(['applied', 'applied']);
      expect(runtime.get('count')).toEqual(int(2));
    });

    it('should drop events left queued when a feedback loop aborts the flush', () => {
      const logger = recordingLogger();
      let runtime: Runtime | null = null;
      let looping = true;
      const sink: PatchSink = {
        mount: () => {},
        apply: () => {
          if (looping && runtime) runtime.dispatch(2, { type: 'click' });
        },
      };
      runtime = createRuntime(counterProgram(), {
        renderer: sink,
        logger,
        maxFlushDepth: 3,
      });

      expect(() => runtime?.dispatch(2, { type: 'click' })).toThrow(
        '[Scheduler] exceeded MAX_FLUSH_DEPTH (3). Likely an event feedback loop.'
      );
      expect(runtime.get('count')).toEqual(int(3));
      expect(runtime.terminated).toBeNull();
      expect(logger.error).toHaveBeenCalledWith(
        'Event queue aborted:',
        '[Scheduler] exceeded MAX_FLUSH_DEPTH (3). Likely an event feedback loop.',
        '(1 queued event(s) dropped)'
      );

      looping = false;
      const outcomes = runtime.dispatch(3, { type: 'click' });

      expect(outcomes).toHaveLength(1);
      expect(outcomes[0]).toMatchObject({ status: 'applied', ref: 3 });
      expect(runtime.get('count')).toEqual(int(2));
    });
  });

  describe('memory', () => {
    it('should account for state and the materialized tree', () => {
      const runtime = createRuntime(formProgram());
      // state: 88; nodes: column 120, input 128, text 128, button 96
      expect(runtime.memory).toEqual({
        usage: 560,
        peak: 560,
        limit: 16_777_216,
      });
    });

    it('should terminate the runtime given a memory violation', () => {
      const logger = recordingLogger();
      const runtime = createRuntime(formProgram(), { memoryLimit: 1000, logger });

      let caught: unknown;
      try {
        runtime.dispatch(1, { type: 'input', value: 'x'.repeat(1000) });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SandboxError);
      expect(caught).toMatchObject({ code: 'MEMORY_EXCEEDED' });
      expect(runtime.terminated).toBe(caught);
      expect(runtime.get('name')).toEqual(str(''));
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error.mock.calls[0][0]).toBe(
        'Application "Form" terminated:'
      );

      expect(() => runtime.execute('clear')).toThrow(SandboxError);
      let later: unknown;
      try {
        runtime.dispatch(3, { type: 'click' });
      } catch (error) {
        later = error;
      }
      expect(later).toBe(caught);
    });

    it('should refuse to start given a limit below the initial footprint', () => {
      const logger = recordingLogger();

      expect(() =>
        createRuntime(formProgram(), { memoryLimit: 100, logger })
      ).toThrow(SandboxError);
      expect(logger.error.mock.calls[0][0]).toBe(
        'Application "Form" failed to start:'
      );
    });
  });
});
