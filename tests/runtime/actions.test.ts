import { describe, it, expect } from 'vitest';
import { ActionError } from '../../src/common/errors';
import { executeAction } from '../../src/runtime/actions';
import { loadProgram } from '../../src/runtime/program';
import { StateStore } from '../../src/runtime/store';
import { int } from '../../src/value/value';
import { counterProgram } from '../fixtures/programs';

describe('action executor (ACTIONS)', () => {
  it('should run the named action and return its dirty set', () => {
    const doc = loadProgram(counterProgram(4));
    const store = new StateStore(doc.initialState);

    expect(executeAction(doc.actions, 'decrement', store)).toEqual(
      new Set(['count'])
    );
    expect(store.get('count')).toEqual(int(3));
  });

  it('should reject an unknown action without touching state', () => {
    const doc = loadProgram(counterProgram(4));
    const store = new StateStore(doc.initialState);
    const before = store.snapshot();

    let caught: unknown;
    try {
      executeAction(doc.actions, 'explode', store);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ActionError);
    expect(caught).toMatchObject({
      code: 'UNKNOWN_ACTION',
      action: 'explode',
      message: 'Unknown action "explode"',
    });
    expect(store.snapshot()).toBe(before);
  });

  it('should match action names case-sensitively', () => {
    const doc = loadProgram(counterProgram());
    const store = new StateStore(doc.initialState);
    expect(() => executeAction(doc.actions, 'Increment', store)).toThrow(
      ActionError
    );
  });
});
