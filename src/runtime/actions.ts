import type { ActionDecl } from '../ast/types';
import { ActionError } from '../common/errors';
import type { StateStore } from './store';

/**
 * Resolve an action by exact, case-sensitive name and run it as one store
 * transaction. Returns the dirty variable set.
 */
export function executeAction(
  actions: ReadonlyMap<string, ActionDecl>,
  name: string,
  store: StateStore
): Set<string> {
  const action = actions.get(name);
  if (!action) throw ActionError.unknownAction(name);
  return store.apply(action);
}
