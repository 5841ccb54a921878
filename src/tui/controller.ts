import type { TaskStore } from '../store/task-store.js';
import { StoreWriteError } from '../store/errors.js';
import { dispatchKey, type KeyOutcome } from './keymap.js';
import { logDebug, type SessionState } from './session.js';

/**
 * Applies one key press and saves the list when the key mutated it.
 * A failed save keeps the in-memory list and reports through `state.message`.
 */
export function handleKey(state: SessionState, store: TaskStore, name: string): KeyOutcome {
  state.message = null;
  const outcome = dispatchKey(state, name);
  if (outcome === 'persist') {
    persistTasks(state, store);
  }
  return outcome;
}

export function persistTasks(state: SessionState, store: TaskStore): boolean {
  try {
    store.save(state.tasks);
    return true;
  } catch (error) {
    if (!(error instanceof StoreWriteError)) throw error;
    state.message = `Save failed: ${error.message}`;
    logDebug(state, state.message);
    return false;
  }
}
