import {
  clampSelection,
  getSelectedTask,
  logDebug,
  type Mode,
  type SessionState,
} from './session.js';
import { isCancelKeyName, isQuitKeyName, isSpaceKeyName, isVisibilityToggleKeyName } from './key-utils.js';
import { applyTextInputKey, createTextInput } from './text-input.js';

/**
 * What the loop must do after a key was applied: nothing beyond a redraw,
 * write the task list to the store, or exit.
 */
export type KeyOutcome = 'none' | 'persist' | 'quit';

const NORMAL: Mode = { kind: 'normal' };

export function dispatchKey(state: SessionState, name: string): KeyOutcome {
  logDebug(state, `Key pressed: ${name}`);

  switch (state.mode.kind) {
    case 'normal':
      return handleNormalKey(state, name);
    case 'adding':
      return handleAddingKey(state, state.mode, name);
    case 'confirmDelete':
      return handleConfirmDeleteKey(state, name);
    case 'help':
      state.mode = NORMAL;
      logDebug(state, 'Closed help');
      return 'none';
  }
}

function handleNormalKey(state: SessionState, name: string): KeyOutcome {
  if (isQuitKeyName(name)) {
    logDebug(state, 'Quitting application');
    return 'quit';
  }

  if (isVisibilityToggleKeyName(name)) {
    state.listVisible = !state.listVisible;
    logDebug(state, `UI toggled: visible=${state.listVisible}`);
    return 'none';
  }

  // With the list hidden every list action is ignored.
  if (state.listVisible) {
    if (isSpaceKeyName(name)) {
      const task = getSelectedTask(state);
      if (!task) return 'none';
      task.done = !task.done;
      logDebug(state, `Task ${state.selected} toggled: done=${task.done}`);
      return 'persist';
    }

    if (name === 'a') {
      state.mode = { kind: 'adding', input: createTextInput() };
      logDebug(state, 'Entered task creation mode');
      return 'none';
    }

    if (name === 'd' && state.tasks.length > 0) {
      state.mode = { kind: 'confirmDelete' };
      logDebug(state, 'Entered delete confirmation mode');
      return 'none';
    }

    if (name === 'h') {
      state.mode = { kind: 'help' };
      logDebug(state, 'Showing help');
      return 'none';
    }

    if (name === 'DOWN' || name === 'UP') {
      const previous = state.selected;
      const delta = name === 'DOWN' ? 1 : -1;
      state.selected = clampSelection(previous + delta, state.tasks.length);
      if (state.selected !== previous) {
        const direction = name === 'DOWN' ? 'down' : 'up';
        logDebug(state, `Selection moved ${direction}: ${previous} -> ${state.selected}`);
      }
      return 'none';
    }
  }

  logDebug(state, 'Unhandled key in Normal mode');
  return 'none';
}

function handleAddingKey(state: SessionState, mode: Extract<Mode, { kind: 'adding' }>, name: string): KeyOutcome {
  if (name === 'ENTER') {
    const text = mode.input.value.trim();
    state.mode = NORMAL;
    if (!text) return 'none';
    state.tasks.push({ text, done: false });
    logDebug(state, `Added task: '${text}'`);
    return 'persist';
  }

  if (isCancelKeyName(name)) {
    state.mode = NORMAL;
    logDebug(state, 'Cancelled task creation');
    return 'none';
  }

  const input = applyTextInputKey(mode.input, name);
  if (input) {
    state.mode = { kind: 'adding', input };
  } else {
    logDebug(state, 'Unhandled key in AddingTask mode');
  }
  return 'none';
}

function handleConfirmDeleteKey(state: SessionState, name: string): KeyOutcome {
  if (name === 'y' || name === 'Y') {
    state.mode = NORMAL;
    if (state.selected >= state.tasks.length) return 'none';
    const [removed] = state.tasks.splice(state.selected, 1);
    state.selected = clampSelection(state.selected, state.tasks.length);
    logDebug(state, `Deleted task: '${removed?.text ?? ''}'`);
    return 'persist';
  }

  if (name === 'n' || name === 'N' || isCancelKeyName(name)) {
    state.mode = NORMAL;
    logDebug(state, 'Cancelled task deletion');
    return 'none';
  }

  logDebug(state, 'Unhandled key in ConfirmingDelete mode');
  return 'none';
}
