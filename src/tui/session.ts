import type { Task } from '../schema/index.js';
import { appendDebugLog, createDebugLog, type DebugLog } from './debug-log.js';
import type { TextInputState } from './text-input.js';

/** Input routing context. The add-task buffer only exists while adding. */
export type Mode =
  | { kind: 'normal' }
  | { kind: 'adding'; input: TextInputState }
  | { kind: 'confirmDelete' }
  | { kind: 'help' };

export interface SessionState {
  tasks: Task[];
  selected: number;
  mode: Mode;
  listVisible: boolean;
  /** Present only when debug output was requested at startup. */
  debugLog: DebugLog | null;
  message: string | null;
  colorsDisabled: boolean;
}

export interface SessionOptions {
  debug?: boolean;
  colorsDisabled?: boolean;
}

export function createSession(tasks: Task[], options: SessionOptions = {}): SessionState {
  const state: SessionState = {
    tasks,
    selected: 0,
    mode: { kind: 'normal' },
    listVisible: true,
    debugLog: options.debug ? createDebugLog() : null,
    message: null,
    colorsDisabled: options.colorsDisabled ?? false,
  };
  logDebug(state, 'Debug mode enabled');
  logDebug(state, `UI visible: ${state.listVisible}`);
  return state;
}

export function logDebug(state: SessionState, entry: string): void {
  if (state.debugLog) appendDebugLog(state.debugLog, entry);
}

export function clampSelection(selected: number, length: number): number {
  return Math.min(Math.max(selected, 0), Math.max(0, length - 1));
}

export function getSelectedTask(state: SessionState): Task | null {
  return state.tasks[state.selected] ?? null;
}

export function isPromptVisible(mode: Mode): boolean {
  return mode.kind === 'adding' || mode.kind === 'confirmDelete';
}
