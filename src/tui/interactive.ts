import type { Task } from '../schema/index.js';
import type { TaskStore } from '../store/task-store.js';
import { handleKey } from './controller.js';
import { paintFrame } from './paint.js';
import { renderFrame } from './render.js';
import { createSession, type SessionState } from './session.js';
import { closeTerminal, openTerminal, type TerminalLike } from './terminal.js';

export interface TuiOptions {
  store: TaskStore;
  debug: boolean;
  colorsDisabled: boolean;
}

function draw(state: SessionState, term: TerminalLike): void {
  const width = term.width || process.stdout.columns || 80;
  const height = term.height || process.stdout.rows || 24;
  const frame = renderFrame(state, { width, height });
  paintFrame(term, frame, { colorsDisabled: state.colorsDisabled });
}

/**
 * Runs the full-screen task list until the user quits. Every key is applied,
 * saved when it changed the list, and followed by a full redraw.
 * Resolves with the in-memory list at exit.
 */
export async function runInteractiveTui(options: TuiOptions): Promise<Task[]> {
  // Open first: loading creates a missing task file.
  const term = openTerminal();
  const state = createSession(options.store.load(), {
    debug: options.debug,
    colorsDisabled: options.colorsDisabled,
  });

  let resolveExit: () => void = () => undefined;
  const exitPromise = new Promise<void>((resolve) => {
    resolveExit = resolve;
  });

  const onKey = (name: string): void => {
    try {
      if (handleKey(state, options.store, name) === 'quit') {
        resolveExit();
        return;
      }
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      state.mode = { kind: 'normal' };
      state.message = `Error: ${msg}`;
    }
    draw(state, term);
  };

  const onResize = (): void => {
    draw(state, term);
  };

  process.stdout.on('resize', onResize);
  term.on('key', onKey);

  try {
    draw(state, term);
    await exitPromise;
  } finally {
    term.removeListener('key', onKey);
    process.stdout.removeListener('resize', onResize);
    closeTerminal(term);
    term.clear();
  }

  return state.tasks;
}
