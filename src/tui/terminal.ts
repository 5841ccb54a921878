import terminalKit from 'terminal-kit';

/** A terminal-kit writer that prints its argument as-is, without `^` or `%` markup. */
export interface RawWriter {
  noFormat(text: string): unknown;
}

/**
 * The subset of a terminal-kit terminal used for drawing. Kept narrow so tests
 * can pass a hand-made stub.
 */
export interface TerminalLike extends RawWriter {
  width: number;
  height: number;
  moveTo(x: number, y: number): unknown;
  clear(): unknown;
  hideCursor(hide?: boolean): unknown;
  styleReset(): unknown;
  bold: RawWriter;
  dim: RawWriter;
  inverse: RawWriter;
  bgBlue: RawWriter;
  yellow: RawWriter;
}

export type Terminal = typeof terminalKit.terminal;

export class TerminalSetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerminalSetupError';
  }
}

export function openTerminal(): Terminal {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new TerminalSetupError('tasktui needs an interactive terminal (stdin and stdout must be a TTY)');
  }

  const term = terminalKit.terminal;
  try {
    term.fullscreen(true);
    term.grabInput(true);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TerminalSetupError(`Failed to enter full-screen mode: ${reason}`, { cause: error });
  }
  return term;
}

export function closeTerminal(term: Terminal): void {
  term.grabInput(false);
  term.fullscreen(false);
  term.hideCursor(false);
  term.styleReset();
}
