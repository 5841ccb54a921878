import type { Cell, CellStyle, Frame } from './render.js';
import type { RawWriter, TerminalLike } from './terminal.js';

type Writer = (text: string) => void;

export interface Run {
  text: string;
  style: CellStyle;
}

function writerFor(target: RawWriter): Writer {
  return (s) => {
    target.noFormat(s);
  };
}

// Task text and messages are user or OS text, so nothing is written as markup.
function writersFor(term: TerminalLike, colorsDisabled: boolean): Record<CellStyle, Writer> {
  const plain = writerFor(term);
  // Selection and the input cursor stay inverse even without colors.
  const inverse = writerFor(term.inverse);

  if (colorsDisabled) {
    return { plain, border: plain, title: plain, done: plain, message: plain, selected: inverse, cursor: inverse };
  }

  return {
    plain,
    border: plain,
    title: writerFor(term.bold),
    done: writerFor(term.dim),
    message: writerFor(term.yellow),
    selected: writerFor(term.bgBlue),
    cursor: inverse,
  };
}

/** Groups a row into same-style runs, dropping trailing unstyled blanks. */
export function toRuns(row: Cell[]): Run[] {
  const runs: Run[] = [];
  for (const cell of row) {
    const last = runs[runs.length - 1];
    if (last && last.style === cell.style) {
      last.text += cell.ch;
    } else {
      runs.push({ text: cell.ch, style: cell.style });
    }
  }

  const tail = runs[runs.length - 1];
  if (tail && tail.style === 'plain') {
    tail.text = tail.text.trimEnd();
    if (!tail.text) runs.pop();
  }
  return runs;
}

export function paintFrame(term: TerminalLike, frame: Frame, options: { colorsDisabled: boolean }): void {
  const writers = writersFor(term, options.colorsDisabled);

  term.hideCursor();
  term.clear();
  frame.rows.forEach((row, y) => {
    const runs = toRuns(row);
    if (runs.length === 0) return;
    term.moveTo(1, y + 1);
    for (const run of runs) writers[run.style](run.text);
  });
}
