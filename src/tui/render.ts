import terminalKit from 'terminal-kit';
import { tailDebugLog, type DebugLog } from './debug-log.js';
import { getHelpLines } from './help-text.js';
import { computeLayout, type Rect, type ScreenSize } from './layout.js';
import { getSelectedTask, isPromptVisible, type SessionState } from './session.js';
import type { TextInputState } from './text-input.js';

export type CellStyle = 'plain' | 'border' | 'title' | 'selected' | 'done' | 'cursor' | 'message';

export interface Cell {
  /** Empty for the trailing half of a double-width character. */
  ch: string;
  style: CellStyle;
}

export interface Frame {
  width: number;
  height: number;
  rows: Cell[][];
}

export const CURSOR_GLYPH = '|';

export function createFrame(size: ScreenSize): Frame {
  const width = Math.max(0, size.width);
  const height = Math.max(0, size.height);
  const rows = Array.from({ length: height }, () =>
    Array.from({ length: width }, (): Cell => ({ ch: ' ', style: 'plain' }))
  );
  return { width, height, rows };
}

function sanitize(text: string): string {
  return text.replace(/[\u0000-\u001f\u007f]/g, ' ');
}

function textWidth(text: string): number {
  return terminalKit.stringWidth(text);
}

/**
 * Writes `text` starting at (x, y), never past `maxWidth` columns or the frame
 * edge. Returns the number of columns written.
 */
export function putText(frame: Frame, x: number, y: number, text: string, maxWidth: number, style: CellStyle): number {
  const row = frame.rows[y];
  if (!row || x < 0) return 0;
  const limit = Math.min(x + Math.max(0, maxWidth), frame.width);
  let col = x;

  for (const ch of Array.from(sanitize(text))) {
    const w = textWidth(ch);
    if (w <= 0) {
      const previous = col > x ? row[col - 1] : undefined;
      if (previous) previous.ch += ch;
      continue;
    }
    if (col + w > limit) break;
    row[col] = { ch, style };
    for (let i = 1; i < w; i++) row[col + i] = { ch: '', style };
    col += w;
  }

  return col - x;
}

function fillRow(frame: Frame, x: number, y: number, width: number, style: CellStyle): void {
  putText(frame, x, y, ' '.repeat(Math.max(0, width)), width, style);
}

/** Draws a bordered box with a title on its top edge and returns the inner area. */
export function drawBox(frame: Frame, rect: Rect, title: string): Rect | null {
  if (rect.width < 2 || rect.height < 2) return null;
  const right = rect.x + rect.width - 1;
  const bottom = rect.y + rect.height - 1;
  const horizontal = '─'.repeat(rect.width - 2);

  putText(frame, rect.x, rect.y, `┌${horizontal}┐`, rect.width, 'border');
  for (let y = rect.y + 1; y < bottom; y++) {
    putText(frame, rect.x, y, '│', 1, 'border');
    putText(frame, right, y, '│', 1, 'border');
  }
  putText(frame, rect.x, bottom, `└${horizontal}┘`, rect.width, 'border');
  putText(frame, rect.x + 1, rect.y, title, rect.width - 2, 'title');

  return { x: rect.x + 1, y: rect.y + 1, width: rect.width - 2, height: rect.height - 2 };
}

export function formatTaskRow(task: { text: string; done: boolean }): string {
  return `${task.done ? '[x]' : '[ ]'} ${task.text}`;
}

function renderTaskList(frame: Frame, rect: Rect, state: SessionState): void {
  const title = state.mode.kind === 'normal' ? 'TODO (h=help)' : 'TODO';
  const inner = drawBox(frame, rect, title);
  if (!inner || inner.height <= 0) return;

  // Keep the selected row on screen.
  const offset = Math.max(0, state.selected - inner.height + 1);
  const visible = state.tasks.slice(offset, offset + inner.height);
  visible.forEach((task, i) => {
    const index = offset + i;
    const y = inner.y + i;
    const style: CellStyle = index === state.selected ? 'selected' : task.done ? 'done' : 'plain';
    if (style === 'selected') fillRow(frame, inner.x, y, inner.width, style);
    putText(frame, inner.x, y, formatTaskRow(task), inner.width, style);
  });
}

function renderInputLine(frame: Frame, area: Rect, label: string, input: TextInputState): void {
  const end = area.x + area.width;
  const used = putText(frame, area.x, area.y, label, area.width, 'plain');
  const budget = area.width - used;
  if (budget <= 0) return;

  const chars = Array.from(sanitize(input.value));
  const cursor = Math.max(0, Math.min(input.cursor, chars.length));
  const cursorWidth = textWidth(CURSOR_GLYPH);

  // Scroll horizontally so the cursor stays inside the field.
  let start = 0;
  while (start < cursor && textWidth(chars.slice(start, cursor).join('')) + cursorWidth > budget) {
    start++;
  }

  let col = area.x + used;
  col += putText(frame, col, area.y, chars.slice(start, cursor).join(''), end - col, 'plain');
  col += putText(frame, col, area.y, CURSOR_GLYPH, end - col, 'cursor');
  putText(frame, col, area.y, chars.slice(cursor).join(''), end - col, 'plain');
}

export function getPromptText(state: SessionState): string {
  if (state.mode.kind === 'adding') return `Add task: ${state.mode.input.value}`;
  if (state.mode.kind !== 'confirmDelete') return '';
  const task = getSelectedTask(state);
  return task ? `Delete '${task.text}' ? (y/n)` : 'No task to delete';
}

function renderPrompt(frame: Frame, rect: Rect, state: SessionState): void {
  const inner = drawBox(frame, rect, 'Prompt');
  if (!inner || inner.height <= 0) return;
  if (state.mode.kind === 'adding') {
    renderInputLine(frame, inner, 'Add task: ', state.mode.input);
    return;
  }
  putText(frame, inner.x, inner.y, getPromptText(state), inner.width, 'plain');
}

function renderLines(frame: Frame, inner: Rect, lines: string[]): void {
  lines.slice(0, inner.height).forEach((line, i) => {
    putText(frame, inner.x, inner.y + i, line, inner.width, 'plain');
  });
}

function renderHelp(frame: Frame, rect: Rect): void {
  const inner = drawBox(frame, rect, 'Help');
  if (inner) renderLines(frame, inner, getHelpLines());
}

function renderDebug(frame: Frame, rect: Rect, log: DebugLog): void {
  const inner = drawBox(frame, rect, 'Debug Log');
  if (inner) renderLines(frame, inner, tailDebugLog(log));
}

/**
 * Composes the whole screen from session state. Never mutates `state`.
 */
export function renderFrame(state: SessionState, size: ScreenSize): Frame {
  const frame = createFrame(size);
  const layout = computeLayout(frame, {
    promptVisible: isPromptVisible(state.mode),
    debugVisible: state.debugLog !== null,
    listVisible: state.listVisible,
    statusVisible: Boolean(state.message),
  });

  if (state.mode.kind === 'help') {
    renderHelp(frame, layout.main);
  } else if (layout.list) {
    renderTaskList(frame, layout.list, state);
  }

  if (layout.status && state.message) {
    putText(frame, layout.status.x, layout.status.y, state.message, layout.status.width, 'message');
  }

  if (layout.prompt) renderPrompt(frame, layout.prompt, state);
  if (layout.debug && state.debugLog) renderDebug(frame, layout.debug, state.debugLog);

  return frame;
}

/** Plain-text view of a frame with trailing blanks removed. */
export function frameToLines(frame: Frame): string[] {
  return frame.rows.map((row) => row.map((cell) => cell.ch).join('').trimEnd());
}
