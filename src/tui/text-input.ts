import { isSpaceKeyName } from './key-utils.js';

export interface TextInputState {
  value: string;
  /**
   * Cursor position measured in Unicode codepoints (i.e. `Array.from(value)` index).
   */
  cursor: number;
}

function toChars(value: string): string[] {
  return Array.from(value);
}

function clampCursor(chars: string[], cursor: number): number {
  return Math.max(0, Math.min(cursor, chars.length));
}

export function createTextInput(initial = ''): TextInputState {
  return { value: initial, cursor: toChars(initial).length };
}

function splice(chars: string[], start: number, deleteCount: number, insert: string[] = []): TextInputState {
  const next = [...chars];
  next.splice(start, deleteCount, ...insert);
  return { value: next.join(''), cursor: start + insert.length };
}

function wordStartBefore(chars: string[], cursor: number): number {
  let i = cursor;
  while (i > 0 && /\s/.test(chars[i - 1] ?? '')) i--;
  while (i > 0 && !/\s/.test(chars[i - 1] ?? '')) i--;
  return i;
}

/**
 * Applies an editing key to the input. Returns null for keys the input does not
 * handle (ENTER, ESCAPE and other control keys are left to the caller).
 */
export function applyTextInputKey(state: TextInputState, name: string): TextInputState | null {
  const chars = toChars(state.value);
  const cursor = clampCursor(chars, state.cursor);

  switch (name) {
    case 'LEFT':
      return { value: state.value, cursor: Math.max(0, cursor - 1) };
    case 'RIGHT':
      return { value: state.value, cursor: Math.min(chars.length, cursor + 1) };
    case 'HOME':
    case 'CTRL_A':
      return { value: state.value, cursor: 0 };
    case 'END':
    case 'CTRL_E':
      return { value: state.value, cursor: chars.length };
    case 'BACKSPACE':
      return cursor > 0 ? splice(chars, cursor - 1, 1) : { value: state.value, cursor };
    case 'DELETE':
      return cursor < chars.length ? splice(chars, cursor, 1) : { value: state.value, cursor };
    case 'CTRL_U':
      return splice(chars, 0, cursor);
    case 'CTRL_W': {
      const start = wordStartBefore(chars, cursor);
      return splice(chars, start, cursor - start);
    }
    default:
      break;
  }

  if (isSpaceKeyName(name)) return splice(chars, cursor, 0, [' ']);
  if (isPrintableKeyName(name)) return splice(chars, cursor, 0, [name]);
  return null;
}

export function isPrintableKeyName(name: string): boolean {
  const chars = toChars(name);
  if (chars.length !== 1) return false;
  const codepoint = name.codePointAt(0) ?? 0;
  return codepoint >= 0x20 && codepoint !== 0x7f;
}
