import { describe, expect, it } from 'vitest';
import { applyTextInputKey, createTextInput, isPrintableKeyName } from '../../src/tui/text-input.js';

describe('applyTextInputKey', () => {
  it('inserts characters at the cursor', () => {
    const moved = applyTextInputKey(createTextInput('ac'), 'LEFT');
    expect(moved).toEqual({ value: 'ac', cursor: 1 });
    expect(moved && applyTextInputKey(moved, 'b')).toEqual({ value: 'abc', cursor: 2 });
  });

  it('inserts a space for both space key names', () => {
    expect(applyTextInputKey(createTextInput('a'), 'SPACE')).toEqual({ value: 'a ', cursor: 2 });
    expect(applyTextInputKey(createTextInput('a'), ' ')).toEqual({ value: 'a ', cursor: 2 });
  });

  it('handles backspace and delete at the edges', () => {
    expect(applyTextInputKey({ value: 'ab', cursor: 0 }, 'BACKSPACE')).toEqual({ value: 'ab', cursor: 0 });
    expect(applyTextInputKey({ value: 'ab', cursor: 2 }, 'DELETE')).toEqual({ value: 'ab', cursor: 2 });
    expect(applyTextInputKey({ value: 'ab', cursor: 0 }, 'DELETE')).toEqual({ value: 'b', cursor: 0 });
  });

  it('treats astral characters as one position', () => {
    expect(applyTextInputKey(createTextInput('a😀'), 'BACKSPACE')).toEqual({ value: 'a', cursor: 1 });
  });

  it('moves to the ends of the line', () => {
    expect(applyTextInputKey({ value: 'abc', cursor: 1 }, 'HOME')).toEqual({ value: 'abc', cursor: 0 });
    expect(applyTextInputKey({ value: 'abc', cursor: 1 }, 'END')).toEqual({ value: 'abc', cursor: 3 });
  });

  it('deletes to line start and the previous word', () => {
    expect(applyTextInputKey({ value: 'foo bar', cursor: 5 }, 'CTRL_U')).toEqual({ value: 'ar', cursor: 0 });
    expect(applyTextInputKey({ value: 'foo bar', cursor: 7 }, 'CTRL_W')).toEqual({ value: 'foo ', cursor: 4 });
  });

  it('leaves submit, cancel and navigation keys to the caller', () => {
    const input = createTextInput('x');
    expect(applyTextInputKey(input, 'ENTER')).toBeNull();
    expect(applyTextInputKey(input, 'ESCAPE')).toBeNull();
    expect(applyTextInputKey(input, 'UP')).toBeNull();
  });
});

describe('isPrintableKeyName', () => {
  it('accepts single characters and rejects key names and control bytes', () => {
    expect(isPrintableKeyName('a')).toBe(true);
    expect(isPrintableKeyName('é')).toBe(true);
    expect(isPrintableKeyName('😀')).toBe(true);
    expect(isPrintableKeyName('TAB')).toBe(false);
    expect(isPrintableKeyName('\u0001')).toBe(false);
    expect(isPrintableKeyName('')).toBe(false);
  });
});
