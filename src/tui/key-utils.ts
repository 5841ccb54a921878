export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

// Ctrl+Space arrives as a NUL byte; terminal-kit names it differently per terminfo entry.
const VISIBILITY_TOGGLE_KEYS = new Set(['CTRL_SPACE', 'NUL', 'CTRL_@']);

export function isVisibilityToggleKeyName(name: string): boolean {
  return VISIBILITY_TOGGLE_KEYS.has(name);
}

export function isQuitKeyName(name: string): boolean {
  return name === 'q' || name === 'CTRL_C';
}

export function isCancelKeyName(name: string): boolean {
  return name === 'ESCAPE' || name === 'CTRL_C';
}
