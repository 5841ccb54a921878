export const PROMPT_PANE_HEIGHT = 3;
export const DEBUG_PANE_HEIGHT = 8;
export const LIST_PANE_WIDTH = 30;
export const STATUS_LINE_HEIGHT = 1;

/** Zero-based cell rectangle. */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ScreenSize {
  width: number;
  height: number;
}

export interface ScreenLayout {
  main: Rect;
  list: Rect | null;
  /** Full-width row under the main pane for the status message. */
  status: Rect | null;
  prompt: Rect | null;
  debug: Rect | null;
}

export interface LayoutOptions {
  promptVisible: boolean;
  debugVisible: boolean;
  listVisible: boolean;
  statusVisible: boolean;
}

function clipToScreen(rect: Rect, size: ScreenSize): Rect {
  const y = Math.min(rect.y, size.height);
  return { ...rect, y, height: Math.max(0, Math.min(rect.height, size.height - y)) };
}

/**
 * Splits the screen top to bottom into main pane, status line, prompt and
 * debug panes. The status line and prompt (when shown) always sit directly
 * under the main pane. Inside the main pane the task list takes a fixed width
 * on the right.
 */
export function computeLayout(size: ScreenSize, options: LayoutOptions): ScreenLayout {
  const width = Math.max(0, size.width);
  const height = Math.max(0, size.height);
  const promptHeight = options.promptVisible ? PROMPT_PANE_HEIGHT : 0;
  const debugHeight = options.debugVisible ? DEBUG_PANE_HEIGHT : 0;
  const statusHeight = options.statusVisible ? STATUS_LINE_HEIGHT : 0;
  const mainHeight = Math.max(0, height - statusHeight - promptHeight - debugHeight);
  const screen = { width, height };

  const main: Rect = { x: 0, y: 0, width, height: mainHeight };
  const status = options.statusVisible
    ? clipToScreen({ x: 0, y: mainHeight, width, height: statusHeight }, screen)
    : null;
  const promptY = mainHeight + statusHeight;
  const prompt = options.promptVisible
    ? clipToScreen({ x: 0, y: promptY, width, height: promptHeight }, screen)
    : null;
  const debug = options.debugVisible
    ? clipToScreen({ x: 0, y: promptY + promptHeight, width, height: debugHeight }, screen)
    : null;

  if (!options.listVisible) {
    return { main, list: null, status, prompt, debug };
  }

  const listWidth = Math.min(LIST_PANE_WIDTH, width);
  const list: Rect = { x: width - listWidth, y: 0, width: listWidth, height: mainHeight };
  return { main, list, status, prompt, debug };
}
