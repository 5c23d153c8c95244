import { measureDisplayWidth, stripSgr } from '../text/display-width.ts';
import type { RendererStoreState } from './renderer-store.ts';
import { visibleContentLines } from './viewport.ts';

const SPINNER_FRAMES = ['◐', '◓', '◑', '◒'] as const;
const SPINNER_FRAME_MS = 100;
const LOADING_FOREGROUND = '\u001b[38;5;244m';
const SGR_RESET = '\u001b[0m';

export function spinnerFrameAt(nowMs: number): string {
  return SPINNER_FRAMES[Math.floor(nowMs / SPINNER_FRAME_MS) % SPINNER_FRAMES.length] ?? '◐';
}

export function backgroundSgrFromHex(hex: string | null): string {
  if (hex === null) {
    return '';
  }
  const match = /^#?([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/.exec(hex.trim());
  if (match === null) {
    return '';
  }
  const [red, green, blue] = match.slice(1).map((part) => Number.parseInt(part, 16));
  return `\u001b[48;2;${String(red)};${String(green)};${String(blue)}m`;
}

function padStyledLine(line: string, width: number): string {
  const missing = width - measureDisplayWidth(stripSgr(line));
  return missing > 0 ? `${line}${' '.repeat(missing)}` : line;
}

export function isShowingContent(state: RendererStoreState): boolean {
  return state.status === 'connected' && state.frame !== null && state.frame.content.length > 0;
}

export function renderLoadingRows(state: RendererStoreState, nowMs: number): string[] {
  const background = backgroundSgrFromHex(state.terminalBg);
  const rows: string[] = [];
  for (let row = 0; row < state.height; row += 1) {
    const text = row === 0 ? ` ${spinnerFrameAt(nowMs)} Loading...` : '';
    rows.push(`${background}${LOADING_FOREGROUND}${padStyledLine(text, state.width)}${SGR_RESET}`);
  }
  return rows;
}

/** The visible window of the last frame, one padded row per surface line. */
export function renderSurfaceRows(state: RendererStoreState, nowMs: number): string[] {
  const frame = state.frame;
  if (!isShowingContent(state) || frame === null) {
    return renderLoadingRows(state, nowMs);
  }
  const visible = visibleContentLines(frame.lines, state.scrollOffset, state.height);
  const rows: string[] = [];
  for (let row = 0; row < state.height; row += 1) {
    rows.push(`${padStyledLine(visible[row] ?? '', state.width)}${SGR_RESET}`);
  }
  return rows;
}
