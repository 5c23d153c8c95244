import { createStore, type StoreApi } from 'zustand/vanilla';
import type { ClickableRegion, RenderPayload } from '../daemon/render-protocol.ts';
import { clampScrollOffset, scrollBy } from './viewport.ts';

export type RendererConnectionStatus = 'connecting' | 'connected' | 'disconnected';

export interface RendererFrame {
  readonly content: string;
  readonly lines: readonly string[];
  readonly regions: readonly ClickableRegion[];
  readonly totalLines: number;
  readonly isTouchMode: boolean;
  readonly sidebarBg: string | null;
}

export interface RendererStoreState {
  readonly status: RendererConnectionStatus;
  readonly width: number;
  readonly height: number;
  readonly sequenceNum: number;
  readonly scrollOffset: number;
  readonly terminalBg: string | null;
  readonly frame: RendererFrame | null;
}

interface ApplyRenderResult {
  readonly sequenceAccepted: boolean;
  readonly scrollChanged: boolean;
}

export type RendererStore = StoreApi<RendererStoreState>;

export function splitContentLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function createRendererStore(
  initial: Partial<RendererStoreState> = {},
): RendererStore {
  return createStore<RendererStoreState>(() => ({
    status: initial.status ?? 'connecting',
    width: initial.width ?? 0,
    height: initial.height ?? 0,
    sequenceNum: initial.sequenceNum ?? 0,
    scrollOffset: initial.scrollOffset ?? 0,
    terminalBg: initial.terminalBg ?? null,
    frame: initial.frame ?? null,
  }));
}

export function setRendererStatus(store: RendererStore, status: RendererConnectionStatus): void {
  const state = store.getState();
  if (state.status === status) {
    return;
  }
  // A fresh subscription may talk to a restarted daemon whose counter starts over.
  store.setState(status === 'connecting' ? { status, sequenceNum: 0 } : { status });
}

export function applyRenderPayloadToStore(
  store: RendererStore,
  payload: RenderPayload,
): ApplyRenderResult {
  const state = store.getState();
  const lines = splitContentLines(payload.content);
  const totalLines = payload.total_lines > 0 ? payload.total_lines : lines.length;
  const sequenceAccepted = payload.sequence_num > state.sequenceNum;
  const scrollOffset = clampScrollOffset(state.scrollOffset, totalLines, state.height);
  store.setState({
    sequenceNum: sequenceAccepted ? payload.sequence_num : state.sequenceNum,
    scrollOffset,
    terminalBg: payload.terminal_bg ?? state.terminalBg,
    frame: {
      content: payload.content,
      lines,
      regions: payload.regions,
      totalLines,
      isTouchMode: payload.is_touch_mode,
      sidebarBg: payload.sidebar_bg ?? null,
    },
  });
  return {
    sequenceAccepted,
    scrollChanged: scrollOffset !== state.scrollOffset,
  };
}

export function scrollRendererStore(store: RendererStore, delta: number): boolean {
  const state = store.getState();
  const totalLines = state.frame?.totalLines ?? 0;
  const scrollOffset = scrollBy(state.scrollOffset, delta, totalLines, state.height);
  if (scrollOffset === state.scrollOffset) {
    return false;
  }
  store.setState({ scrollOffset });
  return true;
}

export function resizeRendererStore(store: RendererStore, width: number, height: number): boolean {
  const state = store.getState();
  const scrollOffset = clampScrollOffset(state.scrollOffset, state.frame?.totalLines ?? 0, height);
  store.setState({ width, height, scrollOffset });
  return scrollOffset !== state.scrollOffset;
}
