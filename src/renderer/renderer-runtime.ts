import type { MuxrailGestureConfig } from '../config/config-core.ts';
import type { InputPayload, ServerMessage } from '../daemon/render-protocol.ts';
import { focusPane, restoreLastPane, type MuxControl } from '../mux/mux-control.ts';
import { recordPerfError, recordPerfEvent } from '../perf/perf-core.ts';
import { ContextMenuOverlay, type SurfaceSize } from './context-menu.ts';
import { copyTextToClipboards, extractDragText, type WriteTty } from './drag-copy.ts';
import { GestureEngine, type GestureResolution, type ScheduleFn } from './gesture-engine.ts';
import { hitTestScreenPoint, isEdgeZoneRightClick } from './region-hit-test.ts';
import {
  applyRenderPayloadToStore,
  resizeRendererStore,
  scrollRendererStore,
  type RendererStore,
} from './renderer-store.ts';
import { renderSurfaceRows } from './surface-view.ts';
import type { PointerButton, PointerPosition, TerminalInputEvent } from './terminal-input.ts';

/** The subset of `RenderClient` the runtime talks through. */
export interface RendererTransport {
  sendInput(input: InputPayload): boolean;
  sendViewportUpdate(viewportOffset: number): boolean;
  sendResize(width: number, height: number): boolean;
  unsubscribe(): Promise<void>;
}

export interface RendererRuntimeOptions {
  readonly paneId: string;
  readonly store: RendererStore;
  readonly transport: RendererTransport;
  readonly mux: MuxControl;
  readonly gesture: MuxrailGestureConfig;
  readonly requestPaint: () => void;
  readonly onQuit: () => void;
  readonly nowMs?: () => number;
  readonly schedule?: ScheduleFn;
  readonly writeTty?: WriteTty;
}

export class RendererRuntime {
  private readonly options: RendererRuntimeOptions;
  private readonly store: RendererStore;
  private readonly transport: RendererTransport;
  private readonly engine: GestureEngine;
  private readonly menu: ContextMenuOverlay;
  private readonly background = new Set<Promise<void>>();
  // Focus and restore must reach the multiplexer in the order the menu changed.
  private focusChain: Promise<void> = Promise.resolve();
  private quitting = false;

  constructor(options: RendererRuntimeOptions) {
    this.options = options;
    this.store = options.store;
    this.transport = options.transport;
    this.engine = new GestureEngine({
      thresholds: options.gesture,
      emit: (resolution) => {
        this.handleGesture(resolution);
      },
      nowMs: options.nowMs,
      schedule: options.schedule,
    });
    this.menu = new ContextMenuOverlay({
      onOpen: () => {
        this.handleMenuOpened();
      },
      onClose: (index) => {
        this.handleMenuClosed(index);
      },
    });
  }

  isMenuOpen(): boolean {
    return this.menu.isOpen();
  }

  menuHighlightedIndex(): number {
    return this.menu.highlightedIndex();
  }

  /** Resolves once every side effect started so far (focus, clipboard, quit) has finished. */
  async settle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
  }

  renderRows(nowMs: number): string[] {
    return this.menu.overlayRows(renderSurfaceRows(this.store.getState(), nowMs), this.surfaceSize());
  }

  handleServerMessage(message: ServerMessage): void {
    switch (message.type) {
      case 'render': {
        const result = applyRenderPayloadToStore(this.store, message.payload);
        if (result.scrollChanged) {
          this.transport.sendViewportUpdate(this.store.getState().scrollOffset);
        }
        this.options.requestPaint();
        return;
      }
      case 'menu':
        this.engine.reset();
        this.menu.open(message.payload);
        this.options.requestPaint();
        return;
      case 'pong':
        return;
    }
  }

  handleTerminalEvent(event: TerminalInputEvent): void {
    if (event.kind === 'key') {
      this.handleKey(event.key);
      return;
    }
    if (this.menu.isOpen()) {
      this.menu.handlePointer(event, this.surfaceSize());
      this.options.requestPaint();
      return;
    }
    this.engine.handle(event);
  }

  handleResize(width: number, height: number): void {
    const scrollChanged = resizeRendererStore(this.store, width, height);
    this.transport.sendResize(width, height);
    if (scrollChanged) {
      this.transport.sendViewportUpdate(this.store.getState().scrollOffset);
    }
    this.options.requestPaint();
  }

  requestQuit(): void {
    if (this.quitting) {
      return;
    }
    this.quitting = true;
    this.menu.cancel();
    this.track(
      this.transport
        .unsubscribe()
        .catch((error: unknown) => {
          recordPerfError('renderer.unsubscribe.error', error);
        })
        .then(() => {
          this.options.onQuit();
        }),
    );
  }

  private handleKey(key: string): void {
    if (this.menu.isOpen()) {
      this.menu.handleKey(key);
      this.options.requestPaint();
      return;
    }
    switch (key) {
      case 'q':
      case 'ctrl+c':
        this.requestQuit();
        return;
      case 'up':
      case 'k':
        this.scroll(-1);
        return;
      case 'down':
      case 'j':
        this.scroll(1);
        return;
      case 'enter':
      case 'r':
        this.transport.sendInput({
          ...this.inputBase(),
          type: 'key',
          key,
        });
        return;
      default:
        return;
    }
  }

  private handleGesture(resolution: GestureResolution): void {
    switch (resolution.kind) {
      case 'scroll':
        this.scroll(resolution.delta);
        return;
      case 'click':
        this.sendClick(resolution.x, resolution.y, resolution.button, resolution.simulated);
        return;
      case 'drag':
        this.copyDrag(resolution.from, resolution.to);
        return;
    }
  }

  private scroll(delta: number): void {
    if (!scrollRendererStore(this.store, delta)) {
      return;
    }
    this.transport.sendViewportUpdate(this.store.getState().scrollOffset);
    this.options.requestPaint();
  }

  private sendClick(x: number, y: number, button: PointerButton, simulated: boolean): void {
    const state = this.store.getState();
    const hit = hitTestScreenPoint(state.frame?.regions ?? [], x, y, state.scrollOffset, state.width);
    let resolvedButton = button;
    let simulatedRightClick = simulated;
    const { edgeZoneCols, edgeZoneActions } = this.options.gesture;
    if (
      button === 'left' &&
      !simulated &&
      isEdgeZoneRightClick(hit, x, state.width, edgeZoneCols, edgeZoneActions)
    ) {
      resolvedButton = 'right';
      simulatedRightClick = true;
    }
    recordPerfEvent('renderer.click', {
      button: resolvedButton,
      simulated: simulatedRightClick,
      action: hit.action,
    });
    this.transport.sendInput({
      ...this.inputBase(),
      type: 'action',
      mouse_x: x,
      mouse_y: y,
      button: resolvedButton,
      action: 'press',
      resolved_action: hit.action,
      resolved_target: hit.target,
      is_simulated_right_click: simulatedRightClick,
    });
  }

  private copyDrag(from: PointerPosition, to: PointerPosition): void {
    const state = this.store.getState();
    if (state.frame === null) {
      return;
    }
    const text = extractDragText(state.frame.lines, from, to, state.scrollOffset);
    if (text.length === 0) {
      return;
    }
    this.track(
      copyTextToClipboards(text, {
        mux: this.options.mux,
        writeTty: this.options.writeTty,
      }).then(() => undefined),
    );
  }

  private handleMenuOpened(): void {
    if (this.options.paneId.length === 0) {
      return;
    }
    const { mux, paneId } = this.options;
    this.enqueueFocusChange(async () => {
      await focusPane(mux, paneId);
    }, 'renderer.menu.focus.error');
  }

  private handleMenuClosed(index: number): void {
    this.transport.sendInput({
      ...this.inputBase(),
      type: 'menu_select',
      mouse_x: index,
    });
    if (this.options.paneId.length === 0) {
      return;
    }
    const { mux } = this.options;
    this.enqueueFocusChange(async () => {
      await restoreLastPane(mux);
    }, 'renderer.menu.restore-focus.error');
  }

  private inputBase(): InputPayload {
    const state = this.store.getState();
    return {
      sequence_num: state.sequenceNum,
      type: 'action',
      mouse_x: 0,
      mouse_y: 0,
      button: '',
      action: '',
      viewport_offset: state.scrollOffset,
      resolved_action: '',
      resolved_target: '',
      pane_id: this.options.paneId,
      is_simulated_right_click: false,
      is_touch_mode: state.frame?.isTouchMode ?? false,
    };
  }

  private surfaceSize(): SurfaceSize {
    const { width, height } = this.store.getState();
    return { width, height };
  }

  private enqueueFocusChange(change: () => Promise<void>, errorEvent: string): void {
    this.focusChain = this.focusChain.then(change).catch((error: unknown) => {
      recordPerfError(errorEvent, error);
    });
    this.track(this.focusChain);
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task.finally(() => {
      this.background.delete(tracked);
    });
    this.background.add(tracked);
  }
}
