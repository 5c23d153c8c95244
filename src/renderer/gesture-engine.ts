import { DEFAULT_MUXRAIL_CONFIG } from '../config/config-core.ts';
import { recordPerfEvent } from '../perf/perf-core.ts';
import type { PointerButton, PointerEvent, PointerPosition } from './terminal-input.ts';

export interface GestureThresholds {
  readonly longPressMs: number;
  readonly doubleTapWindowMs: number;
  readonly doubleTapDistance: number;
  readonly movementTolerance: number;
  readonly dragToleranceCols: number;
  readonly dragToleranceRows: number;
}

export type GestureResolution =
  | {
      readonly kind: 'click';
      readonly x: number;
      readonly y: number;
      readonly button: PointerButton;
      readonly simulated: boolean;
    }
  | {
      readonly kind: 'drag';
      readonly from: PointerPosition;
      readonly to: PointerPosition;
    }
  | {
      readonly kind: 'scroll';
      readonly delta: number;
    };

export type ScheduleFn = (callback: () => void, delayMs: number) => void;

export interface GestureEngineOptions {
  readonly emit: (resolution: GestureResolution) => void;
  readonly thresholds?: Partial<GestureThresholds>;
  readonly nowMs?: () => number;
  readonly schedule?: ScheduleFn;
}

interface PressState {
  readonly x: number;
  readonly y: number;
  readonly atMs: number;
}

function defaultSchedule(callback: () => void, delayMs: number): void {
  setTimeout(callback, delayMs).unref();
}

function exceeds(from: PointerPosition, to: PointerPosition, cols: number, rows: number): boolean {
  return Math.abs(to.x - from.x) > cols || Math.abs(to.y - from.y) > rows;
}

/**
 * Turns raw pointer events into clicks, simulated right-clicks, drags and
 * scrolls. The long-press timer is never cancelled; a stale one is recognised
 * by its generation when it fires.
 */
export class GestureEngine {
  private readonly thresholds: GestureThresholds;
  private readonly nowMs: () => number;
  private readonly schedule: ScheduleFn;
  private readonly emit: (resolution: GestureResolution) => void;
  private press: PressState | null = null;
  private pointer: PointerPosition | null = null;
  private longPressArmed = false;
  private skipNextRelease = false;
  private lastTap: PressState | null = null;
  private generation = 0;

  constructor(options: GestureEngineOptions) {
    this.thresholds = {
      ...DEFAULT_MUXRAIL_CONFIG.gesture,
      ...options.thresholds,
    };
    this.nowMs = options.nowMs ?? Date.now;
    this.schedule = options.schedule ?? defaultSchedule;
    this.emit = options.emit;
  }

  handle(event: PointerEvent): void {
    switch (event.kind) {
      case 'press':
        if (event.button === 'left') {
          this.handleLeftPress(event.x, event.y, event.shift || event.ctrl);
        } else {
          this.handleOtherPress(event.x, event.y, event.button);
        }
        return;
      case 'motion':
        this.handleMotion(event.x, event.y);
        return;
      case 'release':
        this.handleRelease(event.x, event.y);
        return;
      case 'wheel':
        this.emit({ kind: 'scroll', delta: event.delta });
        return;
    }
  }

  reset(): void {
    this.press = null;
    this.pointer = null;
    this.longPressArmed = false;
    this.skipNextRelease = false;
    this.lastTap = null;
    this.generation += 1;
  }

  isLongPressArmed(): boolean {
    return this.longPressArmed;
  }

  private handleLeftPress(x: number, y: number, modifierHeld: boolean): void {
    const now = this.nowMs();
    if (this.isDoubleTap(x, y, now)) {
      this.lastTap = null;
      this.resolveSimulatedRightClick(x, y, 'double-tap');
      return;
    }
    if (modifierHeld) {
      this.resolveSimulatedRightClick(x, y, 'modifier');
      return;
    }

    this.press = { x, y, atMs: now };
    this.pointer = { x, y };
    this.longPressArmed = true;
    this.skipNextRelease = false;
    this.generation += 1;
    const generation = this.generation;
    this.schedule(() => {
      this.fireLongPress(generation);
    }, this.thresholds.longPressMs);
  }

  private handleOtherPress(x: number, y: number, button: PointerButton): void {
    this.press = null;
    this.longPressArmed = false;
    this.skipNextRelease = true;
    this.emit({ kind: 'click', x, y, button, simulated: false });
  }

  private handleMotion(x: number, y: number): void {
    this.pointer = { x, y };
    recordPerfEvent('renderer.pointer.motion');
    if (!this.longPressArmed || this.press === null) {
      return;
    }
    const tolerance = this.thresholds.movementTolerance;
    if (exceeds(this.press, this.pointer, tolerance, tolerance)) {
      this.longPressArmed = false;
    }
  }

  private handleRelease(x: number, y: number): void {
    if (this.skipNextRelease) {
      this.skipNextRelease = false;
      this.press = null;
      this.longPressArmed = false;
      return;
    }
    const press = this.press;
    if (press === null) {
      return;
    }
    const wasArmed = this.longPressArmed;
    this.press = null;
    this.longPressArmed = false;

    const release = { x, y };
    if (exceeds(press, release, this.thresholds.dragToleranceCols, this.thresholds.dragToleranceRows)) {
      this.emit({
        kind: 'drag',
        from: { x: press.x, y: press.y },
        to: release,
      });
      return;
    }

    const now = this.nowMs();
    if (wasArmed && now - press.atMs < this.thresholds.longPressMs) {
      this.lastTap = { x, y, atMs: now };
      this.emit({ kind: 'click', x, y, button: 'left', simulated: false });
    }
  }

  private fireLongPress(generation: number): void {
    const press = this.press;
    if (generation !== this.generation || !this.longPressArmed || press === null) {
      return;
    }
    const tolerance = this.thresholds.movementTolerance;
    if (this.pointer !== null && exceeds(press, this.pointer, tolerance, tolerance)) {
      this.longPressArmed = false;
      return;
    }
    this.press = null;
    this.resolveSimulatedRightClick(press.x, press.y, 'long-press');
  }

  private isDoubleTap(x: number, y: number, now: number): boolean {
    const lastTap = this.lastTap;
    if (lastTap === null) {
      return false;
    }
    const distance = this.thresholds.doubleTapDistance;
    return (
      now - lastTap.atMs < this.thresholds.doubleTapWindowMs &&
      !exceeds(lastTap, { x, y }, distance, distance)
    );
  }

  private resolveSimulatedRightClick(x: number, y: number, trigger: string): void {
    this.press = null;
    this.longPressArmed = false;
    this.skipNextRelease = true;
    recordPerfEvent('renderer.gesture.simulated-right-click', { trigger });
    this.emit({ kind: 'click', x, y, button: 'right', simulated: true });
  }
}
