import {
  isSelectableMenuItem,
  type MenuItemPayload,
  type MenuPayload,
} from '../daemon/render-protocol.ts';
import { recordPerfEvent } from '../perf/perf-core.ts';
import { measureDisplayWidth, padToWidth, truncateToWidth } from '../text/display-width.ts';
import type { PointerEvent } from './terminal-input.ts';

export const MENU_CANCEL_INDEX = -1;

interface OpenMenu {
  readonly title: string;
  readonly items: readonly MenuItemPayload[];
  readonly anchorY: number;
  highlighted: number;
  dragActive: boolean;
}

export interface SurfaceSize {
  readonly width: number;
  readonly height: number;
}

export interface MenuBounds {
  readonly top: number;
  readonly height: number;
  readonly width: number;
}

export interface ContextMenuCallbacks {
  /** The menu took over input; the surface should own keyboard focus. */
  onOpen(): void;
  /** Called exactly once per opened menu with the chosen index or -1. */
  onClose(index: number): void;
}

const SGR_RESET = '\u001b[0m';
const BORDER_STYLE = '\u001b[38;5;241m';
const NORMAL_STYLE = '\u001b[38;5;253m';
const HIGHLIGHT_STYLE = '\u001b[48;5;26m\u001b[38;5;15m';
const HEADER_STYLE = '\u001b[1m\u001b[38;5;246m';
const MIN_MENU_WIDTH = 6;

function styled(style: string, text: string): string {
  return `${style}${text}${SGR_RESET}`;
}

export class ContextMenuOverlay {
  private menu: OpenMenu | null = null;

  constructor(private readonly callbacks: ContextMenuCallbacks) {}

  isOpen(): boolean {
    return this.menu !== null;
  }

  highlightedIndex(): number {
    return this.menu?.highlighted ?? MENU_CANCEL_INDEX;
  }

  isDragActive(): boolean {
    return this.menu?.dragActive ?? false;
  }

  open(payload: MenuPayload): void {
    if (this.menu !== null) {
      recordPerfEvent('renderer.menu.replaced', {
        title: this.menu.title,
      });
      this.close(MENU_CANCEL_INDEX);
    }
    this.menu = {
      title: payload.title,
      items: payload.items,
      anchorY: payload.y,
      highlighted: MENU_CANCEL_INDEX,
      dragActive: true,
    };
    this.callbacks.onOpen();
  }

  cancel(): void {
    if (this.menu !== null) {
      this.close(MENU_CANCEL_INDEX);
    }
  }

  bounds(surface: SurfaceSize): MenuBounds | null {
    const menu = this.menu;
    if (menu === null) {
      return null;
    }
    const height = menu.items.length + 2;
    let top = menu.anchorY;
    if (top + height > surface.height) {
      top = surface.height - height;
    }
    return {
      top: Math.max(0, top),
      height,
      width: surface.width,
    };
  }

  /** Index of the selectable item drawn on surface row `y`, else -1. */
  itemIndexAt(y: number, surface: SurfaceSize): number {
    const menu = this.menu;
    const bounds = this.bounds(surface);
    if (menu === null || bounds === null) {
      return MENU_CANCEL_INDEX;
    }
    const index = y - bounds.top - 1;
    const item = menu.items[index];
    if (item === undefined || !isSelectableMenuItem(item)) {
      return MENU_CANCEL_INDEX;
    }
    return index;
  }

  handlePointer(event: PointerEvent, surface: SurfaceSize): void {
    const menu = this.menu;
    const bounds = this.bounds(surface);
    if (menu === null || bounds === null) {
      return;
    }

    switch (event.kind) {
      case 'wheel':
        this.close(MENU_CANCEL_INDEX);
        return;
      case 'motion':
        menu.highlighted = this.itemIndexAt(event.y, surface);
        return;
      case 'release': {
        if (!menu.dragActive) {
          return;
        }
        menu.dragActive = false;
        const index = this.itemIndexAt(event.y, surface);
        if (index !== MENU_CANCEL_INDEX) {
          this.close(index);
        }
        return;
      }
      case 'press': {
        if (event.y < bounds.top || event.y >= bounds.top + bounds.height) {
          this.close(MENU_CANCEL_INDEX);
          return;
        }
        if (event.button !== 'left' || menu.dragActive) {
          return;
        }
        const index = this.itemIndexAt(event.y, surface);
        if (index !== MENU_CANCEL_INDEX) {
          this.close(index);
        }
        return;
      }
    }
  }

  handleKey(key: string): void {
    const menu = this.menu;
    if (menu === null) {
      return;
    }

    const shortcutIndex = menu.items.findIndex(
      (item) => isSelectableMenuItem(item) && item.key !== undefined && item.key === key,
    );
    if (shortcutIndex >= 0) {
      this.close(shortcutIndex);
      return;
    }

    switch (key) {
      case 'escape':
      case 'q':
        this.close(MENU_CANCEL_INDEX);
        return;
      case 'up':
      case 'k':
        this.moveHighlight(-1);
        return;
      case 'down':
      case 'j':
        this.moveHighlight(1);
        return;
      case 'enter': {
        const item = menu.items[menu.highlighted];
        this.close(
          item !== undefined && isSelectableMenuItem(item) ? menu.highlighted : MENU_CANCEL_INDEX,
        );
        return;
      }
      default:
        return;
    }
  }

  renderLines(width: number): string[] {
    const menu = this.menu;
    if (menu === null || width < MIN_MENU_WIDTH || menu.items.length === 0) {
      return [];
    }

    const title = truncateToWidth(menu.title, Math.max(0, width - 5));
    const topPad = Math.max(0, width - 3 - measureDisplayWidth(title));
    const lines = [styled(BORDER_STYLE, `┌─${title}${'─'.repeat(topPad)}┐`)];
    const innerWidth = Math.max(1, width - 4);
    const border = styled(BORDER_STYLE, '│');

    menu.items.forEach((item, index) => {
      if (item.separator === true) {
        lines.push(styled(BORDER_STYLE, `├${'─'.repeat(width - 2)}┤`));
        return;
      }
      let inner: string;
      if (item.key !== undefined && item.key.length > 0) {
        const labelMax = Math.max(0, innerWidth - measureDisplayWidth(item.key) - 1);
        const label = truncateToWidth(item.label, labelMax);
        const gap = Math.max(0, labelMax - measureDisplayWidth(label));
        inner = `${label}${' '.repeat(gap)} ${item.key}`;
      } else {
        inner = padToWidth(truncateToWidth(item.label, innerWidth), innerWidth);
      }
      let style = NORMAL_STYLE;
      if (item.header === true) {
        style = HEADER_STYLE;
      } else if (index === menu.highlighted) {
        style = HIGHLIGHT_STYLE;
      }
      lines.push(`${border}${styled(style, ` ${inner} `)}${border}`);
    });

    lines.push(styled(BORDER_STYLE, `└${'─'.repeat(width - 2)}┘`));
    return lines;
  }

  /** Lays the menu box over already-rendered surface rows. */
  overlayRows(rows: readonly string[], surface: SurfaceSize): string[] {
    const bounds = this.bounds(surface);
    const output = [...rows];
    if (bounds === null) {
      return output;
    }
    this.renderLines(surface.width).forEach((line, offset) => {
      const row = bounds.top + offset;
      if (row < output.length) {
        output[row] = line;
      }
    });
    return output;
  }

  private moveHighlight(direction: 1 | -1): void {
    const menu = this.menu;
    if (menu === null || menu.items.length === 0) {
      return;
    }
    let start = menu.highlighted;
    if (start < 0) {
      start = direction > 0 ? -1 : menu.items.length;
    }
    for (let index = start + direction; index >= 0 && index < menu.items.length; index += direction) {
      const item = menu.items[index];
      if (item !== undefined && isSelectableMenuItem(item)) {
        menu.highlighted = index;
        return;
      }
    }
  }

  private close(index: number): void {
    this.menu = null;
    recordPerfEvent('renderer.menu.close', {
      index,
    });
    this.callbacks.onClose(index);
  }
}
