export type PointerButton = 'left' | 'middle' | 'right';

export interface PointerPosition {
  readonly x: number;
  readonly y: number;
}

export type PointerEvent =
  | {
      readonly kind: 'press';
      readonly button: PointerButton;
      readonly x: number;
      readonly y: number;
      readonly shift: boolean;
      readonly ctrl: boolean;
    }
  | {
      readonly kind: 'release';
      readonly x: number;
      readonly y: number;
    }
  | {
      readonly kind: 'motion';
      readonly x: number;
      readonly y: number;
    }
  | {
      readonly kind: 'wheel';
      readonly delta: number;
      readonly x: number;
      readonly y: number;
    };

export interface KeyEvent {
  readonly kind: 'key';
  readonly key: string;
}

export type TerminalInputEvent = PointerEvent | KeyEvent;

interface ParsedTerminalInput {
  readonly events: TerminalInputEvent[];
  readonly remainder: string;
}

const SGR_MOUSE_PREFIX = '\u001b[<';
const NUMERIC_SGR_BODY = /^\d+;\d+;\d+$/;
const PARTIAL_SGR_BODY = /^[0-9;]*$/;

const ENABLE_POINTER_MODES = '\u001b[?1000h\u001b[?1002h\u001b[?1006h';
const DISABLE_POINTER_MODES = '\u001b[?1006l\u001b[?1015l\u001b[?1005l\u001b[?1003l\u001b[?1002l\u001b[?1000l';

export const ENTER_SURFACE_MODES = `\u001b[?1049h\u001b[?25l${ENABLE_POINTER_MODES}`;
export const EXIT_SURFACE_MODES = `${DISABLE_POINTER_MODES}\u001b[?25h\u001b[?1049l`;

const CSI_KEY_NAMES: Readonly<Record<string, string>> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
  H: 'home',
  F: 'end',
  Z: 'shift+tab',
};

const CONTROL_KEY_NAMES: Readonly<Record<string, string>> = {
  '\r': 'enter',
  '\n': 'enter',
  '\t': 'tab',
  '\u0003': 'ctrl+c',
  '\u007f': 'backspace',
};

export function isWheelMouseCode(code: number): boolean {
  return (code & 0b0100_0000) !== 0;
}

export function isMotionMouseCode(code: number): boolean {
  return (code & 0b0010_0000) !== 0;
}

function pointerButtonFromCode(code: number): PointerButton | null {
  switch (code & 0b11) {
    case 0:
      return 'left';
    case 1:
      return 'middle';
    case 2:
      return 'right';
    default:
      return null;
  }
}

function parseSgrMouseEvent(sequence: string): PointerEvent | null {
  const final = sequence.endsWith('m') ? 'm' : 'M';
  const body = sequence.slice(SGR_MOUSE_PREFIX.length, -1);
  if (!NUMERIC_SGR_BODY.test(body)) {
    return null;
  }

  const [code, col, row] = body.split(';').map((part) => Number.parseInt(part, 10));
  if (code === undefined || col === undefined || row === undefined) {
    return null;
  }
  const x = col - 1;
  const y = row - 1;

  if (isWheelMouseCode(code)) {
    return {
      kind: 'wheel',
      delta: (code & 0b1) === 0 ? -1 : 1,
      x,
      y,
    };
  }
  if (isMotionMouseCode(code)) {
    return {
      kind: 'motion',
      x,
      y,
    };
  }
  if (final === 'm') {
    return {
      kind: 'release',
      x,
      y,
    };
  }
  const button = pointerButtonFromCode(code);
  if (button === null) {
    return {
      kind: 'release',
      x,
      y,
    };
  }
  return {
    kind: 'press',
    button,
    x,
    y,
    shift: (code & 0b0000_0100) !== 0,
    ctrl: (code & 0b0001_0000) !== 0,
  };
}

function splitPartialMouseTail(text: string): { text: string; remainder: string } {
  const tailStart = text.lastIndexOf(SGR_MOUSE_PREFIX);
  if (tailStart < 0) {
    return {
      text,
      remainder: '',
    };
  }
  const candidate = text.slice(tailStart + SGR_MOUSE_PREFIX.length);
  if (PARTIAL_SGR_BODY.test(candidate)) {
    return {
      text: text.slice(0, tailStart),
      remainder: text.slice(tailStart),
    };
  }
  return {
    text,
    remainder: '',
  };
}

export function parseKeyText(text: string): KeyEvent[] {
  const glyphs = Array.from(text);
  const keys: KeyEvent[] = [];
  let index = 0;
  while (index < glyphs.length) {
    const glyph = glyphs[index] ?? '';
    if (glyph === '\u001b') {
      const introducer = glyphs[index + 1];
      if (introducer !== '[' && introducer !== 'O') {
        keys.push({ kind: 'key', key: 'escape' });
        index += 1;
        continue;
      }
      let cursor = index + 2;
      while (cursor < glyphs.length && /[0-9;]/.test(glyphs[cursor] ?? '')) {
        cursor += 1;
      }
      const final = glyphs[cursor];
      if (final === undefined) {
        break;
      }
      const name = CSI_KEY_NAMES[final];
      if (name !== undefined) {
        keys.push({ kind: 'key', key: name });
      }
      index = cursor + 1;
      continue;
    }

    const controlName = CONTROL_KEY_NAMES[glyph];
    if (controlName !== undefined) {
      keys.push({ kind: 'key', key: controlName });
    } else if ((glyph.codePointAt(0) ?? 0) >= 0x20) {
      keys.push({ kind: 'key', key: glyph });
    }
    index += 1;
  }
  return keys;
}

/**
 * Splits a stdin chunk into pointer and key events. An unterminated SGR mouse
 * sequence at the end is returned as `remainder` for the next chunk.
 */
export function parseTerminalInputChunk(previousRemainder: string, chunk: string): ParsedTerminalInput {
  const input = `${previousRemainder}${chunk}`;
  const events: TerminalInputEvent[] = [];

  let cursor = 0;
  while (cursor < input.length) {
    const start = input.indexOf(SGR_MOUSE_PREFIX, cursor);
    if (start < 0) {
      break;
    }
    if (start > cursor) {
      events.push(...parseKeyText(input.slice(cursor, start)));
    }

    let end = -1;
    let index = start + SGR_MOUSE_PREFIX.length;
    while (index < input.length) {
      const char = input.charAt(index);
      if (char === 'M' || char === 'm') {
        end = index;
        break;
      }
      if ((char >= '0' && char <= '9') || char === ';') {
        index += 1;
        continue;
      }
      break;
    }

    if (end < 0) {
      cursor = start;
      break;
    }

    const parsed = parseSgrMouseEvent(input.slice(start, end + 1));
    if (parsed !== null) {
      events.push(parsed);
    }
    cursor = end + 1;
  }

  const tail = splitPartialMouseTail(input.slice(cursor));
  events.push(...parseKeyText(tail.text));
  return {
    events,
    remainder: tail.remainder,
  };
}
