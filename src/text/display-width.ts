const WIDE_CODE_POINT_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f],
  [0x2329, 0x232a],
  [0x2e80, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe10, 0xfe19],
  [0xfe30, 0xfe6f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f300, 0x1faff],
];

const SGR_PATTERN = /\u001b\[[0-9;]*m/g;

function isWideCodePoint(codePoint: number): boolean {
  for (const [start, end] of WIDE_CODE_POINT_RANGES) {
    if (codePoint >= start && codePoint <= end) {
      return true;
    }
  }
  return false;
}

export function glyphDisplayWidth(glyph: string): number {
  const codePoint = glyph.codePointAt(0);
  if (codePoint === undefined || codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0)) {
    return 0;
  }
  if (/\p{Mark}/u.test(glyph)) {
    return 0;
  }
  return isWideCodePoint(codePoint) ? 2 : 1;
}

export function measureDisplayWidth(text: string): number {
  let width = 0;
  for (const glyph of text) {
    width += glyphDisplayWidth(glyph);
  }
  return width;
}

export function stripSgr(text: string): string {
  return text.replace(SGR_PATTERN, '');
}

export function truncateToWidth(text: string, maxWidth: number): string {
  if (measureDisplayWidth(text) <= maxWidth) {
    return text;
  }
  let output = '';
  let width = 0;
  for (const glyph of text) {
    const glyphWidth = glyphDisplayWidth(glyph);
    if (width + glyphWidth > maxWidth) {
      break;
    }
    output += glyph;
    width += glyphWidth;
  }
  return output;
}

export function padToWidth(text: string, width: number): string {
  const missing = width - measureDisplayWidth(text);
  return missing > 0 ? `${text}${' '.repeat(missing)}` : text;
}

/** Glyphs of plain `text` that overlap the column range `[startCol, endCol)`. */
export function sliceByColumns(text: string, startCol: number, endCol: number): string {
  let output = '';
  let col = 0;
  for (const glyph of text) {
    const width = glyphDisplayWidth(glyph);
    if (col + width > startCol && col < endCol) {
      output += glyph;
    }
    col += width;
    if (col >= endCol) {
      break;
    }
  }
  return output;
}
