export function maxScrollOffset(totalLines: number, visibleHeight: number): number {
  return Math.max(0, totalLines - Math.max(0, visibleHeight));
}

export function clampScrollOffset(offset: number, totalLines: number, visibleHeight: number): number {
  const max = maxScrollOffset(totalLines, visibleHeight);
  if (!Number.isFinite(offset) || offset < 0) {
    return 0;
  }
  return Math.min(Math.floor(offset), max);
}

export function scrollBy(
  offset: number,
  delta: number,
  totalLines: number,
  visibleHeight: number,
): number {
  return clampScrollOffset(offset + delta, totalLines, visibleHeight);
}

/** Maps a surface row to its content line. */
export function contentRowForScreenRow(screenRow: number, scrollOffset: number): number {
  return screenRow + scrollOffset;
}

export function visibleContentLines(
  lines: readonly string[],
  scrollOffset: number,
  visibleHeight: number,
): string[] {
  return lines.slice(scrollOffset, scrollOffset + Math.max(0, visibleHeight));
}
