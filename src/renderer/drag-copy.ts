import { constants } from 'node:fs';
import { open } from 'node:fs/promises';
import { recordPerfError, recordPerfEvent } from '../perf/perf-core.ts';
import {
  displayMessage,
  listClientTtys,
  setPasteBuffer,
  type MuxControl,
} from '../mux/mux-control.ts';
import { measureDisplayWidth, sliceByColumns, stripSgr } from '../text/display-width.ts';
import type { PointerPosition } from './terminal-input.ts';
import { contentRowForScreenRow } from './viewport.ts';

export type WriteTty = (ttyPath: string, data: string) => Promise<void>;

export interface DragCopyDependencies {
  readonly mux: MuxControl;
  readonly writeTty?: WriteTty;
}

async function writeToTty(ttyPath: string, data: string): Promise<void> {
  const handle = await open(ttyPath, constants.O_WRONLY);
  try {
    await handle.write(data);
  } finally {
    await handle.close();
  }
}

export function encodeOsc52(text: string): string {
  return `\u001b]52;c;${Buffer.from(text, 'utf8').toString('base64')}\u0007`;
}

export function countCopiedLines(text: string): number {
  return text.split('\n').length;
}

/**
 * Plain text between two surface positions, in reading order regardless of
 * drag direction. Columns are inclusive on both ends.
 */
export function extractDragText(
  lines: readonly string[],
  from: PointerPosition,
  to: PointerPosition,
  scrollOffset: number,
): string {
  let startRow = contentRowForScreenRow(from.y, scrollOffset);
  let endRow = contentRowForScreenRow(to.y, scrollOffset);
  let startX = from.x;
  let endX = to.x;
  if (startRow > endRow || (startRow === endRow && startX > endX)) {
    [startRow, endRow] = [endRow, startRow];
    [startX, endX] = [endX, startX];
  }

  startRow = Math.max(0, startRow);
  endRow = Math.min(lines.length - 1, endRow);
  if (startRow > endRow) {
    return '';
  }

  const selected: string[] = [];
  for (let row = startRow; row <= endRow; row += 1) {
    const plain = stripSgr(lines[row] ?? '').replace(/ +$/, '');
    if (startRow === endRow) {
      selected.push(sliceByColumns(plain, startX, endX + 1));
    } else if (row === startRow) {
      selected.push(sliceByColumns(plain, startX, measureDisplayWidth(plain)));
    } else if (row === endRow) {
      selected.push(sliceByColumns(plain, 0, endX + 1));
    } else {
      selected.push(plain);
    }
  }
  return selected.join('\n').trim();
}

/**
 * Hands copied text to the multiplexer paste buffer and to every attached
 * terminal through OSC 52. Each destination is best-effort.
 */
export async function copyTextToClipboards(
  text: string,
  dependencies: DragCopyDependencies,
): Promise<boolean> {
  if (text.length === 0) {
    return false;
  }
  const { mux } = dependencies;
  const writeTty = dependencies.writeTty ?? writeToTty;

  try {
    await setPasteBuffer(mux, text);
  } catch (error: unknown) {
    recordPerfError('renderer.copy.paste-buffer.error', error);
  }

  let ttyPaths: string[] = [];
  try {
    ttyPaths = await listClientTtys(mux);
  } catch (error: unknown) {
    recordPerfError('renderer.copy.list-clients.error', error);
  }
  const sequence = encodeOsc52(text);
  for (const ttyPath of ttyPaths) {
    try {
      await writeTty(ttyPath, sequence);
    } catch (error: unknown) {
      recordPerfError('renderer.copy.osc52.error', error, { ttyPath });
    }
  }

  const lineCount = countCopiedLines(text);
  try {
    await displayMessage(mux, `Copied ${String(lineCount)} lines`);
  } catch (error: unknown) {
    recordPerfError('renderer.copy.display-message.error', error);
  }
  recordPerfEvent('renderer.copy', {
    chars: text.length,
    lines: lineCount,
    ttys: ttyPaths.length,
  });
  return true;
}
