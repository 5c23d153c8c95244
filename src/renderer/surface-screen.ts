export interface SurfaceWriter {
  writeOutput(output: string): void;
}

export class ProcessSurfaceWriter implements SurfaceWriter {
  writeOutput(output: string): void {
    process.stdout.write(output);
  }
}

interface DiffRenderedRowsResult {
  readonly output: string;
  readonly nextRows: string[];
  readonly changedRows: number[];
}

const TERMINAL_SYNC_UPDATE_BEGIN = '\u001b[?2026h';
const TERMINAL_SYNC_UPDATE_END = '\u001b[?2026l';

export function diffRenderedRows(
  currentRows: readonly string[],
  previousRows: readonly string[],
): DiffRenderedRowsResult {
  const changedRows: number[] = [];
  let output = '';
  const rowCount = Math.max(currentRows.length, previousRows.length);
  const nextRows: string[] = [];
  for (let row = 0; row < rowCount; row += 1) {
    const current = currentRows[row] ?? '';
    const previous = previousRows[row] ?? '';
    nextRows.push(current);
    if (current === previous) {
      continue;
    }
    changedRows.push(row);
    output += `\u001b[${String(row + 1)};1H\u001b[2K${current}`;
  }
  return {
    output,
    nextRows,
    changedRows,
  };
}

export class SurfaceScreen {
  private previousRows: readonly string[] = [];
  private forceFullClear = true;

  constructor(private readonly writer: SurfaceWriter = new ProcessSurfaceWriter()) {}

  resetFrameCache(): void {
    this.previousRows = [];
    this.forceFullClear = true;
  }

  flush(rows: readonly string[]): number {
    const diff = diffRenderedRows(rows, this.forceFullClear ? [] : this.previousRows);
    let output = '';
    if (this.forceFullClear) {
      output += '\u001b[H\u001b[2J';
      this.forceFullClear = false;
    }
    output += diff.output;
    // SGR state must not bleed from the last written row into later writes.
    if (diff.changedRows.length > 0) {
      output += '\u001b[0m';
    }
    if (output.length > 0) {
      this.writer.writeOutput(`${TERMINAL_SYNC_UPDATE_BEGIN}${output}${TERMINAL_SYNC_UPDATE_END}`);
    }
    this.previousRows = diff.nextRows;
    return diff.changedRows.length;
  }
}
