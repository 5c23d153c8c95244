import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

const DEFAULT_MUX_BINARY = 'tmux';
const DISPLAY_MESSAGE_DURATION_MS = 1500;

/** Runs one host multiplexer command and returns its stdout. */
export interface MuxControl {
  run(args: readonly string[]): Promise<string>;
}

export class ExecMuxControl implements MuxControl {
  constructor(private readonly binary: string = DEFAULT_MUX_BINARY) {}

  async run(args: readonly string[]): Promise<string> {
    const { stdout } = await execFileAsync(this.binary, [...args], {
      encoding: 'utf8',
      timeout: 5000,
    });
    return stdout;
  }
}

export async function focusPane(mux: MuxControl, paneId: string): Promise<void> {
  await mux.run(['select-pane', '-t', paneId]);
}

export async function restoreLastPane(mux: MuxControl): Promise<void> {
  await mux.run(['select-pane', '-l']);
}

export async function setPasteBuffer(mux: MuxControl, text: string): Promise<void> {
  await mux.run(['set-buffer', '--', text]);
}

export async function listClientTtys(mux: MuxControl): Promise<string[]> {
  const output = await mux.run(['list-clients', '-F', '#{client_tty}']);
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function displayMessage(
  mux: MuxControl,
  message: string,
  durationMs: number = DISPLAY_MESSAGE_DURATION_MS,
): Promise<void> {
  await mux.run(['display-message', '-d', String(durationMs), message]);
}

export async function currentPaneId(mux: MuxControl): Promise<string | null> {
  const output = (await mux.run(['display-message', '-p', '#{pane_id}'])).trim();
  return output.length > 0 ? output : null;
}
