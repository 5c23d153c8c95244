import { setTimeout as delay } from 'node:timers/promises';
import type { MuxControl } from '../src/mux/mux-control.ts';

/** Records every multiplexer invocation and answers from a fixed table. */
export class RecordingMuxControl implements MuxControl {
  readonly calls: string[][] = [];
  readonly completed: string[] = [];
  readonly failing = new Set<string>();
  /** Response latency in ms, keyed by the space-joined arguments. */
  readonly latencyMs = new Map<string, number>();
  clientTtys: string[] = [];
  paneId = '%1';

  async run(args: readonly string[]): Promise<string> {
    this.calls.push([...args]);
    const joined = args.join(' ');
    const latency = this.latencyMs.get(joined) ?? 0;
    if (latency > 0) {
      await delay(latency);
    }
    this.completed.push(joined);
    const command = args[0] ?? '';
    if (this.failing.has(command)) {
      throw new Error(`${command} failed`);
    }
    if (command === 'list-clients') {
      return `${this.clientTtys.join('\n')}\n`;
    }
    if (command === 'display-message' && args[1] === '-p') {
      return `${this.paneId}\n`;
    }
    return '';
  }
}
