import { randomUUID } from 'node:crypto';
import { isAbsolute, resolve } from 'node:path';
import { Command, Flags } from '@oclif/core';
import { loadMuxrailConfig, type MuxrailConfig } from '../src/config/config-core.ts';
import {
  DEFAULT_SESSION_ID,
  resolveDaemonRuntimePaths,
  resolveRuntimeDirectory,
} from '../src/config/runtime-paths.ts';
import { isProcessAlive, readPidFile } from '../src/daemon/pid-file.ts';
import { currentPaneId, ExecMuxControl } from '../src/mux/mux-control.ts';
import { configurePerfCore, errorMessage } from '../src/perf/perf-core.ts';
import { runRenderer } from '../src/renderer/renderer-process.ts';

const sessionFlag = Flags.string({
  description: 'Session namespace selecting the daemon socket and pid file.',
  default: DEFAULT_SESSION_ID,
});

function parseEnvBoolean(value: string | undefined): boolean | null {
  const normalized = (value ?? '').trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no') {
    return false;
  }
  return null;
}

export function resolvePerfSettings(
  config: MuxrailConfig,
  env: NodeJS.ProcessEnv = process.env,
): { enabled: boolean; filePath: string } {
  const configured = config.debug.perf;
  const filePath = isAbsolute(configured.filePath)
    ? configured.filePath
    : resolve(resolveRuntimeDirectory(env), configured.filePath);
  return {
    enabled: parseEnvBoolean(env.MUXRAIL_PERF_ENABLED) ?? configured.enabled,
    filePath,
  };
}

export function normalizeTerminalBg(value: string | undefined): string | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  if (!/^#?[0-9a-fA-F]{6}$/.test(trimmed)) {
    throw new Error(`invalid --terminal-bg value: ${value}`);
  }
  return trimmed.startsWith('#') ? trimmed : `#${trimmed}`;
}

abstract class MuxrailCommandBase extends Command {
  protected loadConfig(): MuxrailConfig {
    const loaded = loadMuxrailConfig();
    if (loaded.error !== null) {
      process.stderr.write(`[config] ${loaded.filePath}: ${loaded.error}\n`);
    }
    configurePerfCore(resolvePerfSettings(loaded.config));
    return loaded.config;
  }

  protected exitIfNeeded(code: number): void {
    if (code !== 0) {
      this.exit(code);
    }
  }
}

class RendererCommand extends MuxrailCommandBase {
  static override summary = 'Run a sidebar renderer on the current terminal.';

  static override usage = [
    'renderer [--session <id>] [--client-id <id>] [--pane <paneId>] [--terminal-bg <hex>]',
  ];

  static override flags = {
    help: Flags.help({ char: 'h' }),
    session: sessionFlag,
    'client-id': Flags.string({
      description: 'Client id sent in every envelope; a random one when omitted.',
    }),
    pane: Flags.string({
      description: 'Pane hosting this renderer; defaults to $TMUX_PANE or the active pane.',
    }),
    'terminal-bg': Flags.string({
      description: 'Terminal background colour (#rrggbb) used for the loading screen.',
    }),
  };

  override async run(): Promise<void> {
    const { flags } = await this.parse(RendererCommand);
    const config = this.loadConfig();
    const mux = new ExecMuxControl();
    let paneId = flags.pane ?? process.env.TMUX_PANE ?? '';
    if (paneId.length === 0) {
      try {
        paneId = (await currentPaneId(mux)) ?? '';
      } catch (error: unknown) {
        process.stderr.write(`[renderer] cannot resolve pane id: ${errorMessage(error)}\n`);
      }
    }
    const code = await runRenderer({
      sessionId: flags.session,
      clientId: flags['client-id'] ?? `renderer-${randomUUID()}`,
      paneId,
      terminalBg: normalizeTerminalBg(flags['terminal-bg']),
      config,
      mux,
    });
    this.exitIfNeeded(code);
  }
}

class DaemonStatusCommand extends MuxrailCommandBase {
  static override summary = 'Print the daemon socket and pid paths for a session.';

  static override usage = ['daemon-status [--session <id>]'];

  static override flags = {
    help: Flags.help({ char: 'h' }),
    session: sessionFlag,
  };

  override async run(): Promise<void> {
    const { flags } = await this.parse(DaemonStatusCommand);
    const paths = resolveDaemonRuntimePaths(flags.session);
    const pid = readPidFile(paths.pidPath);
    const running = pid !== null && isProcessAlive(pid);
    this.log(`session: ${paths.sessionId}`);
    this.log(`socket: ${paths.socketPath}`);
    this.log(`pid file: ${paths.pidPath}`);
    this.log(`status: ${running ? `running (pid ${String(pid)})` : 'stopped'}`);
    this.exitIfNeeded(running ? 0 : 1);
  }
}

const commands = {
  renderer: RendererCommand,
  'daemon-status': DaemonStatusCommand,
} satisfies Record<string, Command.Class>;

export default commands;
