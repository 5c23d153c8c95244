import type { MuxrailConfig } from '../config/config-core.ts';
import { resolveDaemonRuntimePaths } from '../config/runtime-paths.ts';
import { ExecMuxControl, type MuxControl } from '../mux/mux-control.ts';
import { recordPerfEvent, shutdownPerfCore } from '../perf/perf-core.ts';
import { detectColorProfile, RenderClient } from './render-client.ts';
import { RendererRuntime } from './renderer-runtime.ts';
import { createRendererStore, setRendererStatus } from './renderer-store.ts';
import { SurfaceScreen } from './surface-screen.ts';
import { isShowingContent } from './surface-view.ts';
import {
  ENTER_SURFACE_MODES,
  EXIT_SURFACE_MODES,
  parseTerminalInputChunk,
} from './terminal-input.ts';

const LOADING_ANIMATION_INTERVAL_MS = 100;
const DEFAULT_SURFACE_WIDTH = 80;
const DEFAULT_SURFACE_HEIGHT = 24;

export interface RunRendererOptions {
  readonly sessionId: string;
  readonly clientId: string;
  readonly paneId: string;
  readonly terminalBg: string | null;
  readonly config: MuxrailConfig;
  readonly mux?: MuxControl;
  readonly env?: NodeJS.ProcessEnv;
}

function surfaceSize(): { width: number; height: number } {
  return {
    width: process.stdout.columns > 0 ? process.stdout.columns : DEFAULT_SURFACE_WIDTH,
    height: process.stdout.rows > 0 ? process.stdout.rows : DEFAULT_SURFACE_HEIGHT,
  };
}

/** Runs a renderer on the controlling terminal until the user quits or a signal arrives. */
export async function runRenderer(options: RunRendererOptions): Promise<number> {
  const paths = resolveDaemonRuntimePaths(options.sessionId, options.env);
  const initialSize = surfaceSize();
  const store = createRendererStore({
    width: initialSize.width,
    height: initialSize.height,
    terminalBg: options.terminalBg,
  });
  const screen = new SurfaceScreen();
  const mux = options.mux ?? new ExecMuxControl();

  let paintScheduled = false;
  let runtime: RendererRuntime | null = null;
  const paint = (): void => {
    paintScheduled = false;
    if (runtime !== null) {
      screen.flush(runtime.renderRows(Date.now()));
    }
  };
  const requestPaint = (): void => {
    if (paintScheduled) {
      return;
    }
    paintScheduled = true;
    setImmediate(paint);
  };

  const client = new RenderClient({
    socketPath: paths.socketPath,
    clientId: options.clientId,
    paneId: options.paneId,
    colorProfile: detectColorProfile(options.env),
    getSize: () => {
      const { width, height } = store.getState();
      return { width, height };
    },
    onMessage: (message) => {
      runtime?.handleServerMessage(message);
    },
    onStatus: (status) => {
      setRendererStatus(store, status);
      requestPaint();
    },
    connectAttempts: options.config.renderer.connectAttempts,
    connectRetryDelayMs: options.config.renderer.connectRetryDelayMs,
    reconnectDelayMs: options.config.renderer.reconnectDelayMs,
    pingIntervalMs: options.config.renderer.pingIntervalMs,
    writeTimeoutMs: options.config.renderer.writeTimeoutMs,
  });

  return await new Promise<number>((resolveExit) => {
    let inputRemainder = '';
    const loadingTimer = setInterval(() => {
      if (!isShowingContent(store.getState())) {
        requestPaint();
      }
    }, LOADING_ANIMATION_INTERVAL_MS);

    const onData = (chunk: string): void => {
      const parsed = parseTerminalInputChunk(inputRemainder, chunk);
      inputRemainder = parsed.remainder;
      for (const event of parsed.events) {
        runtime?.handleTerminalEvent(event);
      }
    };
    const onResize = (): void => {
      const size = surfaceSize();
      screen.resetFrameCache();
      runtime?.handleResize(size.width, size.height);
    };
    const onSignal = (): void => {
      runtime?.requestQuit();
    };

    const shutdown = (): void => {
      clearInterval(loadingTimer);
      process.stdin.off('data', onData);
      process.stdout.off('resize', onResize);
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      if (process.stdin.isTTY) {
        process.stdin.setRawMode(false);
      }
      process.stdin.pause();
      process.stdout.write(EXIT_SURFACE_MODES);
      recordPerfEvent('renderer.exit', {
        clientId: options.clientId,
      });
      shutdownPerfCore();
      resolveExit(0);
    };

    runtime = new RendererRuntime({
      paneId: options.paneId,
      store,
      transport: client,
      mux,
      gesture: options.config.gesture,
      requestPaint,
      onQuit: shutdown,
    });

    process.stdout.write(ENTER_SURFACE_MODES);
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(true);
    }
    process.stdin.setEncoding('utf8');
    process.stdin.on('data', onData);
    process.stdin.resume();
    process.stdout.on('resize', onResize);
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    recordPerfEvent('renderer.start', {
      clientId: options.clientId,
      paneId: options.paneId,
      socketPath: paths.socketPath,
    });
    client.start();
    requestPaint();
  });
}
