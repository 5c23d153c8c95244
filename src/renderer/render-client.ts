import { connect, type Socket } from 'node:net';
import { DEFAULT_MUXRAIL_CONFIG } from '../config/config-core.ts';
import {
  consumeJsonLines,
  encodeRenderMessage,
  parseServerMessage,
  type ClientMessage,
  type ColorProfile,
  type InputPayload,
  type ServerMessage,
} from '../daemon/render-protocol.ts';
import { errorMessage, recordPerfError, recordPerfEvent, startPerfSpan } from '../perf/perf-core.ts';
import type { RendererConnectionStatus } from './renderer-store.ts';

interface SurfaceSizeSource {
  (): { width: number; height: number };
}

export interface RenderClientOptions {
  socketPath: string;
  clientId: string;
  paneId: string;
  colorProfile: ColorProfile;
  getSize: SurfaceSizeSource;
  onMessage: (message: ServerMessage) => void;
  onStatus?: (status: RendererConnectionStatus) => void;
  connectAttempts?: number;
  connectRetryDelayMs?: number;
  reconnectDelayMs?: number;
  pingIntervalMs?: number;
  writeTimeoutMs?: number;
}

export function detectColorProfile(env: NodeJS.ProcessEnv = process.env): ColorProfile {
  if ((env.NO_COLOR ?? '').length > 0) {
    return 'Ascii';
  }
  const colorTerm = (env.COLORTERM ?? '').trim().toLowerCase();
  if (colorTerm === 'truecolor' || colorTerm === '24bit') {
    return 'TrueColor';
  }
  const term = (env.TERM ?? '').trim().toLowerCase();
  if (term === 'dumb') {
    return 'Ascii';
  }
  if (term.includes('256color')) {
    return 'ANSI256';
  }
  return 'ANSI';
}

function dialUnixSocket(socketPath: string): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = connect(socketPath);
    const onError = (error: Error): void => {
      socket.off('connect', onConnect);
      reject(error);
    };
    const onConnect = (): void => {
      socket.off('error', onError);
      resolve(socket);
    };
    socket.once('error', onError);
    socket.once('connect', onConnect);
  });
}

export class RenderClient {
  private readonly options: RenderClientOptions;
  private readonly connectAttempts: number;
  private readonly connectRetryDelayMs: number;
  private readonly reconnectDelayMs: number;
  private readonly pingIntervalMs: number;
  private readonly writeTimeoutMs: number;
  private socket: Socket | null = null;
  private remainder = '';
  private status: RendererConnectionStatus = 'disconnected';
  private stopped = true;
  private retryTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private writeDeadline: NodeJS.Timeout | null = null;
  private queuedPayloads: string[] = [];
  private writeBlocked = false;

  constructor(options: RenderClientOptions) {
    const defaults = DEFAULT_MUXRAIL_CONFIG.renderer;
    this.options = options;
    this.connectAttempts = Math.max(1, options.connectAttempts ?? defaults.connectAttempts);
    this.connectRetryDelayMs = options.connectRetryDelayMs ?? defaults.connectRetryDelayMs;
    this.reconnectDelayMs = options.reconnectDelayMs ?? defaults.reconnectDelayMs;
    this.pingIntervalMs = options.pingIntervalMs ?? defaults.pingIntervalMs;
    this.writeTimeoutMs = options.writeTimeoutMs ?? defaults.writeTimeoutMs;
  }

  getStatus(): RendererConnectionStatus {
    return this.status;
  }

  start(): void {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    void this.connectLoop();
  }

  stop(): void {
    this.stopped = true;
    this.clearTimers();
    const socket = this.socket;
    this.socket = null;
    this.queuedPayloads = [];
    this.writeBlocked = false;
    socket?.destroy();
    this.setStatus('disconnected');
  }

  /** Sends `unsubscribe`, flushes and closes. The client does not reconnect afterwards. */
  async unsubscribe(): Promise<void> {
    const socket = this.socket;
    this.send({
      type: 'unsubscribe',
      client_id: this.options.clientId,
      payload: {},
    });
    this.stopped = true;
    this.clearTimers();
    if (socket === null) {
      this.setStatus('disconnected');
      return;
    }
    for (const payload of this.queuedPayloads.splice(0)) {
      socket.write(payload);
    }
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        socket.destroy();
        resolve();
      }, this.writeTimeoutMs);
      socket.end(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }

  send(message: ClientMessage): boolean {
    const socket = this.socket;
    if (socket === null || this.status !== 'connected') {
      return false;
    }
    this.queuedPayloads.push(encodeRenderMessage(message));
    this.flushWrites(socket);
    return true;
  }

  sendResize(width: number, height: number): boolean {
    return this.send({
      type: 'resize',
      client_id: this.options.clientId,
      payload: {
        width,
        height,
        pane_id: this.options.paneId,
      },
    });
  }

  sendViewportUpdate(viewportOffset: number): boolean {
    return this.send({
      type: 'viewport_update',
      client_id: this.options.clientId,
      payload: {
        viewport_offset: viewportOffset,
      },
    });
  }

  sendInput(input: InputPayload): boolean {
    return this.send({
      type: 'input',
      client_id: this.options.clientId,
      payload: input,
    });
  }

  private async connectLoop(): Promise<void> {
    this.setStatus('connecting');
    for (let attempt = 1; attempt <= this.connectAttempts; attempt += 1) {
      if (this.stopped) {
        return;
      }
      const attemptSpan = startPerfSpan('renderer.connect.attempt', {
        attempt,
        clientId: this.options.clientId,
      });
      try {
        const socket = await dialUnixSocket(this.options.socketPath);
        attemptSpan.end({ status: 'connected' });
        if (this.stopped) {
          socket.destroy();
          return;
        }
        this.attach(socket);
        return;
      } catch (error: unknown) {
        attemptSpan.end({ status: 'error', message: errorMessage(error) });
      }
      if (attempt < this.connectAttempts) {
        await this.delay(this.connectRetryDelayMs);
      }
    }

    if (this.stopped) {
      return;
    }
    recordPerfEvent('renderer.connect.exhausted', {
      clientId: this.options.clientId,
      attempts: this.connectAttempts,
    });
    this.setStatus('disconnected');
    this.scheduleReconnect();
  }

  private attach(socket: Socket): void {
    this.socket = socket;
    this.remainder = '';
    this.queuedPayloads = [];
    this.writeBlocked = false;

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => {
      this.handleData(chunk);
    });
    socket.on('drain', () => {
      this.writeBlocked = false;
      this.clearWriteDeadline();
      this.flushWrites(socket);
    });
    socket.on('error', (error: Error) => {
      recordPerfError('renderer.connection.error', error, {
        clientId: this.options.clientId,
      });
    });
    socket.on('close', () => {
      this.handleClose(socket);
    });

    this.setStatus('connected');
    const size = this.options.getSize();
    this.send({
      type: 'subscribe',
      client_id: this.options.clientId,
      payload: {
        width: size.width,
        height: size.height,
        color_profile: this.options.colorProfile,
        pane_id: this.options.paneId,
      },
    });
    this.pingTimer = setInterval(() => {
      this.send({
        type: 'ping',
        client_id: this.options.clientId,
        payload: {},
      });
    }, this.pingIntervalMs);
    this.pingTimer.unref();
  }

  private handleData(chunk: string): void {
    const consumed = consumeJsonLines(`${this.remainder}${chunk}`);
    this.remainder = consumed.remainder;
    if (consumed.invalidLines > 0) {
      recordPerfEvent('renderer.message.malformed', {
        lines: consumed.invalidLines,
      });
    }
    for (const value of consumed.messages) {
      const message = parseServerMessage(value);
      if (message === null) {
        recordPerfEvent('renderer.message.invalid');
        continue;
      }
      if (message.type === 'pong') {
        continue;
      }
      try {
        this.options.onMessage(message);
      } catch (error: unknown) {
        recordPerfError('renderer.message.handler.error', error, {
          type: message.type,
        });
      }
    }
  }

  private handleClose(socket: Socket): void {
    if (this.socket !== socket) {
      return;
    }
    this.socket = null;
    this.queuedPayloads = [];
    this.writeBlocked = false;
    this.clearWriteDeadline();
    if (this.pingTimer !== null) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    if (this.stopped) {
      this.setStatus('disconnected');
      return;
    }
    recordPerfEvent('renderer.connection.lost', {
      clientId: this.options.clientId,
    });
    this.setStatus('disconnected');
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.stopped || this.reconnectTimer !== null) {
      return;
    }
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.connectLoop();
    }, this.reconnectDelayMs);
  }

  private flushWrites(socket: Socket): void {
    if (this.writeBlocked) {
      return;
    }
    let payload = this.queuedPayloads.shift();
    while (payload !== undefined) {
      if (!socket.write(payload)) {
        this.writeBlocked = true;
        this.armWriteDeadline(socket);
        return;
      }
      payload = this.queuedPayloads.shift();
    }
  }

  private armWriteDeadline(socket: Socket): void {
    if (this.writeDeadline !== null) {
      return;
    }
    this.writeDeadline = setTimeout(() => {
      this.writeDeadline = null;
      if (this.writeBlocked && this.socket === socket) {
        recordPerfEvent('renderer.write.deadline-exceeded', {
          clientId: this.options.clientId,
        });
        socket.destroy();
      }
    }, this.writeTimeoutMs);
  }

  private clearWriteDeadline(): void {
    if (this.writeDeadline !== null) {
      clearTimeout(this.writeDeadline);
      this.writeDeadline = null;
    }
  }

  private delay(delayMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
      this.retryTimer = setTimeout(() => {
        this.retryTimer = null;
        resolve();
      }, delayMs);
    });
  }

  private clearTimers(): void {
    for (const timer of [this.retryTimer, this.reconnectTimer, this.writeDeadline]) {
      if (timer !== null) {
        clearTimeout(timer);
      }
    }
    if (this.pingTimer !== null) {
      clearInterval(this.pingTimer);
    }
    this.retryTimer = null;
    this.reconnectTimer = null;
    this.writeDeadline = null;
    this.pingTimer = null;
  }

  private setStatus(status: RendererConnectionStatus): void {
    if (this.status === status) {
      return;
    }
    this.status = status;
    recordPerfEvent('renderer.status', {
      clientId: this.options.clientId,
      status,
    });
    this.options.onStatus?.(status);
  }
}
