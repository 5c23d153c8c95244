import { createHash, randomUUID } from 'node:crypto';
import { existsSync, renameSync } from 'node:fs';
import { createServer, type Server, type Socket } from 'node:net';
import { DEFAULT_MUXRAIL_CONFIG } from '../config/config-core.ts';
import { recordPerfError, recordPerfEvent, startPerfSpan } from '../perf/perf-core.ts';
import {
  claimPidFile,
  isProcessAlive,
  readPidFile,
  removeFileIfPresent,
  type IsProcessAlive,
} from './pid-file.ts';
import {
  consumeJsonLines,
  encodeRenderMessage,
  minColorProfile,
  normalizeColorProfile,
  parseClientMessage,
  type ClientMessage,
  type ColorProfile,
  type InputPayload,
  type MenuPayload,
  type RenderFrame,
  type RenderPayload,
  type ResizeMessage,
  type ServerMessage,
  type SubscribeMessage,
} from './render-protocol.ts';

const DEFAULT_CLIENT_WIDTH = 80;
const DEFAULT_CLIENT_HEIGHT = 24;

type MaybePromise<T> = T | Promise<T>;

export type RenderProvider = (
  clientId: string,
  width: number,
  height: number,
) => MaybePromise<RenderFrame | null | undefined>;

export interface RenderServerOptions {
  socketPath: string;
  pidPath: string;
  pid?: number;
  isProcessAlive?: IsProcessAlive;
  maxLineBytes?: number;
  writeTimeoutMs?: number;
  maxConnectionBufferedBytes?: number;
  renderProvider?: RenderProvider;
  onConnect?: (clientId: string, paneId: string) => MaybePromise<void>;
  onInput?: (clientId: string, input: InputPayload) => MaybePromise<void>;
  onResize?: (clientId: string, width: number, height: number, paneId: string) => MaybePromise<void>;
  onDisconnect?: (clientId: string) => MaybePromise<void>;
}

interface ConnectionState {
  id: string;
  socket: Socket;
  remainder: string;
  clientId: string | null;
  queuedPayloads: string[];
  queuedPayloadBytes: number;
  writeBlocked: boolean;
  writeDeadline: NodeJS.Timeout | null;
  closed: boolean;
}

interface ClientRecord {
  clientId: string;
  connection: ConnectionState;
  paneId: string;
  width: number;
  height: number;
  viewportOffset: number;
  colorProfile: ColorProfile;
  lastContentHash: string | null;
}

export interface ClientInfo {
  clientId: string;
  paneId: string;
  width: number;
  height: number;
  viewportOffset: number;
  colorProfile: ColorProfile;
}

function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

function countContentLines(content: string): number {
  if (content.length === 0) {
    return 0;
  }
  return content.replace(/\n$/, '').split('\n').length;
}

function positiveOr(value: number, fallback: number): number {
  return value > 0 ? value : fallback;
}

export class RenderServer {
  readonly socketPath: string;
  readonly pidPath: string;
  private readonly pid: number;
  private readonly isAlive: IsProcessAlive;
  private readonly maxLineBytes: number;
  private readonly writeTimeoutMs: number;
  private readonly maxConnectionBufferedBytes: number;
  private readonly renderProvider: RenderProvider | null;
  private readonly options: RenderServerOptions;
  private readonly server: Server;
  private readonly connections = new Map<string, ConnectionState>();
  private readonly clients = new Map<string, ClientRecord>();
  private readonly renderChains = new Map<string, Promise<void>>();
  private nextSequenceNum = 1;
  private listening = false;

  constructor(options: RenderServerOptions) {
    const serverDefaults = DEFAULT_MUXRAIL_CONFIG.server;
    this.options = options;
    this.socketPath = options.socketPath;
    this.pidPath = options.pidPath;
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isProcessAlive ?? isProcessAlive;
    this.maxLineBytes = options.maxLineBytes ?? serverDefaults.maxLineBytes;
    this.writeTimeoutMs = options.writeTimeoutMs ?? serverDefaults.writeTimeoutMs;
    this.maxConnectionBufferedBytes =
      options.maxConnectionBufferedBytes ?? serverDefaults.maxConnectionBufferedBytes;
    this.renderProvider = options.renderProvider ?? null;
    this.server = createServer((socket) => {
      this.handleConnection(socket);
    });
  }

  async start(): Promise<void> {
    if (this.listening) {
      return;
    }

    claimPidFile(this.pidPath, this.pid, this.isAlive);
    // The listener only ever owns its private path; closing it never unlinks the public one.
    const bindPath = `${this.socketPath}.${String(this.pid)}.tmp`;
    try {
      removeFileIfPresent(this.socketPath);
      removeFileIfPresent(bindPath);
      await new Promise<void>((resolve, reject) => {
        const onError = (error: Error): void => {
          this.server.off('listening', onListening);
          reject(error);
        };
        const onListening = (): void => {
          this.server.off('error', onError);
          resolve();
        };

        this.server.once('error', onError);
        this.server.once('listening', onListening);
        this.server.listen(bindPath);
      });
    } catch (error: unknown) {
      removeFileIfPresent(this.pidPath);
      throw error;
    }
    try {
      renameSync(bindPath, this.socketPath);
    } catch (error: unknown) {
      await new Promise<void>((resolve) => {
        this.server.close(() => {
          resolve();
        });
      });
      removeFileIfPresent(bindPath);
      removeFileIfPresent(this.pidPath);
      throw error;
    }
    this.listening = true;
    recordPerfEvent('daemon.server.start', {
      socketPath: this.socketPath,
      pid: this.pid,
    });
  }

  async close(): Promise<void> {
    for (const connection of this.connections.values()) {
      connection.socket.destroy();
    }

    if (this.listening) {
      await new Promise<void>((resolve) => {
        this.server.close(() => {
          resolve();
        });
      });
      this.listening = false;
    }

    if (!existsSync(this.pidPath)) {
      removeFileIfPresent(this.socketPath);
    } else if (readPidFile(this.pidPath) === this.pid) {
      removeFileIfPresent(this.socketPath);
      removeFileIfPresent(this.pidPath);
    }
    recordPerfEvent('daemon.server.close', {
      pid: this.pid,
    });
  }

  sendRenderToClient(clientId: string): Promise<void> {
    const previous = this.renderChains.get(clientId) ?? Promise.resolve();
    const next: Promise<void> = previous.then(async () => {
      await this.renderClientNow(clientId);
      if (this.renderChains.get(clientId) === next) {
        this.renderChains.delete(clientId);
      }
    });
    this.renderChains.set(clientId, next);
    return next;
  }

  async broadcastRender(): Promise<void> {
    const clientIds = this.getClientIds();
    await Promise.all(clientIds.map((clientId) => this.sendRenderToClient(clientId)));
  }

  async renderActiveWindowOnly(activeClientId: string): Promise<void> {
    if (!this.clients.has(activeClientId)) {
      return;
    }
    await this.sendRenderToClient(activeClientId);
  }

  sendMenuToClient(clientId: string, menu: MenuPayload): boolean {
    const record = this.clients.get(clientId);
    if (record === undefined) {
      return false;
    }
    this.writeToConnection(record.connection, {
      type: 'menu',
      client_id: clientId,
      payload: menu,
    });
    return true;
  }

  getMinColorProfile(): ColorProfile {
    return minColorProfile([...this.clients.values()].map((record) => record.colorProfile));
  }

  getClientInfo(clientId: string): ClientInfo | null {
    const record = this.clients.get(clientId);
    if (record === undefined) {
      return null;
    }
    return {
      clientId: record.clientId,
      paneId: record.paneId,
      width: record.width,
      height: record.height,
      viewportOffset: record.viewportOffset,
      colorProfile: record.colorProfile,
    };
  }

  getClientIds(): string[] {
    return [...this.clients.keys()];
  }

  clientCount(): number {
    return this.clients.size;
  }

  private handleConnection(socket: Socket): void {
    const connection: ConnectionState = {
      id: `connection-${randomUUID()}`,
      socket,
      remainder: '',
      clientId: null,
      queuedPayloads: [],
      queuedPayloadBytes: 0,
      writeBlocked: false,
      writeDeadline: null,
      closed: false,
    };
    this.connections.set(connection.id, connection);
    recordPerfEvent('daemon.connection.open', {
      connectionId: connection.id,
    });

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => {
      this.handleSocketData(connection, chunk);
    });

    socket.on('drain', () => {
      connection.writeBlocked = false;
      this.clearWriteDeadline(connection);
      this.flushConnectionWrites(connection);
    });

    socket.on('error', (error: Error) => {
      recordPerfError('daemon.connection.error', error, {
        connectionId: connection.id,
      });
      this.cleanupConnection(connection);
    });

    socket.on('close', () => {
      this.cleanupConnection(connection);
    });
  }

  private handleSocketData(connection: ConnectionState, chunk: string): void {
    const consumed = consumeJsonLines(`${connection.remainder}${chunk}`);
    connection.remainder = consumed.remainder;
    if (consumed.invalidLines > 0) {
      recordPerfEvent('daemon.message.malformed', {
        lines: consumed.invalidLines,
      });
    }

    for (const message of consumed.messages) {
      if (connection.closed) {
        return;
      }
      const parsed = parseClientMessage(message);
      if (parsed === null) {
        recordPerfEvent('daemon.message.invalid', {
          connectionId: connection.id,
        });
        continue;
      }
      this.handleClientMessage(connection, parsed);
    }

    if (Buffer.byteLength(connection.remainder) > this.maxLineBytes) {
      recordPerfEvent('daemon.connection.line-too-long', {
        connectionId: connection.id,
        maxLineBytes: this.maxLineBytes,
      });
      connection.socket.destroy();
    }
  }

  private handleClientMessage(connection: ConnectionState, message: ClientMessage): void {
    if (message.type === 'ping') {
      this.writeToConnection(connection, {
        type: 'pong',
        client_id: message.client_id,
        payload: {},
      });
      return;
    }

    if (message.type === 'subscribe') {
      this.handleSubscribe(connection, message);
      return;
    }

    const record = this.recordForConnection(connection);
    if (record === null) {
      recordPerfEvent('daemon.message.unsubscribed', {
        connectionId: connection.id,
        type: message.type,
      });
      return;
    }

    switch (message.type) {
      case 'unsubscribe':
        this.removeClient(connection);
        connection.socket.end();
        return;
      case 'resize':
        this.handleResize(record, message);
        return;
      case 'viewport_update':
        record.viewportOffset = message.payload.viewport_offset;
        return;
      case 'input': {
        const onInput = this.options.onInput;
        const input = message.payload;
        if (onInput !== undefined) {
          void this.invokeCallback('onInput', record.clientId, () =>
            onInput(record.clientId, input),
          );
        }
        return;
      }
    }
  }

  private handleSubscribe(connection: ConnectionState, message: SubscribeMessage): void {
    const clientId = message.client_id;
    if (clientId.length === 0) {
      recordPerfEvent('daemon.subscribe.missing-client-id', {
        connectionId: connection.id,
      });
      return;
    }
    if (connection.clientId !== null && connection.clientId !== clientId) {
      this.removeClient(connection);
    }

    const previous = this.clients.get(clientId);
    if (previous !== undefined && previous.connection !== connection) {
      previous.connection.clientId = null;
      recordPerfEvent('daemon.subscribe.replaced', {
        clientId,
        connectionId: connection.id,
      });
    }

    const { payload } = message;
    const record: ClientRecord = {
      clientId,
      connection,
      paneId: payload.pane_id,
      width: positiveOr(payload.width, DEFAULT_CLIENT_WIDTH),
      height: positiveOr(payload.height, DEFAULT_CLIENT_HEIGHT),
      viewportOffset: 0,
      colorProfile: normalizeColorProfile(payload.color_profile),
      lastContentHash: null,
    };
    this.clients.set(clientId, record);
    connection.clientId = clientId;
    recordPerfEvent('daemon.subscribe', {
      clientId,
      paneId: record.paneId,
      width: record.width,
      height: record.height,
      colorProfile: record.colorProfile,
    });

    const onConnect = this.options.onConnect;
    void this.invokeCallback('onConnect', clientId, () => onConnect?.(clientId, record.paneId)).then(
      () => this.sendRenderToClient(clientId),
    );
  }

  private handleResize(record: ClientRecord, message: ResizeMessage): void {
    const { payload } = message;
    record.width = positiveOr(payload.width, record.width);
    record.height = positiveOr(payload.height, record.height);
    if (payload.pane_id.length > 0) {
      record.paneId = payload.pane_id;
    }
    const { clientId, width, height, paneId } = record;
    const onResize = this.options.onResize;
    void this.invokeCallback('onResize', clientId, () =>
      onResize?.(clientId, width, height, paneId),
    ).then(() => this.sendRenderToClient(clientId));
  }

  private async renderClientNow(clientId: string): Promise<void> {
    const record = this.clients.get(clientId);
    if (record === undefined || this.renderProvider === null) {
      return;
    }

    const span = startPerfSpan('daemon.render', {
      clientId,
    });
    let frame: RenderFrame | null | undefined;
    try {
      frame = await this.renderProvider(clientId, record.width, record.height);
    } catch (error: unknown) {
      recordPerfError('daemon.callback.renderProvider.error', error, {
        clientId,
      });
      span.end({ outcome: 'error' });
      return;
    }
    if (frame === null || frame === undefined) {
      span.end({ outcome: 'empty' });
      return;
    }

    // The record can be replaced or removed while the provider runs.
    const current = this.clients.get(clientId);
    if (current === undefined) {
      span.end({ outcome: 'gone' });
      return;
    }

    const contentHash = hashContent(frame.content);
    if (current.lastContentHash === contentHash) {
      recordPerfEvent('daemon.render.dedup-skip', {
        clientId,
      });
      span.end({ outcome: 'dedup' });
      return;
    }
    current.lastContentHash = contentHash;

    const payload: RenderPayload = {
      content: frame.content,
      regions: frame.regions === undefined ? [] : [...frame.regions],
      total_lines: frame.total_lines ?? countContentLines(frame.content),
      sequence_num: this.nextSequenceNum,
      is_touch_mode: frame.is_touch_mode ?? false,
      width: frame.width ?? current.width,
      height: frame.height ?? current.height,
      viewport_offset: frame.viewport_offset,
      sidebar_bg: frame.sidebar_bg,
      terminal_bg: frame.terminal_bg,
    };
    this.nextSequenceNum += 1;
    this.writeToConnection(current.connection, {
      type: 'render',
      client_id: clientId,
      payload,
    });
    span.end({
      outcome: 'sent',
      sequenceNum: payload.sequence_num,
    });
  }

  private async invokeCallback(
    name: string,
    clientId: string,
    callback: () => MaybePromise<void> | undefined,
  ): Promise<void> {
    try {
      await callback();
    } catch (error: unknown) {
      recordPerfError(`daemon.callback.${name}.error`, error, {
        clientId,
      });
    }
  }

  private recordForConnection(connection: ConnectionState): ClientRecord | null {
    if (connection.clientId === null) {
      return null;
    }
    const record = this.clients.get(connection.clientId);
    if (record === undefined || record.connection !== connection) {
      return null;
    }
    return record;
  }

  private removeClient(connection: ConnectionState): void {
    const record = this.recordForConnection(connection);
    connection.clientId = null;
    if (record === null) {
      return;
    }
    this.clients.delete(record.clientId);
    recordPerfEvent('daemon.unsubscribe', {
      clientId: record.clientId,
    });
    const onDisconnect = this.options.onDisconnect;
    void this.invokeCallback('onDisconnect', record.clientId, () =>
      onDisconnect?.(record.clientId),
    );
  }

  private cleanupConnection(connection: ConnectionState): void {
    if (connection.closed) {
      return;
    }
    connection.closed = true;
    this.clearWriteDeadline(connection);
    connection.queuedPayloads.length = 0;
    connection.queuedPayloadBytes = 0;
    this.connections.delete(connection.id);
    this.removeClient(connection);
    recordPerfEvent('daemon.connection.close', {
      connectionId: connection.id,
    });
  }

  private writeToConnection(connection: ConnectionState, message: ServerMessage): void {
    if (connection.closed) {
      return;
    }
    const payload = encodeRenderMessage(message);
    connection.queuedPayloads.push(payload);
    connection.queuedPayloadBytes += Buffer.byteLength(payload);

    if (this.connectionBufferedBytes(connection) > this.maxConnectionBufferedBytes) {
      connection.socket.destroy(new Error('connection output buffer exceeded configured maximum'));
      return;
    }

    this.flushConnectionWrites(connection);
  }

  private flushConnectionWrites(connection: ConnectionState): void {
    if (connection.closed || connection.writeBlocked) {
      return;
    }

    let payload = connection.queuedPayloads.shift();
    while (payload !== undefined) {
      connection.queuedPayloadBytes -= Buffer.byteLength(payload);
      if (!connection.socket.write(payload)) {
        connection.writeBlocked = true;
        this.armWriteDeadline(connection);
        break;
      }
      payload = connection.queuedPayloads.shift();
    }

    if (this.connectionBufferedBytes(connection) > this.maxConnectionBufferedBytes) {
      connection.socket.destroy(new Error('connection output buffer exceeded configured maximum'));
    }
  }

  private armWriteDeadline(connection: ConnectionState): void {
    if (connection.writeDeadline !== null) {
      return;
    }
    connection.writeDeadline = setTimeout(() => {
      connection.writeDeadline = null;
      if (connection.writeBlocked && !connection.closed) {
        connection.socket.destroy(new Error('connection write deadline exceeded'));
      }
    }, this.writeTimeoutMs);
    connection.writeDeadline.unref();
  }

  private clearWriteDeadline(connection: ConnectionState): void {
    if (connection.writeDeadline === null) {
      return;
    }
    clearTimeout(connection.writeDeadline);
    connection.writeDeadline = null;
  }

  private connectionBufferedBytes(connection: ConnectionState): number {
    return connection.queuedPayloadBytes + connection.socket.writableLength;
  }
}

export async function startRenderServer(options: RenderServerOptions): Promise<RenderServer> {
  const server = new RenderServer(options);
  await server.start();
  return server;
}
