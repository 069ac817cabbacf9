import type { Server } from 'node:http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { parseClientMessage } from './protocol.ts';
import type {
  ByeMsg,
  ClientType,
  InputMsg,
  JoinMode,
  JoinMsg,
  ServerMessage,
  StatsMsg,
  WelcomeMsg
} from './protocol.ts';

const DEFAULT_MAX_MESSAGE_BYTES = 16 * 1024;
const DEFAULT_MAX_BUFFERED_BYTES = 512 * 1024;

export interface ConnectionState {
  id: number;
  socket: WebSocket;
  clientType: 'unknown' | ClientType;
  joined: boolean;
  mode?: JoinMode;
}

export interface WsHubOptions {
  maxMessageBytes?: number;
  maxBufferedAmount?: number;
}

export interface WsHubHandlers {
  onJoin?: (connId: number, msg: JoinMsg, clientType: ClientType) => void;
  onInput?: (connId: number, msg: InputMsg) => void;
  onDisconnect?: (connId: number) => void;
  /** Called for every protocol violation before the socket is closed. */
  onProtocolError?: (connId: number, reason: string) => void;
}

/** WebSocket fan-out: handshake, join, input routing and broadcasts. */
export class WsHub {
  private wss: WebSocketServer;
  private connections = new Map<number, ConnectionState>();
  private nextId = 1;
  private welcomeJson: string;
  private maxMessageBytes: number;
  private maxBufferedAmount: number;
  private handlers: WsHubHandlers | null;

  constructor(
    httpServer: Server,
    welcome: WelcomeMsg,
    options: WsHubOptions = {},
    handlers?: WsHubHandlers
  ) {
    this.maxMessageBytes = options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;
    this.maxBufferedAmount = options.maxBufferedAmount ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.wss = new WebSocketServer({
      server: httpServer,
      maxPayload: this.maxMessageBytes
    });
    this.welcomeJson = JSON.stringify(welcome);
    this.handlers = handlers ?? null;
    this.wss.on('connection', (socket) => this.handleConnection(socket));
  }

  setHandlers(handlers: WsHubHandlers): void {
    this.handlers = handlers;
  }

  getClientCount(): number {
    return this.connections.size;
  }

  /** True when at least one joined socket would receive a frame. */
  hasFrameRecipients(): boolean {
    for (const state of this.connections.values()) {
      if (state.joined && state.socket.readyState === WebSocket.OPEN) return true;
    }
    return false;
  }

  closeAll(): void {
    for (const state of this.connections.values()) {
      state.socket.close();
    }
    this.connections.clear();
    this.wss.close();
  }

  broadcastFrame(buffer: Uint8Array): void {
    for (const state of this.connections.values()) {
      if (!state.joined) continue;
      if (state.socket.readyState !== WebSocket.OPEN) continue;
      if (state.socket.bufferedAmount > this.maxBufferedAmount) continue;
      state.socket.send(buffer, { binary: true });
    }
  }

  broadcastStats(stats: StatsMsg): void {
    this.broadcastJson(stats, (state) => state.joined);
  }

  /**
   * Say goodbye to every handshaken client, then close their sockets.
   * @param reason - Why the server is going away.
   */
  sayGoodbye(reason: ByeMsg['reason']): void {
    const bye: ByeMsg = { type: 'bye', reason };
    this.broadcastJson(bye, (state) => state.clientType !== 'unknown');
    for (const state of this.connections.values()) {
      state.socket.close(1000, reason);
    }
  }

  sendJsonTo(connId: number, payload: ServerMessage): void {
    const state = this.connections.get(connId);
    if (!state || state.clientType === 'unknown') return;
    if (state.socket.readyState !== WebSocket.OPEN) return;
    if (state.socket.bufferedAmount > this.maxBufferedAmount) return;
    state.socket.send(JSON.stringify(payload));
  }

  private broadcastJson(payload: ServerMessage, include: (state: ConnectionState) => boolean): void {
    const text = JSON.stringify(payload);
    for (const state of this.connections.values()) {
      if (!include(state)) continue;
      if (state.socket.readyState !== WebSocket.OPEN) continue;
      if (state.socket.bufferedAmount > this.maxBufferedAmount) continue;
      state.socket.send(text);
    }
  }

  private handleConnection(socket: WebSocket): void {
    const state: ConnectionState = {
      id: this.nextId++,
      socket,
      clientType: 'unknown',
      joined: false
    };
    this.connections.set(state.id, state);
    socket.on('message', (data, isBinary) => this.handleMessage(state, data, isBinary));
    // ws closes the socket itself after reporting oversized or broken frames.
    socket.on('error', (err: Error) => this.handlers?.onProtocolError?.(state.id, err.message));
    socket.on('close', () => {
      this.connections.delete(state.id);
      this.handlers?.onDisconnect?.(state.id);
    });
  }

  private handleMessage(state: ConnectionState, data: RawData, isBinary: boolean): void {
    const size = payloadSize(data);
    if (size > this.maxMessageBytes) {
      this.protocolError(state, 'message too large');
      return;
    }
    if (isBinary) {
      this.protocolError(state, 'binary messages are not supported');
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(payloadToText(data));
    } catch {
      this.protocolError(state, 'invalid JSON');
      return;
    }
    const msg = parseClientMessage(parsed);
    if (!msg) {
      this.protocolError(state, 'invalid message');
      return;
    }
    switch (msg.type) {
      case 'hello':
        if (state.clientType !== 'unknown') {
          this.protocolError(state, 'duplicate hello');
          return;
        }
        state.clientType = msg.clientType;
        state.socket.send(this.welcomeJson);
        return;
      case 'join':
        if (state.clientType === 'unknown') {
          this.protocolError(state, 'hello required before join');
          return;
        }
        state.joined = true;
        state.mode = msg.mode;
        this.handlers?.onJoin?.(state.id, msg, state.clientType);
        return;
      case 'input':
        if (!state.joined) {
          this.protocolError(state, 'join required before input');
          return;
        }
        if (state.mode !== 'player') {
          this.protocolError(state, 'input requires player mode');
          return;
        }
        this.handlers?.onInput?.(state.id, msg);
        return;
      case 'ping':
        if (state.clientType === 'unknown') return;
        this.sendJsonTo(state.id, { type: 'pong', t: msg.t ?? null });
        return;
    }
  }

  private protocolError(state: ConnectionState, message: string): void {
    this.handlers?.onProtocolError?.(state.id, message);
    if (state.socket.readyState === WebSocket.OPEN) {
      state.socket.send(JSON.stringify({ type: 'error', message }));
    }
    state.socket.close(1008, message);
  }
}

function payloadSize(data: RawData): number {
  if (Array.isArray(data)) return data.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  return data.byteLength;
}

function payloadToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}
