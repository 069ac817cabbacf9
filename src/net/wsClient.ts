import WebSocket, { type RawData } from 'ws';
import type { InputEvent } from '../input.ts';
import {
  PROTOCOL_VERSION,
  parseServerMessage,
  type AssignMsg,
  type ByeMsg,
  type ErrorMsg,
  type HelloMsg,
  type InputMsg,
  type JoinMode,
  type StatsMsg,
  type WelcomeMsg
} from '../protocol/messages.ts';

/** Callback handlers for the websocket client lifecycle and messages. */
export interface WsClientCallbacks {
  onConnected: (info: WelcomeMsg) => void;
  onDisconnected: () => void;
  onFrame: (bytes: Uint8Array) => void;
  onStats?: (msg: StatsMsg) => void;
  onAssign?: (msg: AssignMsg) => void;
  onError?: (msg: ErrorMsg) => void;
  onBye?: (msg: ByeMsg) => void;
}

/** WebSocket client API used by the terminal front end. */
export interface WsClient {
  connect: (url: string) => void;
  disconnect: () => void;
  sendJoin: (mode: JoinMode, name?: string) => void;
  sendInput: (event: InputEvent) => void;
  isConnected: () => boolean;
}

/** Default server URL used when none is configured. */
export const DEFAULT_SERVER_URL = 'ws://127.0.0.1:5174';
/** Handshake timeout in milliseconds before giving up on the server. */
const HANDSHAKE_TIMEOUT_MS = 1500;

/**
 * Resolve the server URL from argv and env.
 * @param argv - Command line arguments.
 * @param env - Environment variables.
 * @returns WebSocket URL to connect to.
 */
export function resolveServerUrl(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): string {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--url') {
      const next = argv[i + 1];
      if (next) return next;
    } else if (arg?.startsWith('--url=')) {
      return arg.slice('--url='.length);
    }
  }
  return env['SNAKE_SERVER_URL'] || DEFAULT_SERVER_URL;
}

/**
 * Flatten a ws payload into one byte array.
 * @param data - Payload as delivered by ws.
 */
function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return new Uint8Array(Buffer.concat(data));
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Create a WebSocket client wrapper with typed callbacks.
 * @param callbacks - Lifecycle and message callbacks.
 * @returns WebSocket client instance.
 */
export function createWsClient(callbacks: WsClientCallbacks): WsClient {
  let socket: WebSocket | null = null;
  let connected = false;
  let handshakeTimer: ReturnType<typeof setTimeout> | null = null;

  const clearHandshakeTimer = (): void => {
    if (handshakeTimer === null) return;
    clearTimeout(handshakeTimer);
    handshakeTimer = null;
  };

  const connect = (url: string): void => {
    if (socket) disconnect();
    const ws = new WebSocket(url);
    socket = ws;
    ws.on('open', () => {
      connected = false;
      const hello: HelloMsg = { type: 'hello', clientType: 'ui', version: PROTOCOL_VERSION };
      ws.send(JSON.stringify(hello));
      clearHandshakeTimer();
      handshakeTimer = setTimeout(() => {
        if (connected || socket !== ws) return;
        callbacks.onError?.({ type: 'error', message: 'Handshake timed out' });
        ws.close();
      }, HANDSHAKE_TIMEOUT_MS);
    });
    ws.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        callbacks.onFrame(toBytes(data));
        return;
      }
      handleJson(Buffer.from(toBytes(data)).toString('utf8'));
    });
    ws.on('error', (err: Error) => {
      callbacks.onError?.({ type: 'error', message: `WebSocket error: ${err.message}` });
    });
    ws.on('close', () => {
      if (socket !== ws) return;
      clearHandshakeTimer();
      connected = false;
      socket = null;
      callbacks.onDisconnected();
    });
  };

  const disconnect = (): void => {
    if (!socket) return;
    const ws = socket;
    socket = null;
    connected = false;
    clearHandshakeTimer();
    ws.removeAllListeners('message');
    // Errors during close would otherwise be unhandled.
    ws.on('error', () => undefined);
    ws.close();
  };

  const send = (payload: object): void => {
    if (!socket || socket.readyState !== WebSocket.OPEN || !connected) return;
    socket.send(JSON.stringify(payload));
  };

  const sendJoin = (mode: JoinMode, name?: string): void => {
    send(name ? { type: 'join', mode, name } : { type: 'join', mode });
  };

  const sendInput = (event: InputEvent): void => {
    const payload: InputMsg = { type: 'input', event };
    send(payload);
  };

  const isConnected = (): boolean => connected;

  const handleJson = (raw: string): void => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      callbacks.onError?.({ type: 'error', message: 'Invalid JSON message' });
      return;
    }
    const msg = parseServerMessage(parsed);
    if (!msg) return;
    switch (msg.type) {
      case 'welcome':
        connected = true;
        clearHandshakeTimer();
        callbacks.onConnected(msg);
        return;
      case 'stats':
        callbacks.onStats?.(msg);
        return;
      case 'assign':
        callbacks.onAssign?.(msg);
        return;
      case 'error':
        callbacks.onError?.(msg);
        return;
      case 'bye':
        callbacks.onBye?.(msg);
        return;
      case 'pong':
        return;
    }
  };

  return {
    connect,
    disconnect,
    sendJoin,
    sendInput,
    isConnected
  };
}
