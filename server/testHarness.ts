// Helpers shared by the socket-level server tests.  Servers bind to an
// ephemeral loopback port; sandboxes that forbid binding yield null so the
// calling test can return early.

import WebSocket, { type RawData } from 'ws';
import { startServer, type RunningServer, type StartServerOptions } from './index.ts';
import { DEFAULT_CONFIG, type ServerConfig } from './config.ts';
import { FrameSerializer } from '../src/serializer.ts';
import { isRecord } from '../src/protocol/messages.ts';
import type { RenderFrame } from '../src/projection.ts';

function isEperm(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EPERM';
}

/**
 * Start a quiet server on port 0.
 * @param overrides - Config fields to change.
 * @param options - Logger and quit hook.
 * @returns Running server, or null when binding is not permitted.
 */
export async function startTestServer(
  overrides: Partial<ServerConfig> = {},
  options: StartServerOptions = {}
): Promise<RunningServer | null> {
  const starting = startServer(
    { ...DEFAULT_CONFIG, port: 0, logLevel: 'error', seed: 5, ...overrides },
    options
  ).catch((err: unknown) => {
    if (isEperm(err)) return null;
    throw err;
  });

  let cleanup = () => {};
  const guard = new Promise<null>((resolve) => {
    const handler = (err: unknown) => {
      if (isEperm(err)) {
        resolve(null);
        return;
      }
      throw err;
    };
    process.once('uncaughtException', handler);
    cleanup = () => process.off('uncaughtException', handler);
  });

  try {
    return await Promise.race([starting, guard]);
  } finally {
    cleanup();
  }
}

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return new Uint8Array(Buffer.concat(data));
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/** How a socket ended. */
export interface CloseInfo {
  code: number;
  reason: string;
}

/** Scripted websocket client that buffers everything it receives. */
export interface TestClient {
  send: (payload: unknown) => void;
  sendRaw: (data: string | Uint8Array) => void;
  /** Resolve with the next unread JSON message of a type. */
  next: (type: string, timeoutMs?: number) => Promise<Record<string, unknown>>;
  /** Resolve with the first unread frame that matches. */
  nextFrame: (match?: (frame: RenderFrame) => boolean, timeoutMs?: number) => Promise<RenderFrame>;
  closed: Promise<CloseInfo>;
  close: () => void;
}

/**
 * Open a client and wait until the socket is open.
 * @param url - Server websocket URL.
 */
export async function connectClient(url: string): Promise<TestClient> {
  const ws = new WebSocket(url);
  const json: Array<Record<string, unknown>> = [];
  const frames: RenderFrame[] = [];
  const waiters = new Set<() => void>();
  const notify = () => {
    for (const waiter of [...waiters]) waiter();
  };

  ws.on('message', (data: RawData, isBinary: boolean) => {
    if (isBinary) {
      frames.push(FrameSerializer.decode(toBytes(data)));
    } else {
      const parsed: unknown = JSON.parse(Buffer.from(toBytes(data)).toString('utf8'));
      if (isRecord(parsed)) json.push(parsed);
    }
    notify();
  });
  const closed = new Promise<CloseInfo>((resolve) => {
    ws.on('close', (code: number, reason: Buffer) => {
      resolve({ code, reason: reason.toString('utf8') });
      notify();
    });
  });
  await new Promise<void>((resolve, reject) => {
    ws.once('open', () => resolve());
    ws.once('error', reject);
  });

  const waitFor = <T>(find: () => T | undefined, what: string, timeoutMs: number): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const check = () => {
        const found = find();
        if (found === undefined) return;
        cleanup();
        resolve(found);
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new Error(`timed out waiting for ${what}`));
      }, timeoutMs);
      const cleanup = () => {
        clearTimeout(timer);
        waiters.delete(check);
      };
      waiters.add(check);
      check();
    });

  return {
    send: (payload) => ws.send(JSON.stringify(payload)),
    sendRaw: (data) => ws.send(data, { binary: typeof data !== 'string' }),
    next: (type, timeoutMs = 4000) =>
      waitFor(
        () => {
          const index = json.findIndex((msg) => msg['type'] === type);
          return index < 0 ? undefined : json.splice(index, 1)[0];
        },
        `${type} message`,
        timeoutMs
      ),
    nextFrame: (match = () => true, timeoutMs = 4000) =>
      waitFor(
        () => {
          const index = frames.findIndex(match);
          return index < 0 ? undefined : frames.splice(0, index + 1)[index];
        },
        'frame',
        timeoutMs
      ),
    closed,
    close: () => ws.close()
  };
}
