import type { InputEvent } from '../input.ts';
import type { Phase } from '../session.ts';

/** JSON protocol version sent in hello. */
export const PROTOCOL_VERSION = 1;

/** Kind of client announced in hello. */
export type ClientType = 'ui' | 'bot';

/** Join mode requested by a client. */
export type JoinMode = 'player' | 'spectator';

/** Role granted by the server after join. */
export type ClientRole = 'player' | 'spectator';

/** Reason attached to a bye message. */
export type ByeReason = 'quit' | 'shutdown';

/** Handshake message sent by a client right after connecting. */
export interface HelloMsg {
  type: 'hello';
  clientType: ClientType;
  version: number;
}

/** Join request: play the session or just watch it. */
export interface JoinMsg {
  type: 'join';
  mode: JoinMode;
  name?: string;
}

/** Single input event from the player. */
export interface InputMsg {
  type: 'input';
  event: InputEvent;
}

/** Keepalive; echoed back as pong. */
export interface PingMsg {
  type: 'ping';
  t?: number;
}

/** Messages accepted from clients. */
export type ClientMessage = HelloMsg | JoinMsg | InputMsg | PingMsg;

/** Welcome message payload from the server. */
export interface WelcomeMsg {
  type: 'welcome';
  sessionId: string;
  tickRate: number;
  frameRate: number;
  grid: { width: number; height: number };
  tileSize: number;
  /** Pixel size of a graphical view: the board plus the score bar. */
  screen: { width: number; height: number };
  serializerVersion: number;
  /** Seed of the session RNG. */
  seed: number;
}

/** Role assignment after join. */
export interface AssignMsg {
  type: 'assign';
  role: ClientRole;
}

/** Once-per-second session summary. */
export interface StatsMsg {
  type: 'stats';
  tick: number;
  phase: Phase;
  score: number;
  clients: number;
  droppedInputs: number;
}

/** Error message payload from the server. */
export interface ErrorMsg {
  type: 'error';
  message: string;
}

/** Sent before the server closes every socket. */
export interface ByeMsg {
  type: 'bye';
  reason: ByeReason;
}

/** Reply to a ping. */
export interface PongMsg {
  type: 'pong';
  t: number | null;
}

/** Messages sent by the server as JSON text. */
export type ServerMessage = WelcomeMsg | AssignMsg | StatsMsg | ErrorMsg | ByeMsg | PongMsg;

/**
 * Check whether a value is a non-null object record.
 * @param value - Value to inspect.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Narrow parsed JSON to a server message by its type tag and required fields.
 * @param value - Parsed JSON value.
 * @returns The message, or null when it is not one the client understands.
 */
export function parseServerMessage(value: unknown): ServerMessage | null {
  if (!isRecord(value)) return null;
  switch (value['type']) {
    case 'welcome': {
      const grid = value['grid'];
      const screen = value['screen'];
      if (typeof value['sessionId'] !== 'string' || !isRecord(grid) || !isRecord(screen)) return null;
      return {
        type: 'welcome',
        sessionId: value['sessionId'],
        tickRate: Number(value['tickRate']),
        frameRate: Number(value['frameRate']),
        grid: { width: Number(grid['width']), height: Number(grid['height']) },
        tileSize: Number(value['tileSize']),
        screen: { width: Number(screen['width']), height: Number(screen['height']) },
        serializerVersion: Number(value['serializerVersion']),
        seed: Number(value['seed'] ?? 0)
      };
    }
    case 'assign': {
      const role = value['role'];
      return role === 'player' || role === 'spectator' ? { type: 'assign', role } : null;
    }
    case 'stats': {
      const phase = value['phase'];
      if (
        phase !== 'main-menu' &&
        phase !== 'countdown' &&
        phase !== 'playing' &&
        phase !== 'dying' &&
        phase !== 'game-over'
      ) {
        return null;
      }
      return {
        type: 'stats',
        tick: Number(value['tick']),
        phase,
        score: Number(value['score']),
        clients: Number(value['clients']),
        droppedInputs: Number(value['droppedInputs'] ?? 0)
      };
    }
    case 'error':
      return { type: 'error', message: String(value['message'] ?? 'unknown error') };
    case 'bye': {
      const reason = value['reason'];
      return reason === 'quit' || reason === 'shutdown' ? { type: 'bye', reason } : null;
    }
    case 'pong': {
      const t = value['t'];
      return { type: 'pong', t: typeof t === 'number' ? t : null };
    }
    default:
      return null;
  }
}
