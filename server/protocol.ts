import { isInputEvent } from '../src/input.ts';
import {
  PROTOCOL_VERSION,
  isRecord,
  type ClientMessage,
  type HelloMsg,
  type InputMsg,
  type JoinMsg,
  type PingMsg
} from '../src/protocol/messages.ts';

export { PROTOCOL_VERSION };
export { SERIALIZER_VERSION } from '../src/protocol/frame.ts';
export type {
  AssignMsg,
  ByeMsg,
  ByeReason,
  ClientMessage,
  ClientRole,
  ClientType,
  ErrorMsg,
  HelloMsg,
  InputMsg,
  JoinMode,
  JoinMsg,
  PingMsg,
  PongMsg,
  ServerMessage,
  StatsMsg,
  WelcomeMsg
} from '../src/protocol/messages.ts';

const MAX_NAME_LENGTH = 24;

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isHello(msg: unknown): msg is HelloMsg {
  if (!isRecord(msg)) return false;
  return (
    msg['type'] === 'hello' &&
    msg['version'] === PROTOCOL_VERSION &&
    (msg['clientType'] === 'ui' || msg['clientType'] === 'bot')
  );
}

export function isJoin(msg: unknown): msg is JoinMsg {
  if (!isRecord(msg)) return false;
  if (msg['type'] !== 'join') return false;
  if (msg['mode'] !== 'spectator' && msg['mode'] !== 'player') return false;
  if ('name' in msg) {
    if (typeof msg['name'] !== 'string') return false;
    if (msg['name'].length > MAX_NAME_LENGTH) return false;
  }
  return true;
}

export function isInput(msg: unknown): msg is InputMsg {
  if (!isRecord(msg)) return false;
  return msg['type'] === 'input' && isInputEvent(msg['event']);
}

export function isPing(msg: unknown): msg is PingMsg {
  if (!isRecord(msg)) return false;
  if (msg['type'] !== 'ping') return false;
  if ('t' in msg && !isFiniteNumber(msg['t'])) return false;
  return true;
}

export function parseClientMessage(raw: unknown): ClientMessage | null {
  if (!isRecord(raw)) return null;
  if (typeof raw['type'] !== 'string') return null;
  switch (raw['type']) {
    case 'hello':
      return isHello(raw) ? raw : null;
    case 'join':
      return isJoin(raw) ? raw : null;
    case 'input':
      return isInput(raw) ? raw : null;
    case 'ping':
      return isPing(raw) ? raw : null;
    default:
      return null;
  }
}
