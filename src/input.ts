// input.ts
// Discrete input events accepted by the session, plus helpers that turn raw
// key data from a host into those events.

import { isDirection, type Direction } from './grid.ts';

/** Events the session understands. */
export type InputEvent = Direction | 'start' | 'menu' | 'quit';

/** Keys a host may report. */
export type KeyName = 'up' | 'down' | 'left' | 'right' | 'space' | 'escape' | 'q';

const KEY_EVENTS: Readonly<Record<KeyName, InputEvent>> = {
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
  space: 'start',
  escape: 'menu',
  q: 'quit'
};

/**
 * Type guard for events arriving from the wire.
 * @param value - Value to inspect.
 */
export function isInputEvent(value: unknown): value is InputEvent {
  return isDirection(value) || value === 'start' || value === 'menu' || value === 'quit';
}

/**
 * Map a single key press to its event.
 * @param key - Key name.
 */
export function keyToEvent(key: KeyName): InputEvent {
  return KEY_EVENTS[key];
}

/**
 * Map a terminal keypress (as emitted by `readline.emitKeypressEvents`) to a
 * key name.
 * @param name - Keypress name, e.g. "up" or "q".
 * @param sequence - Raw sequence, used for the space bar.
 * @returns Key name or null for unmapped keys.
 */
export function keyFromKeypress(name: string | undefined, sequence?: string): KeyName | null {
  if (sequence === ' ') return 'space';
  switch (name) {
    case 'up':
    case 'down':
    case 'left':
    case 'right':
    case 'space':
    case 'escape':
    case 'q':
      return name;
    default:
      return null;
  }
}

/**
 * Convert a polled set of held keys into this tick's events.  Quit wins over
 * everything, at most one direction is reported (up, down, left, right in
 * that order), then start, then menu.
 * @param held - Keys held during the poll.
 */
export function eventsFromKeyState(held: ReadonlySet<KeyName>): InputEvent[] {
  if (held.has('q')) return ['quit'];
  const events: InputEvent[] = [];
  const dir = (['up', 'down', 'left', 'right'] as const).find((key) => held.has(key));
  if (dir) events.push(dir);
  if (held.has('space')) events.push('start');
  if (held.has('escape')) events.push('menu');
  return events;
}

/**
 * Keys pressed since the last poll.  Terminals report presses, not held
 * state, so a tick treats every key pressed since the previous tick as held.
 */
export class KeyPoll {
  private held = new Set<KeyName>();

  press(key: KeyName): void {
    this.held.add(key);
  }

  /** This tick's events; clears the pressed set. */
  poll(): InputEvent[] {
    const events = eventsFromKeyState(this.held);
    this.held.clear();
    return events;
  }
}
