import { describe, it, expect } from 'vitest';
import { PlayerControl } from './playerControl.ts';
import type { ServerMessage } from './protocol.ts';

function setup(limits = { maxInputsPerTick: 2, maxInputsPerSecond: 3 }) {
  const sent: Array<[number, ServerMessage]> = [];
  const clock = { now: 0 };
  const control = new PlayerControl(limits, {
    send: (connId, payload) => sent.push([connId, payload]),
    now: () => clock.now
  });
  return { control, sent, clock };
}

describe('PlayerControl', () => {
  it('gives the slot to the first player and spectates the rest', () => {
    const { control, sent } = setup();
    expect(control.join(1, 'player', '  pat ')).toBe('player');
    expect(control.join(2, 'player')).toBe('spectator');
    expect(control.getPlayerConnId()).toBe(1);
    expect(control.getPlayerName()).toBe('pat');
    expect(sent).toEqual([
      [1, { type: 'assign', role: 'player' }],
      [2, { type: 'assign', role: 'spectator' }]
    ]);
  });

  it('frees the slot on release or a spectator join', () => {
    const { control } = setup();
    control.join(1, 'player');
    control.release(2);
    expect(control.getPlayerConnId()).toBe(1);
    control.join(1, 'spectator');
    expect(control.getPlayerConnId()).toBeNull();
    expect(control.join(2, 'player')).toBe('player');
    control.release(2);
    expect(control.getPlayerConnId()).toBeNull();
  });

  it('drops queued input when the player leaves', () => {
    const { control } = setup();
    control.join(1, 'player');
    control.handleInput(1, 'left');
    control.handleInput(1, 'start');
    control.release(2);
    control.release(1);
    expect(control.drain()).toEqual([]);
    control.join(2, 'player');
    control.handleInput(2, 'up');
    control.join(2, 'spectator');
    expect(control.drain()).toEqual([]);
  });

  it('only queues input from the player', () => {
    const { control } = setup();
    control.join(1, 'player');
    expect(control.handleInput(2, 'up')).toBe('not-player');
    expect(control.handleInput(1, 'up')).toBeNull();
    expect(control.drain()).toEqual(['up']);
    expect(control.drain()).toEqual([]);
  });

  it('enforces the per-tick limit and resets it on drain', () => {
    const { control, clock } = setup({ maxInputsPerTick: 2, maxInputsPerSecond: 100 });
    control.join(1, 'player');
    expect(control.handleInput(1, 'up')).toBeNull();
    expect(control.handleInput(1, 'left')).toBeNull();
    expect(control.handleInput(1, 'down')).toBe('rate-limited');
    expect(control.drain()).toEqual(['up', 'left']);
    clock.now = 16;
    expect(control.handleInput(1, 'right')).toBeNull();
    expect(control.getDroppedInputs()).toBe(1);
  });

  it('enforces the per-second window', () => {
    const { control, clock } = setup({ maxInputsPerTick: 10, maxInputsPerSecond: 3 });
    control.join(1, 'player');
    for (const event of ['up', 'left', 'down'] as const) {
      expect(control.handleInput(1, event)).toBeNull();
    }
    clock.now = 999;
    expect(control.handleInput(1, 'right')).toBe('rate-limited');
    clock.now = 1000;
    expect(control.handleInput(1, 'right')).toBeNull();
    expect(control.drain()).toEqual(['up', 'left', 'down', 'right']);
    expect(control.getDroppedInputs()).toBe(1);
  });

  it('never rate limits quit', () => {
    const { control } = setup({ maxInputsPerTick: 1, maxInputsPerSecond: 1 });
    control.join(1, 'player');
    control.handleInput(1, 'up');
    expect(control.handleInput(1, 'left')).toBe('rate-limited');
    expect(control.handleInput(1, 'quit')).toBeNull();
    expect(control.drain()).toEqual(['up', 'quit']);
  });
});
