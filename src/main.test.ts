import { describe, it, expect } from 'vitest';
import { drawFrame, parseClientArgs } from './main.ts';
import { DEFAULT_SERVER_URL } from './net/wsClient.ts';
import type { RenderFrame } from './projection.ts';

const PLAYING: RenderFrame = {
  phase: 'playing',
  score: 1,
  countdown: -1,
  segments: [{ x: 2, y: 0, tile: 'head', rotation: 90, skeleton: false, tongueOut: false }],
  title: [],
  food: { x: 0, y: 1 },
  dimmed: false
};

describe('main', () => {
  it('parses client flags', () => {
    expect(parseClientArgs([], {})).toEqual({
      url: DEFAULT_SERVER_URL,
      local: false,
      spectate: false
    });
    expect(
      parseClientArgs(['--url', 'ws://box:9000', '--spectate', '--name', 'pat'], {})
    ).toEqual({ url: 'ws://box:9000', local: false, spectate: true, name: 'pat' });
    expect(parseClientArgs(['--local'], { SNAKE_SERVER_URL: 'ws://env:1' })).toEqual({
      url: 'ws://env:1',
      local: true,
      spectate: false
    });
  });

  it('ignores a --name flag with no value', () => {
    expect(parseClientArgs(['--name'], {}).name).toBeUndefined();
  });

  it('draws a cleared screen with the board and status line', () => {
    const text = drawFrame(PLAYING, 'session abcd');
    expect(text.startsWith('\x1b[H\x1b[J')).toBe(true);
    expect(text.endsWith('\n')).toBe(true);
    const lines = text.slice('\x1b[H\x1b[J'.length, -1).split('\n');
    expect(lines).toHaveLength(1 + 20 + 2);
    expect(lines[0]).toBe('Calories: 200');
    expect(lines[1]).toBe('..>' + '.'.repeat(24));
    expect(lines[2]).toBe('*' + '.'.repeat(26));
    expect(lines[21]).toBe('');
    expect(lines[22]).toBe('session abcd');
  });

  it('omits the status block when there is nothing to say', () => {
    const lines = drawFrame(PLAYING).split('\n');
    expect(lines).toHaveLength(1 + 20 + 1);
    expect(lines[21]).toBe('');
  });
});
