import { describe, it, expect } from 'vitest';
import { bendTile, headTile, packTile, retiredHeadTile, unpackTile } from './tiles.ts';
import { GameError } from './errors.ts';

describe('tiles', () => {
  it('faces heads by rotation', () => {
    expect(headTile('up')).toEqual({ type: 'head', rotation: 0 });
    expect(headTile('right')).toEqual({ type: 'head', rotation: 90 });
    expect(headTile('left')).toEqual({ type: 'head', rotation: 270 });
  });

  it('turns a retired head into a bend joining entry and exit edges', () => {
    expect(retiredHeadTile('up', 'right')).toEqual({ type: 'bend', rotation: 270 });
    expect(retiredHeadTile('up', 'left')).toEqual({ type: 'bend', rotation: 0 });
    expect(retiredHeadTile('right', 'up')).toEqual({ type: 'bend', rotation: 90 });
    expect(retiredHeadTile('down', 'right')).toEqual({ type: 'bend', rotation: 180 });
  });

  it('keeps straight moves and reversals straight', () => {
    expect(retiredHeadTile('up', 'up')).toEqual({ type: 'body', rotation: 0 });
    expect(retiredHeadTile('left', 'left')).toEqual({ type: 'body', rotation: 270 });
    expect(retiredHeadTile('up', 'down')).toEqual({ type: 'body', rotation: 180 });
  });

  it('rejects bends between parallel edges', () => {
    expect(() => bendTile('up', 'down')).toThrow(GameError);
    expect(bendTile('right', 'down')).toEqual({ type: 'bend', rotation: 270 });
  });

  it('packs type and rotation into one byte', () => {
    expect(packTile({ type: 'head', rotation: 0 })).toBe(0x00);
    expect(packTile({ type: 'body', rotation: 90 })).toBe(0x12);
    expect(packTile({ type: 'bend', rotation: 270 })).toBe(0x21);
    expect(packTile({ type: 'tail', rotation: 180 })).toBe(0x44);
  });

  it('unpacks known codes and rejects unknown ones', () => {
    expect(unpackTile(0x21)).toEqual({ type: 'bend', rotation: 270 });
    expect(unpackTile(0x44)).toEqual({ type: 'tail', rotation: 180 });
    expect(unpackTile(0x30)).toBeNull();
    expect(unpackTile(0x13)).toBeNull();
  });
});
