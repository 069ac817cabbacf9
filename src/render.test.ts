import { describe, it, expect } from 'vitest';
import { centerText, renderAscii, segmentGlyph } from './render.ts';
import type { RenderFrame, RenderSegment } from './projection.ts';

function seg(overrides: Partial<RenderSegment>): RenderSegment {
  return { x: 0, y: 0, tile: 'body', rotation: 0, skeleton: false, tongueOut: false, ...overrides };
}

function frame(overrides: Partial<RenderFrame>): RenderFrame {
  return {
    phase: 'playing',
    score: 0,
    countdown: -1,
    segments: [],
    title: [],
    food: null,
    dimmed: false,
    ...overrides
  };
}

describe('render', () => {
  it('draws the score line and the board', () => {
    const lines = renderAscii(
      frame({
        score: 2,
        segments: [
          seg({ x: 1, y: 1, tile: 'head' }),
          seg({ x: 1, y: 2, tile: 'body' }),
          seg({ x: 1, y: 3, tile: 'tail' })
        ],
        food: { x: 3, y: 0 }
      }),
      { gridWidth: 4, gridHeight: 4, caloriesPerPoint: 200 }
    );
    expect(lines).toEqual(['Calories: 400', '...*', '.^..', '.|..', '.o..']);
  });

  it('picks glyphs by tile, rotation and state', () => {
    expect(segmentGlyph(seg({ tile: 'head', rotation: 90 }))).toBe('>');
    expect(segmentGlyph(seg({ tile: 'head', rotation: 270 }))).toBe('<');
    expect(segmentGlyph(seg({ tile: 'head', tongueOut: true }))).toBe('@');
    expect(segmentGlyph(seg({ tile: 'head', skeleton: true }))).toBe('X');
    expect(segmentGlyph(seg({ tile: 'bend', skeleton: true }))).toBe('x');
    expect(segmentGlyph(seg({ tile: 'body', rotation: 90 }))).toBe('-');
    expect(segmentGlyph(seg({ tile: 'body', rotation: 180 }))).toBe('|');
    expect(segmentGlyph(seg({ tile: 'bend', rotation: 270 }))).toBe('+');
  });

  it('clears empty cells and adds the banner on game over', () => {
    const lines = renderAscii(frame({ phase: 'game-over', dimmed: true }), {
      gridWidth: 12,
      gridHeight: 2,
      caloriesPerPoint: 200
    });
    expect(lines).toEqual([
      'Calories: 0',
      '            ',
      '            ',
      ' GAME OVER!',
      'SPACE: New Game',
      'ESC: Main Menu',
      '  Q: Quit'
    ]);
  });

  it('draws title letters over the menu snake', () => {
    const lines = renderAscii(
      frame({
        phase: 'main-menu',
        segments: [seg({ x: 0, y: 0, tile: 'head' }), seg({ x: 1, y: 0, tile: 'tail' })],
        title: [seg({ x: 1, y: 0 }), seg({ x: 9, y: 9 })]
      }),
      { gridWidth: 3, gridHeight: 1, caloriesPerPoint: 200 }
    );
    expect(lines.slice(0, 3)).toEqual(['', '^#.', 'SNAKE']);
  });

  it('keeps the head visible when it overlaps the body', () => {
    const lines = renderAscii(
      frame({ segments: [seg({ x: 0, y: 0, tile: 'head', rotation: 180 }), seg({ x: 0, y: 0, tile: 'body' })] }),
      { gridWidth: 1, gridHeight: 1, caloriesPerPoint: 200 }
    );
    expect(lines[1]).toBe('v');
  });

  it('centers short lines only', () => {
    expect(centerText('GO!', 9)).toBe('   GO!');
    expect(centerText('too long for it', 4)).toBe('too long for it');
  });
});
