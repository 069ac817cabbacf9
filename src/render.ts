/** Helper functions for drawing frames as terminal text. */

import { buildHud } from './hud.ts';
import type { GameSettings } from './config.ts';
import type { RenderFrame, RenderSegment } from './projection.ts';
import type { Rotation } from './tiles.ts';

/** Settings the text renderer reads. */
export type AsciiSettings = Pick<GameSettings, 'gridWidth' | 'gridHeight' | 'caloriesPerPoint'>;

/** Characters used for board cells. */
export const GLYPHS = {
  empty: '.',
  emptyDimmed: ' ',
  food: '*',
  title: '#',
  bone: 'x',
  skull: 'X',
  tongue: '@',
  bend: '+',
  tail: 'o'
} as const;

/** Head glyph per facing rotation. */
const HEAD_GLYPHS: Readonly<Record<Rotation, string>> = { 0: '^', 90: '>', 180: 'v', 270: '<' };

/**
 * Glyph for one snake segment.
 * @param seg - Segment to draw.
 */
export function segmentGlyph(seg: RenderSegment): string {
  if (seg.skeleton) return seg.tile === 'head' ? GLYPHS.skull : GLYPHS.bone;
  switch (seg.tile) {
    case 'head':
      return seg.tongueOut ? GLYPHS.tongue : HEAD_GLYPHS[seg.rotation];
    case 'body':
      return seg.rotation === 0 || seg.rotation === 180 ? '|' : '-';
    case 'bend':
      return GLYPHS.bend;
    case 'tail':
      return GLYPHS.tail;
  }
}

/**
 * Left-pad a line so it sits centered over the board.
 * @param text - Line to center.
 * @param width - Board width in characters.
 */
export function centerText(text: string, width: number): string {
  if (text.length >= width) return text;
  return ' '.repeat(Math.floor((width - text.length) / 2)) + text;
}

/**
 * Render a frame as lines of text: the score line, one row per grid row,
 * then the banner and hints when the phase has them.
 * @param frame - Frame to draw.
 * @param settings - Board size and score scaling.
 */
export function renderAscii(frame: RenderFrame, settings: AsciiSettings): string[] {
  const width = settings.gridWidth;
  const height = settings.gridHeight;
  const empty = frame.dimmed ? GLYPHS.emptyDimmed : GLYPHS.empty;
  const rows: string[][] = [];
  for (let y = 0; y < height; y++) rows.push(new Array<string>(width).fill(empty));

  const put = (x: number, y: number, glyph: string): void => {
    const row = rows[y];
    if (!row || x < 0 || x >= width) return;
    row[x] = glyph;
  };

  if (frame.food) put(frame.food.x, frame.food.y, GLYPHS.food);
  // Tail first so the head wins on overlap.
  for (let i = frame.segments.length - 1; i >= 0; i--) {
    const seg = frame.segments[i];
    if (seg) put(seg.x, seg.y, segmentGlyph(seg));
  }
  for (const seg of frame.title) put(seg.x, seg.y, GLYPHS.title);

  const hud = buildHud(frame, settings.caloriesPerPoint);
  const lines = [hud.scoreLine, ...rows.map((row) => row.join(''))];
  if (hud.banner !== null) lines.push(centerText(hud.banner, width));
  for (const hint of hud.hints) lines.push(centerText(hint, width));
  return lines;
}
