// projection.ts
// Read-only view of a session for renderers.  A frame lists every segment as
// (gridX, gridY, tile, rotation, skeleton, tongueOut) head to tail, plus the
// food cell and phase flags.  Projection never mutates the session and may
// run at any frame rate.

import type { Cell } from './grid.ts';
import type { GameSettings } from './config.ts';
import type { SnakeBody } from './snake.ts';
import type { GameSession, Phase } from './session.ts';
import type { Rotation, TileType } from './tiles.ts';

/** Draw instruction for one segment. */
export interface RenderSegment {
  x: number;
  y: number;
  tile: TileType;
  rotation: Rotation;
  skeleton: boolean;
  tongueOut: boolean;
}

/** Everything a renderer needs for one frame. */
export interface RenderFrame {
  phase: Phase;
  score: number;
  countdown: number;
  /** Snake segments, head first. */
  segments: RenderSegment[];
  /** Title snakes, only populated on the main menu. */
  title: RenderSegment[];
  /** Food cell; null on the menu or when the board is full. */
  food: Cell | null;
  /** Draw the board faded (game over). */
  dimmed: boolean;
}

/**
 * Project a snake body into draw instructions.
 * @param body - Snake to project.
 * @param tongueOut - Whether a living head shows its tongue.
 */
export function projectBody(body: SnakeBody, tongueOut = false): RenderSegment[] {
  return body.segments.map((seg, index) => ({
    x: seg.x,
    y: seg.y,
    tile: seg.tile.type,
    rotation: seg.tile.rotation,
    skeleton: seg.skeleton,
    tongueOut: tongueOut && index === 0 && seg.tile.type === 'head' && !seg.skeleton
  }));
}

/**
 * Build the frame for the session's current state.
 * @param session - Session to read.
 * @param titleSnakes - Title snakes shown on the main menu.
 */
export function projectFrame(session: GameSession, titleSnakes: readonly SnakeBody[] = []): RenderFrame {
  const menu = session.phase === 'main-menu';
  const food = session.food;
  return {
    phase: session.phase,
    score: session.score,
    countdown: session.countdown,
    segments: projectBody(session.body, session.tongueOut),
    title: menu ? titleSnakes.flatMap((snake) => projectBody(snake)) : [],
    food: !menu && food ? { x: food.x, y: food.y } : null,
    dimmed: session.phase === 'game-over'
  };
}

/**
 * Screen size in pixels: the board plus the score bar.
 * @param settings - Board and tile dimensions.
 */
export function screenSize(
  settings: Pick<GameSettings, 'gridWidth' | 'gridHeight' | 'tileSize' | 'scoreBarHeight'>
): { width: number; height: number } {
  return {
    width: settings.gridWidth * settings.tileSize,
    height: settings.gridHeight * settings.tileSize + settings.scoreBarHeight
  };
}
