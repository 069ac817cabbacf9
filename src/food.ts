// food.ts
// Food placement on free cells.

import type { Cell, Grid } from './grid.ts';
import type { SnakeBody } from './snake.ts';
import { randInt, type RandomSource } from './rng.ts';

/** A single food item on the board. */
export interface Food {
  x: number;
  y: number;
}

/** Optional knobs for food placement. */
export interface PlaceFoodOptions {
  /** RNG used for sampling. */
  rng?: RandomSource;
  /** Uniform samples tried before falling back to free-cell enumeration. */
  maxAttempts?: number;
}

/**
 * List every cell not covered by the snake, row by row.
 * @param grid - Board geometry.
 * @param body - Snake occupying cells.
 */
export function freeCells(grid: Grid, body: SnakeBody): Cell[] {
  const taken = new Set<number>();
  for (const seg of body.segments) taken.add(seg.y * grid.width + seg.x);
  const out: Cell[] = [];
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (!taken.has(y * grid.width + x)) out.push({ x, y });
    }
  }
  return out;
}

/**
 * Pick a uniformly random cell the snake does not cover.  Sampling is tried
 * first; once `maxAttempts` samples have landed on the snake the free cells
 * are enumerated and one is chosen from that list.
 * @param grid - Board geometry.
 * @param body - Snake to avoid.
 * @param options - RNG and attempt bound.
 * @returns Food position, or null when the snake covers the whole board.
 */
export function placeFood(grid: Grid, body: SnakeBody, options: PlaceFoodOptions = {}): Food | null {
  const rng = options.rng ?? Math.random;
  const maxAttempts = Math.max(0, Math.floor(options.maxAttempts ?? 64));
  for (let i = 0; i < maxAttempts; i++) {
    const cell = { x: randInt(rng, grid.width), y: randInt(rng, grid.height) };
    if (!body.occupies(cell)) return cell;
  }
  const free = freeCells(grid, body);
  if (!free.length) return null;
  const pick = free[randInt(rng, free.length)];
  return pick ? { x: pick.x, y: pick.y } : null;
}
