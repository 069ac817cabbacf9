// movement.ts
// Per-move rules: collision look-ahead, grow-or-shift, food pickup, the
// direction filter and the speed law.

import type { Direction, Grid } from './grid.ts';
import { isPerpendicular, perpendiculars } from './grid.ts';
import type { SnakeBody } from './snake.ts';
import { placeFood, type Food } from './food.ts';
import type { RandomSource } from './rng.ts';
import type { GameSettings } from './config.ts';

/** Mutable state a move reads and writes. */
export interface PlayField {
  grid: Grid;
  body: SnakeBody;
  food: Food | null;
  score: number;
}

/** Which checks a move performs. */
export interface StepChecks {
  /** Stop and report death when the move would bite the body. */
  checkDeath: boolean;
  /** Eat food under the new head. */
  checkFood: boolean;
}

/** What happened during a move. */
export type StepOutcome = 'moved' | 'ate' | 'died';

/** Placement inputs used when food is eaten. */
export interface StepEnv {
  rng: RandomSource;
  foodSampleAttempts: number;
}

/**
 * Move the snake one tile.
 *
 * 1. With `checkDeath`, a look-ahead collision leaves the body untouched and
 *    reports `died`.
 * 2. Without pending growth the tail is removed before the new head is
 *    pushed; with pending growth only the head is pushed and the flag clears.
 * 3. With `checkFood`, landing on food scores a point, arms growth for the
 *    next move and re-places the food.
 */
export function step(field: PlayField, direction: Direction, checks: StepChecks, env: StepEnv): StepOutcome {
  const body = field.body;
  if (checks.checkDeath && body.checkSelfCollision(direction)) return 'died';

  if (!body.pendingGrowth) {
    body.removeTail();
    body.advance(direction);
  } else {
    body.advance(direction);
    body.pendingGrowth = false;
  }

  if (checks.checkFood && body.checkFoodEaten(field.food)) {
    field.score += 1;
    body.pendingGrowth = true;
    field.food = placeFood(field.grid, body, {
      rng: env.rng,
      maxAttempts: env.foodSampleAttempts
    });
    return 'ate';
  }
  return 'moved';
}

/**
 * Player turn filter: only right-angle turns relative to the head's facing are
 * honoured, which rules out both no-op repeats and reversals into the neck.
 * @param facing - Current head facing.
 * @param requested - Requested direction.
 */
export function acceptDirection(facing: Direction, requested: Direction): boolean {
  return isPerpendicular(facing, requested);
}

/**
 * Speed law: one tick faster per point, down to the floor.
 * @param score - Current score.
 * @param settings - Start cadence and floor.
 */
export function ticksPerMoveForScore(
  score: number,
  settings: Pick<GameSettings, 'startTicksPerMove' | 'minTicksPerMove'>
): number {
  return Math.max(settings.startTicksPerMove - score, settings.minTicksPerMove);
}

/**
 * Autopilot for the decorative menu snake: keep going straight half of the
 * time, otherwise turn to one of the two sides with equal odds.
 * @param facing - Current head facing.
 * @param rng - Random source.
 */
export function randomDirection(facing: Direction, rng: RandomSource): Direction {
  if (rng() < 0.5) return facing;
  const [a, b] = perpendiculars(facing);
  return rng() < 0.5 ? a : b;
}
