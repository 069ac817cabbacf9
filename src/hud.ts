// hud.ts
// Text shown around the board.  Renderers decide where to place it.

import type { Phase } from './session.ts';

/** HUD text for one frame. */
export interface Hud {
  /** Score bar caption. */
  scoreLine: string;
  /** Large centered overlay text, if any. */
  banner: string | null;
  /** Smaller help lines under the banner. */
  hints: string[];
}

/** Help lines on the main menu. */
export const MENU_HINTS: readonly string[] = [
  'UP/DOWN/LEFT/RIGHT: Change direction of snake',
  'Q: Quit',
  'SPACE: Start Game',
  'Eat the cupcakes, but not yourself!'
];

/** Help lines on the game-over screen. */
export const GAME_OVER_HINTS: readonly string[] = ['SPACE: New Game', 'ESC: Main Menu', 'Q: Quit'];

/**
 * Score caption.
 * @param score - Points scored.
 * @param caloriesPerPoint - Calories shown per point.
 */
export function scoreLine(score: number, caloriesPerPoint = 200): string {
  return `Calories: ${score * caloriesPerPoint}`;
}

/**
 * Countdown overlay: the number while positive, then GO!.
 * @param countdown - Current countdown value.
 */
export function countdownLabel(countdown: number): string {
  return countdown > 0 ? String(countdown) : 'GO!';
}

/**
 * Build the HUD for a phase.
 * @param state - Phase, score and countdown of the frame.
 * @param caloriesPerPoint - Calories shown per point.
 */
export function buildHud(
  state: { phase: Phase; score: number; countdown: number },
  caloriesPerPoint = 200
): Hud {
  const line = scoreLine(state.score, caloriesPerPoint);
  switch (state.phase) {
    case 'main-menu':
      return { scoreLine: '', banner: 'SNAKE', hints: [...MENU_HINTS] };
    case 'countdown':
      return { scoreLine: line, banner: countdownLabel(state.countdown), hints: [] };
    case 'game-over':
      return { scoreLine: line, banner: 'GAME OVER!', hints: [...GAME_OVER_HINTS] };
    case 'playing':
    case 'dying':
      return { scoreLine: line, banner: null, hints: [] };
  }
}
