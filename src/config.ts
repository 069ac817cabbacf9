// config.ts
// Fixed game tuning values.  Board size and the speed curve are part of the
// game's identity and are not exposed as runtime settings; hosts only choose
// the RNG and tick pacing.

/** Tuning values consumed by the session and movement engine. */
export interface GameSettings {
  /** Board width in tiles. */
  gridWidth: number;
  /** Board height in tiles. */
  gridHeight: number;
  /** Edge length of one tile in pixels. */
  tileSize: number;
  /** Height of the score bar drawn above the board, in pixels. */
  scoreBarHeight: number;
  /** Ticks per move at score 0. */
  startTicksPerMove: number;
  /** Fastest cadence the speed law can reach. */
  minTicksPerMove: number;
  /** Cadence of the decorative menu snake. */
  menuTicksPerMove: number;
  /** Exclusive upper bound on random growth applied to the menu snake. */
  menuPreGrowMax: number;
  /** First number shown by the countdown. */
  countdownStart: number;
  /** Ticks between countdown decrements. */
  countdownTicksPerStep: number;
  /** Ticks between segments turning to bone while dying. */
  skeletonTicksPerSegment: number;
  /** Ticks between tongue toggles. */
  tongueTicks: number;
  /** Chance of showing the tongue when it is hidden. */
  tongueShowChance: number;
  /** Random samples tried before enumerating free cells for food. */
  foodSampleAttempts: number;
  /** Calories shown per point of score. */
  caloriesPerPoint: number;
}

// Default configuration values.
export const CFG_DEFAULT: Readonly<GameSettings> = Object.freeze({
  gridWidth: 27,
  gridHeight: 20,
  tileSize: 16,
  scoreBarHeight: 16,
  startTicksPerMove: 40,
  minTicksPerMove: 7,
  menuTicksPerMove: 5,
  menuPreGrowMax: 100,
  countdownStart: 3,
  countdownTicksPerStep: 60,
  skeletonTicksPerSegment: 2,
  tongueTicks: 20,
  tongueShowChance: 0.3,
  foodSampleAttempts: 64,
  caloriesPerPoint: 200
});

const SETTING_KEYS: ReadonlyArray<keyof GameSettings> = [
  'gridWidth',
  'gridHeight',
  'tileSize',
  'scoreBarHeight',
  'startTicksPerMove',
  'minTicksPerMove',
  'menuTicksPerMove',
  'menuPreGrowMax',
  'countdownStart',
  'countdownTicksPerStep',
  'skeletonTicksPerSegment',
  'tongueTicks',
  'tongueShowChance',
  'foodSampleAttempts',
  'caloriesPerPoint'
];

/**
 * Build a settings object from the defaults plus test or host overrides.
 * Non-finite or negative overrides fall back to the defaults.
 * @param overrides - Partial settings to apply.
 * @returns Fresh settings object.
 */
export function resolveSettings(overrides: Partial<GameSettings> = {}): GameSettings {
  const out: GameSettings = { ...CFG_DEFAULT };
  for (const key of SETTING_KEYS) {
    const value = overrides[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) continue;
    if (key === 'tongueShowChance') {
      out[key] = Math.max(0, Math.min(1, value));
      continue;
    }
    if (value < 0) continue;
    out[key] = value;
  }
  return out;
}
