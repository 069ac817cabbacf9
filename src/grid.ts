// grid.ts
// Toroidal board geometry.  Every coordinate produced by movement goes
// through Grid.wrap so that leaving one edge re-enters on the opposite one.

/** Cardinal movement directions. */
export type Direction = 'up' | 'down' | 'left' | 'right';

/** All directions in declaration order. */
export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

/** Integer tile position. */
export interface Cell {
  x: number;
  y: number;
}

/** Unit step for each direction (screen coordinates, y grows downward). */
export const DIRECTION_VECTORS: Readonly<Record<Direction, Readonly<Cell>>> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 }
};

const OPPOSITE: Readonly<Record<Direction, Direction>> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left'
};

/**
 * Direction pointing the other way.
 * @param d - Input direction.
 */
export function opposite(d: Direction): Direction {
  return OPPOSITE[d];
}

/**
 * True when the two directions are at a right angle.
 * @param a - First direction.
 * @param b - Second direction.
 */
export function isPerpendicular(a: Direction, b: Direction): boolean {
  const vertical = (d: Direction) => d === 'up' || d === 'down';
  return vertical(a) !== vertical(b);
}

/**
 * The two directions at a right angle to `d`.
 * @param d - Reference direction.
 */
export function perpendiculars(d: Direction): [Direction, Direction] {
  return d === 'up' || d === 'down' ? ['left', 'right'] : ['up', 'down'];
}

/**
 * Type guard for direction strings arriving from the wire.
 * @param value - Value to inspect.
 */
export function isDirection(value: unknown): value is Direction {
  return value === 'up' || value === 'down' || value === 'left' || value === 'right';
}

/** Fixed-size wrap-around coordinate space. */
export class Grid {
  /** Width in tiles. */
  readonly width: number;
  /** Height in tiles. */
  readonly height: number;

  /**
   * @param width - Board width in tiles (at least 1).
   * @param height - Board height in tiles (at least 1).
   */
  constructor(width: number, height: number) {
    this.width = Math.max(1, Math.floor(width));
    this.height = Math.max(1, Math.floor(height));
  }

  /**
   * Fold a position that stepped at most one tile off the board back onto it.
   * Coordinates below zero move to the last row/column; coordinates at or
   * past the dimension move to zero.
   */
  wrap(x: number, y: number): Cell {
    let wx = x;
    let wy = y;
    if (wx < 0) wx = this.width - 1;
    if (wx >= this.width) wx = 0;
    if (wy < 0) wy = this.height - 1;
    if (wy >= this.height) wy = 0;
    return { x: wx, y: wy };
  }

  /**
   * Position one tile away from `from` in direction `d`, wrapped.
   * @param from - Starting cell.
   * @param d - Direction of travel.
   */
  step(from: Cell, d: Direction): Cell {
    const v = DIRECTION_VECTORS[d];
    return this.wrap(from.x + v.x, from.y + v.y);
  }

  /** Board center, rounded down (spawn origin for new games). */
  center(): Cell {
    return { x: Math.floor(this.width / 2), y: Math.floor(this.height / 2) };
  }
}
