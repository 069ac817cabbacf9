// snake.ts
// The snake body: an ordered chain of tile segments from head (index 0) to
// tail.  Owns growth, tail removal and the tile bookkeeping that keeps each
// segment's sprite consistent with its neighbours.

import type { Cell, Direction, Grid } from './grid.ts';
import { GameError } from './errors.ts';
import { headTile, bodyTile, tailTile, retiredHeadTile, type RenderTile } from './tiles.ts';

/** One tile of the snake. */
export interface Segment {
  /** Tile column. */
  x: number;
  /** Tile row. */
  y: number;
  /** Direction of travel when the segment was created. */
  facing: Direction;
  /** Sprite and rotation to draw. */
  tile: RenderTile;
  /** Whether the segment has turned to bone. */
  skeleton: boolean;
}

/** Length of a freshly spawned snake. */
export const SPAWN_LENGTH = 3;

/**
 * Snake body on a toroidal grid.  Segments are exclusively owned by the body;
 * callers read them through `segments` and mutate only through the methods.
 */
export class SnakeBody {
  /** Board the snake moves on. */
  readonly grid: Grid;
  /** One-shot flag: skip tail removal on the next move. */
  pendingGrowth: boolean;
  private readonly cells: Segment[];

  private constructor(grid: Grid, segments: Segment[]) {
    this.grid = grid;
    this.cells = segments;
    this.pendingGrowth = false;
  }

  /**
   * Create a three-segment snake facing up, head at the origin and the body
   * trailing below it.
   * @param grid - Board the snake lives on.
   * @param originX - Head column.
   * @param originY - Head row.
   */
  static spawn(grid: Grid, originX: number, originY: number): SnakeBody {
    const at = (dy: number): Cell => grid.wrap(originX, originY + dy);
    const head = at(0);
    const middle = at(1);
    const tail = at(2);
    return new SnakeBody(grid, [
      { x: head.x, y: head.y, facing: 'up', tile: headTile('up'), skeleton: false },
      { x: middle.x, y: middle.y, facing: 'up', tile: bodyTile('up'), skeleton: false },
      { x: tail.x, y: tail.y, facing: 'up', tile: tailTile('up'), skeleton: false }
    ]);
  }

  /** Segments from head to tail. */
  get segments(): ReadonlyArray<Readonly<Segment>> {
    return this.cells;
  }

  /** Number of segments. */
  get length(): number {
    return this.cells.length;
  }

  /** Head segment. */
  head(): Readonly<Segment> {
    return this.at(0);
  }

  /** Tail segment. */
  tail(): Readonly<Segment> {
    return this.at(this.cells.length - 1);
  }

  private at(index: number): Segment {
    const seg = this.cells[index];
    if (!seg) throw new GameError('INVALID_STATE', 'snake has no segments');
    return seg;
  }

  /**
   * Cell the head would enter when moving in `d`.
   * @param d - Direction of travel.
   */
  nextHeadCell(d: Direction): Cell {
    return this.grid.step(this.head(), d);
  }

  /**
   * Push a new head one tile along `d`.  The previous head is re-tiled as a
   * straight piece or a bend depending on its old facing.
   * @param d - Direction of travel.
   */
  advance(d: Direction): void {
    const prev = this.at(0);
    prev.tile = retiredHeadTile(prev.facing, d);
    const next = this.nextHeadCell(d);
    this.cells.unshift({ x: next.x, y: next.y, facing: d, tile: headTile(d), skeleton: false });
  }

  /**
   * Drop the last segment and point the new tail away from its neighbour.
   * A neighbour more than one tile away means the body crosses a board edge
   * between the two, so the naive orientation is flipped.
   * @throws GameError when the body would be left empty.
   */
  removeTail(): void {
    if (this.cells.length <= 1) {
      throw new GameError('INVALID_STATE', 'cannot remove the tail of a single-segment snake', {
        length: this.cells.length
      });
    }
    this.cells.pop();
    if (this.cells.length < 2) return;
    const tail = this.at(this.cells.length - 1);
    const prev = this.cells[this.cells.length - 2];
    if (!prev) return;
    const dx = prev.x - tail.x;
    const dy = prev.y - tail.y;
    if (dx < 0) {
      tail.tile = tailTile(Math.abs(dx) === 1 ? 'left' : 'right');
    } else if (dx > 0) {
      tail.tile = tailTile(Math.abs(dx) === 1 ? 'right' : 'left');
    } else if (dy < 0) {
      tail.tile = tailTile(Math.abs(dy) === 1 ? 'up' : 'down');
    } else if (dy > 0) {
      tail.tile = tailTile(Math.abs(dy) === 1 ? 'down' : 'up');
    }
  }

  /**
   * True when the head sits on the food cell.
   * @param food - Food position, or null when none is on the board.
   */
  checkFoodEaten(food: Cell | null): boolean {
    if (!food) return false;
    const head = this.head();
    return head.x === food.x && head.y === food.y;
  }

  /**
   * Look-ahead collision test against the pre-move body.  The current tail
   * still counts as occupied even though a normal move would vacate it.
   * @param d - Direction of the upcoming move.
   */
  checkSelfCollision(d: Direction): boolean {
    const next = this.nextHeadCell(d);
    for (let i = 1; i < this.cells.length; i++) {
      const seg = this.cells[i];
      if (seg && seg.x === next.x && seg.y === next.y) return true;
    }
    return false;
  }

  /**
   * True when any segment occupies the cell.
   * @param cell - Cell to test.
   */
  occupies(cell: Cell): boolean {
    return this.segments.some((seg) => seg.x === cell.x && seg.y === cell.y);
  }

  /**
   * Turn the first non-skeletal segment (head first) to bone.
   * @returns True when a segment changed.
   */
  skeletonizeNext(): boolean {
    const seg = this.cells.find((s) => !s.skeleton);
    if (!seg) return false;
    seg.skeleton = true;
    return true;
  }

  /** Number of segments already turned to bone. */
  skeletonCount(): number {
    let count = 0;
    for (const seg of this.segments) if (seg.skeleton) count++;
    return count;
  }
}
