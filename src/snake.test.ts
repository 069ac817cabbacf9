import { describe, it, expect, expectTypeOf } from 'vitest';
import { SnakeBody, type Segment } from './snake.ts';
import { Grid } from './grid.ts';
import { GameError } from './errors.ts';

const cells = (body: SnakeBody) => body.segments.map((seg) => [seg.x, seg.y]);

describe('snake.ts', () => {
  const grid = new Grid(27, 20);

  it('spawns three segments facing up with the body below the head', () => {
    const body = SnakeBody.spawn(grid, 5, 5);
    expect(cells(body)).toEqual([
      [5, 5],
      [5, 6],
      [5, 7]
    ]);
    expect(body.segments.map((seg) => seg.tile)).toEqual([
      { type: 'head', rotation: 0 },
      { type: 'body', rotation: 0 },
      { type: 'tail', rotation: 0 }
    ]);
    expect(body.segments.every((seg) => seg.facing === 'up' && !seg.skeleton)).toBe(true);
    expect(body.pendingGrowth).toBe(false);
  });

  it('turns the old head into a bend when advancing sideways', () => {
    const body = SnakeBody.spawn(grid, 5, 5);
    body.advance('right');
    expect(body.length).toBe(4);
    expect(body.head()).toMatchObject({ x: 6, y: 5, facing: 'right', tile: { type: 'head', rotation: 90 } });
    expect(body.segments[1]?.tile).toEqual({ type: 'bend', rotation: 270 });
  });

  it('re-points the tail at its neighbour after removal', () => {
    const body = SnakeBody.spawn(grid, 5, 5);
    body.advance('right');
    body.removeTail();
    expect(cells(body)).toEqual([
      [6, 5],
      [5, 5],
      [5, 6]
    ]);
    expect(body.tail().tile).toEqual({ type: 'tail', rotation: 0 });
  });

  it('flips the tail when its neighbour is across the board edge', () => {
    const body = SnakeBody.spawn(grid, 0, 0);
    body.removeTail();
    body.advance('left');
    body.removeTail();
    body.advance('left');
    expect(cells(body)).toEqual([
      [25, 0],
      [26, 0],
      [0, 0]
    ]);
    expect(body.tail().tile).toEqual({ type: 'tail', rotation: 270 });
  });

  it('refuses to remove the last segment', () => {
    const body = SnakeBody.spawn(grid, 5, 5);
    body.removeTail();
    body.removeTail();
    expect(body.length).toBe(1);
    expect(() => body.removeTail()).toThrow(GameError);
  });

  it('detects food under the head', () => {
    const body = SnakeBody.spawn(grid, 5, 5);
    expect(body.checkFoodEaten({ x: 5, y: 5 })).toBe(true);
    expect(body.checkFoodEaten({ x: 5, y: 6 })).toBe(false);
    expect(body.checkFoodEaten(null)).toBe(false);
  });

  it('looks ahead for self collisions including the tail and the neck', () => {
    const body = SnakeBody.spawn(grid, 5, 5);
    body.advance('right');
    body.advance('down');
    expect(cells(body)).toEqual([
      [6, 6],
      [6, 5],
      [5, 5],
      [5, 6],
      [5, 7]
    ]);
    expect(body.checkSelfCollision('left')).toBe(true);
    expect(body.checkSelfCollision('up')).toBe(true);
    expect(body.checkSelfCollision('down')).toBe(false);
    body.advance('down');
    expect(body.checkSelfCollision('left')).toBe(true);
  });

  it('turns segments to bone head first', () => {
    const body = SnakeBody.spawn(grid, 5, 5);
    expect(body.skeletonizeNext()).toBe(true);
    expect(body.head().skeleton).toBe(true);
    expect(body.tail().skeleton).toBe(false);
    expect(body.skeletonizeNext()).toBe(true);
    expect(body.skeletonizeNext()).toBe(true);
    expect(body.skeletonizeNext()).toBe(false);
    expect(body.skeletonCount()).toBe(3);
  });

  it('exposes segments as a read-only view of the live body', () => {
    const body = SnakeBody.spawn(grid, 5, 5);
    const view = body.segments;
    expectTypeOf(view).toEqualTypeOf<ReadonlyArray<Readonly<Segment>>>();
    expectTypeOf(body.head()).toEqualTypeOf<Readonly<Segment>>();
    body.advance('up');
    expect(view).toHaveLength(4);
    expect(view[0]).toMatchObject({ x: 5, y: 4, facing: 'up' });
  });
});
