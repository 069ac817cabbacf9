import { describe, it, expect } from 'vitest';
import { projectBody, projectFrame, screenSize } from './projection.ts';
import { GameSession } from './session.ts';
import { SnakeBody } from './snake.ts';
import { Grid } from './grid.ts';
import { buildTitleSnakes } from './titleScreen.ts';
import { CFG_DEFAULT } from './config.ts';

describe('projection', () => {
  it('lists segments head to tail with tiles and rotations', () => {
    const body = SnakeBody.spawn(new Grid(27, 20), 5, 5);
    body.advance('right');
    expect(projectBody(body)).toEqual([
      { x: 6, y: 5, tile: 'head', rotation: 90, skeleton: false, tongueOut: false },
      { x: 5, y: 5, tile: 'bend', rotation: 270, skeleton: false, tongueOut: false },
      { x: 5, y: 6, tile: 'body', rotation: 0, skeleton: false, tongueOut: false },
      { x: 5, y: 7, tile: 'tail', rotation: 0, skeleton: false, tongueOut: false }
    ]);
  });

  it('shows the tongue on a living head only', () => {
    const body = SnakeBody.spawn(new Grid(27, 20), 5, 5);
    expect(projectBody(body, true).map((seg) => seg.tongueOut)).toEqual([true, false, false]);
    body.skeletonizeNext();
    expect(projectBody(body, true).map((seg) => seg.tongueOut)).toEqual([false, false, false]);
  });

  it('adds title letters and hides food on the main menu', () => {
    const session = new GameSession({ rng: () => 0 });
    const titles = buildTitleSnakes(session.grid);
    const frame = projectFrame(session, titles);
    expect(frame.phase).toBe('main-menu');
    expect(frame.title).toHaveLength(159);
    expect(frame.food).toBeNull();
    expect(frame.dimmed).toBe(false);
    expect(frame.segments).toHaveLength(3);
  });

  it('drops title letters and shows food once the game starts', () => {
    const session = new GameSession({ rng: () => 0 });
    session.update(['start']);
    const frame = projectFrame(session, buildTitleSnakes(session.grid));
    expect(frame.title).toEqual([]);
    expect(frame.food).toEqual({ x: 0, y: 0 });
    expect(frame.countdown).toBe(3);
  });

  it('dims the board on game over', () => {
    const session = new GameSession({ rng: () => 0 });
    session.changePhase('game-over');
    expect(projectFrame(session).dimmed).toBe(true);
  });

  it('sizes the screen as the board plus the score bar', () => {
    expect(screenSize(CFG_DEFAULT)).toEqual({ width: 432, height: 336 });
    expect(screenSize({ gridWidth: 4, gridHeight: 3, tileSize: 10, scoreBarHeight: 5 })).toEqual({
      width: 40,
      height: 35
    });
  });
});
