import { describe, it, expect } from 'vitest';
import { buildHud, countdownLabel, scoreLine } from './hud.ts';

describe('hud', () => {
  it('shows the title and help on the main menu', () => {
    const hud = buildHud({ phase: 'main-menu', score: 0, countdown: 3 });
    expect(hud.scoreLine).toBe('');
    expect(hud.banner).toBe('SNAKE');
    expect(hud.hints).toEqual([
      'UP/DOWN/LEFT/RIGHT: Change direction of snake',
      'Q: Quit',
      'SPACE: Start Game',
      'Eat the cupcakes, but not yourself!'
    ]);
  });

  it('counts down to GO!', () => {
    expect(countdownLabel(3)).toBe('3');
    expect(countdownLabel(1)).toBe('1');
    expect(countdownLabel(0)).toBe('GO!');
    expect(buildHud({ phase: 'countdown', score: 0, countdown: 2 }).banner).toBe('2');
  });

  it('shows calories while playing', () => {
    expect(scoreLine(3)).toBe('Calories: 600');
    expect(buildHud({ phase: 'playing', score: 3, countdown: -1 })).toEqual({
      scoreLine: 'Calories: 600',
      banner: null,
      hints: []
    });
    expect(buildHud({ phase: 'dying', score: 1, countdown: -1 }, 10).scoreLine).toBe('Calories: 10');
  });

  it('offers restart options on game over', () => {
    const hud = buildHud({ phase: 'game-over', score: 2, countdown: -1 });
    expect(hud.banner).toBe('GAME OVER!');
    expect(hud.hints).toEqual(['SPACE: New Game', 'ESC: Main Menu', 'Q: Quit']);
  });
});
