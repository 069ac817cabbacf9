import { describe, it, expect } from 'vitest';
import { createRng, randInt } from './rng.ts';

describe('rng', () => {
  it('repeats the same sequence for the same seed', () => {
    const draw = (seed: number) => {
      const rng = createRng(seed);
      return Array.from({ length: 8 }, () => rng());
    };
    const seq = draw(42);
    expect(draw(42)).toEqual(seq);
    expect(draw(43)).not.toEqual(seq);
    for (const value of seq) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('treats seeds by their low 32 bits', () => {
    expect(createRng(2 ** 32 + 5)()).toBe(createRng(5)());
    expect(createRng(5.9)()).toBe(createRng(5)());
    expect(createRng(Number.NaN)()).toBe(createRng(0)());
  });

  it('keeps randInt inside its bound', () => {
    expect(randInt(() => 0, 10)).toBe(0);
    expect(randInt(() => 0.999999, 10)).toBe(9);
    expect(randInt(() => 1, 10)).toBe(9);
    expect(randInt(() => 0.5, 0)).toBe(0);
  });
});
