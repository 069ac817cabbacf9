import { describe, it, expect } from 'vitest';
import { CFG_DEFAULT, resolveSettings } from './config.ts';

describe('config', () => {
  it('starts from the fixed defaults', () => {
    const settings = resolveSettings();
    expect(settings).toEqual(CFG_DEFAULT);
    expect(settings).not.toBe(CFG_DEFAULT);
    expect(settings.gridWidth).toBe(27);
    expect(settings.gridHeight).toBe(20);
    expect(settings.startTicksPerMove).toBe(40);
  });

  it('applies valid overrides and skips bad ones', () => {
    const settings = resolveSettings({
      gridWidth: 5,
      countdownStart: 0,
      minTicksPerMove: Number.NaN,
      startTicksPerMove: -3,
      tongueShowChance: 4
    });
    expect(settings.gridWidth).toBe(5);
    expect(settings.countdownStart).toBe(0);
    expect(settings.minTicksPerMove).toBe(7);
    expect(settings.startTicksPerMove).toBe(40);
    expect(settings.tongueShowChance).toBe(1);
  });
});
