import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG, loadTomlConfig, normalizeConfig, parseConfig } from './config.ts';

describe('config', () => {
  const tempDirs: string[] = [];

  /** Write a TOML file into a fresh temp directory. */
  function writeToml(contents: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'snake-config-'));
    tempDirs.push(dir);
    const file = path.join(dir, 'server.toml');
    fs.writeFileSync(file, contents);
    return file;
  }

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('uses the bundled defaults with no input', () => {
    const warnings: string[] = [];
    expect(parseConfig([], {}, (msg) => warnings.push(msg))).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual([]);
  });

  it('clamps values and warns', () => {
    const warnings: string[] = [];
    const config = normalizeConfig(
      { port: 70000, tickRateHz: 30, frameRateHz: 60, maxInputsPerTick: 'abc', seed: 12.7 },
      (msg) => warnings.push(msg)
    );
    expect(config.port).toBe(65535);
    expect(config.tickRateHz).toBe(30);
    expect(config.frameRateHz).toBe(30);
    expect(config.maxInputsPerTick).toBe(DEFAULT_CONFIG.maxInputsPerTick);
    expect(config.seed).toBe(12);
    expect(warnings).toEqual([
      'port was clamped to 65535.',
      'frameRateHz exceeded tickRateHz; clamping to tickRateHz.',
      'maxInputsPerTick is invalid; using 4.'
    ]);
  });

  it('rejects unknown log levels and non-boolean exit flags', () => {
    const warnings: string[] = [];
    const config = normalizeConfig({ logLevel: 'loud', exitOnQuit: 'sometimes' }, (msg) =>
      warnings.push(msg)
    );
    expect(config.logLevel).toBe('info');
    expect(config.exitOnQuit).toBe(true);
    expect(warnings).toEqual([
      'logLevel "loud" is invalid; using info.',
      'exitOnQuit is invalid; using true.'
    ]);
  });

  it('reads TOML from SERVER_CONFIG and reports unknown keys', () => {
    const file = writeToml('port = 6000\nlogLevel = "debug"\nseed = 42\nfancy = 1\n');
    const warnings: string[] = [];
    const config = parseConfig([], { SERVER_CONFIG: file }, (msg) => warnings.push(msg));
    expect(config.port).toBe(6000);
    expect(config.logLevel).toBe('debug');
    expect(config.seed).toBe(42);
    expect(config.tickRateHz).toBe(60);
    expect(warnings).toEqual([`unknown key "fancy" in ${file}; ignoring.`]);
  });

  it('lets env override TOML and flags override env', () => {
    const file = writeToml('port = 6000\ntickRateHz = 50\n');
    const config = parseConfig(
      ['--config', file, '--port=7000', '--log', 'warn', '--stay-alive'],
      { PORT: '6500', TICK_RATE: '30', LOG_LEVEL: 'debug', EXIT_ON_QUIT: 'true' },
      () => undefined
    );
    expect(config.port).toBe(7000);
    expect(config.tickRateHz).toBe(30);
    expect(config.frameRateHz).toBe(30);
    expect(config.logLevel).toBe('warn');
    expect(config.exitOnQuit).toBe(false);
  });

  it('reads EXIT_ON_QUIT and GAME_SEED from env', () => {
    const config = parseConfig([], { EXIT_ON_QUIT: 'no', GAME_SEED: '9' }, () => undefined);
    expect(config.exitOnQuit).toBe(false);
    expect(config.seed).toBe(9);
  });

  it('survives broken or missing files', () => {
    const broken = writeToml('port = = 1\n');
    const warnings: string[] = [];
    expect(loadTomlConfig(broken, (msg) => warnings.push(msg))).toEqual({});
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.startsWith(`Failed to parse ${broken}: `)).toBe(true);

    const missing = path.join(os.tmpdir(), 'snake-config-does-not-exist.toml');
    const missingWarnings: string[] = [];
    expect(parseConfig(['--config', missing], {}, (msg) => missingWarnings.push(msg))).toEqual(
      DEFAULT_CONFIG
    );
    expect(missingWarnings).toEqual([`config file ${missing} not found; using defaults.`]);
  });
});
