import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseToml } from 'smol-toml';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ServerConfig {
  host: string;
  port: number;
  /** Fixed session update rate. */
  tickRateHz: number;
  /** Binary frame broadcast rate; never above the tick rate. */
  frameRateHz: number;
  maxInputsPerTick: number;
  maxInputsPerSecond: number;
  logLevel: LogLevel;
  /** Seed for the session RNG; random when absent. */
  seed?: number;
  /** Exit the process after a quit event. */
  exitOnQuit: boolean;
}

export const DEFAULT_CONFIG: ServerConfig = {
  host: '127.0.0.1',
  port: 5174,
  tickRateHz: 60,
  frameRateHz: 60,
  maxInputsPerTick: 4,
  maxInputsPerSecond: 60,
  logLevel: 'info',
  exitOnQuit: true
};

/** TOML file read when neither `--config` nor SERVER_CONFIG is given. */
export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('./config.toml', import.meta.url));

type Env = Record<string, string | undefined>;
type Warn = (msg: string) => void;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function parseIntValue(raw: string | undefined): number | undefined {
  if (raw == null) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) return undefined;
  return parsed;
}

function parseBoolValue(raw: string | undefined): boolean | undefined {
  if (raw == null) return undefined;
  const value = raw.trim().toLowerCase();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return undefined;
}

function getArgValue(argv: readonly string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === flag) {
      return argv[i + 1];
    }
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
  }
  return undefined;
}

function coerceInt(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  warn?: Warn
): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    parsed = Number.parseInt(value, 10);
  } else {
    parsed = Number.NaN;
  }
  if (!Number.isFinite(parsed)) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const clamped = clampInt(Math.floor(parsed), min, max);
  if (clamped !== parsed) {
    warn?.(`${name} was clamped to ${clamped}.`);
  }
  return clamped;
}

/** Loosely typed config input, as read from TOML or assembled from flags. */
export type ConfigInput = { [K in keyof ServerConfig]?: unknown };

export function normalizeConfig(input: ConfigInput, warn?: Warn): ServerConfig {
  const port = coerceInt('port', input.port, DEFAULT_CONFIG.port, 0, 65535, warn);
  const rawHost = input.host;
  const host = typeof rawHost === 'string' && rawHost.trim() ? rawHost.trim() : DEFAULT_CONFIG.host;
  if (rawHost !== undefined && host !== rawHost) {
    warn?.(`host is invalid; using ${host}.`);
  }
  const tickRateHz = coerceInt('tickRateHz', input.tickRateHz, DEFAULT_CONFIG.tickRateHz, 1, 240, warn);
  let frameRateHz = coerceInt('frameRateHz', input.frameRateHz, DEFAULT_CONFIG.frameRateHz, 1, 240, warn);
  if (frameRateHz > tickRateHz) {
    warn?.('frameRateHz exceeded tickRateHz; clamping to tickRateHz.');
    frameRateHz = tickRateHz;
  }
  const maxInputsPerTick = coerceInt(
    'maxInputsPerTick',
    input.maxInputsPerTick,
    DEFAULT_CONFIG.maxInputsPerTick,
    1,
    60,
    warn
  );
  const maxInputsPerSecond = coerceInt(
    'maxInputsPerSecond',
    input.maxInputsPerSecond,
    DEFAULT_CONFIG.maxInputsPerSecond,
    1,
    10000,
    warn
  );

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (isLogLevel(input.logLevel)) {
    logLevel = input.logLevel;
  } else if (input.logLevel !== undefined) {
    warn?.(`logLevel "${String(input.logLevel)}" is invalid; using ${logLevel}.`);
  }

  let exitOnQuit = DEFAULT_CONFIG.exitOnQuit;
  if (typeof input.exitOnQuit === 'boolean') {
    exitOnQuit = input.exitOnQuit;
  } else if (input.exitOnQuit !== undefined) {
    warn?.(`exitOnQuit is invalid; using ${exitOnQuit}.`);
  }

  let seed: number | undefined;
  if (input.seed !== undefined) {
    const parsedSeed =
      typeof input.seed === 'number' ? input.seed : Number.parseInt(String(input.seed), 10);
    if (Number.isFinite(parsedSeed)) {
      seed = Math.floor(parsedSeed);
    } else {
      warn?.('seed is invalid; ignoring.');
    }
  }

  const output: ServerConfig = {
    host,
    port,
    tickRateHz,
    frameRateHz,
    maxInputsPerTick,
    maxInputsPerSecond,
    logLevel,
    exitOnQuit
  };
  if (seed !== undefined) output.seed = seed;
  return output;
}

const CONFIG_KEYS: ReadonlyArray<keyof ServerConfig> = [
  'host',
  'port',
  'tickRateHz',
  'frameRateHz',
  'maxInputsPerTick',
  'maxInputsPerSecond',
  'logLevel',
  'seed',
  'exitOnQuit'
];

/**
 * Read server settings from a TOML file with flat camelCase keys.
 * @param filePath - TOML path to read.
 * @param warn - Receives parse problems and unknown keys.
 * @returns Known keys found in the file; empty when the file is missing or broken.
 */
export function loadTomlConfig(filePath: string, warn?: Warn): ConfigInput {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, 'utf8');
  if (!raw.trim()) return {};
  let table: Record<string, unknown>;
  try {
    table = parseToml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    warn?.(`Failed to parse ${filePath}: ${message}`);
    return {};
  }
  const out: ConfigInput = {};
  for (const [key, value] of Object.entries(table)) {
    const known = CONFIG_KEYS.find((name) => name === key);
    if (!known) {
      warn?.(`unknown key "${key}" in ${filePath}; ignoring.`);
      continue;
    }
    out[known] = value;
  }
  return out;
}

/**
 * Resolve the config for a process: defaults, then TOML, then env, then flags.
 * @param argv - Command line arguments (without node and script).
 * @param env - Environment variables.
 * @param warn - Receives every correction made along the way.
 */
export function parseConfig(
  argv: readonly string[],
  env: Env,
  warn: Warn = (msg) => console.warn(`[config] ${msg}`)
): ServerConfig {
  const configPath = getArgValue(argv, '--config') ?? env['SERVER_CONFIG'];
  const resolvedPath = configPath ? path.resolve(process.cwd(), configPath) : DEFAULT_CONFIG_PATH;
  if (configPath && !fs.existsSync(resolvedPath)) {
    warn(`config file ${resolvedPath} not found; using defaults.`);
  }
  const input: ConfigInput = loadTomlConfig(resolvedPath, warn);

  const host = getArgValue(argv, '--host') ?? env['HOST'];
  if (host) input.host = host;
  const port = parseIntValue(getArgValue(argv, '--port')) ?? parseIntValue(env['PORT']);
  if (port !== undefined) input.port = port;
  const tickRate = parseIntValue(getArgValue(argv, '--tick')) ?? parseIntValue(env['TICK_RATE']);
  if (tickRate !== undefined) input.tickRateHz = tickRate;
  const frameRate =
    parseIntValue(getArgValue(argv, '--frame-rate')) ?? parseIntValue(env['FRAME_RATE']);
  if (frameRate !== undefined) input.frameRateHz = frameRate;
  const maxInputsPerTick =
    parseIntValue(getArgValue(argv, '--inputs-per-tick')) ??
    parseIntValue(env['INPUTS_PER_TICK']);
  if (maxInputsPerTick !== undefined) input.maxInputsPerTick = maxInputsPerTick;
  const maxInputsPerSecond =
    parseIntValue(getArgValue(argv, '--inputs-per-second')) ??
    parseIntValue(env['INPUTS_PER_SECOND']);
  if (maxInputsPerSecond !== undefined) input.maxInputsPerSecond = maxInputsPerSecond;
  const logLevel = getArgValue(argv, '--log') ?? env['LOG_LEVEL'];
  if (logLevel) input.logLevel = logLevel;
  const seed = parseIntValue(getArgValue(argv, '--seed')) ?? parseIntValue(env['GAME_SEED']);
  if (seed !== undefined) input.seed = seed;
  if (argv.includes('--stay-alive')) {
    input.exitOnQuit = false;
  } else {
    const exitOnQuit = parseBoolValue(env['EXIT_ON_QUIT']);
    if (exitOnQuit !== undefined) input.exitOnQuit = exitOnQuit;
  }
  return normalizeConfig(input, warn);
}
