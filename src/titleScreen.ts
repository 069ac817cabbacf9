// titleScreen.ts
// The menu title: the word SNAKE spelled by five scripted snakes.  Letter
// scripts live in data/titleLetters.json; each is a spawn origin, a few full
// moves (tail removed) and a run of growth moves.

import { readFileSync } from 'node:fs';
import { isDirection, type Direction, type Grid } from './grid.ts';
import { SnakeBody } from './snake.ts';
import { GameError } from './errors.ts';

/** Script for one title letter. */
export interface LetterScript {
  letter: string;
  origin: [number, number];
  /** Moves that shift the whole snake. */
  moves: Direction[];
  /** Moves that only push a new head. */
  grow: Direction[];
}

const TITLE_DATA_URL = new URL('./data/titleLetters.json', import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function parseDirections(value: unknown, where: string): Direction[] {
  if (!Array.isArray(value)) {
    throw new GameError('INVALID_DATA', `${where} must be an array`);
  }
  const out: Direction[] = [];
  for (const item of value) {
    if (!isDirection(item)) {
      throw new GameError('INVALID_DATA', `${where} contains "${String(item)}"`);
    }
    out.push(item);
  }
  return out;
}

/**
 * Validate raw title data.
 * @param raw - Parsed JSON.
 * @returns Letter scripts in drawing order.
 * @throws GameError when the data does not match the expected shape.
 */
export function parseTitleScripts(raw: unknown): LetterScript[] {
  if (!isRecord(raw) || !Array.isArray(raw['letters'])) {
    throw new GameError('INVALID_DATA', 'title data must contain a letters array');
  }
  return raw['letters'].map((entry: unknown, index: number): LetterScript => {
    if (!isRecord(entry)) {
      throw new GameError('INVALID_DATA', `letter ${index} is not an object`);
    }
    const letter = typeof entry['letter'] === 'string' ? entry['letter'] : `#${index}`;
    const origin = entry['origin'];
    if (
      !Array.isArray(origin) ||
      origin.length !== 2 ||
      !Number.isInteger(origin[0]) ||
      !Number.isInteger(origin[1])
    ) {
      throw new GameError('INVALID_DATA', `letter ${letter} needs an integer [x, y] origin`);
    }
    return {
      letter,
      origin: [Number(origin[0]), Number(origin[1])],
      moves: parseDirections(entry['moves'], `letter ${letter} moves`),
      grow: parseDirections(entry['grow'], `letter ${letter} grow`)
    };
  });
}

/** Read and validate the bundled title scripts. */
export function loadTitleScripts(): LetterScript[] {
  const text = readFileSync(TITLE_DATA_URL, 'utf8');
  return parseTitleScripts(JSON.parse(text));
}

/**
 * Play one letter script on a fresh snake.
 * @param grid - Board geometry.
 * @param script - Letter script.
 */
export function buildLetter(grid: Grid, script: LetterScript): SnakeBody {
  const body = SnakeBody.spawn(grid, script.origin[0], script.origin[1]);
  for (const d of script.moves) {
    body.removeTail();
    body.advance(d);
  }
  for (const d of script.grow) body.advance(d);
  return body;
}

/**
 * Build all title snakes.
 * @param grid - Board geometry.
 * @param scripts - Letter scripts; defaults to the bundled ones.
 */
export function buildTitleSnakes(grid: Grid, scripts: LetterScript[] = loadTitleScripts()): SnakeBody[] {
  return scripts.map((script) => buildLetter(grid, script));
}
