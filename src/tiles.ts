// tiles.ts
// Render tile derivation.  Each segment carries a (type, rotation) pair; the
// sprite for every type is drawn facing up (bends join the left and bottom
// edges) and the renderer rotates it clockwise by `rotation` degrees.

import type { Direction } from './grid.ts';
import { opposite } from './grid.ts';
import { GameError } from './errors.ts';

/** Sprite family used for a segment. */
export type TileType = 'head' | 'body' | 'bend' | 'tail';

/** Clockwise rotation in degrees. */
export type Rotation = 0 | 90 | 180 | 270;

/** Sprite plus rotation for one segment. */
export interface RenderTile {
  type: TileType;
  rotation: Rotation;
}

/** Rotation that makes an up-facing sprite face `d`. */
const FACING_ROTATION: Readonly<Record<Direction, Rotation>> = {
  up: 0,
  right: 90,
  down: 180,
  left: 270
};

/** Edges joined by the bend sprite at each rotation (unrotated joins left and down). */
const BEND_EDGES: Readonly<Record<Rotation, readonly [Direction, Direction]>> = {
  0: ['left', 'down'],
  90: ['left', 'up'],
  180: ['right', 'up'],
  270: ['right', 'down']
};

const ROTATIONS: readonly Rotation[] = [0, 90, 180, 270];
const TILE_TYPES: readonly TileType[] = ['head', 'body', 'bend', 'tail'];

/** Head tile facing `d`. */
export function headTile(d: Direction): RenderTile {
  return { type: 'head', rotation: FACING_ROTATION[d] };
}

/** Straight body tile running along `d`. */
export function bodyTile(d: Direction): RenderTile {
  return { type: 'body', rotation: FACING_ROTATION[d] };
}

/** Tail tile pointing along `d`. */
export function tailTile(d: Direction): RenderTile {
  return { type: 'tail', rotation: FACING_ROTATION[d] };
}

/**
 * Bend tile joining the two given edges of a cell.
 * @throws GameError when the edges are not perpendicular.
 */
export function bendTile(edgeA: Direction, edgeB: Direction): RenderTile {
  for (const rotation of ROTATIONS) {
    const edges = BEND_EDGES[rotation];
    if (edges.includes(edgeA) && edges.includes(edgeB) && edgeA !== edgeB) {
      return { type: 'bend', rotation };
    }
  }
  throw new GameError('INVALID_STATE', `no bend joins ${edgeA} and ${edgeB}`, { edgeA, edgeB });
}

/**
 * Tile for a segment that stops being the head.  A snake that was facing `from`
 * entered the cell through the edge opposite `from`; it now leaves through the
 * `to` edge.  Straight moves, and the reversals only scripted snakes make,
 * give a straight piece along `to`.
 */
export function retiredHeadTile(from: Direction, to: Direction): RenderTile {
  if (from === to || from === opposite(to)) return bodyTile(to);
  return bendTile(opposite(from), to);
}

// Packed byte layout used by the binary frame codec:
//   high nibble = type   (head 0x00, body 0x10, bend 0x20, tail 0x40)
//   low nibble  = rotation (none 0x0, ccw 90 0x1, cw 90 0x2, 180 0x4)

const TYPE_BITS: Readonly<Record<TileType, number>> = {
  head: 0x00,
  body: 0x10,
  bend: 0x20,
  tail: 0x40
};

const ROTATION_BITS: Readonly<Record<Rotation, number>> = {
  0: 0x0,
  270: 0x1,
  90: 0x2,
  180: 0x4
};

/**
 * Pack a tile into one byte.
 * @param tile - Tile to encode.
 */
export function packTile(tile: RenderTile): number {
  return TYPE_BITS[tile.type] | ROTATION_BITS[tile.rotation];
}

/**
 * Decode a packed tile byte.
 * @param byte - Packed value.
 * @returns Tile, or null when either nibble is not a known code.
 */
export function unpackTile(byte: number): RenderTile | null {
  let type: TileType | null = null;
  for (const key of TILE_TYPES) {
    if (TYPE_BITS[key] === (byte & 0xf0)) type = key;
  }
  let rotation: Rotation | null = null;
  for (const rot of ROTATIONS) {
    if (ROTATION_BITS[rot] === (byte & 0x0f)) rotation = rot;
  }
  if (type === null || rotation === null) return null;
  return { type, rotation };
}
