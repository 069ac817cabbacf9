import type { Phase } from '../session.ts';

/** Binary frame layout version. */
export const SERIALIZER_VERSION = 1;

export const FRAME_HEADER_OFFSETS = {
  version: 0,
  phase: 1,
  flags: 2,
  countdown: 3,
  score: 4,
  foodX: 6,
  foodY: 7,
  segmentCount: 8,
  titleCount: 10
} as const;

export const FRAME_HEADER_BYTES = 12;

/** Bytes per segment: x, y, packed tile, flags. */
export const SEGMENT_BYTES = 4;

export const FRAME_FLAGS = {
  dimmed: 0x01,
  hasFood: 0x02
} as const;

export const SEGMENT_FLAGS = {
  skeleton: 0x01,
  tongueOut: 0x02
} as const;

export const PHASE_CODES: readonly Phase[] = ['main-menu', 'countdown', 'playing', 'dying', 'game-over'];

export interface FrameHeader {
  version: number;
  phase: Phase | null;
  dimmed: boolean;
  hasFood: boolean;
  countdown: number;
  score: number;
  foodX: number;
  foodY: number;
  segmentCount: number;
  titleCount: number;
}

export function readFrameHeader(bytes: Uint8Array): FrameHeader {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const flags = view.getUint8(FRAME_HEADER_OFFSETS.flags);
  return {
    version: view.getUint8(FRAME_HEADER_OFFSETS.version),
    phase: PHASE_CODES[view.getUint8(FRAME_HEADER_OFFSETS.phase)] ?? null,
    dimmed: (flags & FRAME_FLAGS.dimmed) !== 0,
    hasFood: (flags & FRAME_FLAGS.hasFood) !== 0,
    countdown: view.getInt8(FRAME_HEADER_OFFSETS.countdown),
    score: view.getUint16(FRAME_HEADER_OFFSETS.score, true),
    foodX: view.getUint8(FRAME_HEADER_OFFSETS.foodX),
    foodY: view.getUint8(FRAME_HEADER_OFFSETS.foodY),
    segmentCount: view.getUint16(FRAME_HEADER_OFFSETS.segmentCount, true),
    titleCount: view.getUint16(FRAME_HEADER_OFFSETS.titleCount, true)
  };
}
