/** Helpers to pack render frames into transferable buffers. */

import {
  FRAME_FLAGS,
  FRAME_HEADER_BYTES,
  FRAME_HEADER_OFFSETS,
  PHASE_CODES,
  SEGMENT_BYTES,
  SEGMENT_FLAGS,
  SERIALIZER_VERSION,
  readFrameHeader
} from './protocol/frame.ts';
import { packTile, unpackTile } from './tiles.ts';
import { GameError } from './errors.ts';
import type { RenderFrame, RenderSegment } from './projection.ts';

/** Serializer for packing render frames into a Uint8Array. */
export class FrameSerializer {
  /**
   * Packs a frame into a compact binary buffer.
   *
   * Buffer Layout Contract v1:
   * 1. Header (12 bytes):
   *    [version u8, phase u8, flags u8, countdown i8, score u16,
   *     foodX u8, foodY u8, segmentCount u16, titleCount u16]
   *    Multi-byte fields are little-endian.
   * 2. Snake block: segmentCount × [x, y, tileByte, segFlags].
   * 3. Title block: titleCount × [x, y, tileByte, segFlags].
   *
   * @param frame - Frame to serialize.
   * @returns Buffer ready to send as a binary WebSocket message.
   */
  static serialize(frame: RenderFrame): Uint8Array {
    const total = FRAME_HEADER_BYTES + (frame.segments.length + frame.title.length) * SEGMENT_BYTES;
    const bytes = new Uint8Array(total);
    const view = new DataView(bytes.buffer);

    let flags = 0;
    if (frame.dimmed) flags |= FRAME_FLAGS.dimmed;
    if (frame.food) flags |= FRAME_FLAGS.hasFood;

    view.setUint8(FRAME_HEADER_OFFSETS.version, SERIALIZER_VERSION);
    view.setUint8(FRAME_HEADER_OFFSETS.phase, Math.max(0, PHASE_CODES.indexOf(frame.phase)));
    view.setUint8(FRAME_HEADER_OFFSETS.flags, flags);
    view.setInt8(FRAME_HEADER_OFFSETS.countdown, Math.max(-128, Math.min(127, frame.countdown)));
    view.setUint16(FRAME_HEADER_OFFSETS.score, Math.max(0, Math.min(0xffff, frame.score)), true);
    view.setUint8(FRAME_HEADER_OFFSETS.foodX, frame.food?.x ?? 0);
    view.setUint8(FRAME_HEADER_OFFSETS.foodY, frame.food?.y ?? 0);
    view.setUint16(FRAME_HEADER_OFFSETS.segmentCount, frame.segments.length, true);
    view.setUint16(FRAME_HEADER_OFFSETS.titleCount, frame.title.length, true);

    let ptr = FRAME_HEADER_BYTES;
    for (const seg of [...frame.segments, ...frame.title]) {
      bytes[ptr++] = seg.x;
      bytes[ptr++] = seg.y;
      bytes[ptr++] = packTile({ type: seg.tile, rotation: seg.rotation });
      let segFlags = 0;
      if (seg.skeleton) segFlags |= SEGMENT_FLAGS.skeleton;
      if (seg.tongueOut) segFlags |= SEGMENT_FLAGS.tongueOut;
      bytes[ptr++] = segFlags;
    }
    return bytes;
  }

  /**
   * Unpack a buffer produced by `serialize`.
   * @param input - Binary frame.
   * @returns Decoded frame.
   * @throws GameError when the buffer is truncated or uses unknown codes.
   */
  static decode(input: ArrayBuffer | Uint8Array): RenderFrame {
    const bytes = input instanceof Uint8Array ? input : new Uint8Array(input);
    if (bytes.byteLength < FRAME_HEADER_BYTES) {
      throw new GameError('INVALID_DATA', 'frame shorter than header', { length: bytes.byteLength });
    }
    const header = readFrameHeader(bytes);
    if (header.version !== SERIALIZER_VERSION) {
      throw new GameError('INVALID_DATA', `unsupported frame version ${header.version}`);
    }
    if (!header.phase) {
      throw new GameError('INVALID_DATA', 'unknown phase code');
    }
    const expected = FRAME_HEADER_BYTES + (header.segmentCount + header.titleCount) * SEGMENT_BYTES;
    if (bytes.byteLength < expected) {
      throw new GameError('INVALID_DATA', 'frame truncated', { expected, length: bytes.byteLength });
    }

    let ptr = FRAME_HEADER_BYTES;
    const readSegments = (count: number): RenderSegment[] => {
      const out: RenderSegment[] = [];
      for (let i = 0; i < count; i++) {
        const x = bytes[ptr] ?? 0;
        const y = bytes[ptr + 1] ?? 0;
        const tile = unpackTile(bytes[ptr + 2] ?? 0xff);
        const segFlags = bytes[ptr + 3] ?? 0;
        if (!tile) throw new GameError('INVALID_DATA', `unknown tile byte at ${ptr + 2}`);
        out.push({
          x,
          y,
          tile: tile.type,
          rotation: tile.rotation,
          skeleton: (segFlags & SEGMENT_FLAGS.skeleton) !== 0,
          tongueOut: (segFlags & SEGMENT_FLAGS.tongueOut) !== 0
        });
        ptr += SEGMENT_BYTES;
      }
      return out;
    };

    const segments = readSegments(header.segmentCount);
    const title = readSegments(header.titleCount);
    return {
      phase: header.phase,
      score: header.score,
      countdown: header.countdown,
      segments,
      title,
      food: header.hasFood ? { x: header.foodX, y: header.foodY } : null,
      dimmed: header.dimmed
    };
  }
}
