// lib/raster/gif.ts
// Animated GIF container for assembled animations.

import { writeFile } from 'node:fs/promises';
import { GifWriter } from 'omggif';
import type { AnimationArtifact, RasterFrame } from '../../types';

export const DEFAULT_GIF_FILE_NAME = 'cardiomyocyte_development.gif';

export interface AnimationSink {
  write(artifact: AnimationArtifact): Promise<void>;
}

// 3-3-2 bit RGB: index = rrrgggbb.
const LEVELS_3 = [0, 36, 73, 109, 146, 182, 219, 255];
const LEVELS_2 = [0, 85, 170, 255];

export const PALETTE_332: readonly number[] = Array.from({ length: 256 }, (_, i) => {
  const r = LEVELS_3[(i >> 5) & 7];
  const g = LEVELS_3[(i >> 2) & 7];
  const b = LEVELS_2[i & 3];
  return (r << 16) | (g << 8) | b;
});

export function paletteIndex(r: number, g: number, b: number): number {
  const ri = Math.round((r / 255) * 7);
  const gi = Math.round((g / 255) * 7);
  const bi = Math.round((b / 255) * 3);
  return (ri << 5) | (gi << 2) | bi;
}

export function indexFrame(frame: RasterFrame): number[] {
  const out = new Array<number>(frame.width * frame.height);
  const px = frame.pixels;
  for (let i = 0, p = 0; p < out.length; i += 4, p++) {
    out[p] = paletteIndex(px[i], px[i + 1], px[i + 2]);
  }
  return out;
}

/**
 * GIF delays are whole hundredths of a second, so durations snap to the
 * nearest 10 ms: 125 ms plays as 130 ms. Every frame gets the same delay.
 */
export function gifDelay(frameDurationMs: number): number {
  return Math.max(1, Math.round(frameDurationMs / 10));
}

export function encodeAnimationGif(artifact: AnimationArtifact): Uint8Array {
  const first = artifact.frames[0];
  if (!first) throw new Error('[gif] artifact has no frames');
  const { width, height } = first;
  for (const f of artifact.frames) {
    if (f.width !== width || f.height !== height) {
      throw new Error(`[gif] frame size ${f.width}x${f.height} differs from ${width}x${height}`);
    }
  }

  // LZW output stays below 2 bytes per pixel with a 256-colour table.
  const capacity = 2048 + artifact.frames.length * (width * height * 2 + 1024);
  const buf = Buffer.alloc(capacity);
  const writer = new GifWriter(buf, width, height, {
    palette: [...PALETTE_332],
    loop: 0, // forever
  });
  const delay = gifDelay(artifact.frameDurationMs);
  for (const frame of artifact.frames) {
    writer.addFrame(0, 0, width, height, indexFrame(frame), { delay });
  }
  const end = writer.end();
  return new Uint8Array(buf.subarray(0, end));
}

export class GifFileSink implements AnimationSink {
  constructor(readonly path: string = DEFAULT_GIF_FILE_NAME) {}

  async write(artifact: AnimationArtifact): Promise<void> {
    const bytes = encodeAnimationGif(artifact);
    try {
      await writeFile(this.path, bytes);
    } catch (e) {
      console.error(`[gif] failed to write ${this.path}`, e);
      throw e;
    }
  }
}
