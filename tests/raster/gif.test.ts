import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { assembleAnimation } from '@/lib/cardio/animation';
import { GifFileSink, PALETTE_332, encodeAnimationGif, gifDelay, paletteIndex } from '@/lib/raster/gif';
import type { AnimationArtifact } from '@/types';

// header (6) + screen descriptor (7) + 256-colour table (768) + loop extension (19)
const FIRST_FRAME_EXTENSION = 800;

describe('palette', () => {
  it('maps primaries and greys onto the 3-3-2 table', () => {
    expect(paletteIndex(255, 255, 255)).toBe(255);
    expect(paletteIndex(0, 0, 0)).toBe(0);
    expect(paletteIndex(255, 0, 0)).toBe(224);
    expect(PALETTE_332[255]).toBe(0xffffff);
    expect(PALETTE_332[224]).toBe(0xff0000);
    expect(PALETTE_332[0]).toBe(0);
    expect(PALETTE_332).toHaveLength(256);
  });

  it('converts milliseconds to GIF centiseconds', () => {
    expect(gifDelay(500)).toBe(50);
    expect(gifDelay(250)).toBe(25);
    expect(gifDelay(125)).toBe(13);
    expect(gifDelay(1)).toBe(1);
  });
});

describe('encodeAnimationGif', () => {
  const artifact = assembleAnimation({ dayRange: [1, 3], speed: 'medium' }, { seed: 4, config: { width: 40, height: 30 } });

  it('writes a looping GIF89a stream with the frame delay', () => {
    const bytes = Buffer.from(encodeAnimationGif(artifact));
    expect(bytes.subarray(0, 6).toString('ascii')).toBe('GIF89a');
    expect(bytes.readUInt16LE(6)).toBe(40);
    expect(bytes.readUInt16LE(8)).toBe(30);
    expect(bytes.includes('NETSCAPE2.0')).toBe(true);
    expect(bytes[FIRST_FRAME_EXTENSION]).toBe(0x21);
    expect(bytes[FIRST_FRAME_EXTENSION + 1]).toBe(0xf9);
    expect(bytes[FIRST_FRAME_EXTENSION + 4]).toBe(25);
    expect(bytes[bytes.length - 1]).toBe(0x3b);
  });

  it('rejects an artifact without frames', () => {
    const empty: AnimationArtifact = { frames: [], frameDurationMs: 250, loop: true, dayRange: [1, 3], speed: 'medium' };
    expect(() => encodeAnimationGif(empty)).toThrow(/no frames/);
  });
});

describe('GifFileSink', () => {
  let dir = '';

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'myocyte-gif-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the encoded animation to disk', async () => {
    const artifact = assembleAnimation({ dayRange: [6, 8], speed: 'fast' }, { seed: 5, config: { width: 32, height: 24 } });
    const file = path.join(dir, 'out.gif');
    await new GifFileSink(file).write(artifact);
    const written = await readFile(file);
    expect(written.subarray(0, 6).toString('ascii')).toBe('GIF89a');
    expect(written[FIRST_FRAME_EXTENSION + 4]).toBe(13);
  });
});
