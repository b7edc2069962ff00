// lib/cardio/debris.ts
// Loose particles scattered over the whole frame; density and tint follow damage.

import type { CharacteristicRecord, RGBA } from '../../types';
import type { RandomSource } from '../core/noise';
import type { RasterCanvas } from '../raster/canvas';

export const DEBRIS_PER_LEVEL = 80;
export const DAMAGE_DEBRIS_LEVEL = 0.5;

export const LIGHT_DEBRIS_COLOR: RGBA = [180, 180, 180, 80];
export const DAMAGE_DEBRIS_COLOR: RGBA = [160, 100, 100, 100];

export function debrisCount(record: CharacteristicRecord): number {
  return Math.max(0, Math.round(record.debris_level * DEBRIS_PER_LEVEL));
}

export function debrisColor(record: CharacteristicRecord): RGBA {
  return record.debris_level < DAMAGE_DEBRIS_LEVEL ? LIGHT_DEBRIS_COLOR : DAMAGE_DEBRIS_COLOR;
}

export function renderDebris(canvas: RasterCanvas, record: CharacteristicRecord, rng: RandomSource): number {
  const count = debrisCount(record);
  const color = debrisColor(record);
  for (let i = 0; i < count; i++) {
    const x = rng() * canvas.width;
    const y = rng() * canvas.height;
    const size = 1 + rng() * 3;
    canvas.fillEllipse(x, y, x + size, y + size, color);
  }
  return count;
}
