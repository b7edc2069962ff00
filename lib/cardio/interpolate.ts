// lib/cardio/interpolate.ts
// Continuous day -> characteristic record, blended between anchor days.

import { FIRST_DAY, LAST_DAY, getAnchor } from '../../data/characteristics';
import type { AnchorDay, CharacteristicRecord, ContinuousField, RGB } from '../../types';
import { lerp } from '../util/math';

export const CONTINUOUS_FIELDS: readonly ContinuousField[] = [
  'elongation',
  'alignment',
  'connection',
  'sarcomere_organization',
  'beating_strength',
  'beating_sync',
  'nucleus_size',
  'debris_level',
  'cell_count',
  'cell_clustering',
];

function toAnchorDay(n: number): AnchorDay {
  switch (n) {
    case 1: return 1;
    case 2: return 2;
    case 3: return 3;
    case 4: return 4;
    case 5: return 5;
    case 6: return 6;
    case 7: return 7;
    default: return 8;
  }
}

/** Days below 1 are rejected; anything from 8 upwards is the day-8 anchor. */
export function assertValidDay(day: number): void {
  if (!Number.isFinite(day)) {
    throw new RangeError(`[interpolate] day must be a finite number, got ${day}`);
  }
  if (day < FIRST_DAY) {
    throw new RangeError(`[interpolate] day must be >= ${FIRST_DAY}, got ${day}`);
  }
}

function blend(day: number): CharacteristicRecord {
  assertValidDay(day);
  if (day >= LAST_DAY) return getAnchor(8);

  const floor = Math.trunc(day);
  const lower = getAnchor(toAnchorDay(floor));
  const upper = getAnchor(toAnchorDay(Math.min(LAST_DAY, floor + 1)));
  const t = day - floor;

  const color: RGB = Object.freeze([
    Math.trunc(lerp(lower.color_base[0], upper.color_base[0], t)),
    Math.trunc(lerp(lower.color_base[1], upper.color_base[1], t)),
    Math.trunc(lerp(lower.color_base[2], upper.color_base[2], t)),
  ] as const);

  const mix = (key: ContinuousField): number => lerp(lower[key], upper[key], t);

  // title and shape step at integer days; everything else is smooth.
  return Object.freeze({
    title: lower.title,
    shape: lower.shape,
    elongation: mix('elongation'),
    alignment: mix('alignment'),
    connection: mix('connection'),
    sarcomere_organization: mix('sarcomere_organization'),
    beating_strength: mix('beating_strength'),
    beating_sync: mix('beating_sync'),
    color_base: color,
    nucleus_size: mix('nucleus_size'),
    debris_level: mix('debris_level'),
    cell_count: mix('cell_count'),
    cell_clustering: mix('cell_clustering'),
  });
}

export type Interpolator = {
  (day: number): CharacteristicRecord;
  readonly cacheSize: () => number;
};

/** Memoising interpolator; each instance owns its cache. */
export function createInterpolator(): Interpolator {
  const cache = new Map<number, CharacteristicRecord>();
  const fn = (day: number): CharacteristicRecord => {
    const hit = cache.get(day);
    if (hit) return hit;
    const record = blend(day);
    cache.set(day, record);
    return record;
  };
  return Object.assign(fn, { cacheSize: () => cache.size });
}

export const interpolateCharacteristics: Interpolator = createInterpolator();
