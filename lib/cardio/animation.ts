// lib/cardio/animation.ts
// Keyframe sampling over a day range and assembly into a looping artifact.

import { FIRST_DAY } from '../../data/characteristics';
import type {
  AnimationArtifact,
  AnimationRequest,
  AnimationSpeed,
  CharacteristicRecord,
  DayRange,
  ProgressListener,
  RasterFrame,
} from '../../types';
import { forkRandomSource } from '../core/noise';
import { DEFAULT_RENDER_CONFIG, resolveRenderConfig, type RenderConfig, type RenderConfigInput } from './config';
import { composeFrame } from './frame';
import { interpolateCharacteristics } from './interpolate';

export const SHORT_RANGE_DAYS = 2;
export const SHORT_RANGE_KEYFRAMES = 12;
export const KEYFRAMES_PER_WEEK = 16;

export type DayRangePreset = 'all' | 'early' | 'middle' | 'late';

export const DAY_RANGE_PRESETS: Readonly<Record<DayRangePreset, DayRange>> = {
  all: [1, 8],
  early: [1, 3],
  middle: [3, 6],
  late: [6, 8],
};

const SPEEDS: readonly AnimationSpeed[] = ['slow', 'medium', 'fast'];

/** Accepts 'Slow' / 'MEDIUM' / 'fast' etc. */
export function parseSpeed(value: string): AnimationSpeed {
  const v = value.trim().toLowerCase();
  const hit = SPEEDS.find(s => s === v);
  if (!hit) throw new RangeError(`[animation] unknown speed '${value}', expected one of ${SPEEDS.join(', ')}`);
  return hit;
}

export function frameDurationFor(speed: AnimationSpeed, config: RenderConfig = DEFAULT_RENDER_CONFIG): number {
  return config.frameDurationMs[speed];
}

/** Narrow ranges get a fixed dense sampling, wider ones scale with the span. */
export function keyframeCount(min: number, max: number): number {
  const span = max - min;
  if (span <= SHORT_RANGE_DAYS) return SHORT_RANGE_KEYFRAMES;
  return Math.round((KEYFRAMES_PER_WEEK * span) / 7);
}

/** n evenly spaced days, both ends included. */
export function sampleDays(min: number, max: number, n: number): number[] {
  if (n <= 0) return [];
  if (n === 1) return [min];
  const step = (max - min) / (n - 1);
  const out: number[] = [];
  for (let i = 0; i < n - 1; i++) out.push(min + i * step);
  out.push(max);
  return out;
}

export function dayToTimePoint(day: number, timelineSeconds = DEFAULT_RENDER_CONFIG.timelineSeconds): number {
  return (day - 1) * (timelineSeconds / 7);
}

export function assertValidRange([min, max]: DayRange): void {
  if (!Number.isFinite(min) || !Number.isFinite(max)) {
    throw new RangeError(`[animation] day range must be finite, got [${min}, ${max}]`);
  }
  if (min < FIRST_DAY) {
    throw new RangeError(`[animation] day range must start at or after day ${FIRST_DAY}, got ${min}`);
  }
  if (min >= max) {
    throw new RangeError(`[animation] day range must satisfy min < max, got [${min}, ${max}]`);
  }
}

export type AssembleOptions = {
  config?: RenderConfigInput;
  /** Seeds every frame's random source; omitted means a fresh entropy seed per frame. */
  seed?: number | string;
  onProgress?: ProgressListener;
  interpolate?: (day: number) => CharacteristicRecord;
  /** Overrides the policy count; mostly for callers that want a preview strip. */
  keyframes?: number;
};

export function assembleAnimation(request: AnimationRequest, options: AssembleOptions = {}): AnimationArtifact {
  assertValidRange(request.dayRange);
  const config = resolveRenderConfig(options.config);
  const interpolate = options.interpolate ?? interpolateCharacteristics;
  const [min, max] = request.dayRange;

  const total = options.keyframes ?? keyframeCount(min, max);
  if (options.keyframes !== undefined && (!Number.isInteger(total) || total < 0)) {
    throw new RangeError(`[animation] keyframe count must be a non-negative integer, got ${options.keyframes}`);
  }
  const days = sampleDays(min, max, total);
  if (days.length === 0) {
    throw new Error(`[animation] no keyframes for day range [${min}, ${max}]; nothing to encode`);
  }

  const frames: RasterFrame[] = [];
  days.forEach((day, i) => {
    let frame: RasterFrame;
    try {
      const record = interpolate(day);
      frame = composeFrame(record, dayToTimePoint(day, config.timelineSeconds), {
        width: config.width,
        height: config.height,
        timelineSeconds: config.timelineSeconds,
        rng: forkRandomSource(options.seed, i),
      });
    } catch (e) {
      console.error(`[animation] frame ${i + 1}/${days.length} (day ${day.toFixed(2)}) failed`, e);
      throw new Error(`[animation] failed to compose frame for day ${day}`, { cause: e });
    }
    frames.push(frame);

    const completed = i + 1;
    options.onProgress?.({ completed, total: days.length, fraction: completed / days.length, day });
    if (config.verbose) {
      console.info(`[animation] ${completed}/${days.length} day=${day.toFixed(2)} ${frame.title}`);
    }
  });

  const artifact: AnimationArtifact = {
    frames: Object.freeze(frames),
    frameDurationMs: frameDurationFor(request.speed, config),
    loop: true,
    dayRange: request.dayRange,
    speed: request.speed,
  };
  return Object.freeze(artifact);
}
