// lib/cardio/session.ts
// Session-scoped cache of preview frames and the latest generated animation.

import type {
  AnimationArtifact,
  AnimationRequest,
  DayRange,
  ProgressListener,
  RasterFrame,
} from '../../types';
import { FIRST_DAY } from '../../data/characteristics';
import { forkRandomSource } from '../core/noise';
import { assembleAnimation, dayToTimePoint } from './animation';
import { resolveRenderConfig, type RenderConfig, type RenderConfigInput } from './config';
import { composeFrame } from './frame';
import { assertValidDay, createInterpolator, type Interpolator } from './interpolate';

/** Nearest multiple of `step`, never below day 1. */
export function previewDayKey(day: number, step = 0.5): number {
  return Math.max(FIRST_DAY, Math.round(day / step) * step);
}

// Cached frames stay private; callers get their own pixel buffer.
function detach(frame: RasterFrame): RasterFrame {
  return Object.freeze({ ...frame, pixels: frame.pixels.slice() });
}

export function defaultPreviewDay([min, max]: DayRange, step = 0.5): number {
  return previewDayKey((min + max) / 2, step);
}

export type PreviewResult = {
  dayKey: number;
  frame: RasterFrame;
  cached: boolean;
};

export type RenderSessionOptions = {
  config?: RenderConfigInput;
  seed?: number | string;
  /** Disable to recompose on every preview request. */
  cachePreviews?: boolean;
};

/**
 * Owns everything a rendering session keeps between requests. Nothing is
 * evicted; drop the session to release it.
 */
export class RenderSession {
  readonly config: RenderConfig;
  readonly previews = new Map<number, RasterFrame>();
  private readonly interpolate: Interpolator = createInterpolator();
  private readonly seed: number | string | undefined;
  private readonly cachePreviews: boolean;
  private latest: AnimationArtifact | null = null;
  private generation = 0;

  constructor(opts: RenderSessionOptions = {}) {
    this.config = resolveRenderConfig(opts.config);
    this.seed = opts.seed;
    this.cachePreviews = opts.cachePreviews ?? true;
  }

  /**
   * Frame for the half-day key nearest `day`. Cached frames are handed out as
   * copies, so writing to `frame.pixels` never reaches the cache.
   */
  renderPreview(day: number): PreviewResult {
    assertValidDay(day);
    const dayKey = previewDayKey(day, this.config.previewStep);
    const hit = this.cachePreviews ? this.previews.get(dayKey) : undefined;
    if (hit) return { dayKey, frame: detach(hit), cached: true };

    const frame = composeFrame(this.interpolate(dayKey), dayToTimePoint(dayKey, this.config.timelineSeconds), {
      width: this.config.width,
      height: this.config.height,
      timelineSeconds: this.config.timelineSeconds,
      rng: forkRandomSource(this.seed, `preview:${dayKey}`),
    });
    if (!this.cachePreviews) return { dayKey, frame, cached: false };
    this.previews.set(dayKey, frame);
    return { dayKey, frame: detach(frame), cached: false };
  }

  /** Assembles a new animation; it replaces whatever was generated before. */
  generate(request: AnimationRequest, onProgress?: ProgressListener): AnimationArtifact {
    const seed = this.seed === undefined ? undefined : `${this.seed}:gen:${this.generation}`;
    const artifact = assembleAnimation(request, {
      config: this.config,
      seed,
      onProgress,
      interpolate: this.interpolate,
    });
    this.generation++;
    this.latest = artifact;
    return artifact;
  }

  get latestArtifact(): AnimationArtifact | null {
    return this.latest;
  }
}
