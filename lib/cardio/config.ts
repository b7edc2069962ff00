// lib/cardio/config.ts
// Render configuration with per-field fallbacks to defaults.

import type { AnimationSpeed } from '../../types';

export type RenderConfig = {
  // Frame size in pixels.
  width: number;
  height: number;

  // The 1..8 day axis maps onto this many seconds of nominal timeline.
  timelineSeconds: number;

  // Per-frame display duration by speed setting.
  frameDurationMs: Record<AnimationSpeed, number>;

  // Preview keys snap to multiples of this.
  previewStep: number;

  // Progress lines on the console.
  verbose: boolean;
};

export const DEFAULT_RENDER_CONFIG: RenderConfig = {
  width: 400,
  height: 300,
  timelineSeconds: 60,
  frameDurationMs: { slow: 500, medium: 250, fast: 125 },
  previewStep: 0.5,
  verbose: false,
};

export type RenderConfigInput = Partial<Omit<RenderConfig, 'frameDurationMs'>> & {
  frameDurationMs?: Partial<Record<AnimationSpeed, number>>;
};

function positive(v: unknown, fb: number): number {
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fb;
}

export function resolveRenderConfig(input: RenderConfigInput = {}): RenderConfig {
  const d = DEFAULT_RENDER_CONFIG;
  const durations = input.frameDurationMs ?? {};
  return {
    width: Math.round(positive(input.width, d.width)),
    height: Math.round(positive(input.height, d.height)),
    timelineSeconds: positive(input.timelineSeconds, d.timelineSeconds),
    frameDurationMs: {
      slow: positive(durations.slow, d.frameDurationMs.slow),
      medium: positive(durations.medium, d.frameDurationMs.medium),
      fast: positive(durations.fast, d.frameDurationMs.fast),
    },
    previewStep: positive(input.previewStep, d.previewStep),
    verbose: input.verbose ?? d.verbose,
  };
}
