// lib/index.ts
// Public surface of the timelapse engine.

export * from '../types';
export {
  ANCHOR_DAYS,
  FIRST_DAY,
  LAST_DAY,
  STAGE_SUMMARIES,
  getAnchor,
  isAnchorDay,
  stageForDay,
} from '../data/characteristics';
export type { StageSummary } from '../data/characteristics';
export { makeRandomSource, forkRandomSource } from './core/noise';
export type { RandomSource } from './core/noise';
export { DEFAULT_RENDER_CONFIG, resolveRenderConfig } from './cardio/config';
export type { RenderConfig, RenderConfigInput } from './cardio/config';
export { createInterpolator, interpolateCharacteristics } from './cardio/interpolate';
export type { Interpolator } from './cardio/interpolate';
export { clusterCount, generateClusterLayout } from './cardio/clusters';
export { reducedCellCount, renderCells } from './cardio/cells';
export { debrisCount, renderDebris } from './cardio/debris';
export { composeFrame, computeBeat } from './cardio/frame';
export {
  DAY_RANGE_PRESETS,
  assembleAnimation,
  dayToTimePoint,
  frameDurationFor,
  keyframeCount,
  parseSpeed,
  sampleDays,
} from './cardio/animation';
export type { AssembleOptions, DayRangePreset } from './cardio/animation';
export { RenderSession, defaultPreviewDay, previewDayKey } from './cardio/session';
export type { PreviewResult, RenderSessionOptions } from './cardio/session';
export { RasterCanvas } from './raster/canvas';
export { GifFileSink, encodeAnimationGif } from './raster/gif';
export type { AnimationSink } from './raster/gif';
