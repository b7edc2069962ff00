// lib/cardio/frame.ts
// One finished frame: layout, links, cells, debris, label box.

import type { CharacteristicRecord, FrameReport, FrameSize, RGBA, RasterFrame } from '../../types';
import type { RandomSource } from '../core/noise';
import { frac } from '../util/math';
import { RasterCanvas } from '../raster/canvas';
import { generateClusterLayout } from './clusters';
import { renderCells } from './cells';
import { renderDebris } from './debris';
import { DEFAULT_RENDER_CONFIG } from './config';

const CONNECTION_ALPHA = 120;
const CONNECTION_WIDTH = 2;

// Reserved for the day/title label drawn by the presenting layer.
export const LABEL_BOX = { x0: 10, y0: 10, x1: 160, y1: 30 } as const;
export const LABEL_BOX_COLOR: RGBA = [240, 240, 240, 180];

export type Beat = { frequency: number; phase: number; pulse: number };

/** Half-sine pulse per beat cycle; stronger cultures beat faster. */
export function computeBeat(record: CharacteristicRecord, timePoint: number): Beat {
  const frequency = 1 + record.beating_strength;
  const phase = frac(timePoint * frequency);
  return { frequency, phase, pulse: Math.sin(phase * Math.PI) };
}

/** Inverse of the day -> timeline mapping used for the frame label. */
export function timePointToDay(timePoint: number, timelineSeconds = DEFAULT_RENDER_CONFIG.timelineSeconds): number {
  return 1 + (timePoint / timelineSeconds) * 7;
}

export type ComposeOptions = Partial<FrameSize> & {
  rng: RandomSource;
  timelineSeconds?: number;
};

export function composeFrame(
  record: CharacteristicRecord,
  timePoint: number,
  options: ComposeOptions,
): RasterFrame {
  const width = options.width ?? DEFAULT_RENDER_CONFIG.width;
  const height = options.height ?? DEFAULT_RENDER_CONFIG.height;
  const { rng } = options;

  const canvas = new RasterCanvas(width, height);
  const beat = computeBeat(record, timePoint);

  const layout = generateClusterLayout(record, rng, { width, height });
  const [r, g, b] = record.color_base;
  const linkColor: RGBA = [r, g, b, CONNECTION_ALPHA];
  for (const [i, j] of layout.connections) {
    const a = layout.centers[i];
    const c = layout.centers[j];
    canvas.drawLine(a.x, a.y, c.x, c.y, linkColor, CONNECTION_WIDTH);
  }

  const cells = renderCells(canvas, record, layout, beat.pulse, rng);
  const debris = renderDebris(canvas, record, rng);

  canvas.fillRect(LABEL_BOX.x0, LABEL_BOX.y0, LABEL_BOX.x1, LABEL_BOX.y1, LABEL_BOX_COLOR);

  const report: FrameReport = Object.freeze({
    clusters: layout.centers.length,
    connections: layout.connections.length,
    cells: Object.freeze(cells),
    debris,
    beatPulse: beat.pulse,
  });

  return Object.freeze({
    width,
    height,
    pixels: canvas.data,
    timePoint,
    day: timePointToDay(timePoint, options.timelineSeconds),
    title: record.title,
    shape: record.shape,
    report,
  });
}
