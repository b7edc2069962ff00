// lib/cardio/cells.ts
// Cell bodies, fragments, sarcomere striation and nuclei around cluster centres.

import { ELONGATED_SHAPES } from '../../types';
import type { CellPassReport, CharacteristicRecord, ClusterLayout, RGBA, XY } from '../../types';
import { chance, randomIndex, type RandomSource } from '../core/noise';
import type { RasterCanvas } from '../raster/canvas';

export const MAX_CELLS_PER_FRAME = 15;
export const CELL_COUNT_SCALE = 0.8;
export const CELLS_PER_BATCH = 5;
export const BASE_CELL_WIDTH = 15;

const CELL_ALPHA = 180;
const FRAGMENT_ALPHA = 150;
const SARCOMERE_ALPHA = 150;
const NUCLEUS_COLOR: RGBA = [102, 102, 204, 180];

const FRAGMENT_CHANCE = 0.6;
const FRAGMENT_DEBRIS_LEVEL = 0.5;
const FRAGMENTS_PER_CELL = 3;
const FRAGMENTED_BODY_SCALE = 0.8;

const SARCOMERE_LINES = 3;
const SARCOMERE_MIN_ORGANIZATION = 0.3;
const SARCOMERE_ORDERED_ORGANIZATION = 0.5;
const SARCOMERE_LENGTH = 0.8;
const SARCOMERE_SEGMENTS = 2;
const SEGMENT_SURVIVAL = 0.7;

const NUCLEUS_VISIBLE = 0.8;

export function reducedCellCount(record: CharacteristicRecord): number {
  return Math.max(0, Math.min(Math.round(record.cell_count * CELL_COUNT_SCALE), MAX_CELLS_PER_FRAME));
}

export function clusterRadius(record: CharacteristicRecord): number {
  return 20 + 15 * record.cell_clustering;
}

export function beatEffect(record: CharacteristicRecord, beatPulse: number): number {
  return 1 + beatPulse * record.beating_strength * 0.3;
}

function rgba(record: CharacteristicRecord, alpha: number): RGBA {
  const [r, g, b] = record.color_base;
  return [r, g, b, alpha];
}

function sarcomereColor(record: CharacteristicRecord): RGBA {
  const [r, g, b] = record.color_base;
  return [Math.max(r - 50, 0), Math.max(g - 50, 0), Math.max(b - 50, 0), SARCOMERE_ALPHA];
}

type CellBox = { x: number; y: number; w: number; h: number };

/** Body box for one cell, or null when the cell breaks up into fragments. */
function cellGeometry(
  record: CharacteristicRecord,
  at: XY,
  effect: number,
  rng: RandomSource,
): CellBox | null {
  const base = BASE_CELL_WIDTH * effect;

  if (record.shape === 'round') {
    return { x: at.x, y: at.y, w: base, h: base };
  }

  if (ELONGATED_SHAPES.includes(record.shape)) {
    let w = base;
    let h = base * record.elongation;
    if (chance(rng, record.alignment)) [w, h] = [h, w];
    return { x: at.x, y: at.y, w, h };
  }

  // fragmenting / fragmented
  if (chance(rng, FRAGMENT_CHANCE) && record.debris_level > FRAGMENT_DEBRIS_LEVEL) return null;
  return {
    x: at.x,
    y: at.y,
    w: base * FRAGMENTED_BODY_SCALE,
    h: base * record.elongation * FRAGMENTED_BODY_SCALE,
  };
}

function drawFragments(canvas: RasterCanvas, record: CharacteristicRecord, at: XY, rng: RandomSource): number {
  const color = rgba(record, FRAGMENT_ALPHA);
  for (let i = 0; i < FRAGMENTS_PER_CELL; i++) {
    const fx = at.x + rng() * 15 - 7;
    const fy = at.y + rng() * 15 - 7;
    const size = 4 + rng() * 4;
    canvas.fillEllipse(fx, fy, fx + size, fy + size, color);
  }
  return FRAGMENTS_PER_CELL;
}

/** Returns how many of the lines came out broken. */
function drawSarcomeres(canvas: RasterCanvas, record: CharacteristicRecord, box: CellBox, rng: RandomSource): number {
  const color = sarcomereColor(record);
  const length = box.w * SARCOMERE_LENGTH;
  const start = box.x + (box.w - length) / 2;
  let broken = 0;

  for (let i = 0; i < SARCOMERE_LINES; i++) {
    const y = box.y + (box.h * (i + 1)) / (SARCOMERE_LINES + 1);
    const disordered = record.sarcomere_organization < SARCOMERE_ORDERED_ORGANIZATION;
    if (disordered && chance(rng, 0.5)) {
      broken++;
      for (let s = 0; s < SARCOMERE_SEGMENTS; s++) {
        if (!chance(rng, SEGMENT_SURVIVAL)) continue;
        const segStart = start + (length * s) / SARCOMERE_SEGMENTS;
        const segEnd = start + (length * (s + 1)) / SARCOMERE_SEGMENTS;
        canvas.drawLine(segStart, y, segEnd, y, color, 1);
      }
    } else {
      canvas.drawLine(start, y, start + length, y, color, 1);
    }
  }
  return broken;
}

function drawNucleus(canvas: RasterCanvas, record: CharacteristicRecord, box: CellBox): void {
  const nw = box.w * record.nucleus_size;
  const nh = box.h * record.nucleus_size;
  const nx = box.x + (box.w - nw) / 2;
  const ny = box.y + (box.h - nh) / 2;
  canvas.fillEllipse(nx, ny, nx + nw, ny + nh, NUCLEUS_COLOR);
}

export function emptyCellReport(targetCells = 0): CellPassReport {
  return {
    targetCells,
    cellsPlaced: 0,
    batches: 0,
    bodies: 0,
    fragmentedCells: 0,
    fragments: 0,
    nuclei: 0,
    sarcomereLines: 0,
    brokenSarcomereLines: 0,
  };
}

/**
 * Draws the cell population for one frame. Cells go out in batches of at most
 * five: the first batches visit each cluster once in order, later ones land on
 * a random cluster.
 */
export function renderCells(
  canvas: RasterCanvas,
  record: CharacteristicRecord,
  layout: ClusterLayout,
  beatPulse: number,
  rng: RandomSource,
): CellPassReport {
  const target = reducedCellCount(record);
  const report = emptyCellReport(target);
  if (layout.centers.length === 0) return report;

  const radius = clusterRadius(record);
  const effect = beatEffect(record, beatPulse);
  const bodyColor = rgba(record, CELL_ALPHA);
  const striated = record.sarcomere_organization > SARCOMERE_MIN_ORGANIZATION;

  let visited = 0;
  while (report.cellsPlaced < target) {
    const center = visited < layout.centers.length
      ? layout.centers[visited++]
      : layout.centers[randomIndex(rng, layout.centers.length)];
    const batch = Math.min(CELLS_PER_BATCH, target - report.cellsPlaced);
    report.batches++;

    for (let k = 0; k < batch; k++) {
      const angle = rng() * 2 * Math.PI;
      const distance = rng() * radius;
      const at: XY = { x: center.x + Math.cos(angle) * distance, y: center.y + Math.sin(angle) * distance };

      const box = cellGeometry(record, at, effect, rng);
      report.cellsPlaced++;
      if (!box) {
        report.fragmentedCells++;
        report.fragments += drawFragments(canvas, record, at, rng);
        continue;
      }

      canvas.fillEllipse(box.x, box.y, box.x + box.w, box.y + box.h, bodyColor);
      report.bodies++;

      if (striated) {
        report.sarcomereLines += SARCOMERE_LINES;
        report.brokenSarcomereLines += drawSarcomeres(canvas, record, box, rng);
      }

      if (chance(rng, NUCLEUS_VISIBLE)) {
        drawNucleus(canvas, record, box);
        report.nuclei++;
      }
    }
  }

  return report;
}
