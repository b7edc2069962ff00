// lib/cardio/clusters.ts
// Cluster centres and inter-cluster connections for one frame.

import type { CharacteristicRecord, ClusterLayout, FrameSize, XY } from '../../types';
import { chance, uniform, type RandomSource } from '../core/noise';
import { clamp } from '../util/math';

export const CLUSTER_MARGIN = 100;
export const MIN_CLUSTERS = 2;
export const MAX_CLUSTERS = 3;

// Below or at this connectivity no links are drawn at all.
export const CONNECTION_THRESHOLD = 0.4;

export function clusterCount(record: CharacteristicRecord): number {
  return clamp(Math.round(record.cell_clustering * 3), MIN_CLUSTERS, MAX_CLUSTERS);
}

function insetAxis(rng: RandomSource, size: number): number {
  const margin = Math.min(CLUSTER_MARGIN, size / 2);
  return uniform(rng, margin, size - margin);
}

export function generateClusterLayout(
  record: CharacteristicRecord,
  rng: RandomSource,
  size: FrameSize,
): ClusterLayout {
  const n = clusterCount(record);
  const centers: XY[] = [];
  for (let i = 0; i < n; i++) {
    const x = insetAxis(rng, size.width);
    const y = insetAxis(rng, size.height);
    centers.push({ x, y });
  }

  const connections: Array<readonly [number, number]> = [];
  if (record.connection > CONNECTION_THRESHOLD) {
    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        if (chance(rng, record.connection)) connections.push([i, j]);
      }
    }
  }

  return Object.freeze({ centers: Object.freeze(centers), connections: Object.freeze(connections) });
}
