// data/characteristics.ts
// Anchor records of the culture, one per integer day.

import type { AnchorDay, CharacteristicRecord } from '../types';

export const FIRST_DAY = 1;
export const LAST_DAY = 8;

export const ANCHOR_DAYS: readonly AnchorDay[] = [1, 2, 3, 4, 5, 6, 7, 8];

function anchor(record: CharacteristicRecord): CharacteristicRecord {
  Object.freeze(record.color_base);
  return Object.freeze(record);
}

const ANCHORS: Readonly<Record<AnchorDay, CharacteristicRecord>> = Object.freeze({
  1: anchor({
    title: 'Immature Stage',
    shape: 'round',
    elongation: 1.0,
    alignment: 0.1,
    connection: 0.1,
    sarcomere_organization: 0.1,
    beating_strength: 0.1,
    beating_sync: 0.1,
    color_base: [255, 214, 204],
    nucleus_size: 0.7,
    debris_level: 0.1,
    cell_count: 8,
    cell_clustering: 0.1,
  }),
  2: anchor({
    title: 'Initial Beating',
    shape: 'slightly_elongated',
    elongation: 1.2,
    alignment: 0.2,
    connection: 0.2,
    sarcomere_organization: 0.2,
    beating_strength: 0.3,
    beating_sync: 0.2,
    color_base: [255, 204, 204],
    nucleus_size: 0.65,
    debris_level: 0.1,
    cell_count: 12,
    cell_clustering: 0.3,
  }),
  3: anchor({
    title: 'Mean Beating Begins',
    shape: 'elongated',
    elongation: 1.5,
    alignment: 0.4,
    connection: 0.3,
    sarcomere_organization: 0.4,
    beating_strength: 0.5,
    beating_sync: 0.4,
    color_base: [255, 194, 194],
    nucleus_size: 0.5,
    debris_level: 0.2,
    cell_count: 16,
    cell_clustering: 0.5,
  }),
  4: anchor({
    title: 'Stronger Contractions',
    shape: 'well_elongated',
    elongation: 1.8,
    alignment: 0.6,
    connection: 0.5,
    sarcomere_organization: 0.6,
    beating_strength: 0.7,
    beating_sync: 0.6,
    color_base: [255, 153, 153],
    nucleus_size: 0.45,
    debris_level: 0.2,
    cell_count: 20,
    cell_clustering: 0.7,
  }),
  5: anchor({
    title: 'Moderate Synchronization',
    shape: 'fully_elongated',
    elongation: 2.0,
    alignment: 0.8,
    connection: 0.7,
    sarcomere_organization: 0.8,
    beating_strength: 0.85,
    beating_sync: 0.8,
    color_base: [255, 102, 102],
    nucleus_size: 0.4,
    debris_level: 0.3,
    cell_count: 24,
    cell_clustering: 0.8,
  }),
  6: anchor({
    title: 'Peak Contraction Activity',
    shape: 'fully_elongated',
    elongation: 2.2,
    alignment: 0.9,
    connection: 0.9,
    sarcomere_organization: 0.9,
    beating_strength: 1.0,
    beating_sync: 0.9,
    color_base: [255, 51, 51],
    nucleus_size: 0.4,
    debris_level: 0.4,
    cell_count: 28,
    cell_clustering: 0.9,
  }),
  7: anchor({
    title: 'Damage & Fragmentation Begins',
    shape: 'fragmenting',
    elongation: 1.6,
    alignment: 0.5,
    connection: 0.6,
    sarcomere_organization: 0.5,
    beating_strength: 0.6,
    beating_sync: 0.5,
    color_base: [204, 51, 51],
    nucleus_size: 0.3,
    debris_level: 0.7,
    cell_count: 20,
    cell_clustering: 0.6,
  }),
  8: anchor({
    title: 'Significant Cell Damage',
    shape: 'fragmented',
    elongation: 1.2,
    alignment: 0.2,
    connection: 0.2,
    sarcomere_organization: 0.1,
    beating_strength: 0.2,
    beating_sync: 0.1,
    color_base: [153, 51, 51],
    nucleus_size: 0.25,
    debris_level: 0.9,
    cell_count: 12,
    cell_clustering: 0.2,
  }),
});

export function getAnchor(day: AnchorDay): CharacteristicRecord {
  return ANCHORS[day];
}

export function isAnchorDay(day: number): day is AnchorDay {
  return Number.isInteger(day) && day >= FIRST_DAY && day <= LAST_DAY;
}

export type StageSummary = {
  days: readonly [number, number];
  label: string;
  description: string;
};

export const STAGE_SUMMARIES: readonly StageSummary[] = [
  {
    days: [1, 2],
    label: 'Immature',
    description: 'Small, immature cells with minimal beating',
  },
  {
    days: [3, 4],
    label: 'Maturing',
    description: 'Developing elongation and alignment with improved contractility',
  },
  {
    days: [5, 6],
    label: 'Peak',
    description: 'Peak maturity with strong synchronization and organized sarcomeres',
  },
  {
    days: [7, 8],
    label: 'Decline',
    description: 'Progressive damage, fragmentation and loss of function',
  },
];

export function stageForDay(day: number): StageSummary {
  const d = Math.trunc(day);
  return STAGE_SUMMARIES.find(s => d >= s.days[0] && d <= s.days[1]) ?? STAGE_SUMMARIES[STAGE_SUMMARIES.length - 1];
}
