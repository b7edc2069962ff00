// types.ts
// Shared domain types for the cardiomyocyte timelapse engine.

export type RGB = readonly [number, number, number];
export type RGBA = readonly [number, number, number, number];

export type CellShape =
  | 'round'
  | 'slightly_elongated'
  | 'elongated'
  | 'well_elongated'
  | 'fully_elongated'
  | 'fragmenting'
  | 'fragmented';

export const ELONGATED_SHAPES: readonly CellShape[] = [
  'slightly_elongated',
  'elongated',
  'well_elongated',
  'fully_elongated',
];

export interface CharacteristicRecord {
  readonly title: string;
  readonly shape: CellShape;
  readonly elongation: number; // >= 1
  readonly alignment: number;
  readonly connection: number;
  readonly sarcomere_organization: number;
  readonly beating_strength: number;
  readonly beating_sync: number;
  readonly color_base: RGB;
  readonly nucleus_size: number;
  readonly debris_level: number;
  readonly cell_count: number;
  readonly cell_clustering: number;
}

/** Fields blended linearly between anchors. */
export type ContinuousField = Exclude<keyof CharacteristicRecord, 'title' | 'shape' | 'color_base'>;

export type AnchorDay = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

export type XY = { x: number; y: number };

export interface FrameSize {
  width: number;
  height: number;
}

export interface ClusterLayout {
  readonly centers: readonly XY[];
  /** Unordered cluster pairs as [i, j] with i < j. */
  readonly connections: ReadonlyArray<readonly [number, number]>;
}

export interface CellPassReport {
  targetCells: number;
  cellsPlaced: number;
  batches: number;
  bodies: number;
  fragmentedCells: number;
  fragments: number;
  nuclei: number;
  sarcomereLines: number;
  brokenSarcomereLines: number;
}

export interface FrameReport {
  clusters: number;
  connections: number;
  cells: CellPassReport;
  debris: number;
  beatPulse: number;
}

export interface RasterFrame {
  readonly width: number;
  readonly height: number;
  /** RGBA, row-major. Treat as read-only once the frame is returned. */
  readonly pixels: Uint8ClampedArray;
  readonly timePoint: number;
  readonly day: number;
  readonly title: string;
  readonly shape: CellShape;
  readonly report: Readonly<FrameReport>;
}

export type AnimationSpeed = 'slow' | 'medium' | 'fast';

export type DayRange = readonly [min: number, max: number];

export interface AnimationRequest {
  dayRange: DayRange;
  speed: AnimationSpeed;
}

export interface AnimationArtifact {
  readonly frames: readonly RasterFrame[];
  readonly frameDurationMs: number;
  readonly loop: true;
  readonly dayRange: DayRange;
  readonly speed: AnimationSpeed;
}

export interface AnimationProgress {
  completed: number;
  total: number;
  fraction: number;
  day: number;
}

export type ProgressListener = (progress: AnimationProgress) => void;
