
export interface Grid {
  xSize: number;
  ySize: number;
  zSize: number; // axial slices
  xRes: number; // mm per voxel in X (columns)
  yRes: number; // mm per voxel in Y (rows)
  zRes: number; // mm per slice in Z
  origin: { x: number; y: number; z: number };
}

/** Binary occupancy volume; any non-zero value is "in". */
export interface Volume {
  readonly values: Uint8Array; // length = x*y*z
  readonly grid: Grid;
}

export type VertebraMaskSet = ReadonlyMap<string, Volume>;

/** Inclusive axial slice range. */
export interface SliceRange {
  minIndex: number;
  maxIndex: number;
}

export type VertebraOutcome =
  | { kind: 'unsegmented'; vertebra: string }
  | { kind: 'no-qualifying-slice'; vertebra: string; totalVoxels: number }
  | {
      kind: 'ranged';
      vertebra: string;
      range: SliceRange;
      confinement: 'not-requested' | 'no-overlap';
    }
  | { kind: 'ranged-with-mask'; vertebra: string; range: SliceRange; mask: Volume; overlapVoxels: number };

export type VertebraCondition = 'missing-mask' | 'unsegmented' | 'no-qualifying-slice' | 'no-overlap';

export interface VertebraDiagnostic {
  vertebra: string;
  condition: VertebraCondition;
}

/** 0 = silent, 1 = per-vertebra conditions, 2 = every computed range as well */
export type Verbosity = 0 | 1 | 2;

export interface SegmentationOptions {
  verbosity?: Verbosity;
}

export interface ChordSegmentationResult {
  ranges: Map<string, SliceRange>;
  /** null when confined masks were not requested */
  confinedMasks: Map<string, Volume> | null;
  outcomes: VertebraOutcome[];
  diagnostics: VertebraDiagnostic[];
}

export type RGB = [number, number, number];

/** One named ROI ready for a structure-set writer. */
export interface StructureMask {
  name: string;
  vertebra: string;
  color: RGB;
  grid: Grid;
  occupancy: Uint8Array; // strictly 0/1
}

export interface StructureSetWriteResult {
  filePath: string;
  seriesInstanceUID: string;
  sopInstanceUID: string;
  structureCount: number;
}

export interface StructureSetWriter {
  write(structures: StructureMask[], destination: string): Promise<StructureSetWriteResult>;
}
