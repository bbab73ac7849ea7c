import { GridMismatchError } from './errors';
import type { Grid, SliceRange, Volume } from './types';

export function voxelIndex(x: number, y: number, z: number, grid: Grid): number {
  return x + y * grid.xSize + z * grid.xSize * grid.ySize;
}

export function voxelCount(grid: Grid): number {
  return grid.xSize * grid.ySize * grid.zSize;
}

export function makeGrid(xSize: number, ySize: number, zSize: number, spacing?: Partial<Pick<Grid, 'xRes' | 'yRes' | 'zRes' | 'origin'>>): Grid {
  return {
    xSize,
    ySize,
    zSize,
    xRes: spacing?.xRes ?? 1,
    yRes: spacing?.yRes ?? 1,
    zRes: spacing?.zRes ?? 1,
    origin: spacing?.origin ? { ...spacing.origin } : { x: 0, y: 0, z: 0 },
  };
}

export function createVolume(grid: Grid, fill: 0 | 1 = 0): Volume {
  const values = new Uint8Array(voxelCount(grid));
  if (fill) values.fill(1);
  return { values, grid };
}

export function countVoxels(volume: Volume): number {
  const v = volume.values;
  let n = 0;
  for (let i = 0; i < v.length; i++) {
    if (v[i] !== 0) n++;
  }
  return n;
}

/** Occupied voxel count of every axial slice, summed over x and y. */
export function sliceCounts(volume: Volume): number[] {
  const { xSize, ySize, zSize } = volume.grid;
  const sliceSize = xSize * ySize;
  const counts = new Array<number>(zSize).fill(0);
  const v = volume.values;
  for (let z = 0; z < zSize; z++) {
    const start = z * sliceSize;
    const end = start + sliceSize;
    let n = 0;
    for (let i = start; i < end; i++) {
      if (v[i] !== 0) n++;
    }
    counts[z] = n;
  }
  return counts;
}

/** Copy of `volume` with every slice outside [minIndex, maxIndex] zeroed. */
export function confineToSlices(volume: Volume, range: SliceRange): Volume {
  const { xSize, ySize, zSize } = volume.grid;
  const sliceSize = xSize * ySize;
  const out = new Uint8Array(volume.values.length);
  const lo = Math.max(0, range.minIndex);
  const hi = Math.min(zSize - 1, range.maxIndex);
  if (lo <= hi) {
    out.set(volume.values.subarray(lo * sliceSize, (hi + 1) * sliceSize), lo * sliceSize);
  }
  return { values: out, grid: volume.grid };
}

export function isSameGrid(a: Grid, b: Grid): boolean {
  return a.xSize === b.xSize && a.ySize === b.ySize && a.zSize === b.zSize;
}

export function assertVolumeShape(volume: Volume, subject: string): void {
  const expected = voxelCount(volume.grid);
  if (volume.values.length !== expected) {
    throw new GridMismatchError(
      `${subject}: ${volume.values.length} values for a ${volume.grid.xSize}x${volume.grid.ySize}x${volume.grid.zSize} grid (${expected} expected)`,
      { subject, actual: volume.grid },
    );
  }
}

export function formatGrid(grid: Grid): string {
  return `${grid.xSize}x${grid.ySize}x${grid.zSize}`;
}
