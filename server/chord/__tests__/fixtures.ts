import { createVolume, voxelIndex } from '../volume';
import type { Grid, Volume } from '../types';

export function volumeWhere(grid: Grid, inside: (x: number, y: number, z: number) => boolean): Volume {
  const volume = createVolume(grid);
  for (let z = 0; z < grid.zSize; z++) {
    for (let y = 0; y < grid.ySize; y++) {
      for (let x = 0; x < grid.xSize; x++) {
        if (inside(x, y, z)) volume.values[voxelIndex(x, y, z, grid)] = 1;
      }
    }
  }
  return volume;
}

/** Whole axial slices [from, to] occupied. */
export function slab(grid: Grid, from: number, to: number): Volume {
  return volumeWhere(grid, (_x, _y, z) => z >= from && z <= to);
}

/** counts[z] voxels set at the start of slice z (row-major). */
export function maskWithSliceCounts(grid: Grid, counts: number[]): Volume {
  const volume = createVolume(grid);
  const sliceSize = grid.xSize * grid.ySize;
  counts.forEach((count, z) => {
    volume.values.fill(1, z * sliceSize, z * sliceSize + count);
  });
  return volume;
}

export function occupiedSlices(volume: Volume): number[] {
  const sliceSize = volume.grid.xSize * volume.grid.ySize;
  const slices: number[] = [];
  for (let z = 0; z < volume.grid.zSize; z++) {
    if (volume.values.subarray(z * sliceSize, (z + 1) * sliceSize).some(v => v !== 0)) slices.push(z);
  }
  return slices;
}
