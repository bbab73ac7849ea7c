/**
 * Volume Primitive Tests
 *
 * Voxel indexing, counting, per-slice histograms and axial confinement.
 */

import { GridMismatchError } from '../errors';
import {
  assertVolumeShape,
  confineToSlices,
  countVoxels,
  createVolume,
  isSameGrid,
  makeGrid,
  sliceCounts,
  voxelIndex,
} from '../volume';
import { maskWithSliceCounts, occupiedSlices, slab, volumeWhere } from './fixtures';

describe('voxelIndex', () => {
  it('runs x fastest, then y, then z', () => {
    const grid = makeGrid(4, 3, 2);
    expect(voxelIndex(0, 0, 0, grid)).toBe(0);
    expect(voxelIndex(1, 0, 0, grid)).toBe(1);
    expect(voxelIndex(0, 1, 0, grid)).toBe(4);
    expect(voxelIndex(0, 0, 1, grid)).toBe(12);
    expect(voxelIndex(3, 2, 1, grid)).toBe(23);
  });
});

describe('countVoxels and sliceCounts', () => {
  it('counts every non-zero voxel', () => {
    const grid = makeGrid(2, 2, 2);
    const volume = { values: new Uint8Array([0, 1, 255, 0, 0, 0, 3, 0]), grid };
    expect(countVoxels(volume)).toBe(3);
  });

  it('sums each axial slice over x and y', () => {
    const grid = makeGrid(3, 3, 4);
    const volume = maskWithSliceCounts(grid, [0, 9, 2, 5]);
    expect(sliceCounts(volume)).toEqual([0, 9, 2, 5]);
    expect(countVoxels(volume)).toBe(16);
  });

  it('is all zeros for an empty volume', () => {
    expect(sliceCounts(createVolume(makeGrid(2, 2, 3)))).toEqual([0, 0, 0]);
  });
});

describe('confineToSlices', () => {
  it('keeps values inside the inclusive range and zeroes the rest', () => {
    const grid = makeGrid(2, 2, 6);
    const chord = volumeWhere(grid, (x, _y, z) => x === 1 && z >= 1);
    const confined = confineToSlices(chord, { minIndex: 2, maxIndex: 4 });

    expect(occupiedSlices(confined)).toEqual([2, 3, 4]);
    expect(countVoxels(confined)).toBe(6);
    for (let z = 2; z <= 4; z++) {
      for (let y = 0; y < 2; y++) {
        for (let x = 0; x < 2; x++) {
          const i = voxelIndex(x, y, z, grid);
          expect(confined.values[i]).toBe(chord.values[i]);
        }
      }
    }
  });

  it('does not modify its input', () => {
    const grid = makeGrid(2, 2, 4);
    const chord = slab(grid, 0, 3);
    confineToSlices(chord, { minIndex: 1, maxIndex: 1 });
    expect(countVoxels(chord)).toBe(16);
  });

  it('clamps a range reaching past the volume', () => {
    const grid = makeGrid(1, 1, 3);
    const chord = slab(grid, 0, 2);
    expect(occupiedSlices(confineToSlices(chord, { minIndex: 2, maxIndex: 9 }))).toEqual([2]);
  });
});

describe('grid checks', () => {
  it('compares sizes only', () => {
    expect(isSameGrid(makeGrid(2, 3, 4), makeGrid(2, 3, 4, { xRes: 0.5, zRes: 3 }))).toBe(true);
    expect(isSameGrid(makeGrid(2, 3, 4), makeGrid(3, 2, 4))).toBe(false);
  });

  it('rejects a volume whose buffer does not fit its grid', () => {
    const volume = { values: new Uint8Array(7), grid: makeGrid(2, 2, 2) };
    expect(() => assertVolumeShape(volume, 'chord mask')).toThrow(GridMismatchError);
    expect(() => assertVolumeShape(volume, 'chord mask')).toThrow(
      'chord mask: 7 values for a 2x2x2 grid (8 expected)',
    );
  });
});
