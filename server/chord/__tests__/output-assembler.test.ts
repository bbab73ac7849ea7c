/**
 * Output Assembler Tests
 *
 * Confined chord masks to named boolean ROIs, in registry order.
 */

import { vi } from 'vitest';
import {
  assembleStructures,
  exportStructureSet,
  roiColor,
  roiName,
  toBooleanOccupancy,
} from '../output-assembler';
import { makeGrid } from '../volume';
import type { StructureMask, StructureSetWriter, Volume } from '../types';
import { slab } from './fixtures';

describe('toBooleanOccupancy', () => {
  it('maps every non-zero voxel to 1', () => {
    const volume: Volume = { values: new Uint8Array([0, 2, 255, 1, 0, 0, 7, 0]), grid: makeGrid(2, 2, 2) };
    expect(Array.from(toBooleanOccupancy(volume))).toEqual([0, 1, 1, 1, 0, 0, 1, 0]);
  });
});

describe('assembleStructures', () => {
  const grid = makeGrid(2, 2, 6);
  const masks = new Map<string, Volume>([
    ['T2', slab(grid, 3, 4)],
    ['T1', slab(grid, 0, 1)],
  ]);

  it('follows the registry order and skips vertebrae without a mask', () => {
    const structures = assembleStructures(masks, ['T1', 'T5', 'T2']);
    expect(structures.map(s => s.name)).toEqual(['vertebrae_T1', 'vertebrae_T2']);
    expect(structures.map(s => s.vertebra)).toEqual(['T1', 'T2']);
  });

  it('colours by output position', () => {
    const structures = assembleStructures(masks, ['T1', 'T5', 'T2']);
    expect(structures[0].color).toEqual([255, 0, 0]);
    expect(structures[1].color).toEqual([0, 255, 0]);
  });

  it('applies a custom name prefix', () => {
    const structures = assembleStructures(masks, ['T2'], { namePrefix: 'chord_' });
    expect(structures).toHaveLength(1);
    expect(structures[0].name).toBe('chord_T2');
    expect(structures[0].grid).toBe(grid);
    expect(structures[0].occupancy.reduce((a, b) => a + b, 0)).toBe(8);
  });

  it('returns nothing for an empty mask set', () => {
    expect(assembleStructures(new Map(), ['T1'])).toEqual([]);
  });
});

describe('roi naming', () => {
  it('prefixes with the segmentation label by default', () => {
    expect(roiName('C4')).toBe('vertebrae_C4');
  });

  it('cycles the palette', () => {
    expect(roiColor(10)).toEqual(roiColor(0));
  });
});

describe('exportStructureSet', () => {
  it('hands the structures and destination to the writer', async () => {
    const write = vi.fn(async (structures: StructureMask[], _destination: string) => ({
      filePath: '/out/vertebrae.dcm',
      seriesInstanceUID: '1.2',
      sopInstanceUID: '1.3',
      structureCount: structures.length,
    }));
    const writer: StructureSetWriter = { write };
    const result = await exportStructureSet(writer, [], '/out');
    expect(write).toHaveBeenCalledWith([], '/out');
    expect(result.filePath).toBe('/out/vertebrae.dcm');
  });
});
