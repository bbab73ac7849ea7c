/**
 * Turns confined chord masks into named ROIs and hands them to a structure-set writer.
 */

import type { RGB, StructureMask, StructureSetWriteResult, StructureSetWriter, Volume } from './types';

export const DEFAULT_ROI_NAME_PREFIX = 'vertebrae_';

// Cycled by ROI position
const ROI_PALETTE: RGB[] = [
  [255, 0, 0],
  [0, 255, 0],
  [0, 0, 255],
  [255, 255, 0],
  [255, 0, 255],
  [0, 255, 255],
  [255, 128, 0],
  [128, 0, 255],
  [0, 128, 255],
  [255, 0, 128],
];

export interface AssembleOptions {
  namePrefix?: string;
}

export function roiName(vertebra: string, prefix = DEFAULT_ROI_NAME_PREFIX): string {
  return `${prefix}${vertebra}`;
}

export function roiColor(position: number): RGB {
  const [r, g, b] = ROI_PALETTE[position % ROI_PALETTE.length];
  return [r, g, b];
}

export function toBooleanOccupancy(volume: Volume): Uint8Array {
  const out = new Uint8Array(volume.values.length);
  for (let i = 0; i < out.length; i++) {
    out[i] = volume.values[i] > 0 ? 1 : 0;
  }
  return out;
}

/**
 * One ROI per vertebra that has a confined mask, following `vertebraOrder`.
 * Vertebrae without a confined mask are left out.
 */
export function assembleStructures(
  confinedMasks: ReadonlyMap<string, Volume>,
  vertebraOrder: readonly string[],
  options: AssembleOptions = {},
): StructureMask[] {
  const structures: StructureMask[] = [];
  for (const vertebra of vertebraOrder) {
    const mask = confinedMasks.get(vertebra);
    if (!mask) continue;
    structures.push({
      name: roiName(vertebra, options.namePrefix),
      vertebra,
      color: roiColor(structures.length),
      grid: mask.grid,
      occupancy: toBooleanOccupancy(mask),
    });
  }
  return structures;
}

export function exportStructureSet(
  writer: StructureSetWriter,
  structures: StructureMask[],
  destination: string,
): Promise<StructureSetWriteResult> {
  return writer.write(structures, destination);
}
