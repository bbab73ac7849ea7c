/**
 * Chord segmentation
 *
 * Splits a spinal chord mask into per-vertebra sub-volumes. For each vertebra,
 * an axial slice "belongs" to it when that slice holds more than `threshold`
 * of the vertebra's total voxels; the vertebra's range runs from the first to
 * the last such slice, and the chord is confined to that range.
 */

import { logger } from '../logger';
import { GridMismatchError, InvalidThresholdError } from './errors';
import {
  assertVolumeShape,
  confineToSlices,
  countVoxels,
  formatGrid,
  isSameGrid,
  sliceCounts,
} from './volume';
import type {
  ChordSegmentationResult,
  SegmentationOptions,
  SliceRange,
  Verbosity,
  VertebraDiagnostic,
  VertebraMaskSet,
  VertebraOutcome,
  Volume,
} from './types';

const SOURCE = 'chord-segmentation';

export function validateThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold <= 0 || threshold >= 1) {
    throw new InvalidThresholdError(threshold);
  }
}

/**
 * Slice indices whose share of `total` is strictly above `threshold`.
 * Returned in ascending order.
 */
export function qualifyingSlices(counts: readonly number[], total: number, threshold: number): number[] {
  const qualifying: number[] = [];
  if (total <= 0) return qualifying;
  for (let z = 0; z < counts.length; z++) {
    if (counts[z] / total > threshold) qualifying.push(z);
  }
  return qualifying;
}

export function findSliceRange(mask: Volume, threshold: number): SliceRange | null {
  const total = countVoxels(mask);
  const z = qualifyingSlices(sliceCounts(mask), total, threshold);
  if (z.length === 0) return null;
  return { minIndex: z[0], maxIndex: z[z.length - 1] };
}

/**
 * Range detection and, optionally, chord confinement for a single vertebra.
 * Reads its inputs only; safe to run for several vertebrae at once.
 */
export function segmentVertebra(
  vertebra: string,
  mask: Volume,
  chordMask: Volume,
  threshold: number,
  produceConfinedMask: boolean,
): VertebraOutcome {
  const total = countVoxels(mask);
  if (total === 0) {
    return { kind: 'unsegmented', vertebra };
  }

  const z = qualifyingSlices(sliceCounts(mask), total, threshold);
  if (z.length === 0) {
    return { kind: 'no-qualifying-slice', vertebra, totalVoxels: total };
  }

  const range: SliceRange = { minIndex: z[0], maxIndex: z[z.length - 1] };
  if (!produceConfinedMask) {
    return { kind: 'ranged', vertebra, range, confinement: 'not-requested' };
  }

  const confined = confineToSlices(chordMask, range);
  const overlapVoxels = countVoxels(confined);
  if (overlapVoxels === 0) {
    return { kind: 'ranged', vertebra, range, confinement: 'no-overlap' };
  }
  return { kind: 'ranged-with-mask', vertebra, range, mask: confined, overlapVoxels };
}

function validateGrids(chordMask: Volume, vertebraMasks: VertebraMaskSet, vertebraOrder: readonly string[]): void {
  assertVolumeShape(chordMask, 'chord mask');
  for (const vertebra of vertebraOrder) {
    const mask = vertebraMasks.get(vertebra);
    if (!mask) continue;
    assertVolumeShape(mask, `vertebra ${vertebra}`);
    if (!isSameGrid(mask.grid, chordMask.grid)) {
      throw new GridMismatchError(
        `vertebra ${vertebra}: grid ${formatGrid(mask.grid)} does not match chord grid ${formatGrid(chordMask.grid)}`,
        { subject: vertebra, expected: chordMask.grid, actual: mask.grid },
      );
    }
  }
}

function report(outcome: VertebraOutcome, verbosity: Verbosity): void {
  if (verbosity === 0) return;
  switch (outcome.kind) {
    case 'unsegmented':
      logger.info(`${outcome.vertebra}: empty mask, not segmented`, SOURCE);
      break;
    case 'no-qualifying-slice':
      logger.warn(`${outcome.vertebra}: no slice above threshold (${outcome.totalVoxels} voxels)`, SOURCE);
      break;
    case 'ranged':
    case 'ranged-with-mask':
      if (verbosity > 1) {
        logger.info(`${outcome.vertebra}, min z: ${outcome.range.minIndex}; max z: ${outcome.range.maxIndex}`, SOURCE);
      }
      if (outcome.kind === 'ranged' && outcome.confinement === 'no-overlap') {
        logger.info(`${outcome.vertebra}: no overlap between chord and vertebra`, SOURCE);
      }
      break;
  }
}

/**
 * Compute the axial range of every vertebra in `vertebraOrder` and, when
 * `produceConfinedMasks` is set, the chord restricted to each range.
 *
 * Throws InvalidThresholdError or GridMismatchError before any vertebra is
 * processed. Every per-vertebra condition (missing or empty mask, no slice
 * above threshold, no chord overlap) lands in `diagnostics` instead.
 */
export function computeSegments(
  chordMask: Volume,
  vertebraMasks: VertebraMaskSet,
  vertebraOrder: readonly string[],
  threshold: number,
  produceConfinedMasks: boolean,
  options: SegmentationOptions = {},
): ChordSegmentationResult {
  validateThreshold(threshold);
  validateGrids(chordMask, vertebraMasks, vertebraOrder);

  const verbosity = options.verbosity ?? 0;
  const ranges = new Map<string, SliceRange>();
  const confinedMasks = produceConfinedMasks ? new Map<string, Volume>() : null;
  const outcomes: VertebraOutcome[] = [];
  const diagnostics: VertebraDiagnostic[] = [];

  for (const vertebra of vertebraOrder) {
    const mask = vertebraMasks.get(vertebra);
    if (!mask) {
      diagnostics.push({ vertebra, condition: 'missing-mask' });
      if (verbosity > 0) logger.info(`${vertebra}: no mask provided, skipped`, SOURCE);
      continue;
    }

    const outcome = segmentVertebra(vertebra, mask, chordMask, threshold, produceConfinedMasks);
    outcomes.push(outcome);
    report(outcome, verbosity);

    switch (outcome.kind) {
      case 'unsegmented':
        diagnostics.push({ vertebra, condition: 'unsegmented' });
        break;
      case 'no-qualifying-slice':
        diagnostics.push({ vertebra, condition: 'no-qualifying-slice' });
        break;
      case 'ranged':
        ranges.set(vertebra, outcome.range);
        if (outcome.confinement === 'no-overlap') {
          diagnostics.push({ vertebra, condition: 'no-overlap' });
        }
        break;
      case 'ranged-with-mask':
        ranges.set(vertebra, outcome.range);
        confinedMasks?.set(vertebra, outcome.mask);
        break;
    }
  }

  return { ranges, confinedMasks, outcomes, diagnostics };
}
