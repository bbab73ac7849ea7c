/**
 * Vertebra segmentation provider
 * Finds existing TotalSegmentator outputs and runs the CLI for missing ones.
 */

import fs from 'fs';
import path from 'path';
import { spawn } from 'child_process';
import { logger } from '../logger';
import type { VolumeLoader } from './nifti-volume-loader';
import type { Volume } from './types';

const SOURCE = 'segmentation-provider';

export interface SegmentationRequest {
  ctDirectory: string;
  outputDirectory: string;
  vertebrae: readonly string[];
  fast?: boolean;
}

export type SegmentationRunner = (command: string, args: string[]) => Promise<void>;

export function vertebraLabel(vertebra: string): string {
  return `vertebrae_${vertebra}`;
}

export function segmentationFileName(vertebra: string): string {
  return `${vertebraLabel(vertebra)}.nii.gz`;
}

/** Label names present in `directory` (file names up to the first dot). */
export async function listAvailableSegmentations(directory: string): Promise<Set<string>> {
  const entries = await fs.promises.readdir(directory);
  return new Set(entries.map(name => name.split('.')[0]));
}

export function totalSegmentatorArgs(request: SegmentationRequest): string[] {
  const args = ['-i', request.ctDirectory, '-o', request.outputDirectory];
  if (request.fast) args.push('--fast');
  args.push('--roi_subset', ...request.vertebrae.map(vertebraLabel));
  return args;
}

export const spawnRunner: SegmentationRunner = (command, args) =>
  new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, { cwd: process.cwd() });
    let stderr = '';

    child.stdout.on('data', (chunk) => { logger.debug(chunk.toString().trim(), SOURCE); });
    child.stderr.on('data', (chunk) => { stderr += chunk.toString(); });
    child.on('error', reject);
    child.on('close', (code) => {
      if (code !== 0) {
        reject(new Error(stderr.trim() || `${command} exited with ${code}`));
        return;
      }
      resolve();
    });
  });

/**
 * Returns false when every requested vertebra is already segmented, true
 * after running TotalSegmentator for the set.
 */
export async function ensureVertebraSegmentations(
  request: SegmentationRequest,
  command: string,
  runner: SegmentationRunner = spawnRunner,
): Promise<boolean> {
  const available = await listAvailableSegmentations(request.outputDirectory);
  const missing = request.vertebrae.filter(v => !available.has(vertebraLabel(v)));
  if (missing.length === 0) {
    logger.info('All segmentations found, no need to run TotalSegmentator', SOURCE);
    return false;
  }

  logger.info(`Segmenting: ${request.vertebrae.join(', ')} (missing ${missing.join(', ')})`, SOURCE);
  await runner(command, totalSegmentatorArgs(request));
  return true;
}

/**
 * Load the mask of each vertebra whose label file exists. Vertebrae without
 * a file are left out of the result.
 */
export async function loadVertebraMasks(
  directory: string,
  vertebrae: readonly string[],
  loader: VolumeLoader,
): Promise<Map<string, Volume>> {
  const masks = new Map<string, Volume>();
  for (const vertebra of vertebrae) {
    const filePath = path.join(directory, segmentationFileName(vertebra));
    if (!fs.existsSync(filePath)) {
      logger.debug(`${vertebra}: no segmentation at ${filePath}`, SOURCE);
      continue;
    }
    logger.debug(filePath, SOURCE);
    masks.set(vertebra, await loader.load(filePath, { flipY: true }));
  }
  return masks;
}
