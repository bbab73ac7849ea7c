/**
 * Chord segmentation API
 * Express routes for cutting a chord mask into per-vertebra segments.
 */

import { Router, Request, Response } from 'express';
import { chordCutRequestSchema, type ChordCutRequest, type ChordCutResponse } from '@shared/schema';
import { logger } from './logger';
import { ChordCutter, type ChordCutterDependencies } from './chord/chord-cutter';
import { loadChordConfig, type ChordConfig } from './chord/config';
import { validateThreshold } from './chord/chord-segmentation';
import { isPreconditionError } from './chord/errors';
import { VertebraeRegistry } from './chord/vertebrae-registry';

export async function runChordCutRequest(
  request: ChordCutRequest,
  config: ChordConfig,
  deps: ChordCutterDependencies = {},
): Promise<ChordCutResponse> {
  const cutter = new ChordCutter(
    {
      dicomDirectory: request.dicomDirectory,
      segmentationDirectory: request.segmentationDirectory,
      chordMaskPath: request.chordMaskPath,
      structureSetDirectory: request.structureSetDirectory,
    },
    {
      roiNamePrefix: config.roiNamePrefix,
      structureSetFileName: config.structureSetFileName,
      totalSegmentatorBin: config.totalSegmentatorBin,
      chordMaskFlipY: config.chordMaskFlipY,
    },
    deps,
  );

  for (const group of request.groups) cutter.addGroup(group);
  for (const vertebra of request.vertebrae) cutter.addVertebra(vertebra);

  const threshold = request.threshold ?? config.threshold;
  validateThreshold(threshold);

  if (request.segmentMissing) {
    await cutter.segmentVertebrae({ fast: request.fast || config.totalSegmentatorFast });
  }

  const result = await cutter.cutChord(threshold, {
    saveAsStructureSet: request.saveAsStructureSet,
    verbosity: request.verbosity,
  });

  return {
    ranges: [...result.ranges].map(([vertebra, range]) => ({ vertebra, ...range })),
    diagnostics: result.diagnostics,
    structures: result.confinedMasks ? [...result.confinedMasks.keys()] : [],
    structureSetPath: result.structureSet?.filePath ?? null,
  };
}

export function createChordSegmentationRouter(deps: ChordCutterDependencies = {}): Router {
  const router = Router();

  /**
   * Recognised vertebrae groups and their members
   */
  router.get('/chord-segmentation/groups', (_req: Request, res: Response) => {
    res.json(Object.fromEntries(VertebraeRegistry.groups().map(g => [g, VertebraeRegistry.groupMembers(g)])));
  });

  /**
   * Cut the chord mask
   */
  router.post('/chord-segmentation/cut', async (req: Request, res: Response) => {
    const parsed = chordCutRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues });
    }

    try {
      const response = await runChordCutRequest(parsed.data, loadChordConfig(), deps);
      res.json(response);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (isPreconditionError(error)) {
        return res.status(400).json({ error: message, code: error.code });
      }
      logger.error(`Chord cut failed: ${message}`, 'chord-segmentation-api');
      res.status(500).json({ error: message || 'Chord cut failed' });
    }
  });

  return router;
}

export default createChordSegmentationRouter;
