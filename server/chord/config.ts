import { z } from 'zod';
import { ConfigurationError } from './errors';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

export const DEFAULT_TOTALSEGMENTATOR_BIN = 'TotalSegmentator';

export const chordConfigSchema = z.object({
  CHORD_THRESHOLD: z.coerce.number().gt(0).lt(1).default(0.02),
  TOTALSEGMENTATOR_BIN: z.string().min(1).default(DEFAULT_TOTALSEGMENTATOR_BIN),
  TOTALSEGMENTATOR_FAST: booleanFlag.default('false'),
  CHORD_MASK_FLIP_Y: booleanFlag.default('false'),
  STRUCTURE_SET_FILENAME: z.string().min(1).default('vertebrae.dcm'),
  ROI_NAME_PREFIX: z.string().default('vertebrae_'),
  PORT: z.coerce.number().int().positive().default(5000),
});

export interface ChordConfig {
  threshold: number;
  totalSegmentatorBin: string;
  totalSegmentatorFast: boolean;
  chordMaskFlipY: boolean;
  structureSetFileName: string;
  roiNamePrefix: string;
  port: number;
}

export function loadChordConfig(env: NodeJS.ProcessEnv = process.env): ChordConfig {
  const parsed = chordConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid environment configuration', parsed.error.issues);
  }
  const c = parsed.data;
  return {
    threshold: c.CHORD_THRESHOLD,
    totalSegmentatorBin: c.TOTALSEGMENTATOR_BIN,
    totalSegmentatorFast: c.TOTALSEGMENTATOR_FAST,
    chordMaskFlipY: c.CHORD_MASK_FLIP_Y,
    structureSetFileName: c.STRUCTURE_SET_FILENAME,
    roiNamePrefix: c.ROI_NAME_PREFIX,
    port: c.PORT,
  };
}
