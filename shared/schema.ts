import { z } from "zod";

export const VERTEBRAE_GROUP_NAMES = ["cervical", "thorax", "lumbar"] as const;

export type VertebraeGroup = (typeof VERTEBRAE_GROUP_NAMES)[number];

export const verbositySchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const chordCutRequestSchema = z
  .object({
    dicomDirectory: z.string().min(1),
    segmentationDirectory: z.string().min(1),
    chordMaskPath: z.string().min(1),
    structureSetDirectory: z.string().min(1).optional(),
    groups: z.array(z.enum(VERTEBRAE_GROUP_NAMES)).default([]),
    vertebrae: z.array(z.string().min(1)).default([]),
    // 0 < threshold < 1 is enforced by computeSegments (InvalidThresholdError)
    threshold: z.number().optional(),
    saveAsStructureSet: z.boolean().default(false),
    segmentMissing: z.boolean().default(false),
    fast: z.boolean().default(false),
    verbosity: verbositySchema.default(0),
  })
  .refine(body => body.groups.length > 0 || body.vertebrae.length > 0, {
    message: "At least one vertebrae group or vertebra is required",
    path: ["vertebrae"],
  });

export type ChordCutRequest = z.infer<typeof chordCutRequestSchema>;

export interface SliceRangeEntry {
  vertebra: string;
  minIndex: number;
  maxIndex: number;
}

export interface ChordCutResponse {
  ranges: SliceRangeEntry[];
  diagnostics: { vertebra: string; condition: string }[];
  structures: string[];
  structureSetPath: string | null;
}
