/*
  Cut a chord mask into per-vertebra segments.
  Usage:
    npx tsx scripts/cut-chord.ts --dicom <ct dir> --seg <segmentation dir> --chord <chord.nii.gz>
      [--groups cervical,thorax] [--vertebrae T1,T2] [--threshold 0.02]
      [--rs-out <dir>] [--segment] [--fast] [--verbose 0|1|2]
*/
import 'dotenv/config';
import { chordCutRequestSchema } from '../shared/schema';
import { runChordCutRequest } from '../server/chord-segmentation-api';
import { loadChordConfig } from '../server/chord/config';

async function main() {
  const args = process.argv.slice(2);
  const getArg = (k: string) => { const i = args.indexOf(k); return i > -1 ? args[i+1] : undefined; };
  const list = (v: string | undefined) => (v ? v.split(',').map(s => s.trim()).filter(Boolean) : []);

  const threshold = getArg('--threshold');
  const rsOut = getArg('--rs-out');
  const parsed = chordCutRequestSchema.safeParse({
    dicomDirectory: getArg('--dicom'),
    segmentationDirectory: getArg('--seg'),
    chordMaskPath: getArg('--chord'),
    structureSetDirectory: rsOut,
    groups: list(getArg('--groups')),
    vertebrae: list(getArg('--vertebrae')),
    threshold: threshold === undefined ? undefined : Number(threshold),
    saveAsStructureSet: rsOut !== undefined,
    segmentMissing: args.includes('--segment'),
    fast: args.includes('--fast'),
    verbosity: Number(getArg('--verbose') ?? 1),
  });
  if (!parsed.success) {
    console.error(JSON.stringify({ ok: false, issues: parsed.error.issues }, null, 2));
    process.exitCode = 1;
    return;
  }

  const started = Date.now();
  const response = await runChordCutRequest(parsed.data, loadChordConfig());
  console.log(JSON.stringify({ ok: true, elapsedMs: Date.now() - started, ...response }, null, 2));
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
