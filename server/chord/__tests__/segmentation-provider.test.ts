import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  ensureVertebraSegmentations,
  listAvailableSegmentations,
  loadVertebraMasks,
  segmentationFileName,
  totalSegmentatorArgs,
  type SegmentationRunner,
} from '../segmentation-provider';
import type { VolumeLoader } from '../nifti-volume-loader';
import { createVolume, makeGrid } from '../volume';

describe('segmentation provider', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'segmentations-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  async function touch(...names: string[]) {
    for (const name of names) await fs.promises.writeFile(path.join(dir, name), '');
  }

  it('names label files after the vertebra', () => {
    expect(segmentationFileName('L3')).toBe('vertebrae_L3.nii.gz');
  });

  it('lists labels present in the output directory', async () => {
    await touch('vertebrae_T1.nii.gz', 'spinal_cord.nii.gz');
    expect(await listAvailableSegmentations(dir)).toEqual(new Set(['vertebrae_T1', 'spinal_cord']));
  });

  it('builds the TotalSegmentator command line', () => {
    expect(totalSegmentatorArgs({ ctDirectory: '/ct', outputDirectory: '/seg', vertebrae: ['C1', 'C2'], fast: true }))
      .toEqual(['-i', '/ct', '-o', '/seg', '--fast', '--roi_subset', 'vertebrae_C1', 'vertebrae_C2']);
    expect(totalSegmentatorArgs({ ctDirectory: '/ct', outputDirectory: '/seg', vertebrae: ['L5'] }))
      .toEqual(['-i', '/ct', '-o', '/seg', '--roi_subset', 'vertebrae_L5']);
  });

  describe('ensureVertebraSegmentations', () => {
    it('does not run when every label exists', async () => {
      await touch('vertebrae_T1.nii.gz', 'vertebrae_T2.nii.gz');
      const runner = vi.fn(async (_command: string, _args: string[]) => {});

      const ran = await ensureVertebraSegmentations(
        { ctDirectory: '/ct', outputDirectory: dir, vertebrae: ['T1', 'T2'] },
        'TotalSegmentator',
        runner,
      );

      expect(ran).toBe(false);
      expect(runner).not.toHaveBeenCalled();
    });

    it('runs the whole set when any label is missing', async () => {
      await touch('vertebrae_T1.nii.gz');
      const runner = vi.fn(async (_command: string, _args: string[]) => {});

      const ran = await ensureVertebraSegmentations(
        { ctDirectory: '/ct', outputDirectory: dir, vertebrae: ['T1', 'T2'] },
        '/opt/bin/TotalSegmentator',
        runner,
      );

      expect(ran).toBe(true);
      expect(runner).toHaveBeenCalledWith('/opt/bin/TotalSegmentator', [
        '-i', '/ct', '-o', dir, '--roi_subset', 'vertebrae_T1', 'vertebrae_T2',
      ]);
    });

    it('propagates runner failures', async () => {
      const runner: SegmentationRunner = async () => { throw new Error('TotalSegmentator exited with 1'); };
      await expect(ensureVertebraSegmentations(
        { ctDirectory: '/ct', outputDirectory: dir, vertebrae: ['C3'] },
        'TotalSegmentator',
        runner,
      )).rejects.toThrow('TotalSegmentator exited with 1');
    });
  });

  describe('loadVertebraMasks', () => {
    it('loads existing labels with rows mirrored and skips the rest', async () => {
      await touch('vertebrae_C1.nii.gz');
      const volume = createVolume(makeGrid(2, 2, 2), 1);
      const loader: VolumeLoader = { load: vi.fn(async () => volume) };

      const masks = await loadVertebraMasks(dir, ['C1', 'C2'], loader);

      expect([...masks.keys()]).toEqual(['C1']);
      expect(masks.get('C1')).toBe(volume);
      expect(loader.load).toHaveBeenCalledWith(path.join(dir, 'vertebrae_C1.nii.gz'), { flipY: true });
    });
  });
});
