/**
 * Chord cutter
 * One job: a CT directory, its chord mask and vertebra segmentations, cut
 * into per-vertebra chord segments and optionally saved as an RT Structure Set.
 */

import fs from 'fs';
import { logger } from '../logger';
import { RTStructureWriter } from '../rt-structure-writer';
import { computeSegments, validateThreshold } from './chord-segmentation';
import { DEFAULT_TOTALSEGMENTATOR_BIN } from './config';
import { readCtSeriesGeometry, type CtSeriesGeometry } from './ct-series-geometry';
import { ConfigurationError } from './errors';
import { niftiVolumeLoader, type VolumeLoader } from './nifti-volume-loader';
import { assembleStructures, exportStructureSet } from './output-assembler';
import {
  ensureVertebraSegmentations,
  loadVertebraMasks,
  spawnRunner,
  type SegmentationRunner,
} from './segmentation-provider';
import { VertebraeRegistry } from './vertebrae-registry';
import type {
  ChordSegmentationResult,
  StructureSetWriteResult,
  StructureSetWriter,
  Verbosity,
} from './types';

export interface ChordCutterPaths {
  dicomDirectory: string;
  segmentationDirectory: string;
  /** Chord mask on the CT grid; see `chordMaskFlipY` for TotalSegmentator outputs. */
  chordMaskPath: string;
  structureSetDirectory?: string;
}

export interface ChordCutterDependencies {
  loader?: VolumeLoader;
  readGeometry?: (directory: string) => CtSeriesGeometry;
  createWriter?: (geometry: CtSeriesGeometry) => StructureSetWriter;
  runner?: SegmentationRunner;
}

export interface ChordCutterSettings {
  roiNamePrefix?: string;
  structureSetFileName?: string;
  totalSegmentatorBin?: string;
  /** Mirror the chord mask rows like the vertebra masks (set when the chord comes from TotalSegmentator). */
  chordMaskFlipY?: boolean;
}

export interface CutChordOptions {
  saveAsStructureSet?: boolean;
  verbosity?: Verbosity;
}

export interface CutChordResult extends ChordSegmentationResult {
  structureSet: StructureSetWriteResult | null;
}

function assertDirectory(directory: string, label: string) {
  if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
    throw new ConfigurationError(`Invalid ${label} directory: ${directory}`, { directory });
  }
}

export class ChordCutter {
  readonly dicomDirectory: string;
  readonly segmentationDirectory: string;
  readonly chordMaskPath: string;
  private _structureSetDirectory: string | null = null;
  private readonly registry = new VertebraeRegistry();

  private readonly loader: VolumeLoader;
  private readonly readGeometry: (directory: string) => CtSeriesGeometry;
  private readonly createWriter: (geometry: CtSeriesGeometry) => StructureSetWriter;
  private readonly runner: SegmentationRunner;

  constructor(
    paths: ChordCutterPaths,
    private readonly settings: ChordCutterSettings = {},
    deps: ChordCutterDependencies = {},
  ) {
    assertDirectory(paths.dicomDirectory, 'DICOM input');
    assertDirectory(paths.segmentationDirectory, 'segmentation');
    this.dicomDirectory = paths.dicomDirectory;
    this.segmentationDirectory = paths.segmentationDirectory;
    this.chordMaskPath = paths.chordMaskPath;
    if (paths.structureSetDirectory) this.structureSetDirectory = paths.structureSetDirectory;

    this.loader = deps.loader ?? niftiVolumeLoader;
    this.readGeometry = deps.readGeometry ?? readCtSeriesGeometry;
    this.createWriter = deps.createWriter ?? (geometry => new RTStructureWriter(geometry, { fileName: settings.structureSetFileName }));
    this.runner = deps.runner ?? spawnRunner;
  }

  get structureSetDirectory(): string | null {
    return this._structureSetDirectory;
  }

  set structureSetDirectory(directory: string | null) {
    if (directory !== null) assertDirectory(directory, 'structure set output');
    this._structureSetDirectory = directory;
  }

  get vertebrae(): string[] {
    return this.registry.list();
  }

  addVertebra(vertebra: string): void {
    this.registry.add(vertebra);
  }

  addGroup(group: string): void {
    this.registry.addGroup(group);
  }

  clearVertebrae(): void {
    this.registry.clear();
  }

  /** Run TotalSegmentator for the registered vertebrae if any output is missing. */
  segmentVertebrae(options: { fast?: boolean } = {}): Promise<boolean> {
    return ensureVertebraSegmentations(
      {
        ctDirectory: this.dicomDirectory,
        outputDirectory: this.segmentationDirectory,
        vertebrae: this.vertebrae,
        fast: options.fast,
      },
      this.settings.totalSegmentatorBin ?? DEFAULT_TOTALSEGMENTATOR_BIN,
      this.runner,
    );
  }

  async cutChord(threshold: number, options: CutChordOptions = {}): Promise<CutChordResult> {
    validateThreshold(threshold);
    const saveAsStructureSet = options.saveAsStructureSet ?? false;
    const destination = this._structureSetDirectory;
    if (saveAsStructureSet && destination === null) {
      throw new ConfigurationError('A structure set directory is required to save the chord segments');
    }

    const order = this.vertebrae;
    const chordMask = await this.loader.load(this.chordMaskPath, { flipY: this.settings.chordMaskFlipY ?? false });
    const vertebraMasks = await loadVertebraMasks(this.segmentationDirectory, order, this.loader);

    const result = computeSegments(chordMask, vertebraMasks, order, threshold, saveAsStructureSet, {
      verbosity: options.verbosity,
    });

    let structureSet: StructureSetWriteResult | null = null;
    if (saveAsStructureSet && destination !== null && result.confinedMasks) {
      const structures = assembleStructures(result.confinedMasks, order, { namePrefix: this.settings.roiNamePrefix });
      const writer = this.createWriter(this.readGeometry(this.dicomDirectory));
      structureSet = await exportStructureSet(writer, structures, destination);
    }

    logger.info(`Chord cut: ${result.ranges.size}/${order.length} vertebrae ranged`, 'chord-cutter');
    return { ...result, structureSet };
  }
}
