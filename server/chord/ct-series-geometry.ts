/**
 * CT series geometry
 * Reads the slice geometry and UIDs an RT Structure Set must reference.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dicomParser from 'dicom-parser';
import { logger } from '../logger';
import { SeriesLoadError } from './errors';

type Vector3 = [number, number, number];
type Vector6 = [number, number, number, number, number, number];

export interface CtSlice {
  sopInstanceUID: string;
  sopClassUID: string;
  imagePositionPatient: Vector3;
}

export interface CtSeriesGeometry {
  studyInstanceUID: string;
  seriesInstanceUID: string;
  frameOfReferenceUID: string;
  patientId?: string;
  patientName?: string;
  rows: number;
  columns: number;
  pixelSpacing: [number, number]; // [row spacing, column spacing]
  imageOrientationPatient: Vector6;
  slices: CtSlice[]; // ordered along the slice normal, index = axial z
}

const CT_IMAGE_STORAGE = '1.2.840.10008.5.1.4.1.1.2';

function parseNumbers(value: string | undefined): number[] {
  if (!value) return [];
  return value.split('\\').map(v => parseFloat(v)).filter(v => Number.isFinite(v));
}

function toVector3(values: number[]): Vector3 | null {
  return values.length === 3 ? [values[0], values[1], values[2]] : null;
}

function toVector6(values: number[]): Vector6 | null {
  return values.length === 6 ? [values[0], values[1], values[2], values[3], values[4], values[5]] : null;
}

/** Slice normal = row cosine × column cosine. */
export function sliceNormal(orientation: Vector6): Vector3 {
  const [rx, ry, rz, cx, cy, cz] = orientation;
  return [ry * cz - rz * cy, rz * cx - rx * cz, rx * cy - ry * cx];
}

interface ParsedInstance {
  studyInstanceUID: string;
  seriesInstanceUID: string;
  frameOfReferenceUID: string;
  patientId?: string;
  patientName?: string;
  rows: number;
  columns: number;
  pixelSpacing: [number, number];
  orientation: Vector6;
  slice: CtSlice;
}

function parseInstance(filePath: string): ParsedInstance | null {
  let dataSet: dicomParser.DataSet;
  try {
    const byteArray = new Uint8Array(fs.readFileSync(filePath));
    dataSet = dicomParser.parseDicom(byteArray, { untilTag: 'x7fe00010' });
  } catch (error) {
    logger.debug(`Skipping non-DICOM file ${path.basename(filePath)}: ${error instanceof Error ? error.message : String(error)}`, 'ct-series-geometry');
    return null;
  }

  const modality = dataSet.string('x00080060');
  const sopClassUID = dataSet.string('x00080016') || '';
  if (modality !== 'CT' && sopClassUID !== CT_IMAGE_STORAGE) return null;

  const position = toVector3(parseNumbers(dataSet.string('x00200032')));
  const orientation = toVector6(parseNumbers(dataSet.string('x00200037')));
  const spacing = parseNumbers(dataSet.string('x00280030'));
  const sopInstanceUID = dataSet.string('x00080018');
  if (!position || !orientation || spacing.length !== 2 || !sopInstanceUID) return null;

  return {
    studyInstanceUID: dataSet.string('x0020000d') || '',
    seriesInstanceUID: dataSet.string('x0020000e') || '',
    frameOfReferenceUID: dataSet.string('x00200052') || '',
    patientId: dataSet.string('x00100020'),
    patientName: dataSet.string('x00100010'),
    rows: dataSet.uint16('x00280010') ?? 0,
    columns: dataSet.uint16('x00280011') ?? 0,
    pixelSpacing: [spacing[0], spacing[1]],
    orientation,
    slice: { sopInstanceUID, sopClassUID: sopClassUID || CT_IMAGE_STORAGE, imagePositionPatient: position },
  };
}

/**
 * Collect the CT slices of a DICOM directory. Structure set files (`RS*`) are
 * ignored; only the first series found is kept.
 */
export function readCtSeriesGeometry(directory: string): CtSeriesGeometry {
  if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
    throw new SeriesLoadError('DICOM directory not found', directory);
  }

  const instances: ParsedInstance[] = [];
  for (const name of fs.readdirSync(directory).sort()) {
    if (name.startsWith('RS')) continue;
    const filePath = path.join(directory, name);
    if (!fs.statSync(filePath).isFile()) continue;
    const parsed = parseInstance(filePath);
    if (parsed) instances.push(parsed);
  }

  if (instances.length === 0) {
    throw new SeriesLoadError('No CT image found', directory);
  }

  const first = instances[0];
  const series = instances.filter(i => i.seriesInstanceUID === first.seriesInstanceUID);
  if (series.length !== instances.length) {
    logger.warn(`${instances.length - series.length} CT images from other series ignored`, 'ct-series-geometry');
  }

  const normal = sliceNormal(first.orientation);
  const along = (p: Vector3) => p[0] * normal[0] + p[1] * normal[1] + p[2] * normal[2];
  const slices = series.map(i => i.slice).sort((a, b) => along(a.imagePositionPatient) - along(b.imagePositionPatient));

  return {
    studyInstanceUID: first.studyInstanceUID,
    seriesInstanceUID: first.seriesInstanceUID,
    frameOfReferenceUID: first.frameOfReferenceUID,
    patientId: first.patientId,
    patientName: first.patientName,
    rows: first.rows,
    columns: first.columns,
    pixelSpacing: first.pixelSpacing,
    imageOrientationPatient: first.orientation,
    slices,
  };
}

/** Patient coordinates (mm) of voxel (x = column, y = row) on slice z. */
export function voxelToPatient(geometry: CtSeriesGeometry, x: number, y: number, z: number): Vector3 {
  const [px, py, pz] = geometry.slices[z].imagePositionPatient;
  const [rx, ry, rz, cx, cy, cz] = geometry.imageOrientationPatient;
  const [rowSpacing, columnSpacing] = geometry.pixelSpacing;
  return [
    px + rx * columnSpacing * x + cx * rowSpacing * y,
    py + ry * columnSpacing * x + cy * rowSpacing * y,
    pz + rz * columnSpacing * x + cz * rowSpacing * y,
  ];
}
