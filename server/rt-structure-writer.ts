/**
 * RT Structure Set DICOM Writer
 * Creates DICOM RT Structure files from binary ROI masks using dcmjs
 */

import * as fs from 'fs';
import * as path from 'path';
import dcmjs from 'dcmjs';
import type { NaturalDataset } from 'dcmjs';
import { logger } from './logger';
import { GridMismatchError } from './chord/errors';
import { maskSliceToContours } from './chord/mask-to-contours';
import { voxelToPatient, type CtSeriesGeometry } from './chord/ct-series-geometry';
import type { RGB, StructureMask, StructureSetWriteResult, StructureSetWriter } from './chord/types';

const { DicomMetaDictionary, DicomDict } = dcmjs.data;

const RT_STRUCTURE_SET_STORAGE = '1.2.840.10008.5.1.4.1.1.481.3';
const UID_ROOT = '1.2.826.0.1.3680043.8.498.'; // DICOM standard root for generated UIDs

export const DEFAULT_STRUCTURE_SET_FILENAME = 'vertebrae.dcm';

export interface RTContourInput {
  referencedSOPInstanceUID?: string;
  referencedSOPClassUID?: string;
  points: number[]; // Flattened [x1,y1,z1,x2,y2,z2,...]
}

export interface RTStructureInput {
  roiNumber: number;
  structureName: string;
  color: RGB;
  contours: RTContourInput[];
}

export interface RTStructureWriteInput {
  studyInstanceUID: string;
  referencedSeriesInstanceUID: string;
  referencedFrameOfReferenceUID: string;
  referencedSOPInstanceUIDs: string[];

  seriesInstanceUID: string;
  sopInstanceUID: string;
  structureSetLabel: string;

  patientId?: string;
  patientName?: string;

  structures: RTStructureInput[];
}

export interface RTStructureWriterOptions {
  fileName?: string;
  structureSetLabel?: string;
}

function dicomDate(now: Date) {
  return now.toISOString().slice(0, 10).replace(/-/g, '');
}

function dicomTime(now: Date) {
  return now.toISOString().slice(11, 19).replace(/:/g, '');
}

export class RTStructureWriter implements StructureSetWriter {
  constructor(
    private readonly geometry: CtSeriesGeometry,
    private readonly options: RTStructureWriterOptions = {},
  ) {}

  static generateUID(): string {
    const timestamp = Date.now();
    const random = Math.floor(Math.random() * 1000000);
    return `${UID_ROOT}${timestamp}.${random}`;
  }

  private assertMatchesSeries(structure: StructureMask) {
    const { grid } = structure;
    const { columns, rows, slices } = this.geometry;
    if (grid.xSize !== columns || grid.ySize !== rows || grid.zSize !== slices.length) {
      throw new GridMismatchError(
        `${structure.name}: mask grid ${grid.xSize}x${grid.ySize}x${grid.zSize} does not match CT series ${columns}x${rows}x${slices.length}`,
        { subject: structure.name, actual: grid },
      );
    }
  }

  /**
   * Trace every slice of each mask and map the contours to patient coordinates.
   */
  toStructureInputs(structures: StructureMask[]): RTStructureInput[] {
    return structures.map((structure, index) => {
      this.assertMatchesSeries(structure);
      const contours: RTContourInput[] = [];
      for (let z = 0; z < structure.grid.zSize; z++) {
        const slice = this.geometry.slices[z];
        for (const contour of maskSliceToContours(structure.occupancy, structure.grid, z)) {
          const points: number[] = [];
          for (const [x, y] of contour) {
            points.push(...voxelToPatient(this.geometry, x, y, z));
          }
          contours.push({
            referencedSOPInstanceUID: slice.sopInstanceUID,
            referencedSOPClassUID: slice.sopClassUID,
            points,
          });
        }
      }
      return {
        roiNumber: index + 1,
        structureName: structure.name,
        color: structure.color,
        contours,
      };
    });
  }

  /**
   * Natural (keyword-based) dcmjs dataset for the structure set
   */
  static buildDataset(input: RTStructureWriteInput, now = new Date()): NaturalDataset {
    const dateStr = dicomDate(now);
    const timeStr = dicomTime(now);

    return {
      // Patient Module
      PatientID: input.patientId || 'UNKNOWN',
      PatientName: input.patientName || 'UNKNOWN',
      PatientBirthDate: '',
      PatientSex: '',

      // General Study Module
      StudyInstanceUID: input.studyInstanceUID,
      StudyDate: dateStr,
      StudyTime: timeStr,
      AccessionNumber: '',
      ReferringPhysicianName: '',
      StudyID: '',

      // RT Series Module
      SeriesInstanceUID: input.seriesInstanceUID,
      SeriesNumber: '1',
      SeriesDate: dateStr,
      SeriesTime: timeStr,
      SeriesDescription: input.structureSetLabel,
      Modality: 'RTSTRUCT',
      OperatorsName: '',

      // Frame of Reference Module
      FrameOfReferenceUID: input.referencedFrameOfReferenceUID,
      PositionReferenceIndicator: '',

      // General Equipment Module
      Manufacturer: 'Vertebral Chord Segmentation',
      StationName: 'CHORD',
      SoftwareVersions: '1.0',

      // SOP Common Module
      SOPClassUID: RT_STRUCTURE_SET_STORAGE,
      SOPInstanceUID: input.sopInstanceUID,
      InstanceCreationDate: dateStr,
      InstanceCreationTime: timeStr,

      // Structure Set Module
      StructureSetLabel: input.structureSetLabel,
      StructureSetDate: dateStr,
      StructureSetTime: timeStr,

      ReferencedFrameOfReferenceSequence: [{
        FrameOfReferenceUID: input.referencedFrameOfReferenceUID,
        RTReferencedStudySequence: [{
          ReferencedSOPClassUID: '1.2.840.10008.3.1.2.3.1', // Detached Study Management SOP Class (legacy)
          ReferencedSOPInstanceUID: input.studyInstanceUID,
          RTReferencedSeriesSequence: [{
            SeriesInstanceUID: input.referencedSeriesInstanceUID,
            ContourImageSequence: input.referencedSOPInstanceUIDs.map(sopUID => ({
              ReferencedSOPClassUID: '1.2.840.10008.5.1.4.1.1.2', // CT Image Storage
              ReferencedSOPInstanceUID: sopUID
            }))
          }]
        }]
      }],

      StructureSetROISequence: input.structures.map(structure => ({
        ROINumber: structure.roiNumber.toString(),
        ReferencedFrameOfReferenceUID: input.referencedFrameOfReferenceUID,
        ROIName: structure.structureName,
        ROIGenerationAlgorithm: 'AUTOMATIC'
      })),

      ROIContourSequence: input.structures.map(structure => {
        const contourSequence = structure.contours
          .filter(contour => contour.points.length >= 9) // At least 3 points (9 coordinates)
          .map(contour => {
            const contourItem: NaturalDataset = {
              ContourGeometricType: 'CLOSED_PLANAR',
              NumberOfContourPoints: Math.floor(contour.points.length / 3).toString(),
              ContourData: contour.points.map(p => Number(p.toFixed(6)))
            };

            if (contour.referencedSOPInstanceUID) {
              contourItem.ContourImageSequence = [{
                ReferencedSOPClassUID: contour.referencedSOPClassUID || '1.2.840.10008.5.1.4.1.1.2',
                ReferencedSOPInstanceUID: contour.referencedSOPInstanceUID
              }];
            }

            return contourItem;
          });

        const roiContour: NaturalDataset = {
          ReferencedROINumber: structure.roiNumber.toString(),
          ROIDisplayColor: [...structure.color]
        };
        if (contourSequence.length > 0) roiContour.ContourSequence = contourSequence;
        return roiContour;
      }),

      RTROIObservationsSequence: input.structures.map(structure => ({
        ObservationNumber: structure.roiNumber.toString(),
        ReferencedROINumber: structure.roiNumber.toString(),
        ROIObservationLabel: structure.structureName,
        RTROIInterpretedType: 'ORGAN',
        ROIInterpreter: ''
      }))
    };
  }

  static encode(input: RTStructureWriteInput, now = new Date()): Uint8Array {
    const meta = {
      '00020001': { vr: 'OB', Value: [new Uint8Array([0, 1]).buffer] }, // FileMetaInformationVersion
      '00020002': { vr: 'UI', Value: [RT_STRUCTURE_SET_STORAGE] }, // MediaStorageSOPClassUID
      '00020003': { vr: 'UI', Value: [input.sopInstanceUID] }, // MediaStorageSOPInstanceUID
      '00020010': { vr: 'UI', Value: ['1.2.840.10008.1.2.1'] }, // TransferSyntaxUID (Explicit VR Little Endian)
      '00020012': { vr: 'UI', Value: [UID_ROOT.slice(0, -1)] }, // ImplementationClassUID
      '00020013': { vr: 'SH', Value: ['CHORD_RT'] }, // ImplementationVersionName
    };

    const dicomDict = new DicomDict(meta);
    dicomDict.dict = DicomMetaDictionary.denaturalizeDataset(RTStructureWriter.buildDataset(input, now));
    return new Uint8Array(dicomDict.write());
  }

  async write(structures: StructureMask[], destination: string): Promise<StructureSetWriteResult> {
    const outputPath = path.join(destination, this.options.fileName || DEFAULT_STRUCTURE_SET_FILENAME);
    logger.info(`📝 Writing RT Structure Set to: ${outputPath}`, 'rt-structure-writer');

    const input: RTStructureWriteInput = {
      studyInstanceUID: this.geometry.studyInstanceUID,
      referencedSeriesInstanceUID: this.geometry.seriesInstanceUID,
      referencedFrameOfReferenceUID: this.geometry.frameOfReferenceUID,
      referencedSOPInstanceUIDs: this.geometry.slices.map(s => s.sopInstanceUID),
      seriesInstanceUID: RTStructureWriter.generateUID(),
      sopInstanceUID: RTStructureWriter.generateUID(),
      structureSetLabel: this.options.structureSetLabel || 'VERTEBRAE',
      patientId: this.geometry.patientId,
      patientName: this.geometry.patientName,
      structures: this.toStructureInputs(structures),
    };

    const buffer = RTStructureWriter.encode(input);
    await fs.promises.mkdir(destination, { recursive: true });
    await fs.promises.writeFile(outputPath, buffer);

    logger.info(`✅ RT Structure Set written: ${input.structures.length} structures, ${input.structures.reduce((sum, s) => sum + s.contours.length, 0)} contours`, 'rt-structure-writer');

    return {
      filePath: outputPath,
      seriesInstanceUID: input.seriesInstanceUID,
      sopInstanceUID: input.sopInstanceUID,
      structureCount: input.structures.length,
    };
  }
}

export default RTStructureWriter;
