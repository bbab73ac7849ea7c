/**
 * NIfTI mask loader
 * Reads .nii / .nii.gz masks into occupancy volumes. Voxel order on disk is
 * x fastest, then y, then z, which is the Volume layout.
 */

import * as fs from 'fs';
import * as nifti from 'nifti-reader-js';
import { VolumeLoadError } from './errors';
import { makeGrid, voxelIndex } from './volume';
import type { Volume } from './types';

export interface VolumeLoadOptions {
  /** Mirror rows (y); TotalSegmentator outputs need it to match the CT. */
  flipY?: boolean;
}

export interface VolumeLoader {
  load(filePath: string, options?: VolumeLoadOptions): Promise<Volume>;
}

type VoxelReader = (view: DataView, offset: number, littleEndian: boolean) => number;

// NIfTI-1 datatype codes
const VOXEL_READERS: Record<number, { bytes: number; read: VoxelReader }> = {
  2: { bytes: 1, read: (v, o) => v.getUint8(o) },
  4: { bytes: 2, read: (v, o, le) => v.getInt16(o, le) },
  8: { bytes: 4, read: (v, o, le) => v.getInt32(o, le) },
  16: { bytes: 4, read: (v, o, le) => v.getFloat32(o, le) },
  64: { bytes: 8, read: (v, o, le) => v.getFloat64(o, le) },
  256: { bytes: 1, read: (v, o) => v.getInt8(o) },
  512: { bytes: 2, read: (v, o, le) => v.getUint16(o, le) },
  768: { bytes: 4, read: (v, o, le) => v.getUint32(o, le) },
};

function toArrayBuffer(data: ArrayBufferLike | Uint8Array): ArrayBuffer {
  if (data instanceof ArrayBuffer) return data;
  const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}

export function decodeNiftiVolume(raw: ArrayBuffer, filePath: string, options: VolumeLoadOptions = {}): Volume {
  const data = nifti.isCompressed(raw) ? toArrayBuffer(nifti.decompress(raw)) : raw;
  if (!nifti.isNIFTI(data)) {
    throw new VolumeLoadError('Not a NIfTI file', filePath);
  }

  const header = nifti.readHeader(data);
  if (!header) {
    throw new VolumeLoadError('Unreadable NIfTI header', filePath);
  }

  const reader = VOXEL_READERS[header.datatypeCode];
  if (!reader) {
    throw new VolumeLoadError(`Unsupported NIfTI datatype ${header.datatypeCode}`, filePath);
  }

  const ndim = header.dims[0];
  const dim = (i: number) => (ndim >= i && header.dims[i] > 0 ? header.dims[i] : 1);
  const pixDim = (i: number) => (header.pixDims[i] > 0 ? header.pixDims[i] : 1);
  const grid = makeGrid(dim(1), dim(2), dim(3), { xRes: pixDim(1), yRes: pixDim(2), zRes: pixDim(3) });

  const image = nifti.readImage(header, data);
  const count = grid.xSize * grid.ySize * grid.zSize;
  if (image.byteLength < count * reader.bytes) {
    throw new VolumeLoadError(`Truncated image data (${image.byteLength} bytes for ${count} voxels)`, filePath);
  }

  const view = new DataView(image);
  const values = new Uint8Array(count);
  for (let z = 0; z < grid.zSize; z++) {
    for (let y = 0; y < grid.ySize; y++) {
      const targetY = options.flipY ? grid.ySize - 1 - y : y;
      for (let x = 0; x < grid.xSize; x++) {
        const source = voxelIndex(x, y, z, grid);
        const voxel = reader.read(view, source * reader.bytes, header.littleEndian);
        if (voxel !== 0) values[voxelIndex(x, targetY, z, grid)] = 1;
      }
    }
  }

  return { values, grid };
}

export const niftiVolumeLoader: VolumeLoader = {
  async load(filePath, options) {
    let buffer: Buffer;
    try {
      buffer = await fs.promises.readFile(filePath);
    } catch (error) {
      throw new VolumeLoadError(`Cannot read volume: ${error instanceof Error ? error.message : String(error)}`, filePath);
    }
    return decodeNiftiVolume(toArrayBuffer(buffer), filePath, options);
  },
};
