/**
 * Convert one axial slice of a binary mask to closed contours
 * Moore-neighbour tracing of each 8-connected component's outer boundary
 */

import type { Grid } from './types';

export type VoxelPoint = [number, number];

// Clockwise with y pointing down: E, SE, S, SW, W, NW, N, NE
const DX = [1, 1, 0, -1, -1, -1, 0, 1];
const DY = [0, 1, 1, 1, 0, -1, -1, -1];

function directionOf(dx: number, dy: number): number {
  for (let d = 0; d < 8; d++) {
    if (DX[d] === dx && DY[d] === dy) return d;
  }
  return 4;
}

export function maskSliceToContours(occupancy: Uint8Array, grid: Grid, z: number): VoxelPoint[][] {
  const width = grid.xSize;
  const height = grid.ySize;
  if (width === 0 || height === 0 || z < 0 || z >= grid.zSize) {
    return [];
  }

  const offset = z * width * height;
  const inside = (x: number, y: number) =>
    x >= 0 && x < width && y >= 0 && y < height && occupancy[offset + x + y * width] > 0;

  const labelled = new Uint8Array(width * height);
  const contours: VoxelPoint[][] = [];

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (!inside(x, y) || labelled[x + y * width]) continue;
      const pixels = labelComponent(inside, labelled, width, x, y);
      const contour = traceBoundary(inside, x, y, width * height * 8);
      const simplified = contour.length >= 3 ? simplifyContour(contour) : [];
      contours.push(simplified.length >= 3 ? simplified : boundingSquare(pixels));
    }
  }

  return contours;
}

function labelComponent(
  inside: (x: number, y: number) => boolean,
  labelled: Uint8Array,
  width: number,
  startX: number,
  startY: number,
): VoxelPoint[] {
  const pixels: VoxelPoint[] = [];
  const stack: VoxelPoint[] = [[startX, startY]];
  labelled[startX + startY * width] = 1;
  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    const [x, y] = next;
    pixels.push(next);
    for (let d = 0; d < 8; d++) {
      const nx = x + DX[d];
      const ny = y + DY[d];
      if (inside(nx, ny) && !labelled[nx + ny * width]) {
        labelled[nx + ny * width] = 1;
        stack.push([nx, ny]);
      }
    }
  }
  return pixels;
}

/**
 * Start pixel must be the first foreground pixel of its component in raster
 * order, so its west neighbour is background.
 */
function traceBoundary(
  inside: (x: number, y: number) => boolean,
  startX: number,
  startY: number,
  maxSteps: number,
): VoxelPoint[] {
  const contour: VoxelPoint[] = [[startX, startY]];
  const startBackX = startX - 1;
  const startBackY = startY;

  let x = startX;
  let y = startY;
  let backX = startBackX;
  let backY = startBackY;
  let steps = 0;

  while (steps <= maxSteps) {
    const from = directionOf(backX - x, backY - y);
    let next: { x: number; y: number; backX: number; backY: number } | null = null;
    for (let i = 1; i <= 8; i++) {
      const d = (from + i) % 8;
      const nx = x + DX[d];
      const ny = y + DY[d];
      if (inside(nx, ny)) {
        const prev = (d + 7) % 8;
        next = { x: nx, y: ny, backX: x + DX[prev], backY: y + DY[prev] };
        break;
      }
    }
    if (!next) break; // isolated pixel

    if (steps > 0 && x === startX && y === startY) {
      // Back at the start: done once the walk would repeat its first move
      if (next.x === contour[1][0] && next.y === contour[1][1]) break;
      contour.push([x, y]);
    }

    x = next.x;
    y = next.y;
    backX = next.backX;
    backY = next.backY;
    steps++;

    if (x === startX && y === startY) {
      if (backX === startBackX && backY === startBackY) break;
      continue;
    }
    contour.push([x, y]);
  }

  return contour;
}

function simplifyContour(contour: VoxelPoint[]): VoxelPoint[] {
  const simplified: VoxelPoint[] = [];
  const n = contour.length;
  for (let i = 0; i < n; i++) {
    const prev = contour[(i + n - 1) % n];
    const curr = contour[i];
    const next = contour[(i + 1) % n];
    const cross = (curr[0] - prev[0]) * (next[1] - curr[1]) - (curr[1] - prev[1]) * (next[0] - curr[0]);
    if (cross !== 0) simplified.push(curr);
  }
  return simplified;
}

/** Pixel-corner outline for components too thin to trace. */
function boundingSquare(pixels: VoxelPoint[]): VoxelPoint[] {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const [x, y] of pixels) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return [
    [minX - 0.5, minY - 0.5],
    [maxX + 0.5, minY - 0.5],
    [maxX + 0.5, maxY + 0.5],
    [minX - 0.5, maxY + 0.5],
  ];
}
