import type { TerrainBounds } from './types';

export const MIN_GRID_SIZE = 10;
export const MAX_GRID_SIZE = 500;
export const DEFAULT_RESOLUTION_CM = 50;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function toIndex(width: number, x: number, y: number): number {
  return y * width + x;
}

export function inBounds(width: number, height: number, x: number, y: number): boolean {
  return x >= 0 && x < width && y >= 0 && y < height;
}

export function resolutionToCellSizeM(resolutionCm: number): number {
  return resolutionCm / 100;
}

function normalizeResolution(resolutionCm: number): number {
  if (!Number.isFinite(resolutionCm) || resolutionCm <= 0) {
    return DEFAULT_RESOLUTION_CM;
  }

  return resolutionCm;
}

function cellsAlong(extentCm: number, resolutionCm: number): number {
  const cells = Math.round(extentCm / resolutionCm);
  if (!Number.isFinite(cells)) {
    return MIN_GRID_SIZE;
  }

  return clamp(cells, MIN_GRID_SIZE, MAX_GRID_SIZE);
}

/**
 * Simulation grid size for a terrain extent (bounds in cm) at the given
 * cell resolution. Both axes are clamped to [MIN_GRID_SIZE, MAX_GRID_SIZE].
 */
export function calcGridDimensions(
  bounds: TerrainBounds,
  resolutionCm: number
): [width: number, height: number] {
  const resolution = normalizeResolution(resolutionCm);
  return [
    cellsAlong(bounds.maxX - bounds.minX, resolution),
    cellsAlong(bounds.maxY - bounds.minY, resolution)
  ];
}

/**
 * Bilinear sample at a fractional grid coordinate. The far neighbor is clamped
 * to the last row/column so edge cells sample themselves. A NaN sample that
 * carries weight makes the result NaN.
 */
export function bilinearSample(
  data: ArrayLike<number>,
  width: number,
  height: number,
  x: number,
  y: number
): number {
  const x0 = clamp(Math.floor(x), 0, width - 1);
  const y0 = clamp(Math.floor(y), 0, height - 1);
  const x1 = Math.min(x0 + 1, width - 1);
  const y1 = Math.min(y0 + 1, height - 1);
  const fx = clamp(x - x0, 0, 1);
  const fy = clamp(y - y0, 0, 1);

  const samples: Array<[number, number]> = [
    [data[toIndex(width, x0, y0)], (1 - fx) * (1 - fy)],
    [data[toIndex(width, x1, y0)], fx * (1 - fy)],
    [data[toIndex(width, x0, y1)], (1 - fx) * fy],
    [data[toIndex(width, x1, y1)], fx * fy]
  ];

  let total = 0;
  for (const [value, weight] of samples) {
    if (weight > 0) {
      total += value * weight;
    }
  }

  return total;
}

export function resampleGrid(
  src: Float32Array,
  srcWidth: number,
  srcHeight: number,
  dstWidth: number,
  dstHeight: number
): Float32Array {
  if (srcWidth === dstWidth && srcHeight === dstHeight) {
    return new Float32Array(src);
  }

  const dst = new Float32Array(dstWidth * dstHeight);
  const scaleX = dstWidth > 1 ? (srcWidth - 1) / (dstWidth - 1) : 0;
  const scaleY = dstHeight > 1 ? (srcHeight - 1) / (dstHeight - 1) : 0;

  for (let y = 0; y < dstHeight; y += 1) {
    const sy = y * scaleY;
    for (let x = 0; x < dstWidth; x += 1) {
      dst[toIndex(dstWidth, x, y)] = bilinearSample(src, srcWidth, srcHeight, x * scaleX, sy);
    }
  }

  return dst;
}

/** Nearest cell for a position given as [0, 1] fractions across the grid. */
export function fractionToCell(
  u: number,
  v: number,
  width: number,
  height: number
): [x: number, y: number] | null {
  if (!(u >= 0 && u <= 1 && v >= 0 && v <= 1) || width <= 0 || height <= 0) {
    return null;
  }

  return [Math.round(u * (width - 1)), Math.round(v * (height - 1))];
}
