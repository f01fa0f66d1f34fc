import { clamp, toIndex } from './grid';
import type { TerrainData } from './types';

export const DEFAULT_TERRAIN_SIZE = 96;
export const MIN_DEMO_ELEVATION = 0;
export const MAX_DEMO_ELEVATION = 4;

function fract(value: number): number {
  return value - Math.floor(value);
}

function hash2D(x: number, y: number, seed: number): number {
  const value = Math.sin(x * 127.1 + y * 311.7 + seed * 0.00137) * 43758.5453123;
  return fract(value);
}

function smoothstep(t: number): number {
  return t * t * (3 - 2 * t);
}

function valueNoise(x: number, y: number, seed: number): number {
  const x0 = Math.floor(x);
  const y0 = Math.floor(y);
  const tx = smoothstep(x - x0);
  const ty = smoothstep(y - y0);

  const v00 = hash2D(x0, y0, seed);
  const v10 = hash2D(x0 + 1, y0, seed);
  const v01 = hash2D(x0, y0 + 1, seed);
  const v11 = hash2D(x0 + 1, y0 + 1, seed);

  const a = v00 + (v10 - v00) * tx;
  const b = v01 + (v11 - v01) * tx;
  return a + (b - a) * ty;
}

function fractalNoise(x: number, y: number, seed: number, octaves: number): number {
  let amplitude = 1;
  let frequency = 1;
  let total = 0;
  let weight = 0;

  for (let octave = 0; octave < octaves; octave += 1) {
    total += valueNoise(x * frequency, y * frequency, seed + octave * 97) * amplitude;
    weight += amplitude;
    amplitude *= 0.5;
    frequency *= 2.04;
  }

  return weight > 0 ? total / weight : 0;
}

/**
 * Seeded garden-scale elevation field: a gentle tilt, a shallow swale across
 * the middle and some noise on top. Stands in for an imported elevation file.
 */
export function createDemoTerrain(
  size = DEFAULT_TERRAIN_SIZE,
  seed = 1,
  resolutionCm = 50
): TerrainData {
  const elevation = new Float32Array(size * size);
  const span = Math.max(1, size - 1);

  for (let y = 0; y < size; y += 1) {
    for (let x = 0; x < size; x += 1) {
      const nx = x / span;
      const ny = y / span;

      const tilt = (1 - ny) * 1.6;
      const swale = -Math.exp(-Math.pow((nx - 0.5 + (ny - 0.5) * 0.3) * 5, 2)) * 0.8;
      const rolling = (fractalNoise(nx * 3.2 + 4.1, ny * 3.2 + 7.7, seed, 4) - 0.5) * 1.4;
      const detail = (fractalNoise(nx * 14 + 31.3, ny * 14 + 2.9, seed + 511, 3) - 0.5) * 0.25;

      elevation[toIndex(size, x, y)] = clamp(
        1.2 + tilt + swale + rolling + detail,
        MIN_DEMO_ELEVATION,
        MAX_DEMO_ELEVATION
      );
    }
  }

  return {
    elevation,
    width: size,
    height: size,
    bounds: {
      minX: 0,
      minY: 0,
      maxX: size * resolutionCm,
      maxY: size * resolutionCm
    }
  };
}
