import * as THREE from 'three';

export const SHALLOW_WATER_COLOR = '#82b7cf';
export const DEEP_WATER_COLOR = '#3f7896';

const MIN_ALPHA = 0.35;
const ALPHA_RANGE = 0.6;

/**
 * One RGBA texel per simulation cell, recoloured from the latest water grid.
 * Dry cells are fully transparent.
 */
export class WaterOverlay {
  readonly texture: THREE.DataTexture;
  readonly width: number;
  readonly height: number;

  private readonly pixels: Uint8Array;
  private readonly shallow = new THREE.Color(SHALLOW_WATER_COLOR);
  private readonly deep = new THREE.Color(DEEP_WATER_COLOR);
  private readonly mixed = new THREE.Color();

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.pixels = new Uint8Array(width * height * 4);
    this.texture = new THREE.DataTexture(this.pixels, width, height, THREE.RGBAFormat);
    this.texture.magFilter = THREE.LinearFilter;
    this.texture.minFilter = THREE.LinearFilter;
    this.texture.needsUpdate = true;
  }

  update(grid: ArrayLike<number>, bounds: [min: number, max: number] | null): void {
    const cells = Math.min(grid.length, this.width * this.height);
    this.pixels.fill(0);

    if (bounds) {
      const [min, max] = bounds;
      const span = max - min;

      for (let index = 0; index < cells; index += 1) {
        const depth = grid[index];
        if (!(depth > 0)) {
          continue;
        }

        const normalized = span > 0 ? THREE.MathUtils.clamp((depth - min) / span, 0, 1) : 1;
        const hex = this.mixed.copy(this.shallow).lerp(this.deep, normalized).getHex();
        const offset = index * 4;

        this.pixels[offset] = (hex >> 16) & 0xff;
        this.pixels[offset + 1] = (hex >> 8) & 0xff;
        this.pixels[offset + 2] = hex & 0xff;
        this.pixels[offset + 3] = Math.round((MIN_ALPHA + ALPHA_RANGE * normalized) * 255);
      }
    }

    this.texture.needsUpdate = true;
  }

  pixelAt(index: number): [r: number, g: number, b: number, a: number] {
    const offset = index * 4;
    return [
      this.pixels[offset],
      this.pixels[offset + 1],
      this.pixels[offset + 2],
      this.pixels[offset + 3]
    ];
  }

  dispose(): void {
    this.texture.dispose();
  }
}
