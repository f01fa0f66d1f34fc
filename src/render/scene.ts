import * as THREE from 'three';
import { OrbitControls } from 'three/examples/jsm/controls/OrbitControls.js';
import type { TerrainData } from '../core/types';
import { WaterOverlay } from './overlay';

const BACKGROUND = new THREE.Color('#bccbc4');
const TERRAIN_LOW = new THREE.Color('#6f8d58');
const TERRAIN_MID = new THREE.Color('#9ebc73');
const TERRAIN_HIGH = new THREE.Color('#d9c79a');
const VERTICAL_SCALE = 4;
const WATER_LIFT = 0.04;

function elevationRange(elevation: Float32Array): [min: number, max: number] {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (let index = 0; index < elevation.length; index += 1) {
    const value = elevation[index];
    if (Number.isNaN(value)) {
      continue;
    }
    min = Math.min(min, value);
    max = Math.max(max, value);
  }

  return min <= max ? [min, max] : [0, 0];
}

export type HoverListener = (fraction: [u: number, v: number] | null) => void;

/**
 * Converts a point on the terrain plane to [0, 1] fractions across the
 * elevation grid, u along columns and v along rows.
 */
export function pointToGridFraction(
  x: number,
  z: number,
  width: number,
  height: number
): [u: number, v: number] {
  const spanX = Math.max(1, width - 1);
  const spanY = Math.max(1, height - 1);
  return [(x + (width - 1) / 2) / spanX, ((height - 1) / 2 - z) / spanY];
}

/**
 * Plane mesh with one vertex per grid cell. Grid row 0 sits at v = 0 so a
 * row-major DataTexture lines up with the heights.
 */
function createGridGeometry(
  width: number,
  height: number,
  sample: (x: number, y: number) => number
): THREE.PlaneGeometry {
  const geometry = new THREE.PlaneGeometry(width - 1, height - 1, width - 1, height - 1);
  geometry.rotateX(-Math.PI / 2);

  const positions = geometry.getAttribute('position');
  for (let row = 0; row < height; row += 1) {
    for (let x = 0; x < width; x += 1) {
      const y = height - 1 - row;
      positions.setY(row * width + x, sample(x, y));
    }
  }

  positions.needsUpdate = true;
  geometry.computeVertexNormals();
  return geometry;
}

export class WaterScene {
  private readonly renderer: THREE.WebGLRenderer;
  private readonly scene = new THREE.Scene();
  private readonly camera: THREE.PerspectiveCamera;
  private readonly controls: OrbitControls;
  private readonly terrainMesh: THREE.Mesh;
  private readonly waterMaterial: THREE.MeshBasicMaterial;
  private readonly elevation: Float32Array;
  private readonly terrainWidth: number;
  private readonly terrainHeight: number;
  private readonly host: HTMLElement;
  private readonly raycaster = new THREE.Raycaster();
  private readonly pointer = new THREE.Vector2();

  private waterMesh: THREE.Mesh | null = null;
  private overlay: WaterOverlay | null = null;
  private frameHandle = 0;
  private hoverListener: HoverListener | null = null;

  constructor(host: HTMLElement, terrain: TerrainData) {
    this.host = host;
    this.elevation = terrain.elevation;
    this.terrainWidth = terrain.width;
    this.terrainHeight = terrain.height;

    this.renderer = new THREE.WebGLRenderer({ antialias: true });
    this.renderer.setPixelRatio(window.devicePixelRatio);
    this.renderer.setSize(host.clientWidth, host.clientHeight);
    host.appendChild(this.renderer.domElement);

    this.scene.background = BACKGROUND;
    this.scene.add(new THREE.HemisphereLight('#f4f1e4', '#5f725f', 1.1));
    const sun = new THREE.DirectionalLight('#ffffff', 1.4);
    sun.position.set(40, 80, 30);
    this.scene.add(sun);

    const span = Math.max(terrain.width, terrain.height);
    this.camera = new THREE.PerspectiveCamera(45, host.clientWidth / host.clientHeight, 0.1, span * 10);
    this.camera.position.set(0, span * 0.8, span * 0.9);
    this.controls = new OrbitControls(this.camera, this.renderer.domElement);
    this.controls.enableDamping = true;

    const geometry = createGridGeometry(terrain.width, terrain.height, (x, y) =>
      this.terrainHeightAt(x, y)
    );
    geometry.setAttribute('color', this.createTerrainColors(geometry));
    this.terrainMesh = new THREE.Mesh(
      geometry,
      new THREE.MeshLambertMaterial({ vertexColors: true })
    );
    this.scene.add(this.terrainMesh);

    this.waterMaterial = new THREE.MeshBasicMaterial({ transparent: true, depthWrite: false });

    window.addEventListener('resize', this.handleResize);
    this.renderer.domElement.addEventListener('pointermove', this.handlePointerMove);
    this.renderer.domElement.addEventListener('pointerleave', this.handlePointerLeave);
  }

  /** Reports the terrain position under the pointer, or null when it leaves the terrain. */
  onHover(listener: HoverListener | null): void {
    this.hoverListener = listener;
  }

  /** Recolours the overlay; rebuilds it when the simulation grid size changes. */
  updateWater(
    grid: Float32Array,
    width: number,
    height: number,
    bounds: [min: number, max: number] | null
  ): void {
    if (!this.overlay || this.overlay.width !== width || this.overlay.height !== height) {
      this.rebuildWater(width, height);
    }
    this.overlay?.update(grid, bounds);
  }

  start(): void {
    const loop = (): void => {
      this.frameHandle = requestAnimationFrame(loop);
      this.controls.update();
      this.renderer.render(this.scene, this.camera);
    };
    loop();
  }

  dispose(): void {
    window.removeEventListener('resize', this.handleResize);
    this.renderer.domElement.removeEventListener('pointermove', this.handlePointerMove);
    this.renderer.domElement.removeEventListener('pointerleave', this.handlePointerLeave);
    this.hoverListener = null;
    cancelAnimationFrame(this.frameHandle);
    this.overlay?.dispose();
    this.controls.dispose();
    this.renderer.dispose();
  }

  private readonly handleResize = (): void => {
    this.camera.aspect = this.host.clientWidth / this.host.clientHeight;
    this.camera.updateProjectionMatrix();
    this.renderer.setSize(this.host.clientWidth, this.host.clientHeight);
  };

  private readonly handlePointerMove = (event: PointerEvent): void => {
    if (!this.hoverListener) {
      return;
    }

    const rect = this.renderer.domElement.getBoundingClientRect();
    if (rect.width <= 0 || rect.height <= 0) {
      return;
    }
    this.pointer.set(
      ((event.clientX - rect.left) / rect.width) * 2 - 1,
      -((event.clientY - rect.top) / rect.height) * 2 + 1
    );
    this.raycaster.setFromCamera(this.pointer, this.camera);

    const [hit] = this.raycaster.intersectObject(this.terrainMesh);
    this.hoverListener(
      hit
        ? pointToGridFraction(hit.point.x, hit.point.z, this.terrainWidth, this.terrainHeight)
        : null
    );
  };

  private readonly handlePointerLeave = (): void => {
    this.hoverListener?.(null);
  };

  private terrainHeightAt(x: number, y: number): number {
    const value = this.elevation[y * this.terrainWidth + x];
    return Number.isNaN(value) ? 0 : value * VERTICAL_SCALE;
  }

  private rebuildWater(width: number, height: number): void {
    if (this.waterMesh) {
      this.scene.remove(this.waterMesh);
      this.waterMesh.geometry.dispose();
    }
    this.overlay?.dispose();

    const overlay = new WaterOverlay(width, height);
    const scaleX = (this.terrainWidth - 1) / Math.max(1, width - 1);
    const scaleY = (this.terrainHeight - 1) / Math.max(1, height - 1);
    const geometry = createGridGeometry(width, height, (x, y) => {
      const tx = Math.min(this.terrainWidth - 1, Math.round(x * scaleX));
      const ty = Math.min(this.terrainHeight - 1, Math.round(y * scaleY));
      return this.terrainHeightAt(tx, ty) + WATER_LIFT;
    });
    geometry.scale(scaleX, 1, scaleY);

    this.waterMaterial.map = overlay.texture;
    this.waterMaterial.needsUpdate = true;
    this.waterMesh = new THREE.Mesh(geometry, this.waterMaterial);
    this.overlay = overlay;
    this.scene.add(this.waterMesh);
  }

  private createTerrainColors(geometry: THREE.PlaneGeometry): THREE.BufferAttribute {
    const [min, max] = elevationRange(this.elevation);
    const span = Math.max(0.001, max - min);
    const positions = geometry.getAttribute('position');
    const colors = new Float32Array(positions.count * 3);
    const mixed = new THREE.Color();

    for (let index = 0; index < positions.count; index += 1) {
      const normalized = THREE.MathUtils.clamp(
        (positions.getY(index) / VERTICAL_SCALE - min) / span,
        0,
        1
      );
      if (normalized < 0.45) {
        mixed.copy(TERRAIN_LOW).lerp(TERRAIN_MID, normalized / 0.45);
      } else {
        mixed.copy(TERRAIN_MID).lerp(TERRAIN_HIGH, (normalized - 0.45) / 0.55);
      }

      colors[index * 3] = mixed.r;
      colors[index * 3 + 1] = mixed.g;
      colors[index * 3 + 2] = mixed.b;
    }

    return new THREE.BufferAttribute(colors, 3);
  }
}
