import {
  calcGridDimensions,
  clamp,
  DEFAULT_RESOLUTION_CM,
  resampleGrid,
  resolutionToCellSizeM
} from '../core/grid';
import {
  BASE_FLOW_RATE,
  MAX_FLOW_RATE_SETTING,
  MIN_FLOW_RATE_SETTING,
  MIN_FLOW_THRESHOLD,
  mmPerHourToMPerStep,
  SIMULATION_INTERVAL_MS
} from '../core/physics';
import type { WeatherPreset } from '../core/presets';
import type { SimulationMode, TerrainData, WaterRates } from '../core/types';
import { sampleCellWaterDiagnostics, waterBounds } from '../core/water';
import type { CellWaterDiagnostics } from '../core/water';
import { assertNever, describeMessageType, parseWaterEvent, transferListFor } from '../worker/protocol';
import type { WaterEvent } from '../worker/protocol';
import { spawnWaterWorker } from './link';
import type { WorkerFactory, WorkerLink } from './link';

const LOG_PREFIX = '[water]';

export const DEFAULT_WATER_RATES: Readonly<WaterRates> = {
  rainRateMmHr: 10,
  evaporationMmHr: 5,
  infiltrationMmHr: 0,
  flowRate: BASE_FLOW_RATE
};

export interface WaterSimulationOptions {
  spawnWorker?: WorkerFactory;
  resolutionCm?: number;
  rates?: Partial<WaterRates>;
  intervalMs?: number;
}

export type WaterUpdateListener = (grid: Float32Array, width: number, height: number) => void;

function normalizeDepthRate(value: number, fallback: number): number {
  if (!Number.isFinite(value)) {
    return fallback;
  }

  return Math.max(0, value);
}

function normalizeFlowRate(value: number): number {
  if (!Number.isFinite(value)) {
    return BASE_FLOW_RATE;
  }

  return clamp(value, MIN_FLOW_RATE_SETTING, MAX_FLOW_RATE_SETTING);
}

/**
 * Main-thread façade over the water worker. Owns the user-facing rates and
 * the terrain to simulate, creates the worker on first use, and keeps a
 * read-only copy of the latest water grid for rendering.
 */
export class WaterSimulation {
  private readonly spawnWorker: WorkerFactory;
  private readonly intervalMs: number;
  private readonly mode: SimulationMode = { running: false, raining: false };
  private readonly listeners = new Set<WaterUpdateListener>();

  private rates: WaterRates;
  private resolutionCm: number;
  private terrain: TerrainData | null = null;
  private link: WorkerLink | null = null;
  private unavailable = false;
  private ready = false;
  private waterGrid: Float32Array | null = null;
  // Main-thread copy; the one sent with `init` is transferred away.
  private elevation: Float32Array | null = null;
  private dimensions: [width: number, height: number] = [0, 0];
  private cellSizeM = 0;
  private lastUpdate = 0;

  constructor(options: WaterSimulationOptions = {}) {
    this.spawnWorker = options.spawnWorker ?? spawnWaterWorker;
    this.intervalMs = options.intervalMs ?? SIMULATION_INTERVAL_MS;
    this.resolutionCm = options.resolutionCm ?? DEFAULT_RESOLUTION_CM;

    const rates = { ...DEFAULT_WATER_RATES, ...options.rates };
    this.rates = {
      rainRateMmHr: normalizeDepthRate(rates.rainRateMmHr, DEFAULT_WATER_RATES.rainRateMmHr),
      evaporationMmHr: normalizeDepthRate(
        rates.evaporationMmHr,
        DEFAULT_WATER_RATES.evaporationMmHr
      ),
      infiltrationMmHr: normalizeDepthRate(
        rates.infiltrationMmHr,
        DEFAULT_WATER_RATES.infiltrationMmHr
      ),
      flowRate: normalizeFlowRate(rates.flowRate)
    };
  }

  /**
   * Creates the worker once per session. Returns false when the environment
   * cannot provide one; the simulation then stays inert.
   */
  init(): boolean {
    if (this.link) {
      return true;
    }
    if (this.unavailable) {
      return false;
    }

    let link: WorkerLink;
    try {
      link = this.spawnWorker();
    } catch (error) {
      console.error(LOG_PREFIX, 'Failed to create water worker:', error);
      this.unavailable = true;
      return false;
    }

    this.link = link;
    link.onMessage((data) => this.handleMessage(data));
    link.onError((message) => {
      console.error(LOG_PREFIX, 'Water worker error:', message);
    });
    return true;
  }

  terminate(): void {
    if (!this.link) {
      return;
    }

    this.link.terminate();
    this.link = null;
    this.ready = false;
    this.waterGrid = null;
    this.elevation = null;
    this.mode.running = false;
    this.mode.raining = false;
  }

  /** Terrain collaborator hook. A new terrain fully re-initialises a live worker. */
  setTerrain(terrain: TerrainData | null): void {
    this.terrain = terrain;
    if (this.link) {
      this.sendElevationData();
    }
  }

  setResolution(resolutionCm: number): void {
    if (resolutionCm === this.resolutionCm) {
      return;
    }

    this.resolutionCm = resolutionCm;
    if (this.link) {
      this.sendElevationData();
    }
  }

  start(): void {
    if (!this.init()) {
      return;
    }

    if (!this.ready) {
      this.sendElevationData();
    }
    this.send({ type: 'start' });
    this.mode.running = true;
  }

  stop(): void {
    this.send({ type: 'stop' });
    this.mode.running = false;
    this.mode.raining = false;
  }

  /** Starts rain, and the flow with it. */
  startRain(): void {
    if (!this.init()) {
      return;
    }

    if (!this.ready) {
      this.sendElevationData();
    }
    this.sendParams();
    this.send({ type: 'start-rain' });
    this.send({ type: 'start' });
    this.mode.running = true;
    this.mode.raining = true;
  }

  /** Stops rain but keeps the flow running so the terrain drains. */
  stopRain(): void {
    this.send({ type: 'stop-rain' });
    this.mode.raining = false;
  }

  reset(): void {
    this.send({ type: 'reset' });
    if (this.waterGrid) {
      this.publish(new Float32Array(this.waterGrid.length));
    }
  }

  setRainRate(mmPerHour: number): void {
    this.rates.rainRateMmHr = normalizeDepthRate(mmPerHour, this.rates.rainRateMmHr);
    this.sendParams();
  }

  setEvaporationRate(mmPerHour: number): void {
    this.rates.evaporationMmHr = normalizeDepthRate(mmPerHour, this.rates.evaporationMmHr);
    this.sendParams();
  }

  setInfiltrationRate(mmPerHour: number): void {
    this.rates.infiltrationMmHr = normalizeDepthRate(mmPerHour, this.rates.infiltrationMmHr);
    this.sendParams();
  }

  /** Fraction of a cell's water that flows per step, clamped to [0.01, 0.5]. */
  setFlowRate(rate: number): void {
    this.rates.flowRate = normalizeFlowRate(rate);
    this.sendParams();
  }

  applyPreset(preset: WeatherPreset): void {
    this.rates.rainRateMmHr = normalizeDepthRate(preset.rainRateMmHr, this.rates.rainRateMmHr);
    this.rates.evaporationMmHr = normalizeDepthRate(
      preset.evaporationMmHr,
      this.rates.evaporationMmHr
    );
    this.rates.infiltrationMmHr = normalizeDepthRate(
      preset.infiltrationMmHr,
      this.rates.infiltrationMmHr
    );
    this.sendParams();
  }

  isAvailable(): boolean {
    return !this.unavailable;
  }

  isReady(): boolean {
    return this.ready;
  }

  isRunning(): boolean {
    return this.mode.running;
  }

  isRaining(): boolean {
    return this.mode.raining;
  }

  getRates(): Readonly<WaterRates> {
    return { ...this.rates };
  }

  /** Latest grid received from the worker. Treat as read-only. */
  getWaterGrid(): Float32Array | null {
    return this.waterGrid;
  }

  getGridDimensions(): [width: number, height: number] {
    return [this.dimensions[0], this.dimensions[1]];
  }

  getCellSizeM(): number {
    return this.cellSizeM;
  }

  getWaterBounds(): [min: number, max: number] | null {
    return this.waterGrid ? waterBounds(this.waterGrid) : null;
  }

  getLastUpdateTime(): number {
    return this.lastUpdate;
  }

  /** Flow readout for one cell of the latest grid, or null when there is none. */
  sampleCell(x: number, y: number): CellWaterDiagnostics | null {
    const { elevation, waterGrid } = this;
    if (!elevation || !waterGrid) {
      return null;
    }

    const [width, height] = this.dimensions;
    return sampleCellWaterDiagnostics(
      {
        width,
        height,
        cellSize: this.cellSizeM,
        elevation,
        water: waterGrid,
        flow: new Float32Array(0)
      },
      {
        rainRate: 0,
        evaporation: 0,
        infiltration: 0,
        flowRate: this.rates.flowRate,
        minFlow: MIN_FLOW_THRESHOLD
      },
      x,
      y
    );
  }

  onUpdate(listener: WaterUpdateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private send(...args: Parameters<WorkerLink['send']>): void {
    this.link?.send(...args);
  }

  private sendParams(): void {
    const { rainRateMmHr, evaporationMmHr, infiltrationMmHr, flowRate } = this.rates;
    this.send({
      type: 'set-params',
      rainRate: mmPerHourToMPerStep(rainRateMmHr, this.intervalMs),
      evaporation: mmPerHourToMPerStep(evaporationMmHr, this.intervalMs),
      infiltration: mmPerHourToMPerStep(infiltrationMmHr, this.intervalMs),
      flowRate
    });
  }

  /** Resamples the terrain to the simulation grid and hands it to the worker. */
  private sendElevationData(): void {
    const { terrain } = this;
    if (!this.link) {
      return;
    }
    if (!terrain) {
      console.warn(LOG_PREFIX, 'No terrain loaded; water simulation has nothing to run on');
      return;
    }

    const [width, height] = calcGridDimensions(terrain.bounds, this.resolutionCm);
    const cellSize = resolutionToCellSizeM(this.resolutionCm);
    const elevationData = resampleGrid(
      terrain.elevation,
      terrain.width,
      terrain.height,
      width,
      height
    );

    this.ready = false;
    this.dimensions = [width, height];
    this.cellSizeM = cellSize;
    this.waterGrid = null;
    this.elevation = new Float32Array(elevationData);
    console.info(LOG_PREFIX, `Water simulation: ${width}x${height} cells at ${cellSize} m/cell`);

    this.link.send(
      { type: 'init', elevationData, width, height, cellSize },
      transferListFor(elevationData)
    );
  }

  private handleMessage(data: unknown): void {
    const event = parseWaterEvent(data);
    if (!event) {
      console.warn(LOG_PREFIX, 'Unknown worker message:', describeMessageType(data));
      return;
    }

    this.handleEvent(event);
  }

  private handleEvent(event: WaterEvent): void {
    switch (event.type) {
      case 'loaded':
        console.info(LOG_PREFIX, 'Water worker loaded');
        return;
      case 'ready':
        this.ready = true;
        console.info(LOG_PREFIX, 'Water worker ready');
        this.sendParams();
        return;
      case 'water-update': {
        const [width, height] = this.dimensions;
        // Events arrive in posting order, so anything before `ready` still
        // belongs to the previous terrain, whatever its length.
        if (!this.ready || event.grid.length !== width * height) {
          return;
        }
        this.publish(event.grid);
        return;
      }
      default:
        assertNever(event);
    }
  }

  private publish(grid: Float32Array): void {
    const [width, height] = this.dimensions;
    this.waterGrid = grid;
    this.lastUpdate = Date.now();
    for (const listener of this.listeners) {
      listener(grid, width, height);
    }
  }
}
