import { BASE_FLOW_RATE, MIN_FLOW_THRESHOLD, SIMULATION_INTERVAL_MS } from '../core/physics';
import type { SimParams, SimulationMode, WaterState } from '../core/types';
import { createWaterState, stepWater } from '../core/water';
import { assertNever, describeMessageType, parseWaterRequest, transferListFor } from './protocol';
import type { InitRequest, SetParamsRequest, WaterEvent, WaterRequest } from './protocol';

const LOG_PREFIX = '[water-worker]';

export type PostEvent = (event: WaterEvent, transfer?: Transferable[]) => void;

export type EnginePhase = 'uninitialized' | 'ready' | 'idle' | 'running' | 'raining';

export interface WaterEngineOptions {
  intervalMs?: number;
  minFlow?: number;
}

/**
 * Authoritative owner of the elevation, water and flow buffers. Runs one
 * simulation step per tick while running and posts a copy of the water grid
 * after each one. Requests are handled in arrival order.
 */
export class WaterEngine {
  private readonly post: PostEvent;
  private readonly intervalMs: number;
  private readonly mode: SimulationMode = { running: false, raining: false };
  private readonly params: SimParams;

  private state: WaterState | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private stoppedSinceInit = false;

  constructor(post: PostEvent, options: WaterEngineOptions = {}) {
    this.post = post;
    this.intervalMs = options.intervalMs ?? SIMULATION_INTERVAL_MS;
    this.params = {
      rainRate: 0,
      evaporation: 0,
      infiltration: 0,
      flowRate: BASE_FLOW_RATE,
      minFlow: options.minFlow ?? MIN_FLOW_THRESHOLD
    };
  }

  /** Tells the main thread the module is loaded and can take `init`. */
  announce(): void {
    this.post({ type: 'loaded' });
  }

  handleMessage(data: unknown): void {
    const request = parseWaterRequest(data);
    if (!request) {
      console.warn(LOG_PREFIX, 'Unknown message type:', describeMessageType(data));
      return;
    }

    this.handleRequest(request);
  }

  handleRequest(request: WaterRequest): void {
    switch (request.type) {
      case 'init':
        this.init(request);
        return;
      case 'start':
        this.start();
        return;
      case 'stop':
        this.stop();
        return;
      case 'start-rain':
        this.mode.raining = true;
        return;
      case 'stop-rain':
        this.mode.raining = false;
        return;
      case 'reset':
        this.reset();
        return;
      case 'set-params':
        this.setParams(request);
        return;
      default:
        assertNever(request);
    }
  }

  // Read-only views of the loop; the worker entry never needs them, tests and
  // debugging tools observe the engine through these.

  getPhase(): EnginePhase {
    if (!this.state) {
      return 'uninitialized';
    }
    if (this.mode.running) {
      return this.mode.raining ? 'raining' : 'running';
    }
    return this.stoppedSinceInit ? 'idle' : 'ready';
  }

  getMode(): Readonly<SimulationMode> {
    return this.mode;
  }

  getParams(): Readonly<SimParams> {
    return this.params;
  }

  isTicking(): boolean {
    return this.timer !== null;
  }

  private init(request: InitRequest): void {
    const { elevationData, width, height, cellSize } = request;
    if (elevationData.length !== width * height) {
      console.warn(
        LOG_PREFIX,
        `Elevation has ${elevationData.length} cells, expected ${width}x${height}; steps will be skipped`
      );
      // Never allocate from dimensions the elevation does not back up.
      this.state = {
        width,
        height,
        cellSize,
        elevation: null,
        water: new Float32Array(0),
        flow: new Float32Array(0)
      };
    } else {
      this.state = createWaterState(elevationData, width, height, cellSize);
    }
    if (!this.mode.running) {
      this.stoppedSinceInit = false;
    }
    this.post({ type: 'ready' });
  }

  private start(): void {
    this.mode.running = true;
    if (this.timer === null) {
      this.tick();
    }
  }

  private stop(): void {
    this.mode.running = false;
    this.stoppedSinceInit = true;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private reset(): void {
    if (!this.state) {
      return;
    }

    this.state.water.fill(0);
    this.sendWaterGrid();
  }

  private setParams(request: SetParamsRequest): void {
    this.params.rainRate = Math.max(0, request.rainRate);
    this.params.evaporation = Math.max(0, request.evaporation);
    this.params.infiltration = Math.max(0, request.infiltration);
    this.params.flowRate = Math.max(0, request.flowRate);
  }

  private readonly tick = (): void => {
    this.timer = null;
    if (!this.mode.running) {
      return;
    }

    if (this.state) {
      stepWater(this.state, this.params, this.mode.raining);
    }
    this.sendWaterGrid();
    this.timer = setTimeout(this.tick, this.intervalMs);
  };

  private sendWaterGrid(): void {
    if (!this.state) {
      return;
    }

    const copy = new Float32Array(this.state.water);
    this.post({ type: 'water-update', grid: copy }, transferListFor(copy));
  }
}
