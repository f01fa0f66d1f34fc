import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import type { TerrainData } from '../src/core/types';
import { WaterSimulation } from '../src/simulation/coordinator';
import type { WaterSimulationOptions } from '../src/simulation/coordinator';
import type { WorkerLink } from '../src/simulation/link';
import type { SetParamsRequest, WaterRequest } from '../src/worker/protocol';
import { createInProcessWorker } from './support/inProcessWorker';
import type { InProcessWorker } from './support/inProcessWorker';

function createFlatTerrain(size: number, elevation = 0.5): TerrainData {
  return {
    elevation: new Float32Array(size * size).fill(elevation),
    width: size,
    height: size,
    bounds: { minX: 0, minY: 0, maxX: size * 50, maxY: size * 50 }
  };
}

function createRectTerrain(width: number, height: number): TerrainData {
  return {
    elevation: new Float32Array(width * height).fill(0.5),
    width,
    height,
    bounds: { minX: 0, minY: 0, maxX: width * 50, maxY: height * 50 }
  };
}

/** A link whose worker side only speaks when the test tells it to. */
function createScriptedLink(): { link: WorkerLink; sent: WaterRequest[]; deliver(data: unknown): void } {
  const listeners: Array<(data: unknown) => void> = [];
  const sent: WaterRequest[] = [];
  return {
    sent,
    deliver: (data) => {
      for (const listener of listeners) {
        listener(data);
      }
    },
    link: {
      send: (request) => {
        sent.push(request);
      },
      onMessage: (listener) => {
        listeners.push(listener);
      },
      onError: () => {},
      terminate: () => {}
    }
  };
}

interface Harness {
  simulation: WaterSimulation;
  workers: InProcessWorker[];
  worker(): InProcessWorker;
}

function createHarness(options: Omit<WaterSimulationOptions, 'spawnWorker'> = {}): Harness {
  const workers: InProcessWorker[] = [];
  const simulation = new WaterSimulation({
    ...options,
    spawnWorker: () => {
      const worker = createInProcessWorker();
      workers.push(worker);
      return worker;
    }
  });

  return {
    simulation,
    workers,
    worker: () => {
      const worker = workers[workers.length - 1];
      if (!worker) {
        throw new Error('Expected a spawned worker');
      }
      return worker;
    }
  };
}

function sentTypes(worker: InProcessWorker): string[] {
  return worker.sent.map((request) => request.type);
}

function lastParams(worker: InProcessWorker): SetParamsRequest {
  const params = worker.sent.filter(
    (request): request is SetParamsRequest => request.type === 'set-params'
  );
  const last = params[params.length - 1];
  if (!last) {
    throw new Error('Expected set-params to have been sent');
  }
  return last;
}

describe('water simulation coordinator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  test('creates the worker lazily and only once', () => {
    const { simulation, workers } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));
    simulation.setRainRate(20);

    expect(workers).toHaveLength(0);

    simulation.start();
    simulation.stop();
    simulation.start();

    expect(workers).toHaveLength(1);
    simulation.terminate();
  });

  test('sends the elevation before starting and params once ready', () => {
    const { simulation, worker } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));

    simulation.start();

    expect(sentTypes(worker())).toEqual(['init', 'set-params', 'start']);
    expect(simulation.isReady()).toBe(true);
    expect(simulation.isRunning()).toBe(true);
    expect(simulation.getGridDimensions()).toEqual([20, 20]);
    expect(simulation.getCellSizeM()).toBe(0.5);
    expect(simulation.getWaterGrid()).toHaveLength(400);
    simulation.terminate();
  });

  test('starts the flow together with the rain', () => {
    const { simulation, worker } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));

    simulation.startRain();

    expect(sentTypes(worker())).toEqual(['init', 'set-params', 'set-params', 'start-rain', 'start']);
    expect(simulation.isRaining()).toBe(true);
    expect(simulation.isRunning()).toBe(true);

    const bounds = simulation.getWaterBounds();
    expect(bounds).not.toBeNull();
    expect(bounds?.[0]).toBeGreaterThan(0);
    simulation.terminate();
  });

  test('keeps draining after the rain stops and halts everything on stop', () => {
    const { simulation, worker } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));
    simulation.startRain();

    simulation.stopRain();
    expect(simulation.isRaining()).toBe(false);
    expect(simulation.isRunning()).toBe(true);
    expect(worker().engine.getPhase()).toBe('running');

    simulation.startRain();
    simulation.stop();
    expect(simulation.isRaining()).toBe(false);
    expect(simulation.isRunning()).toBe(false);
    expect(worker().engine.isTicking()).toBe(false);
    simulation.terminate();
  });

  test('converts user rates to meters per step', () => {
    const { simulation, worker } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));
    simulation.start();

    simulation.setRainRate(36);

    // 36 mm/h = 0.036 m per 3,600,000 ms, so 5e-7 m per 50 ms step.
    expect(lastParams(worker()).rainRate).toBeCloseTo(5e-7, 15);
    expect(worker().engine.getParams().rainRate).toBeCloseTo(5e-7, 15);
    simulation.terminate();
  });

  test('clamps rates to their allowed ranges', () => {
    const { simulation } = createHarness();

    simulation.setRainRate(-5);
    simulation.setEvaporationRate(Number.NaN);
    simulation.setFlowRate(2);
    expect(simulation.getRates()).toEqual({
      rainRateMmHr: 0,
      evaporationMmHr: 5,
      infiltrationMmHr: 0,
      flowRate: 0.5
    });

    simulation.setFlowRate(0);
    expect(simulation.getRates().flowRate).toBe(0.01);

    simulation.setFlowRate(Number.POSITIVE_INFINITY);
    expect(simulation.getRates().flowRate).toBe(0.25);
  });

  test('applies weather presets', () => {
    const { simulation } = createHarness();

    simulation.applyPreset({
      label: 'Storm',
      rainRateMmHr: 50,
      evaporationMmHr: 2,
      infiltrationMmHr: 5
    });

    expect(simulation.getRates()).toEqual({
      rainRateMmHr: 50,
      evaporationMmHr: 2,
      infiltrationMmHr: 5,
      flowRate: 0.25
    });
  });

  test('stays inert when no worker can be created', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    let attempts = 0;
    const simulation = new WaterSimulation({
      spawnWorker: () => {
        attempts += 1;
        throw new Error('no workers here');
      }
    });
    simulation.setTerrain(createFlatTerrain(20));

    expect(() => simulation.start()).not.toThrow();
    simulation.startRain();

    expect(attempts).toBe(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][1]).toBe('Failed to create water worker:');
    expect(simulation.isAvailable()).toBe(false);
    expect(simulation.isRunning()).toBe(false);
    expect(simulation.isRaining()).toBe(false);
    expect(simulation.getWaterGrid()).toBeNull();
  });

  test('clears to a fresh zero grid on reset', () => {
    const { simulation } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));
    simulation.startRain();
    vi.advanceTimersByTime(200);

    const before = simulation.getWaterGrid();
    if (!before) {
      throw new Error('Expected a water grid');
    }
    const wetBefore = before[0];

    simulation.reset();

    const after = simulation.getWaterGrid();
    expect(after).not.toBe(before);
    expect(after).toHaveLength(400);
    expect(Array.from(after ?? [])).toEqual(new Array(400).fill(0));
    expect(wetBefore).toBeGreaterThan(0);
    expect(before[0]).toBe(wetBefore);
    expect(simulation.getWaterBounds()).toBeNull();
    simulation.terminate();
  });

  test('re-initialises the worker when the terrain changes', () => {
    const { simulation, worker } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));
    simulation.start();

    simulation.setTerrain(createFlatTerrain(40));

    expect(sentTypes(worker()).filter((type) => type === 'init')).toHaveLength(2);
    expect(simulation.getGridDimensions()).toEqual([40, 40]);
    expect(simulation.isRunning()).toBe(true);
    expect(simulation.getWaterGrid()).toBeNull();

    vi.advanceTimersByTime(50);
    expect(simulation.getWaterGrid()).toHaveLength(1600);
    simulation.terminate();
  });

  test('re-initialises the worker when the resolution changes', () => {
    const { simulation } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));
    simulation.start();

    simulation.setResolution(100);

    expect(simulation.getGridDimensions()).toEqual([10, 10]);
    expect(simulation.getCellSizeM()).toBe(1);
    simulation.terminate();
  });

  test('drops updates that do not match the current grid', () => {
    const { simulation, worker } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));
    simulation.start();
    const current = simulation.getWaterGrid();

    worker().deliver({ type: 'water-update', grid: new Float32Array(3) });

    expect(simulation.getWaterGrid()).toBe(current);
    simulation.terminate();
  });

  test('drops updates posted before the worker is ready for the new terrain', () => {
    const { link, sent, deliver } = createScriptedLink();
    const simulation = new WaterSimulation({ spawnWorker: () => link });
    simulation.setTerrain(createRectTerrain(20, 30));
    simulation.start();

    deliver({ type: 'water-update', grid: new Float32Array(600).fill(0.1) });
    expect(simulation.getWaterGrid()).toBeNull();

    deliver({ type: 'ready' });
    deliver({ type: 'water-update', grid: new Float32Array(600).fill(0.25) });
    expect(simulation.getWaterGrid()?.[0]).toBe(0.25);

    simulation.setTerrain(createRectTerrain(30, 20));
    expect(simulation.getGridDimensions()).toEqual([30, 20]);
    expect(sent.filter((request) => request.type === 'init')).toHaveLength(2);

    // Same cell count, still the previous terrain.
    deliver({ type: 'water-update', grid: new Float32Array(600).fill(0.5) });
    expect(simulation.getWaterGrid()).toBeNull();

    deliver({ type: 'ready' });
    deliver({ type: 'water-update', grid: new Float32Array(600).fill(0.75) });
    expect(simulation.getWaterGrid()?.[0]).toBe(0.75);
    simulation.terminate();
  });

  test('samples a cell of the latest grid', () => {
    const { simulation } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));
    expect(simulation.sampleCell(0, 0)).toBeNull();

    simulation.startRain();
    vi.advanceTimersByTime(100);

    const corner = simulation.sampleCell(0, 0);
    expect(corner).toMatchObject({ x: 0, y: 0, index: 0, isEdge: true, terrainHeight: 0.5 });
    expect(corner?.waterHeight).toBeGreaterThan(0);
    expect(simulation.sampleCell(10, 10)?.isEdge).toBe(false);
    expect(simulation.sampleCell(20, 0)).toBeNull();

    simulation.terminate();
    expect(simulation.sampleCell(0, 0)).toBeNull();
  });

  test('warns about unknown worker messages', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { simulation, worker } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));
    simulation.start();

    worker().deliver({ type: 'progress' });

    expect(warn).toHaveBeenCalledWith('[water]', 'Unknown worker message:', 'progress');
    simulation.terminate();
  });

  test('warns when started without terrain', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { simulation, worker } = createHarness();

    simulation.start();

    expect(warn).toHaveBeenCalledWith(
      '[water]',
      'No terrain loaded; water simulation has nothing to run on'
    );
    expect(sentTypes(worker())).toEqual(['start']);
    expect(simulation.getWaterGrid()).toBeNull();
    simulation.terminate();
  });

  test('notifies update listeners until they unsubscribe', () => {
    const { simulation } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));
    const calls: Array<[number, number, number]> = [];
    const unsubscribe = simulation.onUpdate((grid, width, height) => {
      calls.push([grid.length, width, height]);
    });

    expect(simulation.getLastUpdateTime()).toBe(0);
    simulation.start();
    expect(calls).toEqual([[400, 20, 20]]);
    expect(simulation.getLastUpdateTime()).toBeGreaterThan(0);

    unsubscribe();
    vi.advanceTimersByTime(100);
    expect(calls).toHaveLength(1);
    simulation.terminate();
  });

  test('releases the worker on terminate', () => {
    const { simulation, worker } = createHarness();
    simulation.setTerrain(createFlatTerrain(20));
    simulation.start();

    simulation.terminate();

    expect(worker().isTerminated()).toBe(true);
    expect(simulation.isReady()).toBe(false);
    expect(simulation.isRunning()).toBe(false);
    expect(simulation.getWaterGrid()).toBeNull();
  });
});
