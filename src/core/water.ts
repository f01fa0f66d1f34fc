import { inBounds, toIndex } from './grid';
import { flowRateForSlope } from './physics';
import type { SimParams, WaterState } from './types';

export const DEFAULT_CELL_SIZE_M = 0.5;

export interface CellWaterDiagnostics {
  x: number;
  y: number;
  index: number;
  isEdge: boolean;
  hasElevation: boolean;
  terrainHeight: number;
  waterHeight: number;
  totalHeight: number;
  neighborTotalHeights: {
    left: number | null;
    right: number | null;
    up: number | null;
    down: number | null;
  };
  downhillDiffs: {
    left: number;
    right: number;
    up: number;
    down: number;
  };
  edgeDrainDiff: number;
  outflowRate: number;
}

export function createWaterState(
  elevation: Float32Array | null,
  width: number,
  height: number,
  cellSize: number
): WaterState {
  const cells = Math.max(0, width) * Math.max(0, height);
  return {
    width,
    height,
    cellSize: Number.isFinite(cellSize) && cellSize > 0 ? cellSize : DEFAULT_CELL_SIZE_M,
    elevation,
    water: new Float32Array(cells),
    flow: new Float32Array(cells)
  };
}

/** True when the buffers are present and agree on the grid size. */
export function isSimulatable(state: WaterState): boolean {
  const cells = state.width * state.height;
  return (
    state.elevation !== null &&
    state.width > 0 &&
    state.height > 0 &&
    state.elevation.length === cells &&
    state.water.length === cells &&
    state.flow.length === cells
  );
}

function nonNegative(value: number): number {
  return Number.isFinite(value) ? Math.max(0, value) : 0;
}

export function addRain(state: WaterState, elevation: Float32Array, rainRate: number): void {
  if (rainRate <= 0) {
    return;
  }

  for (let index = 0; index < state.water.length; index += 1) {
    if (Number.isNaN(elevation[index])) {
      continue;
    }
    state.water[index] += rainRate;
  }
}

/**
 * One explicit flow pass. Reads see the pre-step water grid; every transfer,
 * including the source's own loss, is buffered in `state.flow` and merged
 * after all cells are visited. Boundary cells drain to a virtual neighbor at
 * height 0, which also takes part in the slope used for the flow rate.
 */
export function simulateFlow(
  state: WaterState,
  elevation: Float32Array,
  baseFlowRate: number,
  minFlow: number
): void {
  const { width, height, cellSize, water, flow } = state;
  flow.fill(0);

  const neighborIndex = [0, 0, 0, 0];
  const neighborDiff = [0, 0, 0, 0];

  for (let y = 0; y < height; y += 1) {
    const atTop = y === 0;
    const atBottom = y === height - 1;

    for (let x = 0; x < width; x += 1) {
      const index = toIndex(width, x, y);
      const currentWater = water[index];
      if (currentWater <= minFlow) {
        continue;
      }

      const terrain = elevation[index];
      if (Number.isNaN(terrain)) {
        continue;
      }

      const atLeft = x === 0;
      const atRight = x === width - 1;
      const totalHeight = terrain + currentWater;

      let count = 0;
      let totalDiff = 0;
      let maxDiff = 0;

      const visit = (exists: boolean, neighbor: number): void => {
        if (!exists) {
          return;
        }
        const neighborTerrain = elevation[neighbor];
        if (Number.isNaN(neighborTerrain)) {
          return;
        }
        const diff = totalHeight - (neighborTerrain + water[neighbor]);
        if (diff > minFlow) {
          neighborIndex[count] = neighbor;
          neighborDiff[count] = diff;
          count += 1;
          totalDiff += diff;
          if (diff > maxDiff) {
            maxDiff = diff;
          }
        }
      };

      visit(!atLeft, index - 1);
      visit(!atRight, index + 1);
      visit(!atTop, index - width);
      visit(!atBottom, index + width);

      if ((atTop || atBottom || atLeft || atRight) && totalHeight > minFlow) {
        totalDiff += totalHeight;
        if (totalHeight > maxDiff) {
          maxDiff = totalHeight;
        }
      }

      if (totalDiff <= 0) {
        continue;
      }

      const rate = flowRateForSlope(maxDiff, cellSize, baseFlowRate);
      const outflow = currentWater * rate;

      for (let n = 0; n < count; n += 1) {
        flow[neighborIndex[n]] += (outflow * neighborDiff[n]) / totalDiff;
      }
      flow[index] -= outflow;
    }
  }

  for (let index = 0; index < water.length; index += 1) {
    water[index] = Math.max(0, water[index] + flow[index]);
  }
}

/** Clamped uniform loss, used for both evaporation and infiltration. */
export function removeWater(state: WaterState, amount: number): void {
  if (amount <= 0) {
    return;
  }

  const { water } = state;
  for (let index = 0; index < water.length; index += 1) {
    const current = water[index];
    if (current > 0) {
      water[index] = Math.max(0, current - amount);
    }
  }
}

/**
 * Advance the water grid by one step: rain, flow, evaporation, infiltration.
 * Inconsistent or missing buffers make the step a no-op.
 */
export function stepWater(state: WaterState, params: SimParams, raining: boolean): void {
  const { elevation } = state;
  if (!elevation || !isSimulatable(state)) {
    return;
  }

  if (raining) {
    addRain(state, elevation, nonNegative(params.rainRate));
  }

  simulateFlow(state, elevation, nonNegative(params.flowRate), nonNegative(params.minFlow));
  removeWater(state, nonNegative(params.evaporation));
  removeWater(state, nonNegative(params.infiltration));
}

export function totalWater(grid: ArrayLike<number>): number {
  let total = 0;
  for (let index = 0; index < grid.length; index += 1) {
    total += grid[index];
  }
  return total;
}

/**
 * [smallest positive depth, largest depth] for colour mapping, or null when
 * no cell holds water.
 */
export function waterBounds(grid: ArrayLike<number>): [min: number, max: number] | null {
  let min = Number.POSITIVE_INFINITY;
  let max = 0;

  for (let index = 0; index < grid.length; index += 1) {
    const value = grid[index];
    if (value > 0 && value < min) {
      min = value;
    }
    if (value > max) {
      max = value;
    }
  }

  return min < Number.POSITIVE_INFINITY ? [min, max] : null;
}

export function sampleCellWaterDiagnostics(
  state: WaterState,
  params: SimParams,
  x: number,
  y: number
): CellWaterDiagnostics | null {
  const { width, height, elevation, water } = state;
  // Reads only; the flow buffer may be absent.
  const cells = width * height;
  if (
    !elevation ||
    elevation.length !== cells ||
    water.length !== cells ||
    !inBounds(width, height, x, y)
  ) {
    return null;
  }

  const index = toIndex(width, x, y);
  const terrainHeight = elevation[index];
  const waterHeight = water[index];
  const totalHeight = terrainHeight + waterHeight;
  const minFlow = nonNegative(params.minFlow);

  const neighborTotal = (exists: boolean, neighbor: number): number | null => {
    if (!exists || Number.isNaN(elevation[neighbor])) {
      return null;
    }
    return elevation[neighbor] + water[neighbor];
  };
  const downhill = (total: number | null): number => {
    if (total === null) {
      return 0;
    }
    const diff = totalHeight - total;
    return diff > minFlow ? diff : 0;
  };

  const left = neighborTotal(x > 0, index - 1);
  const right = neighborTotal(x < width - 1, index + 1);
  const up = neighborTotal(y > 0, index - width);
  const down = neighborTotal(y < height - 1, index + width);

  const isEdge = x === 0 || y === 0 || x === width - 1 || y === height - 1;
  const edgeDrainDiff = isEdge && totalHeight > minFlow ? totalHeight : 0;
  const downhillDiffs = {
    left: downhill(left),
    right: downhill(right),
    up: downhill(up),
    down: downhill(down)
  };
  const maxDiff = Math.max(
    downhillDiffs.left,
    downhillDiffs.right,
    downhillDiffs.up,
    downhillDiffs.down,
    edgeDrainDiff
  );
  const hasElevation = !Number.isNaN(terrainHeight);
  const flows = hasElevation && waterHeight > minFlow && maxDiff > 0;

  return {
    x,
    y,
    index,
    isEdge,
    hasElevation,
    terrainHeight,
    waterHeight,
    totalHeight,
    neighborTotalHeights: { left, right, up, down },
    downhillDiffs,
    edgeDrainDiff,
    outflowRate: flows ? flowRateForSlope(maxDiff, state.cellSize, nonNegative(params.flowRate)) : 0
  };
}
