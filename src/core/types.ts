/** Terrain extent in centimeters. */
export interface TerrainBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/**
 * Elevation field handed over by the terrain collaborator. Row-major meters,
 * NaN marks cells without data.
 */
export interface TerrainData {
  elevation: Float32Array;
  width: number;
  height: number;
  bounds: TerrainBounds;
}

/** Buffers owned by the execution context for one terrain session. */
export interface WaterState {
  width: number;
  height: number;
  cellSize: number;
  elevation: Float32Array | null;
  water: Float32Array;
  flow: Float32Array;
}

/** Per-step parameters, every depth in meters per step. */
export interface SimParams {
  rainRate: number;
  evaporation: number;
  infiltration: number;
  flowRate: number;
  minFlow: number;
}

/** User-facing rates. Depths in mm/hour, flow rate as a fraction per step. */
export interface WaterRates {
  rainRateMmHr: number;
  evaporationMmHr: number;
  infiltrationMmHr: number;
  flowRate: number;
}

export interface SimulationMode {
  running: boolean;
  raining: boolean;
}
