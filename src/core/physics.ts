export const SIMULATION_INTERVAL_MS = 50;
export const STEPS_PER_SECOND = 1000 / SIMULATION_INTERVAL_MS;

export const BASE_FLOW_RATE = 0.25;
export const MAX_FLOW_RATE = 0.95;
export const MIN_FLOW_THRESHOLD = 0.0001;

/** Range accepted for the user-configurable base flow rate. */
export const MIN_FLOW_RATE_SETTING = 0.01;
export const MAX_FLOW_RATE_SETTING = 0.5;

const METERS_PER_MM = 0.001;
const MS_PER_HOUR = 3_600_000;

export function mmPerHourToMPerStep(mmPerHour: number, stepMs = SIMULATION_INTERVAL_MS): number {
  return (mmPerHour * METERS_PER_MM * stepMs) / MS_PER_HOUR;
}

export function mPerStepToMmPerHour(mPerStep: number, stepMs = SIMULATION_INTERVAL_MS): number {
  return (mPerStep * MS_PER_HOUR) / (stepMs * METERS_PER_MM);
}

/** Rise over run. */
export function calcSlope(heightDiff: number, cellSizeM: number): number {
  return heightDiff / cellSizeM;
}

/**
 * Fraction of a cell's water leaving it in one step. Scales with sqrt(slope)
 * after Manning's equation and is capped at MAX_FLOW_RATE.
 */
export function slopeToFlowRate(slope: number, baseRate = BASE_FLOW_RATE): number {
  return Math.min(MAX_FLOW_RATE, baseRate * (1 + Math.sqrt(Math.max(0, slope))));
}

export function flowRateForSlope(
  heightDiff: number,
  cellSizeM: number,
  baseRate = BASE_FLOW_RATE
): number {
  return slopeToFlowRate(calcSlope(heightDiff, cellSizeM), baseRate);
}
