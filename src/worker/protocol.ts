import { BASE_FLOW_RATE } from '../core/physics';
import { DEFAULT_CELL_SIZE_M } from '../core/water';

/**
 * Messages crossing the worker boundary. Requests flow main -> worker,
 * events flow worker -> main. There is no error event: anything that cannot
 * be handled is logged on the side that received it and dropped.
 */

export interface InitRequest {
  type: 'init';
  elevationData: Float32Array;
  width: number;
  height: number;
  cellSize: number;
}

/** Every depth in meters per step; the coordinator does the SI conversion. */
export interface SetParamsRequest {
  type: 'set-params';
  rainRate: number;
  evaporation: number;
  infiltration: number;
  flowRate: number;
}

export type WaterRequest =
  | InitRequest
  | SetParamsRequest
  | { type: 'start' }
  | { type: 'stop' }
  | { type: 'start-rain' }
  | { type: 'stop-rain' }
  | { type: 'reset' };

export type WaterEvent =
  | { type: 'loaded' }
  | { type: 'ready' }
  | { type: 'water-update'; grid: Float32Array };

export function assertNever(value: never): never {
  throw new Error(`Unhandled message variant: ${JSON.stringify(value)}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isDimension(value: unknown): value is number {
  return isFiniteNumber(value) && Number.isInteger(value) && value >= 0;
}

function numberOr(value: unknown, fallback: number): number {
  return isFiniteNumber(value) ? value : fallback;
}

const COMMAND_TYPES = ['start', 'stop', 'start-rain', 'stop-rain', 'reset'] as const;
type CommandType = (typeof COMMAND_TYPES)[number];

function isCommandType(value: unknown): value is CommandType {
  return COMMAND_TYPES.some((type) => type === value);
}

/** Validates an incoming request, or returns null when it is malformed or unknown. */
export function parseWaterRequest(data: unknown): WaterRequest | null {
  if (!isRecord(data)) {
    return null;
  }

  const { type } = data;
  if (isCommandType(type)) {
    return { type };
  }

  if (type === 'init') {
    const { elevationData, width, height, cellSize } = data;
    if (!(elevationData instanceof Float32Array) || !isDimension(width) || !isDimension(height)) {
      return null;
    }
    return {
      type: 'init',
      elevationData,
      width,
      height,
      cellSize: isFiniteNumber(cellSize) && cellSize > 0 ? cellSize : DEFAULT_CELL_SIZE_M
    };
  }

  if (type === 'set-params') {
    return {
      type: 'set-params',
      rainRate: numberOr(data.rainRate, 0),
      evaporation: numberOr(data.evaporation, 0),
      infiltration: numberOr(data.infiltration, 0),
      flowRate: numberOr(data.flowRate, BASE_FLOW_RATE)
    };
  }

  return null;
}

/** Validates an incoming worker event, or returns null. */
export function parseWaterEvent(data: unknown): WaterEvent | null {
  if (!isRecord(data)) {
    return null;
  }

  if (data.type === 'loaded') {
    return { type: 'loaded' };
  }
  if (data.type === 'ready') {
    return { type: 'ready' };
  }
  if (data.type === 'water-update' && data.grid instanceof Float32Array) {
    return { type: 'water-update', grid: data.grid };
  }

  return null;
}

export function describeMessageType(data: unknown): string {
  if (isRecord(data) && typeof data.type === 'string') {
    return data.type;
  }
  return typeof data;
}

/** Transfer list that moves the grid's backing buffer instead of copying it. */
export function transferListFor(grid: Float32Array): Transferable[] {
  return grid.buffer instanceof ArrayBuffer ? [grid.buffer] : [];
}
