import { describe, expect, test } from 'vitest';
import {
  BASE_FLOW_RATE,
  calcSlope,
  flowRateForSlope,
  MAX_FLOW_RATE,
  mmPerHourToMPerStep,
  mPerStepToMmPerHour,
  SIMULATION_INTERVAL_MS,
  slopeToFlowRate,
  STEPS_PER_SECOND
} from '../src/core/physics';

describe('unit conversion', () => {
  test('converts 1 mm/hour to meters per 50 ms step', () => {
    expect(Math.abs(mmPerHourToMPerStep(1) - 1.3888888888888889e-8)).toBeLessThan(1e-15);
  });

  test('round-trips mm/hour through meters per step', () => {
    for (const rate of [0.5, 2.5, 10, 123.4, 1000]) {
      const back = mPerStepToMmPerHour(mmPerHourToMPerStep(rate));
      expect(Math.abs(back - rate) / rate).toBeLessThan(1e-4);
    }
  });

  test('honours a custom step length', () => {
    expect(mmPerHourToMPerStep(36, 100)).toBeCloseTo(1e-6, 15);
    expect(mPerStepToMmPerHour(1e-6, 100)).toBeCloseTo(36, 9);
  });

  test('keeps zero at zero', () => {
    expect(mmPerHourToMPerStep(0)).toBe(0);
    expect(mPerStepToMmPerHour(0)).toBe(0);
  });
});

describe('slope and flow rate', () => {
  test('computes rise over run', () => {
    expect(calcSlope(1, 1)).toBe(1);
    expect(calcSlope(2, 1)).toBe(2);
    expect(calcSlope(1, 2)).toBe(0.5);
    expect(calcSlope(1, 0.25)).toBe(4);
  });

  test('uses the base rate on flat ground and caps steep slopes', () => {
    expect(slopeToFlowRate(0)).toBe(BASE_FLOW_RATE);
    expect(slopeToFlowRate(100)).toBe(MAX_FLOW_RATE);
    expect(slopeToFlowRate(1000)).toBe(MAX_FLOW_RATE);
  });

  test('steeper slopes flow faster', () => {
    const flat = slopeToFlowRate(0);
    const gentle = slopeToFlowRate(0.1);
    const steep = slopeToFlowRate(1);
    const verySteep = slopeToFlowRate(10);

    expect(flat).toBeLessThan(gentle);
    expect(gentle).toBeLessThan(steep);
    expect(steep).toBeLessThan(verySteep);
  });

  test('is non-decreasing in slope and never above the cap', () => {
    let previous = 0;
    for (let slope = 0; slope <= 50; slope += 0.25) {
      const rate = slopeToFlowRate(slope);
      expect(rate).toBeGreaterThanOrEqual(previous);
      expect(rate).toBeLessThanOrEqual(MAX_FLOW_RATE);
      previous = rate;
    }
  });

  test('derives the slope from a height difference and cell size', () => {
    // slope 2: 0.25 * (1 + sqrt(2))
    expect(flowRateForSlope(1, 0.5)).toBeCloseTo(0.25 * (1 + Math.SQRT2), 12);
    expect(flowRateForSlope(1, 1, 0.1)).toBeCloseTo(0.2, 12);
  });

  test('runs twenty steps per second', () => {
    expect(SIMULATION_INTERVAL_MS).toBe(50);
    expect(STEPS_PER_SECOND).toBe(20);
    expect(BASE_FLOW_RATE).toBeLessThan(MAX_FLOW_RATE);
  });
});
