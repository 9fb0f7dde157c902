import { describe, it, expect } from 'vitest';
import {
  computeMetrological,
  COVERAGE_FACTOR,
  PRACTICAL_MARGIN,
} from '../modules/MetrologicalToleranceModule';
import { rootSumSquares } from '../utils/statistics';
import { DegenerateRangeError, InsufficientSampleError } from '../errors';
import type { CalibrationSample } from '../schema/ToleranceInputV1';

// ─── Shared fixtures ──────────────────────────────────────────────────────────

const SAMPLE: CalibrationSample = [
  { measuredValue: 25.0, error: 0.2 },
  { measuredValue: 30.0, error: -0.1 },
];

const RANGE_0_100 = { min: 0, max: 100 };

describe('computeMetrological', () => {
  it('constants: k = 2, practical margin 0.05', () => {
    expect(COVERAGE_FACTOR).toBe(2);
    expect(PRACTICAL_MARGIN).toBe(0.05);
  });

  // ── Reference case ────────────────────────────────────────────────────────

  describe('temperature 0–100 °C, u_std = 0.1, 0.2 / 0.1 / 0.05 chain', () => {
    const r = computeMetrological(SAMPLE, 0.1, RANGE_0_100, 0.2, 0.1, 0.05, 'temperature');

    it('combined uncertainty √(0.2121² + 0.1²) ≈ 0.2345', () => {
      expect(r.combinedUncertainty).toBe(0.2345);
    });

    it('expanded = strict ≈ 0.4690', () => {
      expect(r.expandedUncertainty).toBe(0.469);
      expect(r.strictTolerance).toBe(0.469);
    });

    it('practical = round(0.4690 + 0.05, 2) = 0.52', () => {
      expect(r.practicalTolerance).toBe(0.52);
    });

    it('percentage of a 100 °C span = 0.47', () => {
      expect(r.tolerancePercent).toBe(0.47);
    });

    it('sensor tolerance 0.35; total √(0.35² + 0.2² + 0.1² + 0.05²) ≈ 0.42', () => {
      expect(r.sensorTolerance).toBe(0.35);
      expect(r.totalTolerance).toBe(0.42);
    });
  });

  // ── Chain total ───────────────────────────────────────────────────────────

  describe('total chain tolerance', () => {
    it('-50–50 °C: sensor 0.25 → total √(0.25² + 0.2² + 0.1² + 0.05²) ≈ 0.3391', () => {
      const r = computeMetrological(SAMPLE, 0.1, { min: -50, max: 50 }, 0.2, 0.1, 0.05, 'temperature');
      expect(r.sensorTolerance).toBe(0.25);
      expect(rootSumSquares(0.25, 0.2, 0.1, 0.05)).toBeCloseTo(0.3391, 4);
      expect(r.totalTolerance).toBe(0.34);
    });

    it('pressure without a datasheet value uses 0.5 → total 0.55', () => {
      const r = computeMetrological(SAMPLE, 0.1, { min: 0, max: 10 }, 0.2, 0.1, 0.05, 'pressure');
      expect(r.sensorTolerance).toBe(0.5);
      expect(r.totalTolerance).toBe(0.55);
    });

    it('pressure with datasheet 0.3 → total √0.1425 ≈ 0.38', () => {
      const r = computeMetrological(SAMPLE, 0.1, { min: 0, max: 10 }, 0.2, 0.1, 0.05, 'pressure', 0.3);
      expect(r.sensorTolerance).toBe(0.3);
      expect(r.totalTolerance).toBe(0.38);
    });

    it('equals the single nonzero input when the other three are 0', () => {
      const r = computeMetrological(SAMPLE, 0.1, { min: 0, max: 10 }, 0.2, 0, 0, 'flow', 0);
      expect(r.totalTolerance).toBe(0.2);
    });

    it('is non-decreasing in each component', () => {
      const steps = [0, 0.05, 0.1, 0.2, 0.4];
      const byTransmitter = steps.map(t => computeMetrological(SAMPLE, 0.1, RANGE_0_100, t, 0.1, 0.05, 'temperature').totalTolerance);
      const byController = steps.map(t => computeMetrological(SAMPLE, 0.1, RANGE_0_100, 0.2, t, 0.05, 'temperature').totalTolerance);
      const byDisplay = steps.map(t => computeMetrological(SAMPLE, 0.1, RANGE_0_100, 0.2, 0.1, t, 'temperature').totalTolerance);
      const bySensor = steps.map(t => computeMetrological(SAMPLE, 0.1, RANGE_0_100, 0.2, 0.1, 0.05, 'speed', t).totalTolerance);
      for (const series of [byTransmitter, byController, byDisplay, bySensor]) {
        for (let i = 1; i < series.length; i++) {
          expect(series[i]).toBeGreaterThanOrEqual(series[i - 1]);
        }
      }
    });
  });

  // ── Edge cases ────────────────────────────────────────────────────────────

  describe('edge cases', () => {
    it('identical errors and zero reference uncertainty → strict 0, practical 0.05', () => {
      const flat: CalibrationSample = [
        { measuredValue: 10, error: 0.5 },
        { measuredValue: 20, error: 0.5 },
      ];
      const r = computeMetrological(flat, 0, RANGE_0_100, 0.2, 0.1, 0.05, 'temperature');
      expect(r.strictTolerance).toBe(0);
      expect(r.practicalTolerance).toBe(0.05);
      expect(r.tolerancePercent).toBe(0);
    });

    it('a single point → InsufficientSampleError, not NaN', () => {
      expect(() =>
        computeMetrological([{ measuredValue: 25, error: 0.2 }], 0.1, RANGE_0_100, 0.2, 0.1, 0.05, 'temperature'),
      ).toThrow(InsufficientSampleError);
    });

    it('equal bounds → DegenerateRangeError', () => {
      expect(() =>
        computeMetrological(SAMPLE, 0.1, { min: 0, max: 0 }, 0.2, 0.1, 0.05, 'temperature'),
      ).toThrow(DegenerateRangeError);
    });

    it('inverted range uses |span|: percentage stays positive', () => {
      const r = computeMetrological(SAMPLE, 0.1, { min: 100, max: 0 }, 0.2, 0.1, 0.05, 'temperature');
      expect(r.tolerancePercent).toBe(0.47);
    });
  });
});
