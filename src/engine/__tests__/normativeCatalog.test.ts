import { describe, it, expect } from 'vitest';
import {
  NORMATIVE_PARAMETERS,
  FALLBACK_PRECISION_BASE,
  FALLBACK_SENSOR_TYPE,
  resolveNormativeParameters,
  resolvePrecisionBase,
} from '../normative.catalog';

describe('normative catalog', () => {
  it('base and compensation factors per sensor type', () => {
    expect(NORMATIVE_PARAMETERS.temperature.baseToleranceFactor).toBe(0.15);
    expect(NORMATIVE_PARAMETERS.temperature.compensationFactor).toBe(0.0020);
    expect(NORMATIVE_PARAMETERS.pressure.baseToleranceFactor).toBe(0.20);
    expect(NORMATIVE_PARAMETERS.pressure.compensationFactor).toBe(0.0025);
    expect(NORMATIVE_PARAMETERS.flow.baseToleranceFactor).toBe(0.25);
    expect(NORMATIVE_PARAMETERS.flow.compensationFactor).toBe(0.0030);
    expect(NORMATIVE_PARAMETERS.speed.baseToleranceFactor).toBe(0.18);
    expect(NORMATIVE_PARAMETERS.speed.compensationFactor).toBe(0.0015);
  });

  it('precision-class percentages (flow high is 0.2, all others 0.1)', () => {
    expect(NORMATIVE_PARAMETERS.temperature.precisionClassTable).toEqual({ high: 0.1, standard: 0.5, low: 1.0 });
    expect(NORMATIVE_PARAMETERS.pressure.precisionClassTable).toEqual({ high: 0.1, standard: 0.5, low: 1.0 });
    expect(NORMATIVE_PARAMETERS.flow.precisionClassTable).toEqual({ high: 0.2, standard: 0.5, low: 1.0 });
    expect(NORMATIVE_PARAMETERS.speed.precisionClassTable).toEqual({ high: 0.1, standard: 0.5, low: 1.0 });
  });

  it('the table is frozen all the way down', () => {
    expect(Object.isFrozen(NORMATIVE_PARAMETERS)).toBe(true);
    expect(Object.isFrozen(NORMATIVE_PARAMETERS.flow)).toBe(true);
    expect(Object.isFrozen(NORMATIVE_PARAMETERS.flow.precisionClassTable)).toBe(true);
  });

  describe('resolveNormativeParameters', () => {
    it('known type → its own table, no fallback', () => {
      const r = resolveNormativeParameters('pressure');
      expect(r.value).toBe(NORMATIVE_PARAMETERS.pressure);
      expect(r.fellBack).toBe(false);
    });

    it('unknown type → temperature table, fallback flagged', () => {
      expect(FALLBACK_SENSOR_TYPE).toBe('temperature');
      const r = resolveNormativeParameters('humidity');
      expect(r.value).toBe(NORMATIVE_PARAMETERS.temperature);
      expect(r.fellBack).toBe(true);
    });
  });

  describe('resolvePrecisionBase', () => {
    it('known class → table value', () => {
      expect(resolvePrecisionBase(NORMATIVE_PARAMETERS.flow, 'high')).toEqual({ value: 0.2, fellBack: false });
      expect(resolvePrecisionBase(NORMATIVE_PARAMETERS.flow, 'low')).toEqual({ value: 1.0, fellBack: false });
    });

    it('unknown class → 0.5, fallback flagged', () => {
      expect(FALLBACK_PRECISION_BASE).toBe(0.5);
      expect(resolvePrecisionBase(NORMATIVE_PARAMETERS.flow, 'ultra')).toEqual({ value: 0.5, fellBack: true });
    });
  });
});
