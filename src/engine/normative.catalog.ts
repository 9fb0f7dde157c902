/**
 * Normative parameter catalog.
 *
 * Precision-class percentages and transmission-tolerance factors per sensor
 * type, taken from the instrument standards the analyser targets. Frozen at
 * module load; never mutated.
 *
 * transmissionTolerance = baseToleranceFactor
 *                       + compensationFactor × max(|range.min|, |range.max|)
 */

import type { PrecisionClass, SensorType } from './schema/ToleranceInputV1';
import { isPrecisionClass, isSensorType } from './schema/ToleranceInputV1';
import { getLogger } from './logger';

const log = getLogger('normative.catalog');

export interface NormativeParameters {
  /** Maximum permitted error as a percentage of span, by precision class. */
  precisionClassTable: Readonly<Record<PrecisionClass, number>>;
  /** Fixed part of the transmission tolerance (sensor units). */
  baseToleranceFactor: number;
  /** Per-unit growth of the tolerance with the largest-magnitude range bound. */
  compensationFactor: number;
}

function freezeParameters(p: NormativeParameters): Readonly<NormativeParameters> {
  Object.freeze(p.precisionClassTable);
  return Object.freeze(p);
}

export const NORMATIVE_PARAMETERS: Readonly<Record<SensorType, Readonly<NormativeParameters>>> = Object.freeze({
  temperature: freezeParameters({
    precisionClassTable: { high: 0.1, standard: 0.5, low: 1.0 },
    baseToleranceFactor: 0.15,
    compensationFactor: 0.0020,
  }),
  pressure: freezeParameters({
    precisionClassTable: { high: 0.1, standard: 0.5, low: 1.0 },
    baseToleranceFactor: 0.20,
    compensationFactor: 0.0025,
  }),
  flow: freezeParameters({
    precisionClassTable: { high: 0.2, standard: 0.5, low: 1.0 },
    baseToleranceFactor: 0.25,
    compensationFactor: 0.0030,
  }),
  speed: freezeParameters({
    precisionClassTable: { high: 0.1, standard: 0.5, low: 1.0 },
    baseToleranceFactor: 0.18,
    compensationFactor: 0.0015,
  }),
});

/** Table used when the sensor type is not recognised. */
export const FALLBACK_SENSOR_TYPE: SensorType = 'temperature';

/** Precision percentage used when the class is not recognised (the "standard" value). */
export const FALLBACK_PRECISION_BASE = 0.5;

export interface Resolved<T> {
  value: T;
  /** True when the fallback branch was taken. */
  fellBack: boolean;
}

/**
 * Look up the normative table for a sensor type.
 * Unrecognised types fall back to the temperature table.
 */
export function resolveNormativeParameters(sensorType: string): Resolved<Readonly<NormativeParameters>> {
  if (isSensorType(sensorType)) {
    return { value: NORMATIVE_PARAMETERS[sensorType], fellBack: false };
  }
  log.warn('Unrecognised sensor type; using temperature parameters', {
    sensorType,
    fallback: FALLBACK_SENSOR_TYPE,
  });
  return { value: NORMATIVE_PARAMETERS[FALLBACK_SENSOR_TYPE], fellBack: true };
}

/**
 * Precision percentage for a class. Unrecognised classes fall back to 0.5 %.
 */
export function resolvePrecisionBase(
  params: Readonly<NormativeParameters>,
  precisionClass: string,
): Resolved<number> {
  if (isPrecisionClass(precisionClass)) {
    return { value: params.precisionClassTable[precisionClass], fellBack: false };
  }
  log.warn('Unrecognised precision class; using standard precision', {
    precisionClass,
    fallback: FALLBACK_PRECISION_BASE,
  });
  return { value: FALLBACK_PRECISION_BASE, fellBack: true };
}
