/**
 * SensorToleranceModule — tolerance contributed by the sensing element itself.
 *
 * Temperature sensors use a built-in class model whose tolerance grows with
 * the largest-magnitude temperature in the calibrated range:
 *
 *   tol = 0.15 + 0.0020 × max(|min|, |max|)
 *
 * Other sensor types have no built-in model; the datasheet value is passed
 * through unchanged, or 0.5 when none is given.
 */

import type { CalibratedRange, SensorType } from '../schema/ToleranceInputV1';

/** Fixed part of the temperature sensor model (°C). */
export const TEMPERATURE_BASE_TOLERANCE = 0.15;
/** Growth of the temperature tolerance per °C of the largest-magnitude bound. */
export const TEMPERATURE_TOLERANCE_SLOPE = 0.0020;
/** Used for non-temperature sensors when no datasheet value is supplied. */
export const DEFAULT_SENSOR_TOLERANCE = 0.5;

/** max(|min|, |max|) */
export function largestMagnitudeBound(range: CalibratedRange): number {
  return Math.max(Math.abs(range.min), Math.abs(range.max));
}

/**
 * @param override  Datasheet tolerance; ignored for temperature sensors.
 */
export function sensorTolerance(
  range: CalibratedRange,
  type: SensorType,
  override?: number,
): number {
  if (type === 'temperature') {
    return TEMPERATURE_BASE_TOLERANCE + TEMPERATURE_TOLERANCE_SLOPE * largestMagnitudeBound(range);
  }
  return override ?? DEFAULT_SENSOR_TOLERANCE;
}
