/**
 * MetrologicalToleranceModule — GUM-style uncertainty tolerance.
 *
 *   σ        = sample std dev of the errors (N − 1)
 *   u_c      = √(σ² + u_std²)
 *   U        = 2 × u_c                          (k = 2, ~95 %)
 *   strict   = U
 *   practical= round(U + 0.05, 2)
 *   percent  = U / |max − min| × 100
 *   total    = √(sensor² + transmitter² + controller² + display²)
 *
 * Requires at least two calibration points.
 */

import type { MetrologicalResultV1 } from '../../contracts/ToleranceOutputV1';
import { getLogger } from '../logger';
import type { CalibratedRange, CalibrationSample, SensorType } from '../schema/ToleranceInputV1';
import { assertValidRange } from '../validation/requestValidation';
import { errorsOf, rootSumSquares, roundTo, sampleStdDev } from '../utils/statistics';
import { sensorTolerance } from './SensorToleranceModule';

const log = getLogger('MetrologicalToleranceModule');

/** Coverage factor k. */
export const COVERAGE_FACTOR = 2;
/** Field-practice margin added to the strict tolerance (sensor units). */
export const PRACTICAL_MARGIN = 0.05;

/**
 * @param standardUncertainty  Uncertainty of the reference standard.
 * @param sensorToleranceOverride  Datasheet sensor tolerance (non-temperature only).
 * @throws InsufficientSampleError when fewer than two points are given.
 * @throws DegenerateRangeError when the range bounds coincide.
 */
export function computeMetrological(
  sample: CalibrationSample,
  standardUncertainty: number,
  range: CalibratedRange,
  transmitterTolerance: number,
  controllerTolerance: number,
  displayTolerance: number,
  sensorType: SensorType,
  sensorToleranceOverride?: number,
): MetrologicalResultV1 {
  assertValidRange(range);

  const stdDev = sampleStdDev(errorsOf(sample));
  const combinedUncertainty = rootSumSquares(stdDev, standardUncertainty);
  const expandedUncertainty = COVERAGE_FACTOR * combinedUncertainty;

  const strictTolerance = expandedUncertainty;
  // Rounded here, before any further use.
  const practicalTolerance = roundTo(expandedUncertainty + PRACTICAL_MARGIN, 2);

  const span = Math.abs(range.max - range.min);
  const tolerancePercent = (expandedUncertainty / span) * 100;

  const sensorTol = sensorTolerance(range, sensorType, sensorToleranceOverride);
  const totalTolerance = rootSumSquares(
    sensorTol,
    transmitterTolerance,
    controllerTolerance,
    displayTolerance,
  );

  log.debug('Metrological tolerance computed', {
    sensorType,
    points: sample.length,
    expandedUncertainty,
    totalTolerance,
  });

  return {
    strictTolerance: roundTo(strictTolerance, 4),
    practicalTolerance,
    tolerancePercent: roundTo(tolerancePercent, 2),
    totalTolerance: roundTo(totalTolerance, 2),
    sensorTolerance: roundTo(sensorTol, 4),
    combinedUncertainty: roundTo(combinedUncertainty, 4),
    expandedUncertainty: roundTo(expandedUncertainty, 4),
  };
}
