/**
 * NormativeToleranceModule — transmission tolerance from standards tables.
 *
 *   compensation          = compensationFactor × max(|min|, |max|)
 *   transmissionTolerance = baseToleranceFactor + compensation
 *   measurementSpan       = max − min            (signed)
 *   allowedErrorUnits     = precisionBase / 100 × measurementSpan
 *   tolerancePercent      = transmissionTolerance / measurementSpan × 100
 *   combinedUncertainty   = √(σ²)                (σ: population std dev, N)
 *   expandedUncertainty   = 2 × combinedUncertainty
 *
 * The span is signed: an inverted range (min > max) yields negative
 * allowed-error and percentage figures. The metrological path uses |span|.
 */

import type { NormativeDetailsV1, NormativeResultV1 } from '../../contracts/ToleranceOutputV1';
import { EmptySampleError } from '../errors';
import { getLogger } from '../logger';
import { resolveNormativeParameters, resolvePrecisionBase, FALLBACK_SENSOR_TYPE } from '../normative.catalog';
import type { CalibratedRange, CalibrationSample } from '../schema/ToleranceInputV1';
import { SENSOR_UNITS, isSensorType } from '../schema/ToleranceInputV1';
import { assertValidRange } from '../validation/requestValidation';
import { errorsOf, maxAbs, mean, populationStdDev, rootSumSquares, roundTo } from '../utils/statistics';
import { largestMagnitudeBound } from './SensorToleranceModule';

const log = getLogger('NormativeToleranceModule');

/** Coverage factor for the expanded uncertainty (~95 %). */
export const NORMATIVE_COVERAGE_FACTOR = 2;

export interface NormativeOptions {
  /** Attach the `details` sub-record. */
  showDetails?: boolean;
  /** Units label; defaults to the unit of the sensor type whose table is used. */
  units?: string;
}

/** Decimal exponents outside [-4, 16) print in exponent form ("1e-05", "1e+16"). */
const FIXED_NOTATION_MIN_EXPONENT = -4;
const FIXED_NOTATION_MAX_EXPONENT = 16;

/**
 * Format a range bound the way the analyser has always printed them: the
 * shortest round-trip digits, integral values with one decimal ("100.0"),
 * the sign of negative zero kept ("-0.0"), and exponent form for very large
 * or very small magnitudes ("1e+16", "2.5e-05").
 */
export function formatRangeBound(value: number): string {
  if (!Number.isFinite(value)) return String(value);

  const sign = value < 0 || Object.is(value, -0) ? '-' : '';
  const [mantissa, exponentText] = Math.abs(value).toExponential().split('e');
  const exponent = Number(exponentText);
  const digits = mantissa.replace('.', '');

  if (exponent < FIXED_NOTATION_MIN_EXPONENT || exponent >= FIXED_NOTATION_MAX_EXPONENT) {
    const exponentSign = exponent < 0 ? '-' : '+';
    return `${sign}${mantissa}e${exponentSign}${String(Math.abs(exponent)).padStart(2, '0')}`;
  }
  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }
  const integerDigits = exponent + 1;
  if (digits.length <= integerDigits) {
    return `${sign}${digits.padEnd(integerDigits, '0')}.0`;
  }
  return `${sign}${digits.slice(0, integerDigits)}.${digits.slice(integerDigits)}`;
}

export function formatCalibratedRange(range: CalibratedRange, units: string): string {
  return `${formatRangeBound(range.min)} - ${formatRangeBound(range.max)} ${units}`;
}

/**
 * Compute the normative transmission tolerance for a calibration sample.
 *
 * @param sensorType      Unrecognised types use the temperature table.
 * @param precisionClass  Unrecognised classes use the standard 0.5 %.
 * @throws EmptySampleError when the sample has no records.
 */
export function computeNormative(
  sensorType: string,
  range: CalibratedRange,
  sample: CalibrationSample,
  precisionClass: string,
  options: NormativeOptions = {},
): NormativeResultV1 {
  if (sample.length === 0) {
    log.warn('Normative calculation rejected: empty sample');
    throw new EmptySampleError();
  }
  assertValidRange(range);

  const measuredValues = sample.map(p => p.measuredValue);
  const errors = errorsOf(sample);

  const meanError = mean(errors);
  const maxError = maxAbs(errors);
  const stdDev = populationStdDev(errors);

  const { value: params } = resolveNormativeParameters(sensorType);
  const { value: precisionBase } = resolvePrecisionBase(params, precisionClass);

  const compensation = params.compensationFactor * largestMagnitudeBound(range);
  const transmissionTolerance = params.baseToleranceFactor + compensation;

  const measurementSpan = range.max - range.min;
  const allowedErrorUnits = (precisionBase / 100) * measurementSpan;
  const tolerancePercent = (transmissionTolerance / measurementSpan) * 100;

  // Single-term quadrature: numerically |σ|.
  const combinedUncertainty = rootSumSquares(stdDev);
  const expandedUncertainty = NORMATIVE_COVERAGE_FACTOR * combinedUncertainty;

  const units = options.units ?? SENSOR_UNITS[isSensorType(sensorType) ? sensorType : FALLBACK_SENSOR_TYPE];

  const result: NormativeResultV1 = {
    sensorType,
    units,
    calibratedRange: formatCalibratedRange(range, units),
    precisionClass,
    meanError: roundTo(meanError, 4),
    maxMeasuredError: roundTo(maxError, 4),
    allowedErrorPercent: roundTo(precisionBase, 2),
    allowedErrorUnits: roundTo(allowedErrorUnits, 4),
    errorStdDev: roundTo(stdDev, 4),
    transmissionTolerance: roundTo(transmissionTolerance, 4),
    tolerancePercent: roundTo(tolerancePercent, 2),
    combinedUncertainty: roundTo(combinedUncertainty, 4),
    expandedUncertainty: roundTo(expandedUncertainty, 4),
  };

  if (options.showDetails) {
    const details: NormativeDetailsV1 = {
      calibrationPoints: measuredValues,
      errors,
      meanError: roundTo(meanError, 4),
      maxError: roundTo(maxError, 4),
      stdDev: roundTo(stdDev, 4),
      precisionBase,
      baseFactor: params.baseToleranceFactor,
      compensationFactor: compensation,
      measurementSpan,
      allowedErrorUnits: roundTo(allowedErrorUnits, 4),
      tolerancePercent: roundTo(tolerancePercent, 2),
    };
    result.details = details;
  }

  log.debug('Normative tolerance computed', {
    sensorType,
    points: sample.length,
    transmissionTolerance: result.transmissionTolerance,
  });

  return result;
}
