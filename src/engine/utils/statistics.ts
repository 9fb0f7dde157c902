/**
 * Shared statistics helpers for the tolerance calculators.
 *
 * The two calculators deliberately use different standard-deviation
 * denominators: the normative path divides by N (population), the
 * metrological path by N − 1 (sample, Bessel-corrected). Keep both.
 */

import { EmptySampleError, InsufficientSampleError } from '../errors';
import type { CalibrationSample } from '../schema/ToleranceInputV1';

/** Minimum points for a Bessel-corrected standard deviation. */
export const MIN_POINTS_FOR_SAMPLE_STD_DEV = 2;

/** The `error` column of a calibration sample, in order. */
export function errorsOf(sample: CalibrationSample): number[] {
  return sample.map(p => p.error);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) throw new EmptySampleError();
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Largest absolute value. */
export function maxAbs(values: readonly number[]): number {
  if (values.length === 0) throw new EmptySampleError();
  return values.reduce((acc, v) => Math.max(acc, Math.abs(v)), 0);
}

function sumSquaredDeviations(values: readonly number[]): number {
  const m = mean(values);
  return values.reduce((acc, v) => acc + (v - m) ** 2, 0);
}

/** Standard deviation with Bessel's correction (N − 1). Requires N ≥ 2. */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < MIN_POINTS_FOR_SAMPLE_STD_DEV) {
    throw new InsufficientSampleError(MIN_POINTS_FOR_SAMPLE_STD_DEV, values.length);
  }
  return Math.sqrt(sumSquaredDeviations(values) / (values.length - 1));
}

/** Population standard deviation (divides by N). */
export function populationStdDev(values: readonly number[]): number {
  return Math.sqrt(sumSquaredDeviations(values) / values.length);
}

/** √(Σ xᵢ²) — quadrature combination of independent, uncorrelated terms. */
export function rootSumSquares(...terms: number[]): number {
  return Math.sqrt(terms.reduce((acc, t) => acc + t * t, 0));
}

/**
 * Extra digits examined past the rounding position. A double that is not an
 * exact tie differs from one within ~17 significant digits, so 20 is enough.
 */
const TIE_CHECK_DIGITS = 20;
const EXACT_TIE_TAIL = '5'.padEnd(TIE_CHECK_DIGITS, '0');

/**
 * Round to a fixed number of decimals for output, ties to even.
 *
 * `toFixed` works on the exact binary value, so it only disagrees with
 * half-even when the value is an exact decimal tie (0.125 → 2 dp); there it
 * rounds away from zero. Those ties are detected on the exact expansion and
 * sent to the even neighbour: 0.125 → 0.12, 0.375 → 0.38, 0.03125 → 0.0312.
 */
export function roundTo(value: number, decimals: number): number {
  const rounded = parseFloat(value.toFixed(decimals));
  // toFixed switches to exponent notation at 1e21; such doubles are integers.
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

  const expansion = Math.abs(value).toFixed(decimals + TIE_CHECK_DIGITS);
  const tail = expansion.slice(-TIE_CHECK_DIGITS);
  if (tail !== EXACT_TIE_TAIL) return rounded;

  const truncated = expansion.slice(0, -TIE_CHECK_DIGITS).replace(/\.$/, '');
  const lastDigit = Number(truncated.charAt(truncated.length - 1));
  if (lastDigit % 2 === 1) return rounded;
  return value < 0 ? -parseFloat(truncated) : parseFloat(truncated);
}
