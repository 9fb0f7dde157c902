import { DegenerateRangeError, InsufficientSampleError, InvalidToleranceError } from '../errors';
import type { CalibratedRange, CalibrationSample, ComponentTolerances } from '../schema/ToleranceInputV1';
import { MIN_POINTS_FOR_SAMPLE_STD_DEV } from '../utils/statistics';

/** Bounds must be finite and distinct: the span is used as a divisor. */
export function assertValidRange(range: CalibratedRange): void {
  if (!Number.isFinite(range.min) || !Number.isFinite(range.max) || range.min === range.max) {
    throw new DegenerateRangeError(range);
  }
}

/** Every supplied tolerance must be finite and ≥ 0. An absent override is fine. */
export function assertValidTolerances(tolerances: ComponentTolerances): void {
  const checks: Array<[label: string, value: number | undefined]> = [
    ['Standard uncertainty', tolerances.standardUncertainty],
    ['Transmitter tolerance', tolerances.transmitterTolerance],
    ['Controller tolerance', tolerances.controllerTolerance],
    ['Display tolerance', tolerances.displayTolerance],
    ['Sensor tolerance', tolerances.sensorToleranceOverride],
  ];
  for (const [label, value] of checks) {
    if (value === undefined) continue;
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidToleranceError(label, value);
    }
  }
}

/** The metrological path needs a sample standard deviation (N ≥ 2). */
export function assertMetrologicalSample(sample: CalibrationSample): void {
  if (sample.length < MIN_POINTS_FOR_SAMPLE_STD_DEV) {
    throw new InsufficientSampleError(MIN_POINTS_FOR_SAMPLE_STD_DEV, sample.length);
  }
}
