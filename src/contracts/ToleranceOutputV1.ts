import type { ENGINE_VERSION, CONTRACT_VERSION } from './versions';
import type { AssumptionId } from './assumptions.ids';

/*
 * Field names and rounding precision below are the output contract.
 * Numbers in brackets give the decimals each field is rounded to.
 */

export interface AssumptionV1 {
  id: AssumptionId;
  title: string;
  detail: string;
  affects: Array<'normative' | 'metrological'>;
  severity: 'info' | 'warn';
  improveBy?: string;
}

export interface ToleranceMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
  assumptions: AssumptionV1[];
}

/** Intermediate normative figures, attached only on request. */
export interface NormativeDetailsV1 {
  /** Measured values, in sample order. */
  calibrationPoints: number[];
  /** Errors, in sample order. */
  errors: number[];
  /** [4] */
  meanError: number;
  /** [4] */
  maxError: number;
  /** [4] Population standard deviation. */
  stdDev: number;
  precisionBase: number;
  baseFactor: number;
  /** Computed compensation term (factor × largest-magnitude bound), unrounded. */
  compensationFactor: number;
  /** Signed span (max − min). */
  measurementSpan: number;
  /** [4] */
  allowedErrorUnits: number;
  /** [2] */
  tolerancePercent: number;
}

export interface NormativeResultV1 {
  /** Sensor type as requested (an unrecognised type is echoed, not replaced). */
  sensorType: string;
  units: string;
  /** e.g. "0.0 - 100.0 °C" */
  calibratedRange: string;
  /** Precision class as requested. */
  precisionClass: string;
  /** [4] */
  meanError: number;
  /** [4] Largest |error| observed. */
  maxMeasuredError: number;
  /** [2] Permitted error as a percentage of span. */
  allowedErrorPercent: number;
  /** [4] Permitted error in sensor units. */
  allowedErrorUnits: number;
  /** [4] Population standard deviation of the errors. */
  errorStdDev: number;
  /** [4] */
  transmissionTolerance: number;
  /** [2] Transmission tolerance as a percentage of the signed span. */
  tolerancePercent: number;
  /** [4] */
  combinedUncertainty: number;
  /** [4] k = 2 */
  expandedUncertainty: number;
  details?: NormativeDetailsV1;
}

export interface MetrologicalResultV1 {
  /** [4] Expanded uncertainty (k = 2) used directly as the tolerance. */
  strictTolerance: number;
  /** [2] Strict tolerance plus the 0.05 field-practice margin. */
  practicalTolerance: number;
  /** [2] Expanded uncertainty as a percentage of |span|. */
  tolerancePercent: number;
  /** [2] Quadrature sum of sensor, transmitter, controller and display tolerances. */
  totalTolerance: number;
  /** [4] Sensor tolerance that entered the chain total. */
  sensorTolerance: number;
  /** [4] */
  combinedUncertainty: number;
  /** [4] */
  expandedUncertainty: number;
}

export interface ToleranceAnalysisV1 {
  meta: ToleranceMetaV1;
  normative: NormativeResultV1;
  metrological: MetrologicalResultV1;
}

/** One display line: a stable key, a human label and the formatted value. */
export interface ResultRowV1 {
  key: string;
  label: string;
  value: string;
}
