/**
 * Error taxonomy for the tolerance engine.
 *
 * Every error here is a validation failure: nothing is transient, nothing is
 * retried. The `message` of each error is written for direct display to the
 * person filling in the form.
 */

import type { CalibratedRange } from './schema/ToleranceInputV1';

export type ToleranceErrorCode =
  | 'empty_sample'
  | 'insufficient_sample'
  | 'degenerate_range'
  | 'malformed_line'
  | 'invalid_tolerance';

export class ToleranceEngineError extends Error {
  readonly code: ToleranceErrorCode;

  constructor(code: ToleranceErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Zero calibration records were supplied. */
export class EmptySampleError extends ToleranceEngineError {
  constructor() {
    super('empty_sample', 'No calibration data provided.');
  }
}

/** Fewer records than a sample standard deviation needs (N − 1 denominator). */
export class InsufficientSampleError extends ToleranceEngineError {
  readonly required: number;
  readonly actual: number;

  constructor(required: number, actual: number) {
    super(
      'insufficient_sample',
      `At least ${required} calibration points are required for the metrological calculation (got ${actual}).`,
    );
    this.required = required;
    this.actual = actual;
  }
}

/** Range bounds are equal (zero span) or not finite. */
export class DegenerateRangeError extends ToleranceEngineError {
  readonly range: CalibratedRange;

  constructor(range: CalibratedRange) {
    super(
      'degenerate_range',
      `Calibrated range ${range.min} – ${range.max} is invalid: the lower and upper limits must be distinct finite numbers.`,
    );
    this.range = range;
  }
}

/** A calibration text line did not split into exactly two numeric tokens. */
export class MalformedInputLineError extends ToleranceEngineError {
  /** 1-based line number in the submitted text. */
  readonly lineNumber: number;
  readonly line: string;

  constructor(lineNumber: number, line: string) {
    super(
      'malformed_line',
      `Line ${lineNumber} ("${line}"): each line must contain two numeric values separated by a comma (measured_value,error).`,
    );
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

/** A component tolerance or uncertainty is negative or not finite. */
export class InvalidToleranceError extends ToleranceEngineError {
  readonly field: string;
  readonly value: number;

  constructor(field: string, value: number) {
    super('invalid_tolerance', `${field} must be a finite number ≥ 0 (got ${value}).`);
    this.field = field;
    this.value = value;
  }
}

export function isToleranceEngineError(value: unknown): value is ToleranceEngineError {
  return value instanceof ToleranceEngineError;
}
