/**
 * CalibrationParser — turns free-text calibration data into a sample.
 *
 * Format: one `<measured_value>,<error>` pair per line. Blank lines are
 * skipped. Parsing stops at the first malformed line and nothing parsed so
 * far is returned.
 */

import { EmptySampleError, MalformedInputLineError } from '../errors';
import { getLogger } from '../logger';
import type { CalibrationPoint, CalibrationSample } from '../schema/ToleranceInputV1';

const log = getLogger('CalibrationParser');

/** Shown as the textarea placeholder. */
export const CALIBRATION_TEXT_EXAMPLE = '25.0,0.2\n30.0,-0.1';

// Plain decimal or exponent notation; no hex, no Infinity/NaN.
const NUMBER_TOKEN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Parse one token, or null when it is not a finite decimal number. */
export function parseNumberToken(token: string): number | null {
  const trimmed = token.trim();
  if (!NUMBER_TOKEN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * @throws EmptySampleError when the text contains no data lines.
 * @throws MalformedInputLineError on the first line that is not two numbers.
 */
export function parseCalibrationText(text: string): CalibrationSample {
  const points: CalibrationPoint[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0) continue;

    const parts = line.split(',');
    const measuredValue = parts.length === 2 ? parseNumberToken(parts[0]) : null;
    const error = parts.length === 2 ? parseNumberToken(parts[1]) : null;

    if (measuredValue === null || error === null) {
      log.warn('Malformed calibration line', { lineNumber: i + 1, line });
      throw new MalformedInputLineError(i + 1, line);
    }

    points.push(Object.freeze({ measuredValue, error }));
  }

  if (points.length === 0) {
    throw new EmptySampleError();
  }

  return Object.freeze(points);
}
