import type { ToleranceAnalysisV1 } from '../contracts/ToleranceOutputV1';
import { ENGINE_VERSION, CONTRACT_VERSION } from '../contracts/versions';
import { buildAssumptionsV1 } from './AssumptionsBuilder';
import { EmptySampleError, isToleranceEngineError } from './errors';
import { getLogger } from './logger';
import { computeMetrological } from './modules/MetrologicalToleranceModule';
import { computeNormative } from './modules/NormativeToleranceModule';
import { parseCalibrationText } from './parser/CalibrationParser';
import type { ToleranceRequestV1 } from './schema/ToleranceInputV1';
import { SENSOR_UNITS } from './schema/ToleranceInputV1';
import {
  assertMetrologicalSample,
  assertValidRange,
  assertValidTolerances,
} from './validation/requestValidation';

const log = getLogger('Engine');

/** Request fields other than the sample, for text submissions. */
export type ToleranceFormInputV1 = Omit<ToleranceRequestV1, 'sample'>;

/**
 * Validate a request and run both calculators.
 *
 * All validation happens before either calculator runs. The two results are
 * independent: nothing computed by one feeds the other.
 */
export function runToleranceEngine(request: ToleranceRequestV1): ToleranceAnalysisV1 {
  const { sensorType, range, precisionClass, sample, tolerances, showDetails } = request;

  try {
    if (sample.length === 0) throw new EmptySampleError();
    assertValidRange(range);
    assertValidTolerances(tolerances);
    assertMetrologicalSample(sample);
  } catch (err) {
    if (isToleranceEngineError(err)) {
      log.warn('Tolerance request rejected', { code: err.code, message: err.message });
    }
    throw err;
  }

  const normative = computeNormative(sensorType, range, sample, precisionClass, {
    showDetails,
    units: SENSOR_UNITS[sensorType],
  });

  const metrological = computeMetrological(
    sample,
    tolerances.standardUncertainty,
    range,
    tolerances.transmitterTolerance,
    tolerances.controllerTolerance,
    tolerances.displayTolerance,
    sensorType,
    tolerances.sensorToleranceOverride,
  );

  const assumptions = buildAssumptionsV1({ sensorType, precisionClass, range, tolerances });

  log.info('Tolerance analysis complete', {
    sensorType,
    points: sample.length,
    assumptions: assumptions.map(a => a.id),
  });

  return {
    meta: {
      engineVersion: ENGINE_VERSION,
      contractVersion: CONTRACT_VERSION,
      assumptions,
    },
    normative,
    metrological,
  };
}

/** Parse free-text calibration data, then run the engine. */
export function runToleranceEngineFromText(
  calibrationText: string,
  input: ToleranceFormInputV1,
): ToleranceAnalysisV1 {
  const sample = parseCalibrationText(calibrationText);
  return runToleranceEngine({ ...input, sample });
}
