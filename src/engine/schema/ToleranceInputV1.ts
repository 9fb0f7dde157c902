/**
 * ToleranceInputV1 — the inputs the presentation shell hands to the engine.
 *
 * Units follow the selected sensor type; the engine never converts them.
 */

export type SensorType = 'temperature' | 'pressure' | 'flow' | 'speed';

export type PrecisionClass = 'high' | 'standard' | 'low';

export const SENSOR_TYPES: readonly SensorType[] = ['temperature', 'pressure', 'flow', 'speed'];

export const PRECISION_CLASSES: readonly PrecisionClass[] = ['high', 'standard', 'low'];

/** Display unit per sensor type. */
export const SENSOR_UNITS: Readonly<Record<SensorType, string>> = {
  temperature: '°C',
  pressure:    'in/W',
  flow:        'm³/h',
  speed:       'rpm',
};

export const SENSOR_LABELS: Readonly<Record<SensorType, string>> = {
  temperature: 'Temperature',
  pressure:    'Pressure',
  flow:        'Flow',
  speed:       'Speed',
};

export const PRECISION_CLASS_LABELS: Readonly<Record<PrecisionClass, string>> = {
  high:     'High precision',
  standard: 'Standard precision',
  low:      'Low precision',
};

export interface CalibrationPoint {
  /** Reading taken from the device under calibration. */
  measuredValue: number;
  /** Deviation of that reading from the reference standard. */
  error: number;
}

/** Ordered, immutable list of calibration points. */
export type CalibrationSample = readonly CalibrationPoint[];

export interface CalibratedRange {
  min: number;
  max: number;
}

export interface ComponentTolerances {
  /** Uncertainty of the reference standard used during calibration. */
  standardUncertainty: number;
  transmitterTolerance: number;
  /** PLC / controller input card tolerance. */
  controllerTolerance: number;
  displayTolerance: number;
  /**
   * Datasheet sensor tolerance. Only read for non-temperature sensors;
   * temperature sensors use the built-in model.
   */
  sensorToleranceOverride?: number;
}

export interface ToleranceRequestV1 {
  sensorType: SensorType;
  range: CalibratedRange;
  precisionClass: PrecisionClass;
  sample: CalibrationSample;
  tolerances: ComponentTolerances;
  /** Attach intermediate normative figures to the result. */
  showDetails: boolean;
}

export function isSensorType(value: string): value is SensorType {
  return (SENSOR_TYPES as readonly string[]).includes(value);
}

export function isPrecisionClass(value: string): value is PrecisionClass {
  return (PRECISION_CLASSES as readonly string[]).includes(value);
}
