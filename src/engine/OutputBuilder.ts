/**
 * OutputBuilder — turns result records into labelled display rows.
 *
 * Keys are the contract field names; labels carry the unit of the selected
 * sensor type. Values are printed as computed (already rounded by the
 * calculators), never re-rounded here.
 */

import type {
  MetrologicalResultV1,
  NormativeDetailsV1,
  NormativeResultV1,
  ResultRowV1,
} from '../contracts/ToleranceOutputV1';
import { PRECISION_CLASS_LABELS, SENSOR_LABELS, isPrecisionClass, isSensorType } from './schema/ToleranceInputV1';

/** "maxMeasuredError" → "Max measured error" */
export function humanizeKey(key: string): string {
  const words = key.replace(/([a-z0-9])([A-Z])/g, '$1 $2').toLowerCase();
  return words.charAt(0).toUpperCase() + words.slice(1);
}

export function formatValue(value: number | string | readonly number[]): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return `[${value.map(String).join(', ')}]`;
}

export function buildNormativeRows(result: NormativeResultV1): ResultRowV1[] {
  const u = result.units;
  const sensorLabel = isSensorType(result.sensorType) ? SENSOR_LABELS[result.sensorType] : result.sensorType;
  const classLabel = isPrecisionClass(result.precisionClass)
    ? PRECISION_CLASS_LABELS[result.precisionClass]
    : result.precisionClass;

  return [
    { key: 'sensorType',            label: 'Sensor type',                         value: sensorLabel },
    { key: 'units',                 label: 'Units',                               value: u },
    { key: 'calibratedRange',       label: 'Calibrated range',                    value: result.calibratedRange },
    { key: 'precisionClass',        label: 'Precision class',                     value: classLabel },
    { key: 'meanError',             label: `Mean error (${u})`,                   value: formatValue(result.meanError) },
    { key: 'maxMeasuredError',      label: `Maximum measured error (${u})`,       value: formatValue(result.maxMeasuredError) },
    { key: 'allowedErrorPercent',   label: 'Maximum allowed error (%)',           value: formatValue(result.allowedErrorPercent) },
    { key: 'allowedErrorUnits',     label: `Maximum allowed error (${u})`,        value: formatValue(result.allowedErrorUnits) },
    { key: 'errorStdDev',           label: `Error standard deviation (${u})`,     value: formatValue(result.errorStdDev) },
    { key: 'transmissionTolerance', label: `Transmission tolerance (${u})`,       value: formatValue(result.transmissionTolerance) },
    { key: 'tolerancePercent',      label: 'Tolerance (% of span)',               value: formatValue(result.tolerancePercent) },
    { key: 'combinedUncertainty',   label: `Combined uncertainty (${u})`,         value: formatValue(result.combinedUncertainty) },
    { key: 'expandedUncertainty',   label: `Expanded uncertainty, k=2 (${u})`,    value: formatValue(result.expandedUncertainty) },
  ];
}

const DETAIL_KEYS: ReadonlyArray<keyof NormativeDetailsV1> = [
  'calibrationPoints',
  'errors',
  'meanError',
  'maxError',
  'stdDev',
  'precisionBase',
  'baseFactor',
  'compensationFactor',
  'measurementSpan',
  'allowedErrorUnits',
  'tolerancePercent',
];

/** Intermediate normative figures, in record order, with humanised keys. */
export function buildNormativeDetailRows(details: NormativeDetailsV1): ResultRowV1[] {
  return DETAIL_KEYS.map(key => ({
    key,
    label: humanizeKey(key),
    value: formatValue(details[key]),
  }));
}

export function buildMetrologicalRows(result: MetrologicalResultV1, units: string): ResultRowV1[] {
  return [
    {
      key: 'strictTolerance',
      label: `Tolerance based on expanded uncertainty (${units})`,
      value: formatValue(result.strictTolerance),
    },
    {
      key: 'practicalTolerance',
      label: `Tolerance with practical adjustment (${units})`,
      value: formatValue(result.practicalTolerance),
    },
    {
      key: 'tolerancePercent',
      label: 'Tolerance as percentage of calibrated range (%)',
      value: formatValue(result.tolerancePercent),
    },
    {
      key: 'totalTolerance',
      label: `Total tolerance across all components (${units})`,
      value: formatValue(result.totalTolerance),
    },
  ];
}

/** Sensor, combined and expanded figures behind the metrological rows. */
export function buildMetrologicalTraceRows(result: MetrologicalResultV1, units: string): ResultRowV1[] {
  return [
    { key: 'sensorTolerance',     label: `Sensor tolerance (${units})`,           value: formatValue(result.sensorTolerance) },
    { key: 'combinedUncertainty', label: `Combined uncertainty (${units})`,       value: formatValue(result.combinedUncertainty) },
    { key: 'expandedUncertainty', label: `Expanded uncertainty, k=2 (${units})`,  value: formatValue(result.expandedUncertainty) },
  ];
}
