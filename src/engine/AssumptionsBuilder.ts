import type { AssumptionV1 } from '../contracts/ToleranceOutputV1';
import { ASSUMPTION_IDS } from '../contracts/assumptions.ids';
import type { CalibratedRange, ComponentTolerances } from './schema/ToleranceInputV1';
import { SENSOR_UNITS, isPrecisionClass, isSensorType } from './schema/ToleranceInputV1';
import { DEFAULT_SENSOR_TOLERANCE } from './modules/SensorToleranceModule';

export interface AssumptionContext {
  sensorType: string;
  precisionClass: string;
  range: CalibratedRange;
  tolerances: ComponentTolerances;
}

/**
 * Lists the defaults and quirks that shaped a result, so the shell can show
 * them next to the figures.
 *
 * Rules:
 *  - Non-temperature sensor without a datasheet value → 0.5 default used (warn)
 *  - Datasheet value supplied for a temperature sensor → ignored (info)
 *  - min > max → normative span and percentages are negative (warn)
 *  - Unrecognised sensor type / precision class → normative fallback (warn)
 */
export function buildAssumptionsV1(ctx: AssumptionContext): AssumptionV1[] {
  const assumptions: AssumptionV1[] = [];

  if (ctx.sensorType !== 'temperature' && ctx.tolerances.sensorToleranceOverride === undefined) {
    const unitSuffix = isSensorType(ctx.sensorType) ? ` ${SENSOR_UNITS[ctx.sensorType]}` : '';
    assumptions.push({
      id: ASSUMPTION_IDS.SENSOR_TOLERANCE_DEFAULTED,
      title: 'Sensor tolerance not provided',
      detail: `No built-in model exists for this sensor type; a default of ${DEFAULT_SENSOR_TOLERANCE}${unitSuffix} has been used in the total chain tolerance.`,
      affects: ['metrological'],
      severity: 'warn',
      improveBy: 'Enter the sensor tolerance from the device datasheet.',
    });
  }

  if (ctx.sensorType === 'temperature' && ctx.tolerances.sensorToleranceOverride !== undefined) {
    assumptions.push({
      id: ASSUMPTION_IDS.SENSOR_OVERRIDE_IGNORED,
      title: 'Sensor tolerance value ignored',
      detail: 'Temperature sensors use the built-in model 0.15 + 0.0020 × max(|min|, |max|); the supplied value was not used.',
      affects: ['metrological'],
      severity: 'info',
    });
  }

  if (ctx.range.min > ctx.range.max) {
    assumptions.push({
      id: ASSUMPTION_IDS.RANGE_INVERTED,
      title: 'Calibrated range is inverted',
      detail: 'The lower limit exceeds the upper limit. Normative span, allowed error and tolerance percentage are negative; the metrological percentage uses the absolute span.',
      affects: ['normative'],
      severity: 'warn',
      improveBy: 'Swap the lower and upper range limits.',
    });
  }

  if (!isSensorType(ctx.sensorType)) {
    assumptions.push({
      id: ASSUMPTION_IDS.NORMATIVE_SENSOR_TYPE_FALLBACK,
      title: 'Sensor type not recognised',
      detail: `"${ctx.sensorType}" has no normative table; temperature parameters have been used.`,
      affects: ['normative'],
      severity: 'warn',
    });
  }

  if (!isPrecisionClass(ctx.precisionClass)) {
    assumptions.push({
      id: ASSUMPTION_IDS.NORMATIVE_PRECISION_CLASS_FALLBACK,
      title: 'Precision class not recognised',
      detail: `"${ctx.precisionClass}" is not a known precision class; standard precision (0.5 %) has been used.`,
      affects: ['normative'],
      severity: 'warn',
    });
  }

  return assumptions;
}
