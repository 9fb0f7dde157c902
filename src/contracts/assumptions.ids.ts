export const ASSUMPTION_IDS = {
  // Sensor tolerance
  SENSOR_TOLERANCE_DEFAULTED: 'sensor.tolerance_defaulted',
  SENSOR_OVERRIDE_IGNORED: 'sensor.override_ignored',

  // Range
  RANGE_INVERTED: 'range.inverted',

  // Normative lookups
  NORMATIVE_SENSOR_TYPE_FALLBACK: 'normative.sensor_type_fallback',
  NORMATIVE_PRECISION_CLASS_FALLBACK: 'normative.precision_class_fallback',
} as const;

export type AssumptionId = typeof ASSUMPTION_IDS[keyof typeof ASSUMPTION_IDS];
