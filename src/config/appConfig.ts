import type { CalibratedRange, PrecisionClass, SensorType } from '../engine/schema/ToleranceInputV1';
import { isPrecisionClass, isSensorType } from '../engine/schema/ToleranceInputV1';

// ─── Types ────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/** Initial values shown in the form before the user edits anything. */
export interface FormDefaults {
  sensorType: SensorType;
  range: CalibratedRange;
  precisionClass: PrecisionClass;
  standardUncertainty: number;
  transmitterTolerance: number;
  controllerTolerance: number;
  displayTolerance: number;
  showDetails: boolean;
}

export interface AppConfig {
  logLevel: LogLevel;
  defaults: FormDefaults;
}

/** Values may be strings, booleans (Vite's DEV/PROD flags) or absent. */
export type RuntimeEnv = Record<string, unknown>;

// ─── Built-in defaults ────────────────────────────────────────────────────────

export const DEFAULT_FORM_VALUES: FormDefaults = {
  sensorType: 'temperature',
  range: { min: 0, max: 100 },
  precisionClass: 'standard',
  standardUncertainty: 0.1,
  transmitterTolerance: 0.2,
  controllerTolerance: 0.1,
  displayTolerance: 0.05,
  showDetails: false,
};

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

// ─── Parse helpers ────────────────────────────────────────────────────────────

export const parseBooleanFlag = (value: unknown, defaultValue = false): boolean => {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'string') {
    return defaultValue;
  }
  const normalised = value.trim().toLowerCase();
  if (normalised === '1' || normalised === 'true' || normalised === 'yes') {
    return true;
  }
  if (normalised === '0' || normalised === 'false' || normalised === 'no') {
    return false;
  }
  return defaultValue;
};

type NumericOptions = {
  min: number;
  max: number;
};

/** Returns null when the value is absent, not numeric or outside [min, max]. */
export const parseNumericEnv = (value: unknown, options: NumericOptions): number | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  if (parsed < options.min || parsed > options.max) {
    return null;
  }
  return parsed;
};

export const parseLogLevel = (value: unknown, defaultValue: LogLevel = DEFAULT_LOG_LEVEL): LogLevel => {
  if (typeof value !== 'string') {
    return defaultValue;
  }
  const normalised = value.trim().toLowerCase();
  const match = LOG_LEVELS.find(level => level === normalised);
  return match ?? defaultValue;
};

const TOLERANCE_BOUNDS: NumericOptions = { min: 0, max: 1_000 };
const RANGE_BOUNDS: NumericOptions = { min: -1e9, max: 1e9 };

// ─── Resolution ───────────────────────────────────────────────────────────────

/**
 * Build the application configuration from a Vite-style env object.
 * Every key is optional; unset or unparseable keys keep the built-in default.
 */
export function resolveAppConfig(env: RuntimeEnv): AppConfig {
  const d = DEFAULT_FORM_VALUES;

  const sensorTypeRaw = env.VITE_DEFAULT_SENSOR_TYPE;
  const precisionRaw = env.VITE_DEFAULT_PRECISION_CLASS;

  const rangeMin = parseNumericEnv(env.VITE_DEFAULT_RANGE_MIN, RANGE_BOUNDS) ?? d.range.min;
  const rangeMax = parseNumericEnv(env.VITE_DEFAULT_RANGE_MAX, RANGE_BOUNDS) ?? d.range.max;

  return {
    logLevel: parseLogLevel(env.VITE_LOG_LEVEL),
    defaults: {
      sensorType:
        typeof sensorTypeRaw === 'string' && isSensorType(sensorTypeRaw) ? sensorTypeRaw : d.sensorType,
      // Equal bounds would make every default submission fail; keep the built-in range instead.
      range: rangeMin !== rangeMax ? { min: rangeMin, max: rangeMax } : { ...d.range },
      precisionClass:
        typeof precisionRaw === 'string' && isPrecisionClass(precisionRaw) ? precisionRaw : d.precisionClass,
      standardUncertainty:
        parseNumericEnv(env.VITE_DEFAULT_STANDARD_UNCERTAINTY, TOLERANCE_BOUNDS) ?? d.standardUncertainty,
      transmitterTolerance:
        parseNumericEnv(env.VITE_DEFAULT_TRANSMITTER_TOLERANCE, TOLERANCE_BOUNDS) ?? d.transmitterTolerance,
      controllerTolerance:
        parseNumericEnv(env.VITE_DEFAULT_CONTROLLER_TOLERANCE, TOLERANCE_BOUNDS) ?? d.controllerTolerance,
      displayTolerance:
        parseNumericEnv(env.VITE_DEFAULT_DISPLAY_TOLERANCE, TOLERANCE_BOUNDS) ?? d.displayTolerance,
      showDetails: parseBooleanFlag(env.VITE_SHOW_DETAILS, d.showDetails),
    },
  };
}

export const appConfig: AppConfig = resolveAppConfig(import.meta.env);
