/**
 * ToleranceForm
 *
 * Collects everything the engine needs. Numeric fields are kept as the raw
 * strings the user typed; `buildFormInput` converts them once on submit and
 * leaves range/tolerance validation to the engine so every rejection reads
 * the same way.
 */

import type { FormDefaults } from '../config/appConfig';
import type { ToleranceFormInputV1 } from '../engine/Engine';
import { CALIBRATION_TEXT_EXAMPLE } from '../engine/parser/CalibrationParser';
import type { PrecisionClass, SensorType } from '../engine/schema/ToleranceInputV1';
import {
  PRECISION_CLASSES,
  PRECISION_CLASS_LABELS,
  SENSOR_LABELS,
  SENSOR_TYPES,
  SENSOR_UNITS,
  isPrecisionClass,
  isSensorType,
} from '../engine/schema/ToleranceInputV1';

// ── Types ──────────────────────────────────────────────────────────────────────

export interface ToleranceFormState {
  sensorType: SensorType;
  rangeMin: string;
  rangeMax: string;
  precisionClass: PrecisionClass;
  calibrationText: string;
  standardUncertainty: string;
  transmitterTolerance: string;
  controllerTolerance: string;
  displayTolerance: string;
  /** Only read for non-temperature sensors. Blank = not provided. */
  sensorToleranceOverride: string;
  showDetails: boolean;
}

export interface ToleranceFormProps {
  state: ToleranceFormState;
  onChange: (next: ToleranceFormState) => void;
  onSubmit: () => void;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

// eslint-disable-next-line react-refresh/only-export-components
export function initialFormState(defaults: FormDefaults): ToleranceFormState {
  return {
    sensorType: defaults.sensorType,
    rangeMin: String(defaults.range.min),
    rangeMax: String(defaults.range.max),
    precisionClass: defaults.precisionClass,
    calibrationText: '',
    standardUncertainty: String(defaults.standardUncertainty),
    transmitterTolerance: String(defaults.transmitterTolerance),
    controllerTolerance: String(defaults.controllerTolerance),
    displayTolerance: String(defaults.displayTolerance),
    sensorToleranceOverride: '',
    showDetails: defaults.showDetails,
  };
}

/** Blank or non-numeric text → NaN, which the engine rejects with a field-specific message. */
// eslint-disable-next-line react-refresh/only-export-components
export function parseFormNumber(raw: string): number {
  const trimmed = raw.trim();
  return trimmed.length === 0 ? NaN : Number(trimmed);
}

// eslint-disable-next-line react-refresh/only-export-components
export function buildFormInput(state: ToleranceFormState): ToleranceFormInputV1 {
  const overrideText = state.sensorToleranceOverride.trim();
  const sensorToleranceOverride =
    state.sensorType !== 'temperature' && overrideText.length > 0 ? parseFormNumber(overrideText) : undefined;

  return {
    sensorType: state.sensorType,
    range: { min: parseFormNumber(state.rangeMin), max: parseFormNumber(state.rangeMax) },
    precisionClass: state.precisionClass,
    tolerances: {
      standardUncertainty: parseFormNumber(state.standardUncertainty),
      transmitterTolerance: parseFormNumber(state.transmitterTolerance),
      controllerTolerance: parseFormNumber(state.controllerTolerance),
      displayTolerance: parseFormNumber(state.displayTolerance),
      sensorToleranceOverride,
    },
    showDetails: state.showDetails,
  };
}

// ── Component ─────────────────────────────────────────────────────────────────

export default function ToleranceForm({ state, onChange, onSubmit }: ToleranceFormProps) {
  const units = SENSOR_UNITS[state.sensorType];

  function set<K extends keyof ToleranceFormState>(key: K, value: ToleranceFormState[K]) {
    onChange({ ...state, [key]: value });
  }

  function numberField(key: 'rangeMin' | 'rangeMax' | 'standardUncertainty' | 'transmitterTolerance' |
    'controllerTolerance' | 'displayTolerance' | 'sensorToleranceOverride', label: string) {
    return (
      <label className="form-field">
        <span>{label}</span>
        <input
          type="number"
          step="0.01"
          value={state[key]}
          onChange={e => set(key, e.target.value)}
        />
      </label>
    );
  }

  return (
    <form
      className="tolerance-form"
      onSubmit={e => {
        e.preventDefault();
        onSubmit();
      }}
    >
      <section>
        <h2>Sensor</h2>
        <label className="form-field">
          <span>Sensor type</span>
          <select
            value={state.sensorType}
            onChange={e => {
              if (isSensorType(e.target.value)) set('sensorType', e.target.value);
            }}
          >
            {SENSOR_TYPES.map(t => (
              <option key={t} value={t}>{SENSOR_LABELS[t]}</option>
            ))}
          </select>
        </label>
      </section>

      <section>
        <h2>Calibrated range</h2>
        {numberField('rangeMin', `Lower limit (${units})`)}
        {numberField('rangeMax', `Upper limit (${units})`)}
      </section>

      <section>
        <h2>Precision class</h2>
        <label className="form-field">
          <span>Precision class</span>
          <select
            value={state.precisionClass}
            onChange={e => {
              if (isPrecisionClass(e.target.value)) set('precisionClass', e.target.value);
            }}
          >
            {PRECISION_CLASSES.map(c => (
              <option key={c} value={c}>{PRECISION_CLASS_LABELS[c]}</option>
            ))}
          </select>
        </label>
      </section>

      <section>
        <h2>Calibration data</h2>
        <p className="hint">One point per line: <strong>measured_value,error</strong></p>
        <textarea
          rows={7}
          value={state.calibrationText}
          placeholder={`Example:\n${CALIBRATION_TEXT_EXAMPLE}`}
          onChange={e => set('calibrationText', e.target.value)}
        />
      </section>

      <section>
        <h2>Metrological parameters</h2>
        {numberField('standardUncertainty', `Reference standard uncertainty (${units})`)}
        {numberField('transmitterTolerance', `Transmitter tolerance (${units})`)}
        {numberField('controllerTolerance', `PLC / controller card tolerance (${units})`)}
        {numberField('displayTolerance', `Display tolerance (${units})`)}
        {state.sensorType !== 'temperature' &&
          numberField('sensorToleranceOverride', `Sensor tolerance from datasheet (${units})`)}
      </section>

      <label className="form-check">
        <input
          type="checkbox"
          checked={state.showDetails}
          onChange={e => set('showDetails', e.target.checked)}
        />
        Show intermediate calculations (normative)
      </label>

      <button type="submit" className="cta-btn">Calculate transmission tolerance</button>
    </form>
  );
}
