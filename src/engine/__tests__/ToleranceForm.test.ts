/**
 * Tests for the form and chart logic helpers.
 *
 * These tests cover:
 *  - initialFormState() — defaults rendered as editable strings
 *  - buildFormInput() — string → number conversion and override gating
 *  - buildErrorChartData() — sorting and ±tolerance flagging
 */
import { describe, it, expect } from 'vitest';
import { initialFormState, buildFormInput, parseFormNumber } from '../../components/ToleranceForm';
import type { ToleranceFormState } from '../../components/ToleranceForm';
import { buildErrorChartData } from '../../components/visualizers/CalibrationErrorChart';
import { DEFAULT_FORM_VALUES } from '../../config/appConfig';
import { runToleranceEngine } from '../Engine';
import { parseCalibrationText } from '../parser/CalibrationParser';
import { InvalidToleranceError } from '../errors';

function makeState(overrides: Partial<ToleranceFormState> = {}): ToleranceFormState {
  return { ...initialFormState(DEFAULT_FORM_VALUES), ...overrides };
}

describe('initialFormState', () => {
  it('renders defaults as strings with empty calibration text', () => {
    const state = initialFormState(DEFAULT_FORM_VALUES);
    expect(state.rangeMin).toBe('0');
    expect(state.rangeMax).toBe('100');
    expect(state.standardUncertainty).toBe('0.1');
    expect(state.displayTolerance).toBe('0.05');
    expect(state.calibrationText).toBe('');
    expect(state.sensorToleranceOverride).toBe('');
  });
});

describe('parseFormNumber', () => {
  it('blank → NaN, otherwise Number()', () => {
    expect(parseFormNumber('  ')).toBeNaN();
    expect(parseFormNumber(' 12.5 ')).toBe(12.5);
  });
});

describe('buildFormInput', () => {
  it('converts every numeric field', () => {
    const input = buildFormInput(makeState({ rangeMin: '-50', rangeMax: '50' }));
    expect(input.range).toEqual({ min: -50, max: 50 });
    expect(input.tolerances).toEqual({
      standardUncertainty: 0.1,
      transmitterTolerance: 0.2,
      controllerTolerance: 0.1,
      displayTolerance: 0.05,
      sensorToleranceOverride: undefined,
    });
  });

  it('override is only read for non-temperature sensors', () => {
    expect(buildFormInput(makeState({ sensorToleranceOverride: '0.3' })).tolerances.sensorToleranceOverride)
      .toBeUndefined();
    expect(
      buildFormInput(makeState({ sensorType: 'pressure', sensorToleranceOverride: '0.3' })).tolerances
        .sensorToleranceOverride,
    ).toBe(0.3);
    expect(
      buildFormInput(makeState({ sensorType: 'pressure', sensorToleranceOverride: ' ' })).tolerances
        .sensorToleranceOverride,
    ).toBeUndefined();
  });

  it('a blank tolerance reaches the engine as NaN and is rejected there', () => {
    const input = buildFormInput(makeState({ transmitterTolerance: '' }));
    const sample = parseCalibrationText('25.0,0.2\n30.0,-0.1');
    expect(() => runToleranceEngine({ ...input, sample })).toThrow(InvalidToleranceError);
  });
});

describe('buildErrorChartData', () => {
  it('sorts by measured value and flags points outside ±tolerance', () => {
    const sample = parseCalibrationText('30,-0.6\n10,0.2\n20,0.52');
    expect(buildErrorChartData(sample, 0.52)).toEqual([
      { measuredValue: 10, error: 0.2, outside: false },
      { measuredValue: 20, error: 0.52, outside: false },
      { measuredValue: 30, error: -0.6, outside: true },
    ]);
  });

  it('does not reorder the original sample', () => {
    const sample = parseCalibrationText('30,0.1\n10,0.2');
    buildErrorChartData(sample, 0.5);
    expect(sample[0].measuredValue).toBe(30);
  });
});
