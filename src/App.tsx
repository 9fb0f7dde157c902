import { useState } from 'react';
import ToleranceForm, { buildFormInput, initialFormState } from './components/ToleranceForm';
import type { ToleranceFormState } from './components/ToleranceForm';
import ResultsPanel from './components/ResultsPanel';
import AssumptionsPanel from './components/AssumptionsPanel';
import CalibrationErrorChart from './components/visualizers/CalibrationErrorChart';
import Footer from './components/Footer';
import { appConfig } from './config/appConfig';
import { runToleranceEngine } from './engine/Engine';
import { isToleranceEngineError } from './engine/errors';
import { parseCalibrationText } from './engine/parser/CalibrationParser';
import {
  buildMetrologicalRows,
  buildMetrologicalTraceRows,
  buildNormativeDetailRows,
  buildNormativeRows,
} from './engine/OutputBuilder';
import type { ToleranceAnalysisV1 } from './contracts/ToleranceOutputV1';
import type { CalibrationSample } from './engine/schema/ToleranceInputV1';
import { SENSOR_UNITS } from './engine/schema/ToleranceInputV1';
import './App.css';

interface Outcome {
  analysis: ToleranceAnalysisV1;
  sample: CalibrationSample;
  units: string;
}

export default function App() {
  const [form, setForm] = useState<ToleranceFormState>(() => initialFormState(appConfig.defaults));
  const [outcome, setOutcome] = useState<Outcome | null>(null);
  const [error, setError] = useState<string | null>(null);

  function handleSubmit() {
    try {
      const sample = parseCalibrationText(form.calibrationText);
      const analysis = runToleranceEngine({ ...buildFormInput(form), sample });
      setOutcome({ analysis, sample, units: SENSOR_UNITS[form.sensorType] });
      setError(null);
    } catch (err) {
      // Validation failures are shown inline; anything else is a bug and goes to the global handler.
      if (!isToleranceEngineError(err)) throw err;
      setOutcome(null);
      setError(err.message);
    }
  }

  return (
    <div className="app">
      <header className="hero">
        <h1>📏 Sensor Transmission Tolerance Analyser</h1>
        <p className="subtitle">Normative and metrological (GUM, k=2) tolerance from calibration data</p>
      </header>

      <main className="layout">
        <ToleranceForm state={form} onChange={setForm} onSubmit={handleSubmit} />

        <div className="results">
          {error && <div className="error-banner" role="alert">{error}</div>}

          {outcome && (
            <>
              <AssumptionsPanel assumptions={outcome.analysis.meta.assumptions} />
              <ResultsPanel
                title="Normative results"
                rows={buildNormativeRows(outcome.analysis.normative)}
                detailRows={
                  outcome.analysis.normative.details
                    ? buildNormativeDetailRows(outcome.analysis.normative.details)
                    : undefined
                }
                detailTitle="Intermediate calculations (normative)"
              />
              <ResultsPanel
                title="Metrological results"
                rows={buildMetrologicalRows(outcome.analysis.metrological, outcome.units)}
                detailRows={buildMetrologicalTraceRows(outcome.analysis.metrological, outcome.units)}
                detailTitle="Uncertainty budget"
              />
              <section className="chart-panel">
                <h2>Calibration errors</h2>
                <CalibrationErrorChart
                  sample={outcome.sample}
                  tolerance={outcome.analysis.metrological.practicalTolerance}
                  units={outcome.units}
                />
              </section>
            </>
          )}
        </div>
      </main>

      <Footer />
    </div>
  );
}
