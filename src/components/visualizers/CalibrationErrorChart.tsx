import {
  ScatterChart,
  Scatter,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  ReferenceLine,
} from 'recharts';
import type { CalibrationSample } from '../../engine/schema/ToleranceInputV1';

export interface ErrorChartPoint {
  measuredValue: number;
  error: number;
  /** |error| exceeds the practical tolerance band. */
  outside: boolean;
}

/**
 * Calibration points sorted by measured value, each flagged against the
 * ±tolerance band.
 */
// eslint-disable-next-line react-refresh/only-export-components
export function buildErrorChartData(sample: CalibrationSample, tolerance: number): ErrorChartPoint[] {
  return [...sample]
    .sort((a, b) => a.measuredValue - b.measuredValue)
    .map(p => ({
      measuredValue: p.measuredValue,
      error: p.error,
      outside: Math.abs(p.error) > tolerance,
    }));
}

interface CalibrationErrorChartProps {
  sample: CalibrationSample;
  /** Practical tolerance drawn as ± reference lines. */
  tolerance: number;
  units: string;
}

export default function CalibrationErrorChart({ sample, tolerance, units }: CalibrationErrorChartProps) {
  const data = buildErrorChartData(sample, tolerance);
  const inside = data.filter(p => !p.outside);
  const outside = data.filter(p => p.outside);

  return (
    <ResponsiveContainer width="100%" height={260}>
      <ScatterChart margin={{ top: 10, right: 20, left: 0, bottom: 10 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis
          type="number"
          dataKey="measuredValue"
          name="Measured value"
          tick={{ fontSize: 10 }}
          label={{ value: `Measured value (${units})`, position: 'insideBottom', offset: -4, fontSize: 11 }}
        />
        <YAxis
          type="number"
          dataKey="error"
          name="Error"
          tick={{ fontSize: 10 }}
          label={{ value: `Error (${units})`, angle: -90, position: 'insideLeft', fontSize: 11 }}
        />
        <Tooltip contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }} />
        <ReferenceLine y={0} stroke="#a0aec0" />
        <ReferenceLine
          y={tolerance}
          stroke="#e53e3e"
          strokeDasharray="4 4"
          label={{ value: `+${tolerance} ${units}`, fontSize: 10, fill: '#e53e3e' }}
        />
        <ReferenceLine
          y={-tolerance}
          stroke="#e53e3e"
          strokeDasharray="4 4"
          label={{ value: `−${tolerance} ${units}`, fontSize: 10, fill: '#e53e3e' }}
        />
        <Scatter name="Within tolerance" data={inside} fill="#3182ce" />
        <Scatter name="Outside tolerance" data={outside} fill="#e53e3e" />
      </ScatterChart>
    </ResponsiveContainer>
  );
}
