import type { ResultRowV1 } from '../contracts/ToleranceOutputV1';

interface ResultsPanelProps {
  title: string;
  rows: ResultRowV1[];
  /** Rendered in a collapsible block below the main rows. */
  detailRows?: ResultRowV1[];
  detailTitle?: string;
}

function RowList({ rows }: { rows: ResultRowV1[] }) {
  return (
    <dl className="result-rows">
      {rows.map(row => (
        <div key={row.key} className="result-row">
          <dt>{row.label}</dt>
          <dd>{row.value}</dd>
        </div>
      ))}
    </dl>
  );
}

export default function ResultsPanel({ title, rows, detailRows, detailTitle }: ResultsPanelProps) {
  return (
    <section className="results-panel">
      <h2>{title}</h2>
      <RowList rows={rows} />
      {detailRows && detailRows.length > 0 && (
        <details className="result-details">
          <summary>{detailTitle ?? 'Intermediate calculations'}</summary>
          <RowList rows={detailRows} />
        </details>
      )}
    </section>
  );
}
