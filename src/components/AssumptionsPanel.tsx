import type { AssumptionV1 } from '../contracts/ToleranceOutputV1';

const SEVERITY_ICON: Record<AssumptionV1['severity'], string> = {
  info: 'ℹ️',
  warn: '⚠️',
};

export default function AssumptionsPanel({ assumptions }: { assumptions: AssumptionV1[] }) {
  if (assumptions.length === 0) return null;

  return (
    <section className="assumptions-panel">
      <h3>Assumptions</h3>
      <ul>
        {assumptions.map(a => (
          <li key={a.id} className={`assumption ${a.severity}`}>
            <strong>{SEVERITY_ICON[a.severity]} {a.title}</strong>
            <p>{a.detail}</p>
            {a.improveBy && <p className="improve-by">{a.improveBy}</p>}
          </li>
        ))}
      </ul>
    </section>
  );
}
