import type { AnalysisEnvelope } from '../api.js';
import { isRecord } from '../utils/records.js';

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function asTextList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map(asText).filter((s) => s.length > 0);
}

function humanizeKey(key: string): string {
  const spaced = key.replace(/_/gu, ' ');
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

function Section({ title, children }: { title: string; children: React.ReactNode }) {
  return (
    <section className="result-section">
      <h6 className="result-title">{title}</h6>
      {children}
    </section>
  );
}

function IssueItem({ issue }: { issue: unknown }) {
  if (!isRecord(issue)) return <div className="result-item">{asText(issue)}</div>;

  const title = asText(issue.description) || asText(issue.type) || 'Issue';
  const line = issue.line ? asText(issue.line) : '';
  const details = asText(issue.details);
  return (
    <div className="result-item">
      <div className="issue-title">
        <strong>{title}</strong>
        {line && <span className="badge">{`Line ${line}`}</span>}
      </div>
      {details && <p className="issue-details">{details}</p>}
    </div>
  );
}

function IssueList({ issues }: { issues: unknown[] }) {
  return (
    <div className="issue-list">
      {issues.map((issue, idx) => (
        <IssueItem key={idx} issue={issue} />
      ))}
    </div>
  );
}

function TextList({ items, className }: { items: string[]; className?: string }) {
  return (
    <ul className={className}>
      {items.map((item, idx) => (
        <li key={idx}>{item}</li>
      ))}
    </ul>
  );
}

/** Renders whatever parts of an analysis envelope are present, as plain text. */
export function ResultView({ envelope }: { envelope: AnalysisEnvelope }) {
  const result = isRecord(envelope.result) ? envelope.result : {};
  const analysisId = asText(envelope.analysis_id);

  const description = asText(result.description);
  const language = asText(result.language);
  const summary = asText(result.summary);
  const issues = Array.isArray(result.issues)
    ? result.issues
    : Array.isArray(result.potential_issues)
      ? result.potential_issues
      : [];
  const staticIssues = Array.isArray(result.static_issues) ? result.static_issues : [];
  const metrics = isRecord(result.metrics) ? Object.entries(result.metrics).filter(([, v]) => asText(v) !== '') : [];
  const combined = asText(result.combined_analysis);
  const correlations = asTextList(result.correlations);
  const rootCauses = asTextList(result.root_causes);
  const recommendations = asTextList(envelope.recommendations);

  return (
    <div className="card result-card">
      <div className="card-header">
        <h5>Analysis Results</h5>
        {analysisId && <span className="analysis-id">{`ID: ${analysisId}`}</span>}
      </div>
      <div className="card-body">
        {description && (
          <Section title="Description">
            <p className="prose">{description}</p>
          </Section>
        )}

        {language && (
          <Section title="Code Analysis">
            <p>{`Language: ${language}`}</p>
            {summary && <p className="prose">{summary}</p>}
          </Section>
        )}

        {issues.length > 0 && (
          <Section title="Issues Detected">
            <IssueList issues={issues} />
          </Section>
        )}

        {staticIssues.length > 0 && (
          <Section title="Static Checks">
            <IssueList issues={staticIssues} />
          </Section>
        )}

        {metrics.length > 0 && (
          <Section title="Code Metrics">
            <dl className="metrics">
              {metrics.map(([key, value]) => (
                <div key={key} className="metric">
                  <dt>{humanizeKey(key)}</dt>
                  <dd>{asText(value)}</dd>
                </div>
              ))}
            </dl>
          </Section>
        )}

        {combined && (
          <Section title="Combined Analysis">
            <p className="prose">{combined}</p>
            {correlations.length > 0 && (
              <>
                <h6 className="result-subtitle">Correlations</h6>
                <TextList items={correlations} />
              </>
            )}
            {rootCauses.length > 0 && (
              <>
                <h6 className="result-subtitle">Root Causes</h6>
                <TextList items={rootCauses} />
              </>
            )}
          </Section>
        )}

        {recommendations.length > 0 && (
          <Section title="Recommendations">
            <TextList items={recommendations} className="recommendations" />
          </Section>
        )}
      </div>
    </div>
  );
}
