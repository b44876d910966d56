import { useState, type FormEvent } from 'react';

import { ANALYSIS_ENDPOINTS, submitAnalysis, type AnalysisTab } from '../api.js';
import { useAnalysisResults } from '../analysisContext.js';
import { ErrorCard } from './ErrorCard.js';
import { ResultView } from './ResultView.js';
import { UploadArea } from './UploadArea.js';

export type UploadField = {
  name: string;
  label: string;
  hint: string;
  accept?: string;
};

export type ContextField = {
  name: string;
  label: string;
  placeholder: string;
};

type StatusState = { state: 'idle' } | { state: 'running' } | { state: 'error'; message: string };

export type AnalysisFormProps = {
  tab: AnalysisTab;
  fields: UploadField[];
  contextField?: ContextField;
  submitLabel: string;
};

export function AnalysisForm({ tab, fields, contextField, submitLabel }: AnalysisFormProps) {
  const { results, setResult } = useAnalysisResults();
  const [files, setFiles] = useState<Record<string, File>>({});
  const [context, setContext] = useState('');
  const [status, setStatus] = useState<StatusState>({ state: 'idle' });

  const envelope = results[tab];
  const missingFile = fields.some((f) => !files[f.name]);
  const running = status.state === 'running';

  async function onAnalyze() {
    if (running || missingFile) return;

    const body = new FormData();
    for (const field of fields) {
      const file = files[field.name];
      if (file) body.append(field.name, file, file.name);
    }
    if (contextField && context.trim()) body.append(contextField.name, context);

    try {
      setStatus({ state: 'running' });
      const next = await submitAnalysis(ANALYSIS_ENDPOINTS[tab], body);
      setResult(tab, next);
      setStatus({ state: 'idle' });
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      setResult(tab, null);
      setStatus({ state: 'error', message });
    }
  }

  function onSubmit(e: FormEvent<HTMLFormElement>) {
    e.preventDefault();
    void onAnalyze();
  }

  return (
    <div className="analysis">
      <form className="form" onSubmit={onSubmit}>
        {fields.map((field) => (
          <UploadArea
            key={field.name}
            name={field.name}
            label={field.label}
            hint={field.hint}
            accept={field.accept}
            file={files[field.name] ?? null}
            onFileChange={(file) => setFiles((prev) => ({ ...prev, [field.name]: file }))}
          />
        ))}

        {contextField && (
          <label className="field">
            <div className="label">{contextField.label}</div>
            <textarea
              className="input"
              name={contextField.name}
              placeholder={contextField.placeholder}
              value={context}
              onChange={(e) => setContext(e.target.value)}
            />
          </label>
        )}

        <button className="button" type="submit" disabled={running || missingFile}>
          {running ? 'Analyzing...' : submitLabel}
        </button>
      </form>

      <div className="result-container">
        {running && (
          <div className="loading" role="status" aria-label="Loading">
            <div className="spinner" />
          </div>
        )}
        {status.state === 'error' && <ErrorCard message={status.message} />}
        {status.state === 'idle' && envelope && <ResultView envelope={envelope} />}
      </div>
    </div>
  );
}
