import { useCallback, useEffect, useMemo, useState } from 'react';

import { AnalysisContext, type AnalysisContextValue, type AnalysisResults } from './analysisContext.js';
import { ANALYSIS_TABS, type AnalysisEnvelope, type AnalysisTab } from './api.js';
import { isRecord } from './utils/records.js';

export const RESULTS_STORAGE_KEY = 'multimodal-analysis:last-results';

function readFromSessionStorage(): AnalysisResults {
  try {
    if (typeof window === 'undefined') return {};
    const raw = window.sessionStorage.getItem(RESULTS_STORAGE_KEY);
    if (!raw) return {};
    const parsed = JSON.parse(raw) as unknown;
    if (!isRecord(parsed)) return {};

    const results: AnalysisResults = {};
    for (const tab of ANALYSIS_TABS) {
      const envelope = parsed[tab];
      if (isRecord(envelope)) results[tab] = envelope;
    }
    return results;
  } catch {
    return {};
  }
}

function writeToSessionStorage(results: AnalysisResults): void {
  try {
    if (typeof window === 'undefined') return;
    if (Object.keys(results).length === 0) {
      window.sessionStorage.removeItem(RESULTS_STORAGE_KEY);
      return;
    }
    window.sessionStorage.setItem(RESULTS_STORAGE_KEY, JSON.stringify(results));
  } catch {
    // ignore storage failures
  }
}

export function AnalysisProvider({ children }: { children: React.ReactNode }) {
  const [results, setResults] = useState<AnalysisResults>(() => readFromSessionStorage());

  useEffect(() => {
    writeToSessionStorage(results);
  }, [results]);

  const setResult = useCallback((tab: AnalysisTab, envelope: AnalysisEnvelope | null) => {
    setResults((prev) => {
      const next = { ...prev };
      if (envelope) next[tab] = envelope;
      else delete next[tab];
      return next;
    });
  }, []);

  const value = useMemo<AnalysisContextValue>(() => ({ results, setResult }), [results, setResult]);
  return <AnalysisContext.Provider value={value}>{children}</AnalysisContext.Provider>;
}
