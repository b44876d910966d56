import { createContext, useContext } from 'react';

import type { AnalysisEnvelope, AnalysisTab } from './api.js';

export type AnalysisResults = Partial<Record<AnalysisTab, AnalysisEnvelope>>;

export type AnalysisContextValue = {
  results: AnalysisResults;
  setResult: (tab: AnalysisTab, envelope: AnalysisEnvelope | null) => void;
};

export const AnalysisContext = createContext<AnalysisContextValue | undefined>(undefined);

export function useAnalysisResults(): AnalysisContextValue {
  const ctx = useContext(AnalysisContext);
  if (!ctx) throw new Error('useAnalysisResults must be used within <AnalysisProvider>');
  return ctx;
}
