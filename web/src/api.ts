import { isRecord } from './utils/records.js';

export type AnalysisTab = 'image' | 'code' | 'combined';

export const ANALYSIS_TABS: readonly AnalysisTab[] = ['image', 'code', 'combined'];

export const ANALYSIS_ENDPOINTS: Record<AnalysisTab, string> = {
  image: '/api/analyze/image',
  code: '/api/analyze/code',
  combined: '/api/analyze/combined',
};

/**
 * The gateway's success body. Only the envelope keys are known here; `result`
 * varies by endpoint and is read defensively by the renderer.
 */
export type AnalysisEnvelope = Record<string, unknown>;

export function isAnalysisTab(value: unknown): value is AnalysisTab {
  return ANALYSIS_TABS.some((tab) => tab === value);
}

export async function submitAnalysis(endpoint: string, body: FormData): Promise<AnalysisEnvelope> {
  const res = await fetch(endpoint, { method: 'POST', body });
  if (!res.ok) throw new Error(`API error: ${res.status}`);

  const data = (await res.json()) as unknown;
  if (!isRecord(data)) throw new Error('Unexpected response format');
  return data;
}
