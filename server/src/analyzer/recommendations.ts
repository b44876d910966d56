import { extractSuggestions, PLACEHOLDERS } from './extract.js';
import type { AnalysisResult, CodeIssue } from './types.js';

export const GENERIC_RECOMMENDATION = 'Review the full analysis for detailed recommendations';

function isPlaceholder(value: string): boolean {
  return PLACEHOLDERS.has(value);
}

function fromIssue(issue: CodeIssue | string): string | null {
  if (typeof issue === 'string') return isPlaceholder(issue) ? null : `Fix the issue: ${issue}`;
  return issue.solution ? issue.solution : null;
}

function suggestionsFrom(text: string): string[] {
  return extractSuggestions(text).filter((s) => !isPlaceholder(s));
}

export function generateRecommendations(result: AnalysisResult): string[] {
  const recommendations: string[] = [];

  if ('issues' in result) {
    for (const issue of result.issues) {
      const rec = fromIssue(issue);
      if (rec) recommendations.push(rec);
    }
  }

  if ('potential_issues' in result) {
    for (const issue of result.potential_issues) {
      if (!isPlaceholder(issue)) recommendations.push(`Address the issue: ${issue}`);
    }
  }

  if ('root_causes' in result) {
    for (const cause of result.root_causes) {
      if (!isPlaceholder(cause)) recommendations.push(`Resolve root cause: ${cause}`);
    }
  }

  if ('suggestions' in result) {
    recommendations.push(...result.suggestions.filter((s) => !isPlaceholder(s)));
  }

  if (recommendations.length === 0 && 'full_analysis' in result) {
    recommendations.push(...suggestionsFrom(result.full_analysis));
  }

  if (recommendations.length === 0 && 'combined_analysis' in result) {
    recommendations.push(...suggestionsFrom(result.combined_analysis));
  }

  return recommendations.length > 0 ? recommendations : [GENERIC_RECOMMENDATION];
}
