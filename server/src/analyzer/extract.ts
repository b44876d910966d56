import type { CodeIssue } from './types.js';

export const NO_ELEMENTS = 'No specific elements identified';
export const NO_ISSUES = 'No specific issues identified';
export const NO_SUGGESTIONS = 'No specific suggestions identified';
export const NO_SUMMARY = 'No summary available';
export const NO_CORRELATIONS = 'No specific correlations identified';
export const NO_ROOT_CAUSE = 'Root cause not specifically identified';

export const PLACEHOLDERS: ReadonlySet<string> = new Set([
  NO_ELEMENTS,
  NO_ISSUES,
  NO_SUGGESTIONS,
  NO_SUMMARY,
  NO_CORRELATIONS,
  NO_ROOT_CAUSE,
]);

const ISSUE_WORDS = ['error', 'issue', 'problem', 'bug', 'warning', 'fail'];
const CODE_ISSUE_WORDS = ['issue', 'bug', 'error', 'problem'];
const SUGGESTION_WORDS = ['suggest', 'recommend', 'improv', 'should', 'could', 'better'];
const ROOT_CAUSE_PHRASES = ['root cause', 'caused by', 'due to', 'because', 'reason for'];

function mentionsAny(text: string, words: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return words.some((w) => lower.includes(w));
}

function pickLines(text: string, words: readonly string[], limit: number, placeholder: string): string[] {
  const picked = text
    .split('\n')
    .filter((line) => mentionsAny(line, words))
    .map((line) => line.trim());
  return picked.length > 0 ? picked.slice(0, limit) : [placeholder];
}

/** Key elements: `key: value` lines, bullets, numbered items, component mentions. */
export function extractElements(text: string): string[] {
  const elements: string[] = [];
  for (const line of text.split('\n')) {
    const stripped = line.trim();
    const lower = line.toLowerCase();
    if (
      (line.includes(':') && !line.endsWith(':')) ||
      stripped.startsWith('-') ||
      stripped.startsWith('*') ||
      stripped.startsWith(`${elements.length + 1}.`) ||
      lower.includes('component') ||
      lower.includes('element')
    ) {
      elements.push(stripped);
    }
  }
  return elements.length > 0 ? elements.slice(0, 10) : [NO_ELEMENTS];
}

export function extractIssues(text: string): string[] {
  return pickLines(text, ISSUE_WORDS, 5, NO_ISSUES);
}

export function extractSuggestions(text: string): string[] {
  return pickLines(text, SUGGESTION_WORDS, 5, NO_SUGGESTIONS);
}

export function extractRootCauses(text: string): string[] {
  return pickLines(text, ROOT_CAUSE_PHRASES, 3, NO_ROOT_CAUSE);
}

/**
 * Paragraphs that talk about a problem become `{ description, details }`; the
 * nearest "solution" paragraph after it, if any, is attached.
 */
export function extractCodeIssues(text: string): CodeIssue[] {
  const issues: CodeIssue[] = [];

  for (const section of text.split('\n\n')) {
    if (!mentionsAny(section, CODE_ISSUE_WORDS)) continue;
    const lines = section.split('\n');
    if (lines.length < 2) continue;

    const issue: CodeIssue = {
      description: (lines[0] ?? '').trim(),
      details: lines.slice(1).join('\n').trim(),
    };

    const solutionIdx = text.indexOf('solution', Math.max(0, text.indexOf(section)));
    if (solutionIdx !== -1) {
      const endIdx = text.indexOf('\n\n', solutionIdx);
      if (endIdx !== -1) issue.solution = text.slice(solutionIdx, endIdx).trim();
    }

    issues.push(issue);
  }

  if (issues.length === 0) {
    for (const line of text.split('\n')) {
      if (mentionsAny(line, CODE_ISSUE_WORDS)) issues.push({ description: line.trim() });
    }
  }

  return issues.length > 0 ? issues.slice(0, 5) : [{ description: NO_ISSUES }];
}

export function extractSummary(text: string): string {
  const paragraphs = text.split('\n\n');

  for (const para of paragraphs) {
    const trimmed = para.trim();
    if (trimmed.length > 50 && trimmed.toLowerCase().includes('summary')) return trimmed;
  }

  const first = (paragraphs[0] ?? '').trim();
  return first.length > 30 ? first : NO_SUMMARY;
}

export function extractCorrelations(text: string): string[] {
  const correlations: string[] = [];
  for (const sentence of text.replaceAll('\n', ' ').split('. ')) {
    if (mentionsAny(sentence, ['image', 'screen', 'visual']) && mentionsAny(sentence, ['code', 'function', 'variable'])) {
      correlations.push(`${sentence.trim()}.`);
    }
  }
  return correlations.length > 0 ? correlations.slice(0, 3) : [NO_CORRELATIONS];
}
