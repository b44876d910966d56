import { parseCode } from './codeParser.js';
import { getLanguagePattern, UNKNOWN_LANGUAGE } from './language.js';
import type { ComplexityMetrics } from './types.js';

const C_LIKE = [/\bif\b/gu, /\belse if\b/gu, /\bfor\b/gu, /\bwhile\b/gu, /\bcase\b/gu, /\bcatch\b/gu, /&&/gu, /\|\|/gu];

const DECISION_PATTERNS: Record<string, RegExp[]> = {
  python: [/\bif\b/gu, /\belif\b/gu, /\bfor\b/gu, /\bwhile\b/gu, /\bexcept\b/gu, /\band\b/gu, /\bor\b/gu],
  javascript: C_LIKE,
  java: C_LIKE,
  cpp: C_LIKE,
  c: [/\bif\b/gu, /\belse if\b/gu, /\bfor\b/gu, /\bwhile\b/gu, /\bcase\b/gu, /&&/gu, /\|\|/gu],
  go: [/\bif\b/gu, /\belse if\b/gu, /\bfor\b/gu, /\bswitch\b/gu, /\bcase\b/gu, /&&/gu, /\|\|/gu],
};

function countMatches(code: string, pattern: RegExp): number {
  return [...code.matchAll(pattern)].length;
}

function nestingDepth(code: string, commentMarker: string | null): number {
  let maxDepth = 0;
  let depth = 0;
  let prevIndent = 0;

  for (const line of code.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || (commentMarker && trimmed.startsWith(commentMarker))) continue;

    const indent = line.length - line.trimStart().length;
    if (indent > prevIndent) {
      depth += 1;
    } else if (indent < prevIndent) {
      // Two spaces per level is an approximation for brace languages.
      depth = Math.max(0, depth - Math.max(1, Math.floor((prevIndent - indent) / 2)));
    }
    prevIndent = indent;
    maxDepth = Math.max(maxDepth, depth);
  }

  return maxDepth;
}

export function analyzeComplexity(code: string, language: string): ComplexityMetrics {
  const lineCount = code.split('\n').length;
  const metrics: ComplexityMetrics = {
    cyclomatic_complexity: 0,
    nesting_depth: 0,
    function_count: 0,
    class_count: 0,
    line_count: lineCount,
    comment_ratio: 0,
  };

  if (language === UNKNOWN_LANGUAGE) return metrics;

  const parsed = parseCode(code, language);
  metrics.function_count = parsed.functions.length;
  metrics.class_count = parsed.classes.length;
  metrics.comment_ratio = Math.round((parsed.comments.length / lineCount) * 1000) / 1000;

  const patterns = DECISION_PATTERNS[language] ?? C_LIKE;
  metrics.cyclomatic_complexity = 1 + patterns.reduce((sum, p) => sum + countMatches(code, p), 0);
  metrics.nesting_depth = nestingDepth(code, getLanguagePattern(language)?.comment ?? null);

  return metrics;
}
