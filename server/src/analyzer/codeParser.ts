import { getLanguagePattern, UNKNOWN_LANGUAGE } from './language.js';
import type { ParsedCode, StaticIssue } from './types.js';

type LineParser = (line: string, lineNum: number, result: ParsedCode) => void;

const CONTROL_WORDS = new Set(['if', 'for', 'while', 'switch', 'catch', 'return', 'new', 'else', 'do']);

function parsePythonLine(line: string, lineNum: number, result: ParsedCode): void {
  if (line.startsWith('def ')) {
    const m = /^def\s+([a-zA-Z0-9_]+)\s*\((.*)\):/u.exec(line);
    if (m?.[1]) result.functions.push({ name: m[1], params: m[2] ?? '', line: lineNum });
    return;
  }
  if (line.startsWith('class ')) {
    const m = /^class\s+([a-zA-Z0-9_]+)(?:\((.*)\))?:/u.exec(line);
    if (m?.[1]) result.classes.push({ name: m[1], inherits: m[2] ?? '', line: lineNum });
    return;
  }
  if (line.startsWith('import ') || line.startsWith('from ')) {
    result.imports.push({ statement: line, line: lineNum });
    return;
  }
  if (line.includes('=') && !/^(?:if|elif|while) /u.test(line)) {
    const m = /^([a-zA-Z0-9_]+)\s*=/u.exec(line);
    if (m?.[1]) {
      result.variables.push({ name: m[1], line: lineNum, value: line.slice(line.indexOf('=') + 1).trim() });
    }
  }
}

function parseJavaScriptLine(line: string, lineNum: number, result: ParsedCode): void {
  if (line.includes('function ')) {
    const m = /function\s+([a-zA-Z0-9_$]+)\s*\((.*)\)/u.exec(line);
    if (m?.[1]) result.functions.push({ name: m[1], params: m[2] ?? '', line: lineNum });
    return;
  }
  if (line.includes('=>') && line.includes('=')) {
    const m = /(const|let|var)\s+([a-zA-Z0-9_$]+)\s*=\s*(?:async\s+)?(?:\((.*)\)|([a-zA-Z0-9_$]+))\s*=>/u.exec(line);
    if (m?.[2]) {
      result.functions.push({ name: m[2], params: m[3] || m[4] || '', line: lineNum, type: 'arrow' });
    }
    return;
  }
  if (/^(?:export\s+)?(?:default\s+)?class /u.test(line)) {
    const m = /class\s+([a-zA-Z0-9_$]+)(?:\s+extends\s+([a-zA-Z0-9_$.]+))?/u.exec(line);
    if (m?.[1]) result.classes.push({ name: m[1], inherits: m[2] ?? '', line: lineNum });
    return;
  }
  if (line.startsWith('import ')) {
    result.imports.push({ statement: line, line: lineNum });
    return;
  }
  const m = /^(?:export\s+)?(?:const|let|var)\s+([a-zA-Z0-9_$]+)\s*=/u.exec(line);
  if (m?.[1]) {
    const value = line.slice(line.indexOf('=') + 1).trim().replace(/;+$/u, '');
    result.variables.push({ name: m[1], line: lineNum, value });
  }
}

function parseJavaLine(line: string, lineNum: number, result: ParsedCode): void {
  const method = /(?:(?:public|private|protected)\s+)?(?:static\s+)?[a-zA-Z0-9_<>[\]]+\s+([a-zA-Z0-9_]+)\s*\((.*)\)/u.exec(line);
  if (method?.[1] && !line.endsWith(';') && !CONTROL_WORDS.has(method[1])) {
    result.functions.push({ name: method[1], params: method[2] ?? '', line: lineNum });
  } else if (line.includes('class ')) {
    const m = /class\s+([a-zA-Z0-9_]+)(?:\s+extends\s+([a-zA-Z0-9_]+))?(?:\s+implements\s+([a-zA-Z0-9_, ]+))?/u.exec(line);
    if (m?.[1]) {
      result.classes.push({ name: m[1], inherits: m[2] ?? '', implements: m[3]?.trim() ?? '', line: lineNum });
    }
  } else if (line.startsWith('import ')) {
    result.imports.push({ statement: line, line: lineNum });
  }

  const v = /^(?:(?:public|private|protected)\s+)?(?:static\s+)?(?:final\s+)?([a-zA-Z0-9_<>[\]]+)\s+([a-zA-Z0-9_]+)\s*=/u.exec(line);
  if (v?.[1] && v[2] && !CONTROL_WORDS.has(v[1])) {
    result.variables.push({ name: v[2], type: v[1], line: lineNum });
  }
}

function parseCLine(line: string, lineNum: number, result: ParsedCode): void {
  const func = /(?:[a-zA-Z0-9_*]+\s+)+([a-zA-Z0-9_]+)\s*\((.*)\)\s*(?:const)?\s*(?:\{|$)/u.exec(line);
  if (func?.[1] && !line.endsWith(';') && !CONTROL_WORDS.has(func[1])) {
    result.functions.push({ name: func[1], params: func[2] ?? '', line: lineNum });
  } else if (line.includes('class ') || line.includes('struct ')) {
    const m = /(?:class|struct)\s+([a-zA-Z0-9_]+)(?:\s*:\s*(?:public|private|protected)?\s*([a-zA-Z0-9_]+))?/u.exec(line);
    if (m?.[1]) {
      result.classes.push({
        name: m[1],
        inherits: m[2] ?? '',
        line: lineNum,
        type: line.includes('class ') ? 'class' : 'struct',
      });
    }
  } else if (line.startsWith('#include')) {
    result.imports.push({ statement: line, line: lineNum });
  }

  if (func) return;
  const v = /(?:static\s+)?(?:const\s+)?([a-zA-Z0-9_*]+)\s+([a-zA-Z0-9_]+)(?:\s*=|;|\[)/u.exec(line);
  if (v?.[1] && v[2] && !CONTROL_WORDS.has(v[1])) {
    result.variables.push({ name: v[2], type: v[1], line: lineNum });
  }
}

function parseGoLine(line: string, lineNum: number, result: ParsedCode): void {
  if (line.startsWith('func ')) {
    const m = /func\s+(?:\([^)]+\)\s+)?([a-zA-Z0-9_]+)\s*\((.*)\)/u.exec(line);
    if (m?.[1]) result.functions.push({ name: m[1], params: m[2] ?? '', line: lineNum });
    return;
  }
  if (line.includes('type ') && line.includes('struct')) {
    const m = /type\s+([a-zA-Z0-9_]+)\s+struct/u.exec(line);
    if (m?.[1]) result.classes.push({ name: m[1], line: lineNum, type: 'struct' });
    return;
  }
  if (line.startsWith('import ')) {
    result.imports.push({ statement: line, line: lineNum });
    return;
  }
  if (line.includes(':=')) {
    const m = /([a-zA-Z0-9_]+)\s*:=/u.exec(line);
    if (m?.[1]) {
      result.variables.push({ name: m[1], line: lineNum, value: line.slice(line.indexOf(':=') + 2).trim() });
    }
    return;
  }
  if (line.includes('var ')) {
    const m = /var\s+([a-zA-Z0-9_]+)\s+([a-zA-Z0-9_]+)/u.exec(line);
    if (m?.[1]) result.variables.push({ name: m[1], type: m[2], line: lineNum });
  }
}

const LINE_PARSERS: Record<string, LineParser> = {
  python: parsePythonLine,
  javascript: parseJavaScriptLine,
  java: parseJavaLine,
  c: parseCLine,
  cpp: parseCLine,
  go: parseGoLine,
};

export function lineNumberAt(code: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index && i < code.length; i += 1) {
    if (code.charCodeAt(i) === 10) line += 1;
  }
  return line;
}

const CREDENTIAL_PATTERNS = [
  /password\s*=\s*['"]([^'"]+)['"]/giu,
  /api[_-]?key\s*=\s*['"]([^'"]+)['"]/giu,
  /secret\s*=\s*['"]([^'"]+)['"]/giu,
  /token\s*=\s*['"]([^'"]+)['"]/giu,
];

export function findStaticIssues(code: string, language: string): StaticIssue[] {
  const issues: StaticIssue[] = [];
  const lines = code.split('\n');

  for (const m of code.matchAll(/\b(?:TODO|FIXME|XXX|BUG|HACK)\b/giu)) {
    const lineNum = lineNumberAt(code, m.index ?? 0);
    const text = (lines[lineNum - 1] ?? '').trim();
    issues.push({ type: 'todo', line: lineNum, description: `TODO comment: ${text}` });
  }

  for (const pattern of CREDENTIAL_PATTERNS) {
    for (const m of code.matchAll(pattern)) {
      const lineNum = lineNumberAt(code, m.index ?? 0);
      issues.push({ type: 'security', line: lineNum, description: `Potential hardcoded credential at line ${lineNum}` });
    }
  }

  if (language === 'python') {
    for (const m of code.matchAll(/except\s*:/gu)) {
      issues.push({
        type: 'style',
        line: lineNumberAt(code, m.index ?? 0),
        description: 'Bare except clause should specify exceptions',
      });
    }
    for (const m of code.matchAll(/def\s+\w+\s*\(.*?=\s*(?:\[\]|\{\}|\(\)).*?\):/gu)) {
      issues.push({
        type: 'bug',
        line: lineNumberAt(code, m.index ?? 0),
        description: 'Mutable default argument (list, dict, etc.) can cause unexpected behavior',
      });
    }
  } else if (language === 'javascript') {
    for (const m of code.matchAll(/console\.log\(/gu)) {
      issues.push({
        type: 'debug',
        line: lineNumberAt(code, m.index ?? 0),
        description: 'console.log statement should be removed in production code',
      });
    }
    for (const m of code.matchAll(/[^=!<>]==(?!=)/gu)) {
      const lineNum = lineNumberAt(code, (m.index ?? 0) + 1);
      if ((lines[lineNum - 1] ?? '').trim().startsWith('//')) continue;
      issues.push({ type: 'style', line: lineNum, description: 'Consider using === instead of == for comparison' });
    }
  }

  return issues;
}

/** Line-oriented structure scan: declarations, imports, comments and static issues. */
export function parseCode(code: string, language: string): ParsedCode {
  const result: ParsedCode = {
    language,
    line_count: code.split('\n').length,
    functions: [],
    classes: [],
    imports: [],
    variables: [],
    comments: [],
    potential_issues: [],
  };

  if (language === UNKNOWN_LANGUAGE) return result;

  const commentMarker = getLanguagePattern(language)?.comment ?? null;
  const parseLine = LINE_PARSERS[language];

  const lines = code.split('\n');
  for (let i = 0; i < lines.length; i += 1) {
    const lineNum = i + 1;
    const stripped = (lines[i] ?? '').trim();
    if (!stripped) continue;

    if (commentMarker && stripped.startsWith(commentMarker)) {
      result.comments.push({ line: lineNum, text: stripped });
      continue;
    }

    parseLine?.(stripped, lineNum, result);
  }

  result.potential_issues.push(...findStaticIssues(code, language));
  return result;
}
