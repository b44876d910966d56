import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { SERVER_DATA_DIR } from '../paths.js';

const LanguagePatternSchema = z.object({
  extensions: z.array(z.string()),
  keywords: z.array(z.string()),
  comment: z.string().nullable(),
});
const LanguageTableSchema = z.record(LanguagePatternSchema);

export type LanguagePattern = z.infer<typeof LanguagePatternSchema>;

export const UNKNOWN_LANGUAGE = 'unknown';

let cachedTable: Map<string, LanguagePattern> | null = null;

export function loadLanguageTable(): Map<string, LanguagePattern> {
  if (cachedTable) return cachedTable;
  const filePath = path.join(SERVER_DATA_DIR, 'languages.json');
  const parsed = LanguageTableSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf8')) as unknown);
  cachedTable = new Map(Object.entries(parsed));
  return cachedTable;
}

export function getLanguagePattern(language: string): LanguagePattern | undefined {
  return loadLanguageTable().get(language);
}

export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let from = 0;
  for (;;) {
    const idx = haystack.indexOf(needle, from);
    if (idx === -1) return count;
    count += 1;
    from = idx + needle.length;
  }
}

function languageFromFileName(fileName: string): string | null {
  const base = path.basename(fileName);
  const ext = path.extname(base).toLowerCase();
  for (const [lang, pattern] of loadLanguageTable()) {
    for (const candidate of pattern.extensions) {
      if (candidate.startsWith('.') ? candidate === ext : candidate === base) return lang;
    }
  }
  return null;
}

function languageFromFirstLine(firstLine: string): string | null {
  if (firstLine.startsWith('#!/bin/bash') || firstLine.startsWith('#!/bin/sh')) return 'bash';
  if (firstLine.startsWith('#!/usr/bin/env python')) return 'python';
  if (firstLine.startsWith('#!/usr/bin/env node')) return 'javascript';
  if (firstLine.startsWith('<?php')) return 'php';
  return null;
}

function bonusScore(lang: string, code: string): number {
  if (lang === 'python' && code.includes('def ') && code.includes(':')) return 5;
  if (lang === 'javascript' && (code.includes('function') || code.includes('=>')) && code.includes(';')) return 5;
  if (lang === 'html' && code.trim().startsWith('<') && code.includes('>')) return 5;
  if (lang === 'java' && code.includes('public class') && code.includes(';')) return 5;
  return 0;
}

export function scoreLanguages(code: string): Map<string, number> {
  const scores = new Map<string, number>();
  for (const [lang, pattern] of loadLanguageTable()) {
    let score = 0;
    for (const keyword of pattern.keywords) {
      score += countOccurrences(code, keyword) * 2;
    }
    scores.set(lang, score + bonusScore(lang, code));
  }
  return scores;
}

/**
 * Detects the language of an uploaded code file. A known file extension wins,
 * then interpreter lines, then keyword scoring; ties keep table order.
 */
export function detectLanguage(code: string, fileName?: string): string {
  if (fileName) {
    const byName = languageFromFileName(fileName);
    if (byName) return byName;
  }

  const firstLine = code ? (code.split('\n')[0] ?? '') : '';
  const byFirstLine = languageFromFirstLine(firstLine);
  if (byFirstLine) return byFirstLine;

  let best = UNKNOWN_LANGUAGE;
  let bestScore = 0;
  for (const [lang, score] of scoreLanguages(code)) {
    if (score > bestScore) {
      best = lang;
      bestScore = score;
    }
  }
  return best;
}
