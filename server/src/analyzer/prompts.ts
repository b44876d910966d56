import type { ParsedCode } from './types.js';

export const IMAGE_PROMPT = [
  'Analyze this technical image in detail. If it is a diagram, describe its components and relationships.',
  'If it is a screenshot, identify UI elements, error messages, or notable features.',
  'If it contains code or terminal output, extract and explain key information.',
  'Identify any potential issues or errors visible in the image.',
].join('\n');

export const CODE_SYSTEM_PROMPT =
  'You are an expert code analyzer specializing in identifying issues and providing solutions.';

export const COMBINED_SYSTEM_PROMPT =
  'You are an expert technical troubleshooter specializing in analyzing both visual information and code to solve problems.';

const COMBINED_PROMPT = [
  'Analyze both the provided image and code together to identify issues and provide solutions.',
  '',
  'For the image: Identify any error messages, UI issues, or relevant visual information.',
  '',
  "For the code: Analyze structure, potential bugs, and how it might relate to what's shown in the image.",
  '',
  'Provide a comprehensive analysis that connects the visual information with the code.',
].join('\n');

function fence(language: string, code: string): string {
  const tag = language === 'unknown' ? '' : language;
  return `\`\`\`${tag}\n${code}\n\`\`\``;
}

export function describeStructure(parsed: ParsedCode): string {
  const parts = [`${parsed.line_count} lines`];
  if (parsed.functions.length > 0) parts.push(`functions: ${parsed.functions.map((f) => f.name).join(', ')}`);
  if (parsed.classes.length > 0) parts.push(`classes/types: ${parsed.classes.map((c) => c.name).join(', ')}`);
  if (parsed.imports.length > 0) parts.push(`${parsed.imports.length} imports`);
  return parts.join('; ');
}

export function buildCodePrompt(code: string, parsed: ParsedCode): string {
  return [
    `Analyze this ${parsed.language} code (${describeStructure(parsed)}):`,
    fence(parsed.language, code),
    '',
    'Provide a detailed analysis including:',
    '1. Code structure and organization',
    '2. Potential bugs or errors',
    '3. Performance issues',
    '4. Security concerns',
    '5. Best practices violations',
    '6. Suggestions for improvement',
  ].join('\n');
}

export function buildCombinedPrompt(context?: string): string {
  const trimmed = context?.trim();
  return trimmed ? `${COMBINED_PROMPT}\n\nAdditional context from the user: ${trimmed}` : COMBINED_PROMPT;
}

export function buildCodeAttachment(code: string, language: string): string {
  return `Code (${language}):\n${fence(language, code)}`;
}
