import { ConfigurationError } from '../errors.js';

function normalizeProviderName(provider: string): string {
  return provider.trim().toLowerCase();
}

/** Explicit base URLs win over the provider default; later ones are fallbacks. */
export function resolveLlmBaseUrls(provider: string, overrides: string[] = []): string[] {
  const explicit = overrides.map((u) => u.trim()).filter(Boolean);
  if (explicit.length > 0) return explicit;

  const p = normalizeProviderName(provider);
  if (p === 'groq') return ['https://api.groq.com/openai/v1'];
  if (p === 'openai') return ['https://api.openai.com/v1'];

  throw new ConfigurationError(
    `Unsupported LLM provider=${provider}; use groq or openai, or set LLM_BASE_URL to an OpenAI-compatible base URL`,
    'llm.provider',
  );
}
