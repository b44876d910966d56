import { z } from 'zod';

import { ConfigurationError } from './errors.js';

const ConfigSchema = z.object({
  server: z.object({
    port: z.number().int().min(0).max(65535).default(8000),
    corsOrigins: z.array(z.string()).default(['*']),
    maxUploadBytes: z
      .number()
      .int()
      .min(1024)
      .max(100 * 1024 * 1024)
      .default(10 * 1024 * 1024),
  }),
  llm: z.object({
    provider: z.string().min(1).default('groq'),
    apiKey: z.string().optional(),
    baseUrls: z.array(z.string().url()).optional(),
    visionModel: z.string().min(1).default('meta-llama/llama-4-scout-17b-16e-instruct'),
    textModel: z.string().min(1).default('llama-3.3-70b-versatile'),
    timeoutMs: z.number().int().min(1000).max(300000).default(60000),
  }),
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  }),
});
export type AppConfig = z.infer<typeof ConfigSchema>;

// Later entries win, so LLM_API_KEY takes precedence over GROQ_API_KEY.
const ENV_MAP: Record<string, string> = {
  PORT: 'server.port',
  CORS_ORIGINS: 'server.corsOrigins',
  MAX_UPLOAD_BYTES: 'server.maxUploadBytes',
  LLM_PROVIDER: 'llm.provider',
  GROQ_API_KEY: 'llm.apiKey',
  LLM_API_KEY: 'llm.apiKey',
  LLM_BASE_URL: 'llm.baseUrls',
  LLM_VISION_MODEL: 'llm.visionModel',
  LLM_TEXT_MODEL: 'llm.textModel',
  LLM_TIMEOUT_MS: 'llm.timeoutMs',
  LOG_LEVEL: 'log.level',
};

type Coercer = (raw: string) => unknown;

const toNumber: Coercer = (raw) => {
  const n = parseInt(raw, 10);
  return isNaN(n) ? raw : n;
};
const toStringArray: Coercer = (raw) =>
  raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
const toLowerTrimmed: Coercer = (raw) => raw.trim().toLowerCase();
const identity: Coercer = (raw) => raw;

const COERCE_MAP: Record<string, Coercer> = {
  'server.port': toNumber,
  'server.corsOrigins': toStringArray,
  'server.maxUploadBytes': toNumber,
  'llm.provider': toLowerTrimmed,
  'llm.baseUrls': toStringArray,
  'llm.timeoutMs': toNumber,
  'log.level': toLowerTrimmed,
};

function setNestedValue(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const segments = dotPath.split('.');
  let current: Record<string, unknown> = obj;
  for (let i = 0; i < segments.length - 1; i++) {
    const seg = segments[i];
    if (!seg) continue;
    const next = current[seg];
    if (typeof next === 'object' && next !== null && !Array.isArray(next)) {
      current = next as Record<string, unknown>;
    } else {
      const created: Record<string, unknown> = {};
      current[seg] = created;
      current = created;
    }
  }
  const lastKey = segments.at(-1);
  if (lastKey) {
    current[lastKey] = value;
  }
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = { server: {}, llm: {}, log: {} };

  for (const [envVar, dotPath] of Object.entries(ENV_MAP)) {
    const raw = env[envVar];
    // Empty values in .env files mean "unset".
    if (raw === undefined || raw.trim() === '') continue;
    const coerce = COERCE_MAP[dotPath] ?? identity;
    setNestedValue(config, dotPath, coerce(raw));
  }

  return config;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse(readEnv(env));
  if (!result.success) {
    const summary = result.error.issues
      .map((issue, idx) => `${String(idx + 1)}. ${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Config validation failed: ${summary}`, 'validation');
  }
  return result.data;
}
