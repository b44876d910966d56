import { describe, expect, it } from 'vitest';

import { loadConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';
import { resolveLlmBaseUrls } from '../src/llm/provider.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});
    expect(config.server).toEqual({ port: 8000, corsOrigins: ['*'], maxUploadBytes: 10 * 1024 * 1024 });
    expect(config.llm.provider).toBe('groq');
    expect(config.llm.apiKey).toBeUndefined();
    expect(config.llm.textModel).toBe('llama-3.3-70b-versatile');
    expect(config.log.level).toBe('info');
  });

  it('reads and coerces environment values', () => {
    const config = loadConfig({
      PORT: '9001',
      CORS_ORIGINS: 'http://a.test, http://b.test',
      GROQ_API_KEY: 'test-groq',
      LLM_API_KEY: 'test-secret',
      LOG_LEVEL: 'DEBUG',
    });
    expect(config.server.port).toBe(9001);
    expect(config.server.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.log.level).toBe('debug');
  });

  it('reads a comma-separated list of LLM base URLs', () => {
    const config = loadConfig({ LLM_BASE_URL: 'https://a.test/v1, https://b.test/v1,' });
    expect(config.llm.baseUrls).toEqual(['https://a.test/v1', 'https://b.test/v1']);
    expect(resolveLlmBaseUrls(config.llm.provider, config.llm.baseUrls)).toEqual([
      'https://a.test/v1',
      'https://b.test/v1',
    ]);
  });

  it('rejects a base URL list with an invalid entry', () => {
    expect(() => loadConfig({ LLM_BASE_URL: 'https://a.test/v1,not-a-url' })).toThrow(
      /^Config validation failed: 1\. llm\.baseUrls\.1:/,
    );
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ GROQ_API_KEY: 'test-groq', LLM_API_KEY: '' }).llm.apiKey).toBe('test-groq');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Config validation failed: 1\. server\.port:/);
  });
});

describe('resolveLlmBaseUrls', () => {
  it('maps known providers', () => {
    expect(resolveLlmBaseUrls('groq')).toEqual(['https://api.groq.com/openai/v1']);
    expect(resolveLlmBaseUrls('OpenAI')).toEqual(['https://api.openai.com/v1']);
  });

  it('prefers an explicit base URL', () => {
    expect(resolveLlmBaseUrls('anything', [' http://localhost:1234/v1 '])).toEqual(['http://localhost:1234/v1']);
  });

  it('falls back to the provider default when the list is empty', () => {
    expect(resolveLlmBaseUrls('groq', [])).toEqual(['https://api.groq.com/openai/v1']);
  });

  it('rejects unknown providers', () => {
    expect(() => resolveLlmBaseUrls('mistral')).toThrow(ConfigurationError);
  });
});
