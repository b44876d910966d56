import { asErrorText } from '../errors.js';
import { Logger } from '../logger.js';
import type { LlmChatInput, LlmChatRequest, LlmChatResponse, LlmClient } from './types.js';

function joinUrl(baseUrl: string, pathname: string): string {
  const b = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  const p = pathname.startsWith('/') ? pathname : `/${pathname}`;
  return `${b}${p}`;
}

export class LlmNetworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LlmNetworkError';
  }
}

export class LlmHttpError extends Error {
  status: number;
  responseText: string;

  constructor(status: number, responseText: string) {
    super(`LLM request failed (HTTP ${status}): ${responseText.slice(0, 500)}`);
    this.name = 'LlmHttpError';
    this.status = status;
    this.responseText = responseText;
  }
}

export class LlmResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LlmResponseError';
  }
}

function readMessageContent(json: unknown): string {
  if (!json || typeof json !== 'object' || !('choices' in json)) return '';
  const choices = json.choices;
  if (!Array.isArray(choices) || choices.length === 0) return '';
  const first: unknown = choices[0];
  if (!first || typeof first !== 'object' || !('message' in first)) return '';
  const message = first.message;
  if (!message || typeof message !== 'object' || !('content' in message)) return '';
  return typeof message.content === 'string' ? message.content : '';
}

export async function openAiCompatibleChat(request: LlmChatRequest): Promise<LlmChatResponse> {
  const url = joinUrl(request.baseUrl, '/chat/completions');

  const body: Record<string, unknown> = {
    model: request.model,
    messages: request.messages,
    temperature: request.temperature ?? 0.2,
  };

  if (typeof request.maxTokens === 'number') body.max_tokens = request.maxTokens;

  let res: Response;
  let text: string;
  try {
    res = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${request.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: typeof request.timeoutMs === 'number' ? AbortSignal.timeout(request.timeoutMs) : undefined,
    });
    // The timeout signal also covers reading the body.
    text = await res.text();
  } catch (e) {
    throw new LlmNetworkError(`LLM request failed (network error): ${asErrorText(e)}`);
  }

  if (!res.ok) {
    throw new LlmHttpError(res.status, text);
  }

  let json: unknown;
  try {
    json = JSON.parse(text) as unknown;
  } catch {
    throw new LlmResponseError(`LLM returned non-JSON: ${text.slice(0, 2000)}`);
  }

  const content = readMessageContent(json);
  if (!content) {
    throw new LlmResponseError(`LLM response is missing message.content: ${text.slice(0, 2000)}`);
  }

  return { content, raw: json };
}

function canTryNextBaseUrl(e: unknown): boolean {
  return e instanceof LlmNetworkError || (e instanceof LlmHttpError && (e.status === 401 || e.status === 404 || e.status >= 500));
}

export type OpenAiCompatibleClientOptions = {
  baseUrls: string[];
  apiKey: string;
  timeoutMs?: number;
};

/** Sends each chat to the first base URL that answers; later URLs are fallbacks. */
export function createOpenAiCompatibleClient(options: OpenAiCompatibleClientOptions): LlmClient {
  return {
    async chat(input: LlmChatInput): Promise<LlmChatResponse> {
      let lastError: unknown = new LlmNetworkError('No LLM base URL configured');

      for (let i = 0; i < options.baseUrls.length; i += 1) {
        const baseUrl = options.baseUrls[i];
        if (!baseUrl) continue;
        try {
          return await openAiCompatibleChat({
            ...input,
            baseUrl,
            apiKey: options.apiKey,
            timeoutMs: options.timeoutMs,
          });
        } catch (e) {
          lastError = e;
          const hasNext = i < options.baseUrls.length - 1;
          if (!hasNext || !canTryNextBaseUrl(e)) throw e;
          Logger.warn(`LLM call to ${baseUrl} failed, trying next base URL: ${asErrorText(e)}`);
        }
      }

      throw lastError;
    },
  };
}
