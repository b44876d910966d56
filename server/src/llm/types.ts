export type LlmTextPart = { type: 'text'; text: string };

export type LlmImagePart = { type: 'image_url'; image_url: { url: string } };

export type LlmContentPart = LlmTextPart | LlmImagePart;

export type LlmChatMessage = {
  role: 'system' | 'user' | 'assistant';
  content: string | LlmContentPart[];
};

export type LlmChatRequest = {
  baseUrl: string;
  apiKey: string;
  model: string;
  messages: LlmChatMessage[];
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
};

export type LlmChatResponse = {
  content: string;
  raw: unknown;
};

/** Everything about a chat call except where it is sent. */
export type LlmChatInput = Omit<LlmChatRequest, 'baseUrl' | 'apiKey' | 'timeoutMs'>;

export type LlmClient = {
  chat(input: LlmChatInput): Promise<LlmChatResponse>;
};
