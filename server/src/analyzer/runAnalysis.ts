import { randomUUID } from 'node:crypto';

import { asErrorText, InputError, ProviderError } from '../errors.js';
import { LlmHttpError, LlmNetworkError, LlmResponseError } from '../llm/openaiCompatible.js';
import type { LlmChatInput, LlmClient } from '../llm/types.js';
import { Logger } from '../logger.js';
import { parseCode } from './codeParser.js';
import { analyzeComplexity } from './complexity.js';
import {
  extractCodeIssues,
  extractCorrelations,
  extractElements,
  extractIssues,
  extractRootCauses,
  extractSuggestions,
  extractSummary,
} from './extract.js';
import { detectLanguage } from './language.js';
import {
  buildCodeAttachment,
  buildCodePrompt,
  buildCombinedPrompt,
  CODE_SYSTEM_PROMPT,
  COMBINED_SYSTEM_PROMPT,
  IMAGE_PROMPT,
} from './prompts.js';
import { generateRecommendations } from './recommendations.js';
import type {
  AnalysisEnvelope,
  AnalysisResult,
  CodeAnalysis,
  CombinedAnalysis,
  ImageAnalysis,
  UploadedFile,
} from './types.js';

export type AnalysisModels = {
  visionModel: string;
  textModel: string;
};

export type AnalysisServiceOptions = {
  llm: LlmClient;
  models: AnalysisModels;
  now?: () => Date;
  newId?: () => string;
};

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function decodeCodeFile(file: UploadedFile): string {
  try {
    return utf8.decode(file.buffer);
  } catch {
    throw new InputError(`${file.fileName || 'code_file'} is not valid UTF-8 text`);
  }
}

export function toImageDataUrl(file: UploadedFile): string {
  const mime = file.mimeType.startsWith('image/') ? file.mimeType : 'image/jpeg';
  return `data:${mime};base64,${file.buffer.toString('base64')}`;
}

function toProviderError(e: unknown): unknown {
  if (e instanceof LlmHttpError) return new ProviderError(`API error: ${e.status}`, e.status);
  if (e instanceof LlmNetworkError || e instanceof LlmResponseError) return new ProviderError(e.message);
  return e;
}

export class AnalysisService {
  private readonly llm: LlmClient;
  private readonly models: AnalysisModels;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(options: AnalysisServiceOptions) {
    this.llm = options.llm;
    this.models = options.models;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  async analyzeImage(image: UploadedFile): Promise<AnalysisEnvelope<ImageAnalysis>> {
    const content = await this.ask({
      model: this.models.visionModel,
      maxTokens: 1024,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: IMAGE_PROMPT },
            { type: 'image_url', image_url: { url: toImageDataUrl(image) } },
          ],
        },
      ],
    });

    return this.wrap({
      description: content,
      detected_elements: extractElements(content),
      potential_issues: extractIssues(content),
    });
  }

  async analyzeCode(codeFile: UploadedFile): Promise<AnalysisEnvelope<CodeAnalysis>> {
    const code = decodeCodeFile(codeFile);
    const language = detectLanguage(code, codeFile.fileName);
    const parsed = parseCode(code, language);

    const content = await this.ask({
      model: this.models.textModel,
      maxTokens: 2048,
      messages: [
        { role: 'system', content: CODE_SYSTEM_PROMPT },
        { role: 'user', content: buildCodePrompt(code, parsed) },
      ],
    });

    return this.wrap({
      language,
      summary: extractSummary(content),
      issues: extractCodeIssues(content),
      suggestions: extractSuggestions(content),
      full_analysis: content,
      static_issues: parsed.potential_issues,
      structure: {
        functions: parsed.functions.map((f) => f.name),
        classes: parsed.classes.map((c) => c.name),
        imports: parsed.imports.length,
      },
      metrics: analyzeComplexity(code, language),
    });
  }

  async analyzeCombined(
    image: UploadedFile,
    codeFile: UploadedFile,
    context?: string,
  ): Promise<AnalysisEnvelope<CombinedAnalysis>> {
    const code = decodeCodeFile(codeFile);
    const language = detectLanguage(code, codeFile.fileName);

    const content = await this.ask({
      model: this.models.visionModel,
      maxTokens: 2048,
      messages: [
        { role: 'system', content: COMBINED_SYSTEM_PROMPT },
        {
          role: 'user',
          content: [
            { type: 'text', text: buildCombinedPrompt(context) },
            { type: 'image_url', image_url: { url: toImageDataUrl(image) } },
            { type: 'text', text: buildCodeAttachment(code, language) },
          ],
        },
      ],
    });

    return this.wrap({
      combined_analysis: content,
      language,
      image_elements: extractElements(content),
      code_issues: extractCodeIssues(content),
      correlations: extractCorrelations(content),
      root_causes: extractRootCauses(content),
    });
  }

  private async ask(input: LlmChatInput): Promise<string> {
    try {
      const res = await this.llm.chat(input);
      return res.content;
    } catch (e) {
      Logger.fail(`LLM call with model=${input.model} failed: ${asErrorText(e)}`);
      throw toProviderError(e);
    }
  }

  private wrap<T extends AnalysisResult>(result: T): AnalysisEnvelope<T> {
    return {
      analysis_id: this.newId(),
      result,
      recommendations: generateRecommendations(result),
      timestamp: this.now().toISOString(),
    };
  }
}
