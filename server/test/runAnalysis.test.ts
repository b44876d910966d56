import { beforeAll, describe, expect, it } from 'vitest';

import { CODE_SYSTEM_PROMPT } from '../src/analyzer/prompts.js';
import { AnalysisService, decodeCodeFile, toImageDataUrl } from '../src/analyzer/runAnalysis.js';
import type { UploadedFile } from '../src/analyzer/types.js';
import { InputError, ProviderError } from '../src/errors.js';
import { LlmHttpError } from '../src/llm/openaiCompatible.js';
import { setLogLevel } from '../src/logger.js';
import { fakeLlm, FIXED_NOW } from './fakes.js';

function upload(fileName: string, mimeType: string, content: string | Buffer): UploadedFile {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf8') : content;
  return { fileName, mimeType, size: buffer.length, buffer };
}

function service(reply: string | Error) {
  const llm = fakeLlm(reply);
  const analysis = new AnalysisService({
    llm,
    models: { visionModel: 'vision-model', textModel: 'text-model' },
    now: () => FIXED_NOW,
    newId: () => 'test-id',
  });
  return { llm, analysis };
}

describe('AnalysisService', () => {
  beforeAll(() => {
    setLogLevel('silent');
  });

  it('analyzes an image with the vision model', async () => {
    const reply = ['Login form screenshot', '- Button: Sign in', 'An error banner says invalid password'].join('\n');
    const { llm, analysis } = service(reply);
    const image = upload('shot.png', 'image/png', 'png-bytes');

    const envelope = await analysis.analyzeImage(image);

    expect(envelope).toEqual({
      analysis_id: 'test-id',
      result: {
        description: reply,
        detected_elements: ['- Button: Sign in'],
        potential_issues: ['An error banner says invalid password'],
      },
      recommendations: ['Address the issue: An error banner says invalid password'],
      timestamp: '2026-01-02T03:04:05.000Z',
    });

    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0]).toMatchObject({ model: 'vision-model', maxTokens: 1024 });
    expect(llm.calls[0]?.messages[0]?.content).toContainEqual({
      type: 'image_url',
      image_url: { url: `data:image/png;base64,${Buffer.from('png-bytes').toString('base64')}` },
    });
  });

  it('analyzes code with the text model and local metrics', async () => {
    const reply = [
      'Summary: the add function is small and correct overall.',
      '',
      'Potential bug in add',
      'Inputs are not validated',
      '',
      'You should add type hints',
    ].join('\n');
    const { llm, analysis } = service(reply);

    const envelope = await analysis.analyzeCode(upload('calc.py', 'text/x-python', 'def add(a, b):\n    return a + b\n'));

    expect(envelope.result).toEqual({
      language: 'python',
      summary: 'Summary: the add function is small and correct overall.',
      issues: [{ description: 'Potential bug in add', details: 'Inputs are not validated' }],
      suggestions: ['You should add type hints'],
      full_analysis: reply,
      static_issues: [],
      structure: { functions: ['add'], classes: [], imports: 0 },
      metrics: {
        cyclomatic_complexity: 1,
        nesting_depth: 1,
        function_count: 1,
        class_count: 0,
        line_count: 3,
        comment_ratio: 0,
      },
    });
    expect(envelope.recommendations).toEqual(['You should add type hints']);

    const call = llm.calls[0];
    expect(call?.model).toBe('text-model');
    expect(call?.maxTokens).toBe(2048);
    expect(call?.messages[0]).toEqual({ role: 'system', content: CODE_SYSTEM_PROMPT });
    expect(call?.messages[1]?.content).toContain('Analyze this python code (3 lines; functions: add):');
  });

  it('analyzes an image and code together', async () => {
    const reply = 'The error on screen comes from the render function. It fails because the state is null.';
    const { llm, analysis } = service(reply);
    const code = 'render(state.user);';

    const envelope = await analysis.analyzeCombined(
      upload('shot.jpg', 'image/jpeg', 'jpg-bytes'),
      upload('view.js', 'text/javascript', code),
      'Happens after login',
    );

    expect(envelope.result).toEqual({
      combined_analysis: reply,
      language: 'javascript',
      image_elements: ['No specific elements identified'],
      code_issues: [{ description: reply }],
      correlations: ['The error on screen comes from the render function.'],
      root_causes: [reply],
    });
    expect(envelope.recommendations).toEqual([`Resolve root cause: ${reply}`]);

    expect(llm.calls[0]?.model).toBe('vision-model');
    expect(llm.calls[0]?.messages[1]).toEqual({
      role: 'user',
      content: [
        {
          type: 'text',
          text: expect.stringContaining('Additional context from the user: Happens after login'),
        },
        { type: 'image_url', image_url: { url: `data:image/jpeg;base64,${Buffer.from('jpg-bytes').toString('base64')}` } },
        { type: 'text', text: `Code (javascript):\n\`\`\`javascript\n${code}\n\`\`\`` },
      ],
    });
  });

  it('maps provider HTTP failures to a 502 error', async () => {
    const { analysis } = service(new LlmHttpError(429, 'rate limited'));

    const err = await analysis.analyzeImage(upload('shot.png', 'image/png', 'png')).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ message: 'API error: 429', status: 502, upstreamStatus: 429 });
  });

  it('passes unexpected errors through', async () => {
    const { analysis } = service(new Error('boom'));
    await expect(analysis.analyzeImage(upload('shot.png', 'image/png', 'png'))).rejects.toThrow('boom');
  });

  it('rejects code that is not UTF-8 before calling the model', async () => {
    const { llm, analysis } = service('unused');

    await expect(analysis.analyzeCode(upload('bad.py', 'text/plain', Buffer.from([0xc3, 0x28])))).rejects.toThrow(
      new InputError('bad.py is not valid UTF-8 text'),
    );
    expect(llm.calls).toHaveLength(0);
  });
});

describe('upload helpers', () => {
  it('decodes UTF-8 text', () => {
    expect(decodeCodeFile(upload('a.txt', 'text/plain', 'héllo'))).toBe('héllo');
  });

  it('falls back to image/jpeg for non-image types', () => {
    expect(toImageDataUrl(upload('x', 'application/octet-stream', 'ab'))).toBe('data:image/jpeg;base64,YWI=');
  });
});
