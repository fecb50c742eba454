import { describe, it, expect, vi, beforeEach } from 'vitest';
import { callLLM, callLLMWithJsonRetry, JSON_REPAIR_INSTRUCTION, type LLMCallOptions } from './llm.js';
import { ProviderNotConfiguredError } from './retry.js';

// Mock the AI SDK
vi.mock('ai', () => ({
  generateText: vi.fn(),
}));

import { generateText } from 'ai';

const mockGenerateText = vi.mocked(generateText);

type GenerateTextResult = Awaited<ReturnType<typeof generateText>>;

function textResult(text: string, inputTokens?: number, outputTokens?: number): GenerateTextResult {
  return {
    text,
    usage: { inputTokens, outputTokens, totalTokens: undefined },
  } as unknown as GenerateTextResult;
}

beforeEach(() => {
  vi.clearAllMocks();
});

function makeMockModel() {
  return {
    modelId: 'llama-3.3-70b-versatile',
    provider: 'groq.chat',
    specificationVersion: 'v2' as const,
  } as unknown as LLMCallOptions['model'];
}

function makeBaseOptions(overrides?: Partial<LLMCallOptions>): LLMCallOptions {
  return {
    model: makeMockModel(),
    modelId: 'groq:llama-3.3-70b-versatile',
    system: 'You are a distressed-company forensic strategist.',
    messages: [{ role: 'user', content: 'Draft the failure drivers for Acme Retail.' }],
    maxOutputTokens: 400,
    retry: { initialDelayMs: 1 },
    ...overrides,
  };
}

describe('callLLM', () => {
  it('calls generateText and returns content with usage', async () => {
    mockGenerateText.mockResolvedValueOnce(textResult('{"executive_summary":"ok"}', 120, 40));

    const result = await callLLM(makeBaseOptions());

    expect(result.content).toBe('{"executive_summary":"ok"}');
    expect(result.usage).toEqual({ inputTokens: 120, outputTokens: 40 });
    expect(result.attempts).toBe(1);
    expect(mockGenerateText).toHaveBeenCalledWith(expect.objectContaining({
      system: 'You are a distressed-company forensic strategist.',
      maxOutputTokens: 400,
    }));
  });

  it('defaults missing token counts to zero', async () => {
    mockGenerateText.mockResolvedValueOnce(textResult('{}'));

    const result = await callLLM(makeBaseOptions());

    expect(result.usage).toEqual({ inputTokens: 0, outputTokens: 0 });
  });

  it('retries a server error and reports the attempt count', async () => {
    mockGenerateText
      .mockRejectedValueOnce(new Error('HTTP 503 Service Unavailable'))
      .mockResolvedValueOnce(textResult('{}'));

    const result = await callLLM(makeBaseOptions());

    expect(result.attempts).toBe(2);
    expect(mockGenerateText).toHaveBeenCalledTimes(2);
  });

  it('does not retry a missing configuration', async () => {
    mockGenerateText.mockRejectedValue(new ProviderNotConfiguredError('GROQ_API_KEY is required.'));

    await expect(callLLM(makeBaseOptions())).rejects.toThrow('GROQ_API_KEY is required.');
    expect(mockGenerateText).toHaveBeenCalledTimes(1);
  });
});

describe('callLLMWithJsonRetry', () => {
  const isJson = (content: string) => content.trim().startsWith('{');

  it('returns the first reply when it validates', async () => {
    mockGenerateText.mockResolvedValueOnce(textResult('{"answer":"Cut leverage"}'));

    const result = await callLLMWithJsonRetry(makeBaseOptions(), isJson);

    expect(result.content).toBe('{"answer":"Cut leverage"}');
    expect(result.repaired).toBeUndefined();
    expect(mockGenerateText).toHaveBeenCalledTimes(1);
  });

  it('re-asks once with the previous reply and a doubled token cap', async () => {
    mockGenerateText
      .mockResolvedValueOnce(textResult('Sure! Here are the drivers'))
      .mockResolvedValueOnce(textResult('{"failure_drivers":[]}'));

    const result = await callLLMWithJsonRetry(makeBaseOptions(), isJson);

    expect(result.content).toBe('{"failure_drivers":[]}');
    expect(result.repaired).toBe(true);
    const repairCall = mockGenerateText.mock.calls[1][0];
    expect(repairCall.maxOutputTokens).toBe(800);
    expect(repairCall.messages).toEqual([
      { role: 'user', content: 'Draft the failure drivers for Acme Retail.' },
      { role: 'assistant', content: 'Sure! Here are the drivers' },
      { role: 'user', content: JSON_REPAIR_INSTRUCTION },
    ]);
  });

  it('uses at least 512 output tokens for the repair', async () => {
    mockGenerateText
      .mockResolvedValueOnce(textResult('nope'))
      .mockResolvedValueOnce(textResult('still nope'));

    const result = await callLLMWithJsonRetry(makeBaseOptions({ maxOutputTokens: 96 }), isJson);

    expect(result.content).toBe('still nope');
    expect(mockGenerateText.mock.calls[1][0].maxOutputTokens).toBe(512);
    expect(mockGenerateText).toHaveBeenCalledTimes(2);
  });

  it('skips validation when no validator is given', async () => {
    mockGenerateText.mockResolvedValueOnce(textResult('plain text'));

    const result = await callLLMWithJsonRetry(makeBaseOptions());

    expect(result.content).toBe('plain text');
    expect(mockGenerateText).toHaveBeenCalledTimes(1);
  });
});
