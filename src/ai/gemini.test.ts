import { describe, it, expect, vi, beforeEach } from 'vitest';

const { constructed, generateContent, getGenerativeModel } = vi.hoisted(() => {
  const generateContent = vi.fn();
  return {
    constructed: [] as string[],
    generateContent,
    getGenerativeModel: vi.fn(() => ({ generateContent })),
  };
});

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel = getGenerativeModel;

    constructor(apiKey: string) {
      constructed.push(apiKey);
    }
  },
}));

import { GeminiGenerator } from './gemini';

const request = { system: 'You are a printer.', prompt: 'Print a ritual.', temperature: 0.7, maxTokens: 100 };

describe('GeminiGenerator', () => {
  beforeEach(() => {
    constructed.length = 0;
    vi.clearAllMocks();
  });

  it('uses the persona as system instruction and returns trimmed text', async () => {
    generateContent.mockResolvedValue({ response: { text: () => '  light three candles backwards  ' } });

    const generator = new GeminiGenerator({ apiKey: 'test-key', model: 'gemini-2.0-flash', timeoutMs: 5000 });
    const text = await generator.generate(request);

    expect(text).toBe('light three candles backwards');
    expect(constructed).toEqual(['test-key']);
    expect(getGenerativeModel).toHaveBeenCalledWith(
      {
        model: 'gemini-2.0-flash',
        systemInstruction: 'You are a printer.',
        generationConfig: { temperature: 0.7, maxOutputTokens: 100 },
      },
      { timeout: 5000 },
    );
    expect(generateContent).toHaveBeenCalledTimes(1);
    expect(generateContent).toHaveBeenCalledWith('Print a ritual.');
  });

  it('propagates SDK errors', async () => {
    generateContent.mockRejectedValue(new Error('[403 Forbidden] API key not valid'));

    const generator = new GeminiGenerator({ apiKey: 'test-key', model: 'gemini-2.0-flash', timeoutMs: 5000 });

    await expect(generator.generate(request)).rejects.toThrow('API key not valid');
  });
});
