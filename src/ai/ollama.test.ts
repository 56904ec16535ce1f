import { describe, it, expect, vi } from 'vitest';
import { OllamaGenerator } from './ollama';

const request = { system: 'You are a printer.', prompt: 'Print a dream log.', temperature: 0.9, maxTokens: 200 };
const options = { url: 'http://localhost:11434/', model: 'llama3.1', timeoutMs: 5000 };

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

describe('OllamaGenerator', () => {
  it('posts one non-streaming request to /api/generate', async () => {
    const fakeFetch = vi.fn<typeof fetch>(async () => jsonResponse({ response: '  the fridge hums  ' }));

    const text = await new OllamaGenerator(options, fakeFetch).generate(request);

    expect(text).toBe('the fridge hums');
    expect(fakeFetch).toHaveBeenCalledTimes(1);
    const [url, init] = fakeFetch.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/generate');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'llama3.1',
      system: 'You are a printer.',
      prompt: 'Print a dream log.',
      stream: false,
      options: { temperature: 0.9, num_predict: 200 },
    });
  });

  it('throws on a non-OK status without retrying', async () => {
    const fakeFetch = vi.fn<typeof fetch>(
      async () => new Response('model not found', { status: 404, statusText: 'Not Found' }),
    );

    await expect(new OllamaGenerator(options, fakeFetch).generate(request)).rejects.toThrow(
      'Ollama request failed: 404 Not Found',
    );
    expect(fakeFetch).toHaveBeenCalledTimes(1);
  });

  it('rejects a response without text', async () => {
    const fakeFetch = vi.fn<typeof fetch>(async () => jsonResponse({ done: true }));

    await expect(new OllamaGenerator(options, fakeFetch).generate(request)).rejects.toThrow();
  });
});
