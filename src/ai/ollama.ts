import { z } from 'zod';
import type { GenerationRequest, TextGenerator } from './types';

type FetchImplementation = typeof fetch;

const ollamaResponseSchema = z.object({
  response: z.string(),
});

export interface OllamaGeneratorOptions {
  url: string;
  model: string;
  timeoutMs: number;
}

/**
 * Generates text with a local Ollama server through its non-streaming
 * `/api/generate` endpoint.
 */
export class OllamaGenerator implements TextGenerator {
  readonly provider = 'ollama' as const;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchImplementation;

  constructor(private readonly options: OllamaGeneratorOptions, fetchImpl?: FetchImplementation) {
    this.baseUrl = options.url.replace(/\/+$/, '');
    this.fetchImpl = fetchImpl ?? globalThis.fetch;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.options.model,
          system: request.system,
          prompt: request.prompt,
          stream: false,
          options: {
            temperature: request.temperature,
            num_predict: request.maxTokens,
          },
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Ollama request failed: ${response.status} ${response.statusText}`);
      }

      const data = ollamaResponseSchema.parse(await response.json());
      return data.response.trim();
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
