import OpenAI from 'openai';
import type { GenerationRequest, TextGenerator } from './types';

type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

/** The slice of the OpenAI client this generator calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: ChatMessage[];
        temperature: number;
        max_tokens: number;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAIGeneratorOptions {
  apiKey: string;
  model: string;
  baseURL?: string;
  timeoutMs: number;
}

export class OpenAIGenerator implements TextGenerator {
  readonly provider = 'openai' as const;
  private readonly client: ChatCompletionClient;
  private readonly model: string;

  constructor(options: OpenAIGeneratorOptions, client?: ChatCompletionClient) {
    this.model = options.model;
    // The SDK retries twice by default; a slip gets one request
    this.client = client ?? new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(request: GenerationRequest): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });

    return (completion.choices[0]?.message.content ?? '').trim();
  }
}
