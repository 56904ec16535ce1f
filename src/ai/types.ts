import type { LlmProvider } from '../utils/env';

export interface GenerationRequest {
  system: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

export interface TextGenerator {
  readonly provider: LlmProvider;
  /** Issues exactly one completion request and returns the trimmed text. */
  generate(request: GenerationRequest): Promise<string>;
}
