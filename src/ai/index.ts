import { GeminiGenerator } from './gemini';
import { OllamaGenerator } from './ollama';
import { OpenAIGenerator } from './openai';
import { TextGenerator } from './types';
import { ConfigError } from '../utils/errors';
import type { GenerationConfig } from '../utils/env';

export const createGenerator = (config: GenerationConfig): TextGenerator => {
  switch (config.provider) {
    case 'openai':
      if (!config.openaiApiKey) throw new ConfigError(['OPENAI_API_KEY: required when LLM_PROVIDER is openai']);
      return new OpenAIGenerator({
        apiKey: config.openaiApiKey,
        model: config.openaiModel,
        baseURL: config.openaiBaseUrl,
        timeoutMs: config.timeoutMs,
      });
    case 'gemini':
      if (!config.geminiApiKey) throw new ConfigError(['GEMINI_API_KEY: required when LLM_PROVIDER is gemini']);
      return new GeminiGenerator({
        apiKey: config.geminiApiKey,
        model: config.geminiModel,
        timeoutMs: config.timeoutMs,
      });
    case 'ollama':
      return new OllamaGenerator({
        url: config.ollamaUrl,
        model: config.ollamaModel,
        timeoutMs: config.timeoutMs,
      });
  }
};

export { GeminiGenerator, OllamaGenerator, OpenAIGenerator };
export * from './types';
