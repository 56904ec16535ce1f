import { GoogleGenerativeAI } from '@google/generative-ai';
import type { GenerationRequest, TextGenerator } from './types';

export interface GeminiGeneratorOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class GeminiGenerator implements TextGenerator {
  readonly provider = 'gemini' as const;
  private readonly genAI: GoogleGenerativeAI;

  constructor(private readonly options: GeminiGeneratorOptions) {
    this.genAI = new GoogleGenerativeAI(options.apiKey);
  }

  async generate(request: GenerationRequest): Promise<string> {
    const model = this.genAI.getGenerativeModel(
      {
        model: this.options.model,
        systemInstruction: request.system,
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
        },
      },
      { timeout: this.options.timeoutMs },
    );

    const result = await model.generateContent(request.prompt);
    return result.response.text().trim();
  }
}
