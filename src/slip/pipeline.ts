import type { TextGenerator } from '../ai/types';
import { stripUnprintable } from '../printer/format';
import type { SlipPrinter } from '../printer/types';
import { PromptSelector } from '../prompts/selector';
import { systemPrompt } from '../prompts/systemPrompt';
import {
  AppError,
  GenerationError,
  PrinterError,
  SlipInProgressError,
  errorMessage,
} from '../utils/errors';
import { logger as rootLogger, Logger } from '../utils/logger';

export interface SlipRequest {
  category?: string;
  temperature?: number;
}

export interface SlipResult {
  category: string;
  text: string;
  fallback: boolean;
  durationMs: number;
}

export interface SlipPipelineOptions {
  selector: PromptSelector;
  generator: TextGenerator;
  printer: SlipPrinter;
  temperature: number;
  maxTokens: number;
  logger?: Logger;
}

/**
 * One trigger, one slip: select a prompt, make one generation request, print
 * the text as one job. A trigger that arrives while a slip is in flight is
 * rejected rather than queued.
 */
export class SlipPipeline {
  private inFlight = false;
  private readonly log: Logger;

  constructor(private readonly options: SlipPipelineOptions) {
    this.log = options.logger ?? rootLogger;
  }

  get busy(): boolean {
    return this.inFlight;
  }

  async run(request: SlipRequest = {}): Promise<SlipResult> {
    if (this.inFlight) {
      throw new SlipInProgressError();
    }

    this.inFlight = true;
    const start = Date.now();

    try {
      const { selector, generator, printer } = this.options;
      const { prompt, fallback } = selector.select(request.category);

      if (fallback) {
        this.log.warn({ requested: request.category, category: prompt.category }, 'unknown category, drew one instead');
      }

      const text = await this.generate(generator, prompt.text, request.temperature);
      this.log.debug({ category: prompt.category, length: text.length }, 'slip generated');

      try {
        await printer.printSlip({ category: prompt.category, text, createdAt: new Date() });
      } catch (error) {
        throw error instanceof AppError
          ? error
          : new PrinterError(`Print failed on ${printer.name}: ${errorMessage(error)}`, { cause: error });
      }

      const durationMs = Date.now() - start;
      this.log.info({ category: prompt.category, printer: printer.name, durationMs }, 'slip printed');

      return { category: prompt.category, text, fallback, durationMs };
    } finally {
      this.inFlight = false;
    }
  }

  private async generate(generator: TextGenerator, prompt: string, temperature?: number): Promise<string> {
    let text: string;
    try {
      text = await generator.generate({
        system: systemPrompt,
        prompt,
        temperature: temperature ?? this.options.temperature,
        maxTokens: this.options.maxTokens,
      });
    } catch (error) {
      throw new GenerationError(
        generator.provider,
        `Error communicating with ${generator.provider}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    // escape codes alone would print a blank slip
    if (!stripUnprintable(text).trim()) {
      throw new GenerationError(generator.provider, `${generator.provider} returned an empty slip`);
    }
    return text;
  }
}
