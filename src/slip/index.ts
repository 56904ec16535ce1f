import { createGenerator, TextGenerator } from '../ai';
import { createPrinter, SlipPrinter } from '../printer';
import { PromptSelector } from '../prompts/selector';
import type { AppConfig } from '../utils/env';
import { SlipPipeline } from './pipeline';

export interface SlipRuntime {
  selector: PromptSelector;
  generator: TextGenerator;
  printer: SlipPrinter;
  pipeline: SlipPipeline;
}

export const createSlipRuntime = (config: AppConfig): SlipRuntime => {
  const selector = new PromptSelector({ strategy: config.selection });
  const generator = createGenerator(config.generation);
  const printer = createPrinter(config.printer);
  const pipeline = new SlipPipeline({
    selector,
    generator,
    printer,
    temperature: config.generation.temperature,
    maxTokens: config.generation.maxTokens,
  });

  return { selector, generator, printer, pipeline };
};

export * from './pipeline';
