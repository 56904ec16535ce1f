import { Prompt, PROMPT_CATALOG } from './catalog';
import type { SelectionStrategy } from '../utils/env';

export interface Selection {
  prompt: Prompt;
  /** The requested category was not in the catalog and a drawn one was used instead. */
  fallback: boolean;
}

export interface PromptSelectorOptions {
  strategy?: SelectionStrategy;
  catalog?: readonly Prompt[];
  random?: () => number;
}

/**
 * Picks the prompt for each slip, by weighted draw or by rotating through
 * the catalog in definition order.
 */
export class PromptSelector {
  private readonly strategy: SelectionStrategy;
  private readonly catalog: readonly Prompt[];
  private readonly random: () => number;
  private cursor = 0;

  constructor(options: PromptSelectorOptions = {}) {
    this.strategy = options.strategy ?? 'weighted';
    this.catalog = options.catalog ?? PROMPT_CATALOG;
    this.random = options.random ?? Math.random;

    if (this.catalog.length === 0) {
      throw new Error('Prompt catalog is empty');
    }
  }

  select(requested?: string): Selection {
    if (requested) {
      const match = this.catalog.find((p) => p.category === requested);
      if (match) return { prompt: match, fallback: false };
      return { prompt: this.draw(), fallback: true };
    }

    return { prompt: this.draw(), fallback: false };
  }

  list(): readonly Prompt[] {
    return this.catalog;
  }

  private draw(): Prompt {
    return this.strategy === 'rotate' ? this.next() : this.weighted();
  }

  private next(): Prompt {
    const prompt = this.catalog[this.cursor % this.catalog.length];
    this.cursor = (this.cursor + 1) % this.catalog.length;
    return prompt;
  }

  private weighted(): Prompt {
    const total = this.catalog.reduce((sum, p) => sum + p.weight, 0);
    const target = this.random() * total;

    let cumulative = 0;
    for (const prompt of this.catalog) {
      cumulative += prompt.weight;
      if (target < cumulative) return prompt;
    }

    return this.catalog[this.catalog.length - 1];
  }
}
