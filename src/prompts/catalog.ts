import { z } from 'zod';
import rawCategories from './categories.json';

const promptSchema = z.object({
  category: z.string().regex(/^[a-z][a-z0-9_]*$/, 'category names are snake_case'),
  text: z.string().trim().min(1),
  weight: z.number().positive().default(1),
});

export const catalogSchema = z
  .array(promptSchema)
  .min(1)
  .superRefine((prompts, ctx) => {
    const seen = new Set<string>();
    prompts.forEach((prompt, index) => {
      if (seen.has(prompt.category)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'category'],
          message: `duplicate category: ${prompt.category}`,
        });
      }
      seen.add(prompt.category);
    });
  });

export type Prompt = Readonly<z.infer<typeof promptSchema>>;

export const PROMPT_CATALOG: readonly Prompt[] = Object.freeze(
  catalogSchema.parse(rawCategories).map((prompt) => Object.freeze(prompt)),
);
