import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import type { PromptSelector } from '../prompts/selector';
import type { SlipPipeline } from '../slip/pipeline';
import { temperatureSchema } from '../utils/env';

const slipRequestSchema = z
  .object({
    category: z.string().trim().min(1).max(64).optional(),
    temperature: temperatureSchema.optional(),
  })
  .strict();

export interface SlipRoutesDeps {
  pipeline: Pick<SlipPipeline, 'run'>;
  selector: Pick<PromptSelector, 'list'>;
  slipRateLimit: RequestHandler;
}

export const createSlipRoutes = ({ pipeline, selector, slipRateLimit }: SlipRoutesDeps): Router => {
  const router = Router();

  router.post('/slips', slipRateLimit, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = slipRequestSchema.parse(req.body ?? {});
      const result = await pipeline.run(request);
      res.status(201).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get('/categories', (_req: Request, res: Response) => {
    res.json({
      categories: selector.list().map((p) => ({ name: p.category, weight: p.weight })),
    });
  });

  return router;
};
