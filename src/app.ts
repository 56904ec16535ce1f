import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createHealthRoutes } from './api/health.routes';
import { createSlipRoutes } from './api/slip.routes';
import { errorHandler } from './middleware/errorHandler';
import { loggingMiddleware } from './middleware/logging';
import { createApiRateLimit, createSlipRateLimit } from './middleware/rateLimit';
import type { SlipPrinter } from './printer/types';
import type { PromptSelector } from './prompts/selector';
import type { SlipPipeline } from './slip/pipeline';

export interface AppDeps {
  pipeline: Pick<SlipPipeline, 'run'>;
  selector: Pick<PromptSelector, 'list'>;
  printer: SlipPrinter;
  allowedOrigins?: string[];
  slipsPerMinute?: number;
}

export const createApp = (deps: AppDeps): Express => {
  const app = express();

  app.use(helmet());

  // Browser callers (a kiosk page) must be listed; button boxes send no Origin
  app.use(cors({
    origin: deps.allowedOrigins?.length ? deps.allowedOrigins : false,
    methods: ['GET', 'POST', 'OPTIONS'],
  }));

  app.use(express.json({ limit: '16kb' }));
  app.use(loggingMiddleware);

  app.use(createHealthRoutes(deps.printer, createApiRateLimit()));
  app.use('/api', createSlipRoutes({
    pipeline: deps.pipeline,
    selector: deps.selector,
    slipRateLimit: createSlipRateLimit(deps.slipsPerMinute ?? 12),
  }));

  // Global error handler - must be after routes
  app.use(errorHandler);

  return app;
};
