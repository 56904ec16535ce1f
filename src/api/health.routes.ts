import { Router, Request, Response, RequestHandler } from 'express';
import type { SlipPrinter } from '../printer/types';

interface HealthCheck {
  status: 'ok' | 'error';
  latency?: number;
  message?: string;
}

interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  checks: Record<string, HealthCheck>;
}

const checkPrinter = async (printer: SlipPrinter): Promise<HealthCheck> => {
  const start = Date.now();
  if (await printer.isConnected()) {
    return { status: 'ok', latency: Date.now() - start };
  }
  return { status: 'error', message: `Printer not reachable (${printer.name})` };
};

export const createHealthRoutes = (printer: SlipPrinter, apiRateLimit: RequestHandler): Router => {
  const router = Router();

  router.get('/health', apiRateLimit, async (_req: Request, res: Response) => {
    const printerCheck = await checkPrinter(printer);

    const health: HealthStatus = {
      status: printerCheck.status === 'ok' ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      checks: { printer: printerCheck },
    };

    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  });

  // Lightweight liveness probe - no rate limit needed
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  return router;
};
