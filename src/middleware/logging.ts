import { Request, Response, NextFunction } from 'express';
import { generateRequestId, createChildLogger } from '../utils/logger';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      log?: ReturnType<typeof createChildLogger>;
    }
  }
}

export const loggingMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header ? header : generateRequestId();
  const log = createChildLogger(requestId);
  req.requestId = requestId;
  req.log = log;

  res.setHeader('x-request-id', requestId);

  const start = Date.now();
  log.debug({ method: req.method, url: req.url }, 'request started');

  res.on('finish', () => {
    log.info(
      { method: req.method, url: req.url, status: res.statusCode, duration: Date.now() - start },
      'request completed'
    );
  });

  next();
};
