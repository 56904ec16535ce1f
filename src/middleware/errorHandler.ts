import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

// Sanitize error messages for production
export const sanitizeError = (error: Error): string => {
  if (error instanceof ZodError) {
    return 'Invalid request data';
  }
  if (error instanceof AppError && error.statusCode < 500) {
    return error.message;
  }
  if (error.name === 'GenerationError') {
    return 'Slip generation failed';
  }
  if (error.name === 'PrinterError') {
    return 'Printer unavailable';
  }
  return 'An unexpected error occurred';
};

const statusFor = (error: Error): number => {
  if (error instanceof ZodError) return 400;
  if (error instanceof AppError) return error.statusCode;
  return 500;
};

// Global error handler middleware
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const statusCode = statusFor(err);
  const log = req.log ?? logger;
  if (statusCode >= 500) {
    log.error({ err, method: req.method, path: req.path }, 'request failed');
  } else {
    log.warn({ method: req.method, path: req.path, status: statusCode }, err.message);
  }

  const isDev = process.env.NODE_ENV === 'development';

  res.status(statusCode).json({
    error: isDev ? err.message : sanitizeError(err),
    ...(err instanceof ZodError && { issues: err.issues.map((i) => `${i.path.join('.')}: ${i.message}`) }),
    ...(isDev && { stack: err.stack }),
  });
};
