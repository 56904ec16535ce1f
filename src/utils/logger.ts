import pino from 'pino';
import { randomUUID } from 'crypto';

const env = process.env.NODE_ENV;
const isDev = env !== 'production' && env !== 'test';

// stderr: stdout carries console slips
export const logger = pino(
  {
    level: process.env.LOG_LEVEL || (env === 'test' ? 'silent' : isDev ? 'debug' : 'info'),
    transport: isDev
      ? { target: 'pino-pretty', options: { colorize: true, destination: 2 } }
      : undefined,
    base: { service: 'slipwraith' },
    redact: {
      paths: ['req.headers.authorization', '*.apiKey', '*.openaiApiKey', '*.geminiApiKey'],
      censor: '[REDACTED]',
    },
  },
  isDev ? undefined : pino.destination(2),
);

export type Logger = typeof logger;

export const generateRequestId = (): string => randomUUID();

export const createChildLogger = (requestId: string) =>
  logger.child({ requestId });
