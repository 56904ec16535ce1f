import rateLimit from 'express-rate-limit';

// Each slip costs a completion and paper
export const createSlipRateLimit = (max: number) =>
  rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max,
    message: { error: 'Too many slip requests, please try again later' },
    standardHeaders: true,
    legacyHeaders: false,
  });

// General API rate limit
export const createApiRateLimit = () =>
  rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100, // 100 requests per minute per IP
    message: { error: 'Too many requests, please try again later' },
    standardHeaders: true,
    legacyHeaders: false,
  });
