// ============================================
// src/middlewares/rateLimiter.ts - In-Memory Only
// ============================================

import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';

const WINDOW_MS = 15 * 60 * 1000; // 15 minutes

export const createApiLimiter = (limit: number): RateLimitRequestHandler =>
  rateLimit({
    windowMs: WINDOW_MS,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      success: false,
      error: 'Too many requests from this IP, please try again later.',
      retryAfter: '15 minutes',
    },
  });
