// ============================================
// src/middlewares/errorHandler.ts
// ============================================

import { Request, Response, NextFunction } from 'express';
import { AppError, ValidationError, errorMessage, truncate } from '../utils/errors';
import { Logger } from '../utils/loggers';

const MAX_MESSAGE_LENGTH = 200;

// AppError carries its own status; body-parser errors come with status/statusCode
const resolveStatus = (err: unknown): number => {
  if (err instanceof AppError) return err.status;
  if (typeof err === 'object' && err !== null) {
    if ('status' in err && typeof err.status === 'number') return err.status;
    if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  }
  return 500;
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const status = resolveStatus(err);
  const isDevelopment = process.env.NODE_ENV === 'development';

  // Don't expose unexpected internal errors in production
  const exposeMessage = err instanceof AppError || status < 500 || isDevelopment;
  const message = truncate(exposeMessage ? errorMessage(err) : 'Server error', MAX_MESSAGE_LENGTH);

  Logger.error('Request failed', {
    message: errorMessage(err),
    status,
    path: req.path,
    method: req.method,
  });

  res.status(status).json({
    success: false,
    error: message,
    ...(err instanceof ValidationError && { details: err.details }),
    ...(isDevelopment && err instanceof Error && { stack: err.stack }),
  });
};
