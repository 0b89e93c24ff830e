import type { NextFunction, Request, Response } from 'express';
import logger from '../utils/logger.js';

export type HttpFailure = Error & { status?: number };

const errorMiddleware = (err: HttpFailure, req: Request, res: Response, _next: NextFunction): void => {
  logger.error(`[http] ${req.method} ${req.originalUrl} failed: ${err.message}`);

  res.status(err.status || 500).json({
    error: {
      message: err.message || 'An unexpected error occurred',
    },
  });
};

export default errorMiddleware;
