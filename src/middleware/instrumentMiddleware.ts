import type { NextFunction, Request, Response } from 'express';
import { requestCounter, responseTimeHistogram } from '../metrics/metrics.js';
import logger from '../utils/logger.js';

const instrumentMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  logger.debug(`Request received: ${req.method} ${req.url}`);
  const stopTimer = responseTimeHistogram.startTimer();

  res.on('finish', () => {
    const labels = { method: req.method, path: req.baseUrl || req.path, status: String(res.statusCode) };
    requestCounter.inc(labels);
    stopTimer(labels);
  });

  next();
};

export default instrumentMiddleware;
