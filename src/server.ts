import express, { type Express, type RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import errorMiddleware from './middleware/errorMiddleware.js';
import instrumentMiddleware from './middleware/instrumentMiddleware.js';
import healthRoutes from './routes/healthRoutes.js';
import metricsRoutes from './routes/metricsRoutes.js';

export type ServerOptions = {
  webhook?: { path: string; handler: RequestHandler };
};

// Telegram retries deliveries on its own, the limiter only guards against floods
const webhookLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 600,
  message: 'Too many requests, please try again later',
});

export const createServer = (options: ServerOptions = {}): Express => {
  const app = express();

  app.use(helmet());
  app.use(express.json());
  app.use(instrumentMiddleware);

  if (options.webhook) {
    app.post(options.webhook.path, webhookLimiter, options.webhook.handler);
  }

  app.use('/healthz', healthRoutes);
  app.use('/metrics', metricsRoutes);

  app.use(errorMiddleware);

  return app;
};
