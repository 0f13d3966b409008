import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';

import { config } from './config';
import { errorHandler } from './middleware/errorHandler';
import { createRateLimiter } from './middleware/rateLimiter';
import { createApiRouter, RouteDeps } from './routes';
import { SlidingWindowLimiter } from './services/rateLimiter';
import { NotFoundError } from './utils/errors';

export const API_VERSION = '1.0.0';

export interface AppDeps extends RouteDeps {
  limiter: SlidingWindowLimiter;
  /** Morgan format; null turns request logging off. */
  requestLogFormat?: string | null;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({
    origin: config.allowedOrigins === '*' ? '*' : config.allowedOrigins.split(',').map(s => s.trim()),
    credentials: config.allowedOrigins !== '*',
  }));
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));

  const logFormat = deps.requestLogFormat === undefined
    ? (config.env === 'production' ? 'combined' : 'short')
    : deps.requestLogFormat;
  if (logFormat) app.use(morgan(logFormat));

  // Admission control runs before any handler; /health is exempt
  app.use(createRateLimiter(deps.limiter));

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString(), version: API_VERSION });
  });

  app.get('/', (_req, res) => {
    res.json({ message: 'Cloud Deploy API', version: API_VERSION, health: '/health' });
  });

  app.use('/api/v1', createApiRouter(deps));

  app.use((_req, _res, next) => next(new NotFoundError('Route')));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
