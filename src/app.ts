import express from 'express';
import cors from 'cors';
import { pinoHttp } from 'pino-http';
import { logger } from './logger.js';
import { createHealthRouter } from './routes/health.js';
import { createRouteRouter, type RouteOptimizer } from './routes/route.js';
import type { StationCatalog } from './stations/repository.js';

export type AppDependencies = {
  optimizer: RouteOptimizer;
  catalog: StationCatalog;
  corsOrigin: string;
  routeRateLimitMax?: number;
};

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Remove Express version disclosure
  app.disable('x-powered-by');

  // Correct client IP behind a reverse proxy; the rate limiter keys on it
  app.set('trust proxy', 1);

  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    next();
  });

  app.use(pinoHttp({
    logger,
    autoLogging: {
      ignore: (req) => req.url?.startsWith('/api/health') ?? false,
    },
    customSuccessMessage: (req, res) => {
      return `${req.method} ${req.url} ${res.statusCode}`;
    },
    customErrorMessage: (req, res, err) => {
      return `${req.method} ${req.url} ${res.statusCode} - ${err.message}`;
    },
    serializers: {
      res: (res) => ({
        statusCode: res.statusCode,
      }),
      req: (req) => ({
        id: req.id,
        method: req.method,
        url: req.url,
      }),
    },
  }));

  app.use(cors({ origin: deps.corsOrigin }));
  app.use(express.json({ limit: '100kb' }));

  app.use('/api/route', createRouteRouter(deps.optimizer, { rateLimitMax: deps.routeRateLimitMax }));
  app.use('/api/health', createHealthRouter(deps.catalog));

  // JSON for every error instead of the Express HTML page
  app.use((err: Error & { status?: number; type?: string }, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    if (err.type === 'entity.too.large') {
      return res.status(413).json({ error: 'Request body too large' });
    }
    if (err.type === 'entity.parse.failed') {
      return res.status(400).json({ error: 'Invalid JSON' });
    }

    const status = err.status ?? 500;
    const message = status === 500 ? 'Internal server error' : err.message;
    logger.error({ err }, 'Unhandled error');
    return res.status(status).json({ error: message });
  });

  return app;
}
