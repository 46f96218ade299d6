import express from 'express';
import cors from 'cors';
import { pinoHttp } from 'pino-http';
import { config } from './config.js';
import { logger } from './logger.js';
import { disabledCache, type ResponseCache } from './cache.js';
import { apiLimiter } from './middleware/rateLimiter.js';
import { createHealthRouter } from './routes/health.js';
import { createOptimizeRouter } from './routes/optimize.js';
import { createStationsRouter } from './routes/stations.js';
import type { RoutingService } from './services/openRouteService.js';
import type { SpatialIndex } from './stations/spatialIndex.js';

export type AppDeps = {
  index: SpatialIndex;
  routing: RoutingService | null;
  cache?: ResponseCache;
};

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const cache = deps.cache ?? disabledCache;

  // Remove Express version disclosure
  app.disable('x-powered-by');

  // Correct client IP behind a reverse proxy; rate limiting keys on it
  app.set('trust proxy', 1);

  // Security headers (API-relevant only; CSP/COOP/COEP apply to HTML documents)
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
    customSuccessMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode}`,
    customErrorMessage: (req, res, err) => `${req.method} ${req.url} ${res.statusCode} - ${err.message}`,
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

  app.use(cors({ origin: config.corsOrigin }));
  // JSON-only API; explicit limit (matches Express default, here for visibility)
  app.use(express.json({ limit: '100kb' }));

  app.use('/api/health', createHealthRouter({ index: deps.index, routingConfigured: deps.routing !== null }));
  app.use('/api', apiLimiter);
  app.use('/api/optimize', createOptimizeRouter({ index: deps.index, routing: deps.routing, cache }));
  app.use('/api/stations', createStationsRouter(deps.index));

  app.use('/api', (_req, res) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  // Global error handler (returns JSON instead of HTML for all errors)
  app.use((err: Error & { status?: number; type?: string }, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    if (err.type === 'entity.too.large') {
      return res.status(413).json({ success: false, error: 'Request body too large' });
    }
    if (err.type === 'entity.parse.failed') {
      return res.status(400).json({ success: false, error: 'Invalid JSON' });
    }

    const status = err.status ?? 500;
    const message = status === 500 ? 'Internal server error' : err.message;
    logger.error({ err }, 'Unhandled error');
    return res.status(status).json({ success: false, error: message });
  });

  return app;
}
