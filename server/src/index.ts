import { config } from './config.js';
import { logger } from './logger.js';
import { createApp } from './app.js';
import { createPgCache, disabledCache } from './cache.js';
import { createPool, verifyDbConnection } from './db.js';
import { runMigrations } from './migrations.js';
import { OpenRouteServiceClient } from './services/openRouteService.js';
import { loadStationFeed } from './stations/csv.js';
import { SpatialIndex } from './stations/spatialIndex.js';

async function start() {
  try {
    const index = SpatialIndex.build(await loadStationFeed());

    const pool = createPool();
    let cache = disabledCache;
    if (pool) {
      await verifyDbConnection(pool);
      logger.info('Database connected');
      await runMigrations(pool);
      cache = createPgCache(pool);
    } else {
      logger.info('DB_PASSWORD not set; response cache disabled');
    }

    const apiKey = config.apiKeys.openRouteService;
    if (!apiKey) {
      logger.warn('OPENROUTESERVICE_API_KEY not configured; /api/optimize will return 503');
    }
    const routing = apiKey
      ? new OpenRouteServiceClient(apiKey, {
          cache,
          geocodeTtlDays: config.cache.geocodeTtlDays,
          timeoutMs: config.upstream.timeoutMs,
        })
      : null;

    const app = createApp({ index, routing, cache });
    app.listen(config.port, () => {
      logger.info({ port: config.port }, `Server running on http://localhost:${config.port}`);
    });
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

void start();
