import { Router } from 'express';
import type { SpatialIndex } from '../stations/spatialIndex.js';

export type HealthDeps = {
  index: SpatialIndex;
  routingConfigured: boolean;
};

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const stats = deps.index.stats();
    const healthy = stats.isLoaded && stats.stationCount > 0 && deps.routingConfigured;

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      stats: {
        station_count: stats.stationCount,
        memory_estimate_bytes: stats.memoryEstimateBytes,
        is_loaded: stats.isLoaded,
      },
      map_service: deps.routingConfigured ? 'configured' : 'missing',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
