import { Router, type Response } from 'express';
import { config } from '../config.js';
import { createLogger } from '../logger.js';
import { HttpError, InvalidOptimizerConfigError, UpstreamServiceError, toErrorMessage } from '../errors.js';
import { makeRouteResponseCacheKey, type ResponseCache } from '../cache.js';
import { optimizeLimiter } from '../middleware/rateLimiter.js';
import { RouteOptimizer } from '../optimization/routeOptimizer.js';
import type { FuelShortfall, FuelStop } from '../optimization/types.js';
import type { RoutingService } from '../services/openRouteService.js';
import type { SpatialIndex } from '../stations/spatialIndex.js';
import type { Point } from '../types/station.js';
import { ensureNumber, ensureString, isRecord, roundTo } from '../utils/parse.js';

const log = createLogger('optimize');

export type OptimizeDeps = {
  index: SpatialIndex;
  routing: RoutingService | null;
  cache: ResponseCache;
};

type LatLon = { lat: number; lon: number };

type StopResponse = {
  name: string;
  station_id: string;
  location: LatLon;
  price_per_gallon: number;
  gallons: number;
  cost: number;
  miles_from_start: number;
};

type ShortfallResponse = {
  waypoint_index: number;
  location: LatLon;
  miles_from_start: number;
  remaining_range_miles: number;
  search_radius_miles: number;
};

export type OptimizeResponse = {
  success: true;
  cache_hit: boolean;
  route: {
    start: string;
    end: string;
    distance_miles: number;
    duration_hours: number;
    geometry: [number, number][];
  };
  fuel: {
    total_cost: number;
    total_gallons: number;
    cost_per_gallon_avg: number;
    stops: StopResponse[];
    num_stops: number;
    serviceable: boolean;
    shortfalls: ShortfallResponse[];
  };
  performance: {
    optimization_ms: number;
    total_response_ms: number;
    station_count: number;
  };
  map_url: string;
  warning?: string;
};

const SHORTFALL_WARNING =
  'Some legs have no fuel station within reach; see fuel.shortfalls for where the tank runs low';

function toLatLon(point: Point): LatLon {
  return { lat: point[0], lon: point[1] };
}

function formatStop(stop: FuelStop): StopResponse {
  return {
    name: stop.name,
    station_id: stop.stationId,
    location: toLatLon(stop.location),
    price_per_gallon: stop.price,
    gallons: stop.gallons,
    cost: stop.cost,
    miles_from_start: stop.milesFromStart,
  };
}

function formatShortfall(shortfall: FuelShortfall): ShortfallResponse {
  return {
    waypoint_index: shortfall.waypointIndex,
    location: toLatLon(shortfall.location),
    miles_from_start: shortfall.milesFromStart,
    remaining_range_miles: shortfall.remainingRangeMiles,
    search_radius_miles: shortfall.searchRadiusMiles,
  };
}

/** Google Maps directions link through every planned stop. */
export function buildMapUrl(start: string, end: string, stops: readonly FuelStop[]): string {
  const url = new URL('https://www.google.com/maps/dir/');
  url.searchParams.set('api', '1');
  url.searchParams.set('origin', start);
  url.searchParams.set('destination', end);
  if (stops.length > 0) {
    url.searchParams.set('waypoints', stops.map((s) => `${s.location[0]},${s.location[1]}`).join('|'));
  }
  return url.toString();
}

function readOptionalPositive(value: unknown, fallback: number, name: string): number {
  if (value === undefined || value === null || value === '') return fallback;
  const parsed = ensureNumber(value);
  if (parsed === null || parsed <= 0) {
    throw new HttpError(400, `"${name}" must be a positive number`);
  }
  return parsed;
}

function elapsedMs(startedAt: number): number {
  return roundTo(performance.now() - startedAt, 2);
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof HttpError) {
    res.status(error.status).json({ success: false, error: error.message });
    return;
  }
  if (error instanceof UpstreamServiceError) {
    log.warn({ reason: toErrorMessage(error), upstreamStatus: error.upstreamStatus }, 'Routing service failed');
    res.status(502).json({ success: false, error: error.message });
    return;
  }
  log.error({ err: error }, 'Route optimization failed');
  res.status(500).json({ success: false, error: 'Internal server error' });
}

export function createOptimizeRouter(deps: OptimizeDeps): Router {
  const router = Router();

  router.post('/', optimizeLimiter, async (req, res) => {
    const requestStart = performance.now();

    try {
      const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
      const start = ensureString(body.start);
      const end = ensureString(body.end);
      if (!start || !end) {
        throw new HttpError(400, 'Both "start" and "end" are required');
      }

      const maxRange = readOptionalPositive(
        body.maxRange ?? body.max_range,
        config.optimizer.defaultMaxRangeMiles,
        'max_range',
      );
      const mpg = readOptionalPositive(body.mpg, config.optimizer.defaultMpg, 'mpg');

      let optimizer: RouteOptimizer;
      try {
        optimizer = new RouteOptimizer({ maxRange, mpg });
      } catch (error) {
        if (error instanceof InvalidOptimizerConfigError) throw new HttpError(400, error.message);
        throw error;
      }

      const cacheKey = makeRouteResponseCacheKey({ start, end, maxRange, mpg });
      const cached = await deps.cache.getRouteResponse(cacheKey);
      if (isRecord(cached) && isRecord(cached.performance)) {
        log.info({ start, end }, 'Route response cache hit');
        return res.json({
          ...cached,
          cache_hit: true,
          performance: { ...cached.performance, total_response_ms: elapsedMs(requestStart) },
        });
      }

      if (!deps.routing) {
        throw new HttpError(503, 'Routing service not configured. Set OPENROUTESERVICE_API_KEY');
      }

      const stats = deps.index.stats();
      if (!stats.isLoaded || stats.stationCount === 0) {
        throw new HttpError(503, 'Fuel station data not loaded. Run: npm run prepare:data');
      }

      const startPoint = await deps.routing.parseLocation(start);
      if (!startPoint) throw new HttpError(404, `Could not geocode location: ${start}`);
      const endPoint = await deps.routing.parseLocation(end);
      if (!endPoint) throw new HttpError(404, `Could not geocode location: ${end}`);

      log.info({ start, end, startPoint, endPoint }, 'Route request');
      const route = await deps.routing.directions(startPoint, endPoint);

      const result = optimizer.optimize(route.polyline, route.distanceMiles, deps.index);

      const response: OptimizeResponse = {
        success: true,
        cache_hit: false,
        route: {
          start,
          end,
          distance_miles: result.totalDistance,
          duration_hours: roundTo(route.durationHours, 2),
          geometry: route.polyline.map(([lat, lon]): [number, number] => [lat, lon]),
        },
        fuel: {
          total_cost: result.totalCost,
          total_gallons: result.totalGallons,
          cost_per_gallon_avg: result.totalGallons > 0 ? roundTo(result.totalCost / result.totalGallons, 2) : 0,
          stops: result.stops.map(formatStop),
          num_stops: result.stops.length,
          serviceable: result.serviceable,
          shortfalls: result.shortfalls.map(formatShortfall),
        },
        performance: {
          optimization_ms: result.computationMs,
          total_response_ms: elapsedMs(requestStart),
          station_count: stats.stationCount,
        },
        map_url: buildMapUrl(start, end, result.stops),
      };
      if (!result.serviceable) {
        response.warning = SHORTFALL_WARNING;
      }

      await deps.cache.setRouteResponse({
        cacheKey,
        requestJson: { start, end, maxRange, mpg },
        responseJson: response,
        ttlSeconds: config.cache.routeResponseTtlSeconds,
      });

      log.info(
        {
          totalCost: result.totalCost,
          stops: result.stops.length,
          totalResponseMs: response.performance.total_response_ms,
        },
        'Route optimized',
      );
      return res.json(response);
    } catch (error) {
      return sendError(res, error);
    }
  });

  return router;
}
