import { createLogger } from '../logger.js';
import { InvalidOptimizerConfigError } from '../errors.js';
import { haversineMiles } from '../geo/distance.js';
import { roundTo } from '../utils/parse.js';
import type { Point, StationLocator, StationMatch } from '../types/station.js';
import type {
  FuelShortfall,
  FuelStop,
  OptimizationResult,
  OptimizerConfig,
  ResolvedOptimizerConfig,
} from './types.js';

const log = createLogger('route-optimizer');

export const OPTIMIZER_DEFAULTS = {
  safetyBuffer: 30,
  maxDetour: 20,
  sampleInterval: 50,
  fillRatio: 0.8,
  maxCandidates: 30,
  distanceWeight: 0.01,
} as const;

// Share of remaining range the first station search may cover
const SEARCH_RANGE_SHARE = 0.9;
// Upper bound for the fallback search when nothing is within the detour radius
const EXPANDED_SEARCH_MILES = 50;

/**
 * Thins a route polyline to points roughly `intervalMiles` apart (measured
 * along the path). The first and last input points are always kept.
 */
export function sampleRoute(
  points: readonly Point[],
  intervalMiles: number = OPTIMIZER_DEFAULTS.sampleInterval,
): Point[] {
  if (points.length < 2) return [...points];

  const sampled: Point[] = [points[0]];
  let cumulative = 0;

  for (let i = 1; i < points.length; i++) {
    cumulative += haversineMiles(points[i - 1], points[i]);
    if (cumulative >= intervalMiles) {
      sampled.push(points[i]);
      cumulative = 0;
    }
  }

  const last = points[points.length - 1];
  const tail = sampled[sampled.length - 1];
  if (tail[0] !== last[0] || tail[1] !== last[1]) {
    sampled.push(last);
  }

  return sampled;
}

export function resolveOptimizerConfig(options: OptimizerConfig): ResolvedOptimizerConfig {
  const resolved: ResolvedOptimizerConfig = {
    maxRange: options.maxRange,
    mpg: options.mpg,
    safetyBuffer: options.safetyBuffer ?? OPTIMIZER_DEFAULTS.safetyBuffer,
    maxDetour: options.maxDetour ?? OPTIMIZER_DEFAULTS.maxDetour,
    sampleInterval: options.sampleInterval ?? OPTIMIZER_DEFAULTS.sampleInterval,
    fillRatio: options.fillRatio ?? OPTIMIZER_DEFAULTS.fillRatio,
    maxCandidates: options.maxCandidates ?? OPTIMIZER_DEFAULTS.maxCandidates,
    distanceWeight: options.distanceWeight ?? OPTIMIZER_DEFAULTS.distanceWeight,
  };

  const positive = (name: keyof ResolvedOptimizerConfig) => {
    const value = resolved[name];
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidOptimizerConfigError(`${name} must be a positive number (got ${value})`);
    }
  };
  const nonNegative = (name: keyof ResolvedOptimizerConfig) => {
    const value = resolved[name];
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidOptimizerConfigError(`${name} must be zero or more (got ${value})`);
    }
  };

  positive('maxRange');
  positive('mpg');
  positive('sampleInterval');
  positive('maxCandidates');
  nonNegative('safetyBuffer');
  nonNegative('maxDetour');
  nonNegative('distanceWeight');

  if (resolved.fillRatio <= 0 || resolved.fillRatio > 1) {
    throw new InvalidOptimizerConfigError(`fillRatio must be in (0, 1] (got ${resolved.fillRatio})`);
  }
  if (resolved.safetyBuffer >= resolved.maxRange) {
    throw new InvalidOptimizerConfigError(
      `safetyBuffer (${resolved.safetyBuffer}) must be smaller than maxRange (${resolved.maxRange})`,
    );
  }

  return resolved;
}

/**
 * Greedy fuel-stop planner.
 *
 * Walks the sampled route tracking remaining range. Whenever the next leg would
 * eat into the safety buffer it refuels at the best-scoring station near the
 * vehicle (price plus a small distance penalty) and tops up to `fillRatio` of
 * max range. The leg after a stop is measured from the station. Instances hold only configuration, so one optimizer may serve any
 * number of calls.
 */
export class RouteOptimizer {
  readonly config: ResolvedOptimizerConfig;

  constructor(options: OptimizerConfig) {
    this.config = resolveOptimizerConfig(options);
  }

  optimize(routePoints: readonly Point[], totalDistance: number, index: StationLocator): OptimizationResult {
    const startedAt = performance.now();
    const { maxRange, mpg, safetyBuffer, fillRatio, sampleInterval } = this.config;

    const stops: FuelStop[] = [];
    const shortfalls: FuelShortfall[] = [];
    let remainingRange = maxRange;
    let milesTraveled = 0;
    let totalCost = 0;
    let totalGallons = 0;

    const waypoints = sampleRoute(routePoints, sampleInterval);
    log.debug(
      { routePoints: routePoints.length, waypoints: waypoints.length },
      `Route has ${routePoints.length} points, sampled to ${waypoints.length} waypoints`,
    );

    // The vehicle's position: route start, then each waypoint as it is reached.
    let position = waypoints[0];

    for (let i = 1; i < waypoints.length; i++) {
      const waypoint = waypoints[i];
      const segmentMiles = haversineMiles(position, waypoint);
      // Miles actually driven to reach this waypoint; after a stop the leg starts at the station.
      let legMiles = segmentMiles;

      if (segmentMiles > remainingRange - safetyBuffer) {
        log.debug(
          { waypoint: i, segmentMiles: roundTo(segmentMiles, 1), remainingRange: roundTo(remainingRange, 1) },
          'Refuel needed before next waypoint',
        );

        const search = this.findBestStation(position, remainingRange, index);
        if (search.best) {
          const { station } = search.best;
          const fillRange = fillRatio * maxRange;
          const gallons = fillRange / mpg;
          const cost = gallons * station.price;

          stops.push({
            name: station.name,
            stationId: station.id,
            location: station.location,
            price: station.price,
            gallons: roundTo(gallons, 2),
            cost: roundTo(cost, 2),
            milesFromStart: roundTo(milesTraveled, 2),
          });
          totalCost += cost;
          totalGallons += gallons;
          remainingRange = fillRange;
          legMiles = haversineMiles(station.location, waypoint);

          log.debug({ stop: stops.length, station: station.name, cost: roundTo(cost, 2) }, 'Planned fuel stop');
        } else {
          shortfalls.push({
            waypointIndex: i,
            location: position,
            milesFromStart: roundTo(milesTraveled, 2),
            remainingRangeMiles: roundTo(remainingRange, 2),
            searchRadiusMiles: roundTo(search.radiusMiles, 2),
          });
          log.warn(
            { waypoint: i, milesFromStart: roundTo(milesTraveled, 1), remainingRange: roundTo(remainingRange, 1) },
            'No reachable station for required refuel',
          );
        }
      }

      remainingRange -= legMiles;
      milesTraveled += legMiles;
      position = waypoint;
    }

    const computationMs = performance.now() - startedAt;
    log.info(
      {
        stops: stops.length,
        shortfalls: shortfalls.length,
        totalCost: roundTo(totalCost, 2),
        computationMs: roundTo(computationMs, 2),
      },
      'Optimization complete',
    );

    return {
      stops,
      totalCost: roundTo(totalCost, 2),
      totalGallons: roundTo(totalGallons, 2),
      totalDistance: roundTo(totalDistance, 2),
      computationMs: roundTo(computationMs, 2),
      shortfalls,
      serviceable: shortfalls.length === 0,
    };
  }

  /**
   * Lowest `price + distanceWeight * miles` among the nearest candidates. The
   * first candidate wins ties; candidates arrive nearest first, then by id.
   */
  private findBestStation(
    position: Point,
    remainingRange: number,
    index: StationLocator,
  ): { best: StationMatch | null; radiusMiles: number } {
    const { maxDetour, maxCandidates, distanceWeight } = this.config;

    // Range can already be negative after an earlier shortfall.
    const reach = Math.max(0, remainingRange);
    let radiusMiles = Math.min(reach * SEARCH_RANGE_SHARE, maxDetour);
    let candidates = index.withinRadius(position, radiusMiles);

    if (candidates.length === 0) {
      log.debug({ radiusMiles: roundTo(radiusMiles, 1) }, 'No stations in detour radius, expanding search');
      radiusMiles = Math.min(reach, EXPANDED_SEARCH_MILES);
      candidates = index.withinRadius(position, radiusMiles);
    }

    let best: StationMatch | null = null;
    let bestScore = Infinity;
    for (const candidate of candidates.slice(0, maxCandidates)) {
      const score = candidate.station.price + candidate.distanceMiles * distanceWeight;
      if (score < bestScore) {
        bestScore = score;
        best = candidate;
      }
    }

    return { best, radiusMiles };
  }
}
