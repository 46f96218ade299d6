import { describe, it, expect } from 'vitest';
import { InvalidOptimizerConfigError } from '../src/errors.js';
import { RouteOptimizer, resolveOptimizerConfig, sampleRoute } from '../src/optimization/routeOptimizer.js';
import { SpatialIndex } from '../src/stations/spatialIndex.js';
import type { Point, StationLocator, StationMatch, StationRecord } from '../src/types/station.js';

// Due north along -100°, 0.1° apart: 30.0 → 35.0 (about 345 miles)
const northbound: Point[] = Array.from({ length: 51 }, (_, k): Point => [(300 + k) / 10, -100]);

function station(id: string, lat: number, lon: number, price: number): StationRecord {
  return { id, name: `Stop ${id}`, city: 'Town', state: 'TX', price, latitude: lat, longitude: lon };
}

class RecordingLocator implements StationLocator {
  readonly radii: number[] = [];

  constructor(private readonly index: SpatialIndex) {}

  withinRadius(point: Point, radiusMiles: number): StationMatch[] {
    this.radii.push(radiusMiles);
    return this.index.withinRadius(point, radiusMiles);
  }
}

describe('sampleRoute', () => {
  it('keeps points about every 50 miles plus both ends', () => {
    const sampled = sampleRoute(northbound);
    expect(sampled.map(([lat]) => lat)).toEqual([30, 30.8, 31.6, 32.4, 33.2, 34, 34.8, 35]);
  });

  it('does not repeat the last point when it was just emitted', () => {
    const far: Point[] = [[34, -100], [36, -100]];
    expect(sampleRoute(far)).toEqual(far);
  });

  it('keeps the destination of a short route', () => {
    const route: Point[] = [[34.0522, -118.2437], [34.5, -118.0], [35.0, -119.0]];
    expect(sampleRoute(route)).toEqual([route[0], route[2]]);
  });

  it('does not append a last point that repeats the previous coordinates', () => {
    const route: Point[] = [[34, -100], [36, -100], [36, -100]];
    expect(sampleRoute(route)).toEqual([[34, -100], [36, -100]]);
  });

  it('returns degenerate routes unchanged', () => {
    expect(sampleRoute([])).toEqual([]);
    expect(sampleRoute([[35, -100]])).toEqual([[35, -100]]);
  });

  it('never returns more points than it was given', () => {
    const dense: Point[] = Array.from({ length: 200 }, (_, k): Point => [35, -100 + k / 1000]);
    const sampled = sampleRoute(dense, 1);
    expect(sampled.length).toBeLessThanOrEqual(dense.length);
    expect(sampled[0]).toBe(dense[0]);
    expect(sampled[sampled.length - 1]).toBe(dense[dense.length - 1]);
  });
});

describe('resolveOptimizerConfig', () => {
  it('fills defaults', () => {
    expect(resolveOptimizerConfig({ maxRange: 500, mpg: 10 })).toEqual({
      maxRange: 500,
      mpg: 10,
      safetyBuffer: 30,
      maxDetour: 20,
      sampleInterval: 50,
      fillRatio: 0.8,
      maxCandidates: 30,
      distanceWeight: 0.01,
    });
  });

  it('rejects unusable values', () => {
    expect(() => resolveOptimizerConfig({ maxRange: 0, mpg: 10 })).toThrow(InvalidOptimizerConfigError);
    expect(() => resolveOptimizerConfig({ maxRange: 500, mpg: -2 })).toThrow('mpg must be a positive number');
    expect(() => resolveOptimizerConfig({ maxRange: 500, mpg: 10, fillRatio: 1.5 })).toThrow('fillRatio');
    expect(() => resolveOptimizerConfig({ maxRange: 500, mpg: 10, maxDetour: -1 })).toThrow('maxDetour');
    expect(() => resolveOptimizerConfig({ maxRange: 30, mpg: 10 })).toThrow('safetyBuffer (30) must be smaller');
  });
});

describe('RouteOptimizer', () => {
  it('plans no stops when the route fits in one tank', () => {
    const index = SpatialIndex.build([station('la', 34.05, -118.25, 4.5)]);
    const result = new RouteOptimizer({ maxRange: 500, mpg: 10 }).optimize(
      [[34.0522, -118.2437], [34.5, -118.0], [35.0, -119.0]],
      150,
      index,
    );

    expect(result.stops).toEqual([]);
    expect(result.totalCost).toBe(0);
    expect(result.totalGallons).toBe(0);
    expect(result.totalDistance).toBe(150);
    expect(result.serviceable).toBe(true);
  });

  it('plans no stops on a multi-waypoint route that fits in one tank', () => {
    const index = SpatialIndex.build([station('A', 33.2, -100.1, 3.9)]);
    const locator = new RecordingLocator(index);
    const result = new RouteOptimizer({ maxRange: 500, mpg: 10 }).optimize(northbound, 345.49, locator);

    expect(result.stops).toEqual([]);
    expect(result.totalCost).toBe(0);
    expect(result.serviceable).toBe(true);
    expect(locator.radii).toEqual([]);
  });

  it('plans no stops for a single-point route', () => {
    const index = SpatialIndex.build([station('a', 35, -100, 3)]);
    const result = new RouteOptimizer({ maxRange: 100, mpg: 10 }).optimize([[35, -100]], 0, index);
    expect(result.stops).toEqual([]);
    expect(result.shortfalls).toEqual([]);
  });

  it('refuels at the best-scoring station inside the detour radius', () => {
    const index = SpatialIndex.build([
      station('A', 33.2, -100.1, 3.9),
      station('B', 33.3, -100.0, 3.4),
      // Cheapest, but about 29 miles away
      station('C', 33.2, -99.5, 2.0),
    ]);
    const locator = new RecordingLocator(index);

    const result = new RouteOptimizer({ maxRange: 300, mpg: 10 }).optimize(northbound, 345.49, locator);

    expect(result.stops).toEqual([
      {
        name: 'Stop B',
        stationId: 'B',
        location: [33.3, -100],
        price: 3.4,
        gallons: 24,
        cost: 81.6,
        milesFromStart: 221.11,
      },
    ]);
    expect(locator.radii).toEqual([20]);
    expect(result.totalGallons).toBe(24);
    expect(result.totalCost).toBe(81.6);
    expect(result.totalDistance).toBe(345.49);
    expect(result.serviceable).toBe(true);
  });

  it('only scores the nearest maxCandidates stations', () => {
    const index = SpatialIndex.build([station('A', 33.2, -100.1, 3.9), station('B', 33.3, -100.0, 3.4)]);
    const result = new RouteOptimizer({ maxRange: 300, mpg: 10, maxCandidates: 1 }).optimize(northbound, 345.49, index);
    expect(result.stops.map((s) => [s.stationId, s.cost])).toEqual([['A', 93.6]]);
  });

  it('widens the search when nothing is within the detour radius', () => {
    const index = SpatialIndex.build([station('far', 33.65, -100, 3)]);
    const locator = new RecordingLocator(index);

    const result = new RouteOptimizer({ maxRange: 300, mpg: 10 }).optimize(northbound, 345.49, locator);

    expect(locator.radii).toEqual([20, 50]);
    expect(result.stops.map((s) => [s.stationId, s.cost, s.milesFromStart])).toEqual([['far', 72, 221.11]]);
  });

  it('measures the leg after a stop from the station', () => {
    // About 29 miles east of the route
    const index = SpatialIndex.build([station('east', 31.6, -99.5, 3)]);
    const result = new RouteOptimizer({ maxRange: 150, mpg: 10 }).optimize(northbound, 345.49, index);

    expect(result.stops.map((s) => [s.stationId, s.milesFromStart])).toEqual([['east', 110.56]]);
    // 120 miles after the fill, less the 62.56 from the station to the next waypoint
    expect(result.shortfalls[0]).toEqual({
      waypointIndex: 4,
      location: [32.4, -100],
      milesFromStart: 173.12,
      remainingRangeMiles: 57.44,
      searchRadiusMiles: 50,
    });
  });

  it('charges the trip back to the route after each of two consecutive stops', () => {
    const index = SpatialIndex.build([station('S1', 31.6, -99.5, 3), station('S2', 32.4, -99.5, 3.2)]);
    const result = new RouteOptimizer({ maxRange: 150, mpg: 10 }).optimize(northbound, 345.49, index);

    expect(result.stops).toEqual([
      { name: 'Stop S1', stationId: 'S1', location: [31.6, -99.5], price: 3, gallons: 12, cost: 36, milesFromStart: 110.56 },
      { name: 'Stop S2', stationId: 'S2', location: [32.4, -99.5], price: 3.2, gallons: 12, cost: 38.4, milesFromStart: 173.12 },
    ]);
    expect(result.totalCost).toBe(74.4);
    expect(result.shortfalls[0]).toEqual({
      waypointIndex: 5,
      location: [33.2, -100],
      milesFromStart: 235.56,
      remainingRangeMiles: 57.56,
      searchRadiusMiles: 50,
    });
    expect(result.serviceable).toBe(false);
  });

  it('flags every leg it cannot fuel instead of dropping it', () => {
    const result = new RouteOptimizer({ maxRange: 300, mpg: 10 }).optimize(northbound, 345.49, SpatialIndex.build([]));

    expect(result.stops).toEqual([]);
    expect(result.serviceable).toBe(false);
    expect(result.shortfalls).toEqual([
      { waypointIndex: 5, location: [33.2, -100], milesFromStart: 221.11, remainingRangeMiles: 78.89, searchRadiusMiles: 50 },
      { waypointIndex: 6, location: [34, -100], milesFromStart: 276.39, remainingRangeMiles: 23.61, searchRadiusMiles: 23.61 },
      { waypointIndex: 7, location: [34.8, -100], milesFromStart: 331.67, remainingRangeMiles: -31.67, searchRadiusMiles: 0 },
    ]);
  });

  it('breaks score ties by station id', () => {
    const index = SpatialIndex.build([station('B-2', 33.2, -100.1, 3.5), station('A-1', 33.2, -99.9, 3.5)]);
    const result = new RouteOptimizer({ maxRange: 300, mpg: 10 }).optimize(northbound, 345.49, index);
    expect(result.stops.map((s) => s.stationId)).toEqual(['A-1']);
  });

  it('returns the same plan on repeated calls', () => {
    const index = SpatialIndex.build([
      station('A', 33.2, -100.1, 3.9),
      station('B', 33.3, -100.0, 3.4),
      station('D', 34.1, -100.05, 3.1),
    ]);
    const optimizer = new RouteOptimizer({ maxRange: 150, mpg: 8 });

    const first = optimizer.optimize(northbound, 345.49, index);
    const second = optimizer.optimize(northbound, 345.49, index);

    const { computationMs: _a, ...firstPlan } = first;
    const { computationMs: _b, ...secondPlan } = second;
    expect(secondPlan).toEqual(firstPlan);
  });
});
