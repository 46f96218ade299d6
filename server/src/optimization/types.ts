import type { Point } from '../types/station.js';

export type OptimizerConfig = {
  /** Miles on a full tank. */
  maxRange: number;
  mpg: number;
  /** Miles kept in reserve; a refuel is planned before range drops below this. */
  safetyBuffer?: number;
  /** Preferred search radius around the vehicle when picking a station. */
  maxDetour?: number;
  /** Spacing of the waypoints the route is evaluated at. */
  sampleInterval?: number;
  /** Share of max range restored at each stop. */
  fillRatio?: number;
  /** How many of the nearest candidates are scored. */
  maxCandidates?: number;
  /** Score penalty per mile of distance to the station. */
  distanceWeight?: number;
};

export type ResolvedOptimizerConfig = Required<OptimizerConfig>;

export type FuelStop = {
  name: string;
  stationId: string;
  location: Point;
  price: number;
  gallons: number;
  cost: number;
  milesFromStart: number;
};

/** A required refuel that no station in reach could satisfy. */
export type FuelShortfall = {
  waypointIndex: number;
  location: Point;
  milesFromStart: number;
  remainingRangeMiles: number;
  searchRadiusMiles: number;
};

export type OptimizationResult = {
  stops: FuelStop[];
  totalCost: number;
  totalGallons: number;
  totalDistance: number;
  computationMs: number;
  shortfalls: FuelShortfall[];
  /** False when at least one leg could not be covered by a station. */
  serviceable: boolean;
};
