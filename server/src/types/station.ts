/** `[latitude, longitude]` in decimal degrees. */
export type Point = readonly [lat: number, lon: number];

export type Station = {
  readonly id: string;
  readonly name: string;
  readonly city: string;
  readonly state: string;
  /** Retail price per gallon. */
  readonly price: number;
  readonly location: Point;
};

/**
 * Untyped row from the station feed (CSV or JSON). Values may be text or
 * numbers; the spatial index maps them into `Station` and drops bad rows.
 */
export type StationRecord = {
  id?: unknown;
  name?: unknown;
  city?: unknown;
  state?: unknown;
  price?: unknown;
  latitude?: unknown;
  longitude?: unknown;
};

export type StationMatch = {
  station: Station;
  distanceMiles: number;
};

export type IndexStats = {
  stationCount: number;
  memoryEstimateBytes: number;
  isLoaded: boolean;
};

/** The subset of the spatial index the route optimizer needs. */
export interface StationLocator {
  withinRadius(point: Point, radiusMiles: number): StationMatch[];
}
