import { createLogger } from '../logger.js';
import { StaticKdTree } from '../geo/kdTree.js';
import {
  EARTH_RADIUS_MILES,
  degreesToRadians,
  haversineMiles,
  isValidPoint,
  radiansToDegrees,
} from '../geo/distance.js';
import { ensureNumber, ensureString, ensureText } from '../utils/parse.js';
import type {
  IndexStats,
  Point,
  Station,
  StationLocator,
  StationMatch,
  StationRecord,
} from '../types/station.js';

const log = createLogger('spatial-index');

// Pads the degree bounding box so float error never excludes a boundary station
const SEARCH_BOX_WIDENING = 1.001;

type IndexSnapshot = {
  readonly stations: readonly Station[];
  /** `coords[2i]`, `coords[2i + 1]` = lat/lon of `stations[i]`. */
  readonly coords: Float64Array;
  readonly tree: StaticKdTree;
};

type Box = { minLat: number; minLon: number; maxLat: number; maxLon: number };

/**
 * Maps a feed row into a Station, or null when the row cannot be used.
 * Zero coordinates are what the geocoder leaves behind for unmatched cities,
 * so they are treated as missing.
 */
export function toStation(record: StationRecord): Station | null {
  const lat = ensureNumber(record.latitude);
  const lon = ensureNumber(record.longitude);
  if (lat === null || lon === null) return null;
  if (lat === 0 || lon === 0) return null;

  const location: Point = [lat, lon];
  if (!isValidPoint(location)) return null;

  const price = ensureNumber(record.price);
  if (price === null || price < 0) return null;

  return {
    id: ensureText(record.id) ?? '',
    name: ensureString(record.name) ?? 'Unknown',
    city: ensureString(record.city) ?? '',
    state: ensureString(record.state) ?? '',
    price,
    location,
  };
}

/**
 * Degree-space boxes covering every point within `radiusMiles` of `center`.
 * Uses the exact longitude extent of a spherical cap; splits at the
 * anti-meridian and spans all longitudes when the cap contains a pole.
 */
export function searchBoxes(center: Point, radiusMiles: number): Box[] {
  const [lat, lon] = center;
  const angular = (radiusMiles / EARTH_RADIUS_MILES) * SEARCH_BOX_WIDENING;
  const delta = radiansToDegrees(angular);

  const minLat = lat - delta;
  const maxLat = lat + delta;
  if (minLat <= -90 || maxLat >= 90 || angular >= Math.PI / 2) {
    return [{ minLat: Math.max(-90, minLat), minLon: -180, maxLat: Math.min(90, maxLat), maxLon: 180 }];
  }

  const ratio = Math.sin(angular) / Math.cos(degreesToRadians(lat));
  const lonDelta = ratio >= 1 ? 180 : radiansToDegrees(Math.asin(ratio)) * SEARCH_BOX_WIDENING;
  const minLon = lon - lonDelta;
  const maxLon = lon + lonDelta;

  if (lonDelta >= 180) {
    return [{ minLat, minLon: -180, maxLat, maxLon: 180 }];
  }
  if (minLon < -180) {
    return [
      { minLat, minLon: minLon + 360, maxLat, maxLon: 180 },
      { minLat, minLon: -180, maxLat, maxLon },
    ];
  }
  if (maxLon > 180) {
    return [
      { minLat, minLon, maxLat, maxLon: 180 },
      { minLat, minLon: -180, maxLat, maxLon: maxLon - 360 },
    ];
  }
  return [{ minLat, minLon, maxLat, maxLon }];
}

/**
 * In-memory proximity index over fuel stations.
 *
 * A load builds a complete new snapshot (stations, coordinate array, tree) and
 * swaps it in; queries read whichever snapshot was current when they started.
 * There is no incremental insert or delete.
 */
export class SpatialIndex implements StationLocator {
  private snapshot: IndexSnapshot | null = null;

  static build(records: Iterable<StationRecord>): SpatialIndex {
    const index = new SpatialIndex();
    index.load(records);
    return index;
  }

  /** Replaces the indexed stations. Returns how many rows were kept. */
  load(records: Iterable<StationRecord>): number {
    const startedAt = performance.now();
    const stations: Station[] = [];
    let skipped = 0;

    for (const record of records) {
      const station = toStation(record);
      if (!station) {
        skipped += 1;
        log.debug({ id: record.id }, 'Skipping station row with invalid coordinates or price');
        continue;
      }
      stations.push(station);
    }

    const coords = new Float64Array(stations.length * 2);
    stations.forEach((station, i) => {
      coords[2 * i] = station.location[0];
      coords[2 * i + 1] = station.location[1];
    });

    this.snapshot = { stations, coords, tree: new StaticKdTree(coords) };

    const buildMs = performance.now() - startedAt;
    if (stations.length === 0) {
      log.error({ skipped }, 'No valid stations loaded; every query will return no results');
    } else {
      log.info(
        { stationCount: stations.length, skipped, buildMs: Number(buildMs.toFixed(2)) },
        `Loaded ${stations.length} stations into spatial index`,
      );
    }
    return stations.length;
  }

  stations(): readonly Station[] {
    return this.snapshot?.stations ?? [];
  }

  /**
   * Every station within `radiusMiles` (haversine) of `point`, nearest first.
   * Equal distances are ordered by station id, then load order.
   */
  withinRadius(point: Point, radiusMiles: number): StationMatch[] {
    const snapshot = this.snapshot;
    if (!snapshot || snapshot.stations.length === 0) return [];
    if (!isValidPoint(point) || !Number.isFinite(radiusMiles) || radiusMiles < 0) return [];
    return collectWithin(snapshot, point, radiusMiles);
  }

  /**
   * The `n` stations closest to `point` (fewer when the index is smaller),
   * nearest first, with exact haversine distances.
   */
  nearest(point: Point, n: number): StationMatch[] {
    const snapshot = this.snapshot;
    if (!snapshot || !isValidPoint(point)) return [];

    const count = Math.min(Math.floor(n), snapshot.stations.length);
    if (!(count > 0)) return [];

    // Degree-space neighbours bound the true answer: all of them lie within the
    // farthest one's ground distance, so an exact radius query there is complete.
    const seeds = snapshot.tree.nearest(point[0], point[1], count);
    let radius = 0;
    for (const i of seeds) {
      radius = Math.max(radius, haversineMiles(point, snapshot.stations[i].location));
    }

    return collectWithin(snapshot, point, radius).slice(0, count);
  }

  stats(): IndexStats {
    const snapshot = this.snapshot;
    if (!snapshot) {
      return { stationCount: 0, memoryEstimateBytes: 0, isLoaded: false };
    }
    return {
      stationCount: snapshot.stations.length,
      memoryEstimateBytes: snapshot.coords.byteLength + snapshot.tree.byteLength,
      isLoaded: true,
    };
  }
}

function collectWithin(snapshot: IndexSnapshot, point: Point, radiusMiles: number): StationMatch[] {
  const hits: { order: number; match: StationMatch }[] = [];
  const seen = new Set<number>();

  for (const box of searchBoxes(point, radiusMiles)) {
    for (const i of snapshot.tree.range(box.minLat, box.minLon, box.maxLat, box.maxLon)) {
      if (seen.has(i)) continue;
      seen.add(i);

      const station = snapshot.stations[i];
      const distanceMiles = haversineMiles(point, station.location);
      if (distanceMiles <= radiusMiles) {
        hits.push({ order: i, match: { station, distanceMiles } });
      }
    }
  }

  hits.sort((a, b) => {
    if (a.match.distanceMiles !== b.match.distanceMiles) {
      return a.match.distanceMiles - b.match.distanceMiles;
    }
    if (a.match.station.id !== b.match.station.id) {
      return a.match.station.id < b.match.station.id ? -1 : 1;
    }
    return a.order - b.order;
  });

  return hits.map((hit) => hit.match);
}
