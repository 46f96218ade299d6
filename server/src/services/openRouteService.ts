import { createLogger } from '../logger.js';
import { UpstreamServiceError, toErrorMessage } from '../errors.js';
import { disabledCache, makeGeocodeCacheKey, type ResponseCache } from '../cache.js';
import { isValidPoint, metersToMiles } from '../geo/distance.js';
import { isRecord } from '../utils/parse.js';
import type { Point } from '../types/station.js';

const log = createLogger('openrouteservice');

const ORS_BASE_URL = 'https://api.openrouteservice.org';

export type DirectionsResult = {
  /** Route geometry as `[lat, lon]` points, start to end. */
  polyline: Point[];
  distanceMiles: number;
  durationHours: number;
};

/** What the optimize endpoint needs from a routing provider. */
export interface RoutingService {
  parseLocation(text: string): Promise<Point | null>;
  directions(start: Point, end: Point): Promise<DirectionsResult>;
}

export type OpenRouteServiceOptions = {
  cache?: ResponseCache;
  geocodeTtlDays?: number;
  timeoutMs?: number;
  baseUrl?: string;
};

/**
 * `"lat,lon"` text with both parts numeric and in range, otherwise null.
 */
export function parseCoordinatePair(text: string): Point | null {
  const parts = text.split(',');
  if (parts.length !== 2) return null;
  const [latText, lonText] = parts.map((p) => p.trim());
  if (!latText || !lonText) return null;
  const lat = Number(latText);
  const lon = Number(lonText);
  const point: Point = [lat, lon];
  return isValidPoint(point) ? point : null;
}

function parseOrsError(text: string): number | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed) && isRecord(parsed.error) && typeof parsed.error.code === 'number') {
      return parsed.error.code;
    }
  } catch {
    // Body is not JSON; only the HTTP status is reported.
  }
  return undefined;
}

function parseGeocodeFeature(data: unknown): { point: Point; label: string | null } | null {
  if (!isRecord(data)) return null;
  const features = data.features;
  if (!Array.isArray(features) || features.length === 0) return null;

  const first: unknown = features[0];
  if (!isRecord(first) || !isRecord(first.geometry)) return null;
  const coords = first.geometry.coordinates;
  if (!Array.isArray(coords) || coords.length < 2) return null;
  const [lng, lat]: unknown[] = coords;
  if (typeof lat !== 'number' || typeof lng !== 'number') return null;

  const point: Point = [lat, lng];
  if (!isValidPoint(point)) return null;

  const label = isRecord(first.properties) && typeof first.properties.label === 'string'
    ? first.properties.label
    : null;
  return { point, label };
}

function parseDirectionsFeature(data: unknown): DirectionsResult | null {
  if (!isRecord(data)) return null;
  const features = data.features;
  if (!Array.isArray(features) || features.length === 0) return null;

  const feature: unknown = features[0];
  if (!isRecord(feature) || !isRecord(feature.properties) || !isRecord(feature.geometry)) return null;

  const summary = feature.properties.summary;
  if (!isRecord(summary)) return null;
  const distance = summary.distance;
  const duration = summary.duration;
  if (typeof distance !== 'number' || typeof duration !== 'number') return null;

  const line = feature.geometry.coordinates;
  if (!Array.isArray(line) || line.length === 0) return null;

  const polyline: Point[] = [];
  for (const entry of line) {
    if (!Array.isArray(entry) || entry.length < 2) continue;
    const [lng, lat]: unknown[] = entry;
    if (typeof lat !== 'number' || typeof lng !== 'number') continue;
    const point: Point = [lat, lng];
    if (isValidPoint(point)) polyline.push(point);
  }
  if (polyline.length === 0) return null;

  return {
    polyline,
    distanceMiles: metersToMiles(distance),
    durationHours: duration / 3600,
  };
}

export class OpenRouteServiceClient implements RoutingService {
  private readonly cache: ResponseCache;
  private readonly geocodeTtlDays: number;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(
    private readonly apiKey: string,
    options: OpenRouteServiceOptions = {},
  ) {
    this.cache = options.cache ?? disabledCache;
    this.geocodeTtlDays = options.geocodeTtlDays ?? 0;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.baseUrl = options.baseUrl ?? ORS_BASE_URL;
  }

  async parseLocation(text: string): Promise<Point | null> {
    return parseCoordinatePair(text) ?? this.geocode(text);
  }

  async geocode(query: string): Promise<Point | null> {
    const cacheKey = this.geocodeTtlDays > 0 ? makeGeocodeCacheKey(query) : null;
    if (cacheKey) {
      const cached = await this.cache.getGeocode(cacheKey);
      if (cached) return [cached.lat, cached.lng];
    }

    const url = new URL(`${this.baseUrl}/geocode/search`);
    url.searchParams.set('text', query);
    url.searchParams.set('boundary.country', 'USA');
    url.searchParams.set('size', '1');

    const data = await this.request(url.toString(), {
      headers: { Accept: 'application/json', Authorization: this.apiKey },
    }, 'geocoding');

    const found = parseGeocodeFeature(data);
    if (!found) {
      log.info({ query }, 'No geocoding match');
      return null;
    }

    if (cacheKey) {
      await this.cache.setGeocode({
        cacheKey,
        queryText: query,
        label: found.label ?? query,
        lat: found.point[0],
        lng: found.point[1],
        ttlDays: this.geocodeTtlDays,
      });
    }
    return found.point;
  }

  async directions(start: Point, end: Point): Promise<DirectionsResult> {
    const body = {
      // ORS takes [lon, lat]
      coordinates: [
        [start[1], start[0]],
        [end[1], end[0]],
      ],
      instructions: false,
    };

    const data = await this.request(`${this.baseUrl}/v2/directions/driving-car/geojson`, {
      method: 'POST',
      headers: {
        Accept: 'application/geo+json',
        Authorization: this.apiKey,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    }, 'directions');

    const route = parseDirectionsFeature(data);
    if (!route) {
      throw new UpstreamServiceError('OpenRouteService directions response had no usable route');
    }
    log.debug(
      { distanceMiles: Math.round(route.distanceMiles * 10) / 10, points: route.polyline.length },
      'Route received',
    );
    return route;
  }

  private async request(url: string, init: RequestInit, operation: string): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      log.error({ err: error, operation }, 'OpenRouteService request failed');
      throw new UpstreamServiceError(`OpenRouteService ${operation} request failed: ${toErrorMessage(error)}`);
    }

    if (!response.ok) {
      const text = await response.text();
      const orsCode = parseOrsError(text);
      log.error({ status: response.status, orsCode, operation }, 'OpenRouteService returned an error');
      throw new UpstreamServiceError(
        `OpenRouteService ${operation} error: ${response.status} ${response.statusText}`,
        response.status,
        orsCode,
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new UpstreamServiceError(`OpenRouteService ${operation} returned invalid JSON: ${toErrorMessage(error)}`);
    }
  }
}
