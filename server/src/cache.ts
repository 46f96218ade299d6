import crypto from 'node:crypto';
import type { Pool } from 'pg';
import { createLogger } from './logger.js';

const log = createLogger('cache');

export type CachedGeocode = {
  label: string;
  lat: number;
  lng: number;
};

export type RouteResponseCacheKeyInput = {
  start: string;
  end: string;
  maxRange: number;
  mpg: number;
};

/**
 * Lookups degrade to a miss and writes to a no-op when the backing store is
 * unavailable; callers never see cache errors.
 */
export interface ResponseCache {
  readonly enabled: boolean;
  getGeocode(cacheKey: string): Promise<CachedGeocode | null>;
  setGeocode(options: {
    cacheKey: string;
    queryText: string;
    label: string;
    lat: number;
    lng: number;
    ttlDays: number;
  }): Promise<void>;
  getRouteResponse(cacheKey: string): Promise<unknown | null>;
  setRouteResponse(options: {
    cacheKey: string;
    requestJson: unknown;
    responseJson: unknown;
    ttlSeconds: number;
  }): Promise<void>;
}

function sha256Hex(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex');
}

export function normalizeQueryText(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

export function makeGeocodeCacheKey(query: string): string {
  return sha256Hex(`geocode:v1:${normalizeQueryText(query).toLowerCase()}`);
}

export function makeRouteResponseCacheKey(options: RouteResponseCacheKeyInput): string {
  const payload = [
    'optimize:v1',
    `range=${Math.round(options.maxRange * 100) / 100}`,
    `mpg=${Math.round(options.mpg * 100) / 100}`,
    `q=${[options.start, options.end].map((q) => normalizeQueryText(q).toLowerCase()).join('|')}`,
  ].join(':');
  return sha256Hex(payload);
}

export const disabledCache: ResponseCache = {
  enabled: false,
  getGeocode: async () => null,
  setGeocode: async () => {},
  getRouteResponse: async () => null,
  setRouteResponse: async () => {},
};

type CacheTable = 'geocode_cache' | 'route_response_cache';

export function createPgCache(pool: Pool): ResponseCache {
  const warned = new Set<string>();
  function warnOnce(key: string, error: unknown): void {
    if (warned.has(key)) return;
    warned.add(key);
    log.warn({ err: error, table: key }, `Cache disabled for ${key}`);
  }

  const lastCleanup: Record<CacheTable, number> = {
    geocode_cache: 0,
    route_response_cache: 0,
  };

  async function maybeCleanup(table: CacheTable): Promise<void> {
    const now = Date.now();
    if (now - lastCleanup[table] < 60 * 60 * 1000) return;
    lastCleanup[table] = now;
    try {
      // Table name is hard-coded via switch to avoid SQL injection.
      switch (table) {
        case 'geocode_cache':
          await pool.query('DELETE FROM geocode_cache WHERE expires_at < NOW()');
          break;
        case 'route_response_cache':
          await pool.query('DELETE FROM route_response_cache WHERE expires_at < NOW()');
          break;
        default: {
          const _exhaustive: never = table;
          return _exhaustive;
        }
      }
    } catch (error) {
      warnOnce(table, error);
    }
  }

  return {
    enabled: true,

    async getGeocode(cacheKey) {
      try {
        const result = await pool.query<CachedGeocode>(
          `
            SELECT label, lat, lng
            FROM geocode_cache
            WHERE cache_key = $1
              AND expires_at > NOW()
            LIMIT 1
          `,
          [cacheKey]
        );
        const row = result.rows[0];
        if (!row) return null;
        if (typeof row.label !== 'string') return null;
        if (!Number.isFinite(row.lat) || !Number.isFinite(row.lng)) return null;
        return row;
      } catch (error) {
        warnOnce('geocode_cache', error);
        return null;
      }
    },

    async setGeocode(options) {
      if (!Number.isFinite(options.ttlDays) || options.ttlDays <= 0) return;
      try {
        await maybeCleanup('geocode_cache');
        await pool.query(
          `
            INSERT INTO geocode_cache (cache_key, query_text, label, lat, lng, expires_at)
            VALUES ($1, $2, $3, $4, $5, NOW() + ($6 * INTERVAL '1 day'))
            ON CONFLICT (cache_key) DO UPDATE SET
              query_text = EXCLUDED.query_text,
              label = EXCLUDED.label,
              lat = EXCLUDED.lat,
              lng = EXCLUDED.lng,
              updated_at = NOW(),
              expires_at = EXCLUDED.expires_at
          `,
          [
            options.cacheKey,
            normalizeQueryText(options.queryText),
            options.label,
            options.lat,
            options.lng,
            Math.floor(options.ttlDays),
          ]
        );
      } catch (error) {
        warnOnce('geocode_cache', error);
      }
    },

    async getRouteResponse(cacheKey) {
      try {
        const result = await pool.query<{ response_json: unknown }>(
          `
            SELECT response_json
            FROM route_response_cache
            WHERE cache_key = $1
              AND expires_at > NOW()
            LIMIT 1
          `,
          [cacheKey]
        );
        return result.rows[0]?.response_json ?? null;
      } catch (error) {
        warnOnce('route_response_cache', error);
        return null;
      }
    },

    async setRouteResponse(options) {
      if (!Number.isFinite(options.ttlSeconds) || options.ttlSeconds <= 0) return;
      try {
        await maybeCleanup('route_response_cache');
        await pool.query(
          `
            INSERT INTO route_response_cache (cache_key, request_json, response_json, expires_at)
            VALUES ($1, $2::jsonb, $3::jsonb, NOW() + ($4 * INTERVAL '1 second'))
            ON CONFLICT (cache_key) DO UPDATE SET
              request_json = EXCLUDED.request_json,
              response_json = EXCLUDED.response_json,
              updated_at = NOW(),
              expires_at = EXCLUDED.expires_at
          `,
          [
            options.cacheKey,
            JSON.stringify(options.requestJson),
            JSON.stringify(options.responseJson),
            Math.floor(options.ttlSeconds),
          ]
        );
      } catch (error) {
        warnOnce('route_response_cache', error);
      }
    },
  };
}
