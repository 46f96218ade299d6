import fs from 'node:fs/promises';
import type { Point } from '../types/station.js';
import { isRecord, ensureNumber, ensureString } from '../utils/parse.js';

export type CityCentroid = {
  city: string;
  state: string;
  lat: number;
  lon: number;
};

export type CentroidLookup = (city: string, state: string) => Point | null;

export type GeocodeSummary = {
  rows: Record<string, string>[];
  geocoded: number;
  failed: number;
};

export function parseCentroids(value: unknown): CityCentroid[] {
  if (!Array.isArray(value)) {
    throw new Error('City centroid table must be a JSON array');
  }

  const centroids: CityCentroid[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) continue;
    const city = ensureString(entry.city);
    const state = ensureString(entry.state);
    const lat = ensureNumber(entry.lat);
    const lon = ensureNumber(entry.lon);
    if (!city || !state || lat === null || lon === null) continue;
    centroids.push({ city, state, lat, lon });
  }
  return centroids;
}

export async function readCentroidsFile(filePath: string): Promise<CityCentroid[]> {
  const text = await fs.readFile(filePath, 'utf8');
  return parseCentroids(JSON.parse(text));
}

/**
 * City/state → centroid lookup. Tries the exact spelling first, then a
 * case-insensitive match on both parts.
 */
export function createCentroidLookup(centroids: readonly CityCentroid[]): CentroidLookup {
  const exact = new Map<string, Point>();
  const folded = new Map<string, Point>();

  for (const { city, state, lat, lon } of centroids) {
    const point: Point = [lat, lon];
    const exactKey = `${city}|${state}`;
    const foldedKey = `${city.toLowerCase()}|${state.toUpperCase()}`;
    if (!exact.has(exactKey)) exact.set(exactKey, point);
    if (!folded.has(foldedKey)) folded.set(foldedKey, point);
  }

  return (city, state) => {
    const c = city.trim();
    const s = state.trim();
    return exact.get(`${c}|${s}`) ?? folded.get(`${c.toLowerCase()}|${s.toUpperCase()}`) ?? null;
  };
}

/**
 * Adds `latitude`/`longitude` columns to every raw price row whose City/State
 * resolves to a centroid. Unresolved rows are counted and left out.
 */
export function geocodeStationRows(
  rows: readonly Record<string, string>[],
  lookup: CentroidLookup,
): GeocodeSummary {
  const geocodedRows: Record<string, string>[] = [];
  let failed = 0;

  for (const row of rows) {
    const point = lookup(row.City ?? '', row.State ?? '');
    if (!point) {
      failed += 1;
      continue;
    }
    geocodedRows.push({
      ...row,
      latitude: String(point[0]),
      longitude: String(point[1]),
    });
  }

  return { rows: geocodedRows, geocoded: geocodedRows.length, failed };
}
