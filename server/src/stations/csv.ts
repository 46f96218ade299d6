import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from '../config.js';
import { createLogger } from '../logger.js';
import type { StationRecord } from '../types/station.js';

const log = createLogger('stations-csv');
const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const GEOCODED_STATIONS_FILENAME = 'fuel_stations_geocoded.csv';

export type CsvTable = {
  headers: string[];
  rows: Record<string, string>[];
};

// Header aliases, matched case-insensitively. The first match wins.
const STATION_COLUMNS: Record<keyof StationRecord, string[]> = {
  id: ['opis truckstop id', 'id', 'station_id'],
  name: ['truckstop name', 'name', 'station_name'],
  city: ['city'],
  state: ['state'],
  price: ['retail price', 'price', 'price_per_gallon'],
  latitude: ['latitude', 'lat'],
  longitude: ['longitude', 'lon', 'lng'],
};

export function parseCsvLine(line: string): string[] {
  const out: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i += 1) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === ',') {
      out.push(current);
      current = '';
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      continue;
    }

    current += ch;
  }

  out.push(current);
  return out;
}

export function toCsvLine(values: readonly string[]): string {
  return values
    .map((value) => (/[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value))
    .join(',');
}

/** Decodes a CSV buffer, falling back to latin1 for legacy exports. */
export function decodeCsvBuffer(buffer: Buffer): string {
  let text = buffer.toString('utf8');
  if (text.includes('\uFFFD')) {
    text = buffer.toString('latin1');
  }
  if (text.charCodeAt(0) === 0xfeff) {
    text = text.slice(1);
  }
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/** Header row plus one record per non-blank line, keyed by the original header text. */
export function parseCsv(text: string): CsvTable {
  const lines = text.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  const headerLine = lines.findIndex((line) => line.trim() !== '');
  if (headerLine === -1) return { headers: [], rows: [] };

  const headers = parseCsvLine(lines[headerLine]).map((h) => h.trim());
  const rows: Record<string, string>[] = [];

  for (let i = headerLine + 1; i < lines.length; i++) {
    const line = lines[i];
    if (!line.trim()) continue;

    const cols = parseCsvLine(line);
    const row: Record<string, string> = {};
    headers.forEach((header, col) => {
      row[header] = cols[col] ?? '';
    });
    rows.push(row);
  }

  return { headers, rows };
}

export function parseStationsCsv(text: string): StationRecord[] {
  const { headers, rows } = parseCsv(text);
  if (headers.length === 0) return [];

  const lowerHeaders = new Map<string, string>();
  for (const header of headers) {
    const key = header.toLowerCase();
    if (!lowerHeaders.has(key)) lowerHeaders.set(key, header);
  }

  const columnFor = (field: keyof StationRecord): string | null => {
    for (const alias of STATION_COLUMNS[field]) {
      const header = lowerHeaders.get(alias);
      if (header !== undefined) return header;
    }
    return null;
  };

  const columns = {
    id: columnFor('id'),
    name: columnFor('name'),
    city: columnFor('city'),
    state: columnFor('state'),
    price: columnFor('price'),
    latitude: columnFor('latitude'),
    longitude: columnFor('longitude'),
  };

  if (!columns.latitude || !columns.longitude) {
    log.warn({ headers }, 'Station CSV has no latitude/longitude columns; run the data preparation script first');
  }

  const read = (row: Record<string, string>, column: string | null) => (column ? row[column] : undefined);

  return rows.map((row) => ({
    id: read(row, columns.id),
    name: read(row, columns.name),
    city: read(row, columns.city),
    state: read(row, columns.state),
    price: read(row, columns.price),
    latitude: read(row, columns.latitude),
    longitude: read(row, columns.longitude),
  }));
}

export async function findStationsCsvPath(): Promise<string | null> {
  const candidates = [
    config.stations.csvPath ? path.resolve(process.cwd(), config.stations.csvPath) : undefined,
    // repo root
    path.resolve(__dirname, '../../../data', GEOCODED_STATIONS_FILENAME),
    // compiled output (dist/stations -> repo root)
    path.resolve(__dirname, '../../data', GEOCODED_STATIONS_FILENAME),
    path.resolve(process.cwd(), 'data', GEOCODED_STATIONS_FILENAME),
  ].filter((p): p is string => Boolean(p));

  for (const candidate of candidates) {
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      // try the next location
    }
  }

  return null;
}

export async function loadStationsFromCsv(csvPath: string): Promise<StationRecord[]> {
  const buffer = await fs.readFile(csvPath);
  const records = parseStationsCsv(decodeCsvBuffer(buffer));
  log.info({ csvPath, rows: records.length }, `Read ${records.length} station rows`);
  return records;
}

/**
 * Station rows from the configured feed, or none when no feed file exists.
 * Read errors propagate.
 */
export async function loadStationFeed(): Promise<StationRecord[]> {
  const csvPath = await findStationsCsvPath();
  if (!csvPath) {
    log.warn(
      `Stations CSV not found; set STATIONS_CSV_PATH or add data/${GEOCODED_STATIONS_FILENAME} (npm run prepare:data)`,
    );
    return [];
  }
  return loadStationsFromCsv(csvPath);
}
