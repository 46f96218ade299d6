import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import {
  createCentroidLookup,
  geocodeStationRows,
  parseCentroids,
  readCentroidsFile,
} from '../src/stations/geocodeStations.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

describe('parseCentroids', () => {
  it('keeps well-formed entries only', () => {
    expect(
      parseCentroids([
        { city: 'Amarillo', state: 'TX', lat: 35.222, lon: -101.8313 },
        { city: 'Nowhere', state: 'TX' },
        'junk',
        { city: 'Tulsa', state: 'OK', lat: '36.154', lon: '-95.9928' },
      ]),
    ).toEqual([
      { city: 'Amarillo', state: 'TX', lat: 35.222, lon: -101.8313 },
      { city: 'Tulsa', state: 'OK', lat: 36.154, lon: -95.9928 },
    ]);
  });

  it('rejects a table that is not an array', () => {
    expect(() => parseCentroids({ city: 'Amarillo' })).toThrow('must be a JSON array');
  });
});

describe('createCentroidLookup', () => {
  const lookup = createCentroidLookup([
    { city: 'Amarillo', state: 'TX', lat: 35.222, lon: -101.8313 },
    { city: 'St. Louis', state: 'MO', lat: 38.627, lon: -90.1994 },
  ]);

  it('matches exact spelling', () => {
    expect(lookup('Amarillo', 'TX')).toEqual([35.222, -101.8313]);
  });

  it('falls back to a case-insensitive match', () => {
    expect(lookup(' ST. LOUIS ', 'mo')).toEqual([38.627, -90.1994]);
  });

  it('returns null for unknown cities', () => {
    expect(lookup('Amarillo', 'NM')).toBeNull();
  });
});

describe('geocodeStationRows', () => {
  it('adds coordinates and counts misses', () => {
    const lookup = createCentroidLookup([{ city: 'Amarillo', state: 'TX', lat: 35.222, lon: -101.8313 }]);
    const result = geocodeStationRows(
      [
        { 'Truckstop Name': 'A', City: 'Amarillo', State: 'TX' },
        { 'Truckstop Name': 'B', City: 'Atlantis', State: 'TX' },
        { 'Truckstop Name': 'C' },
      ],
      lookup,
    );

    expect(result.geocoded).toBe(1);
    expect(result.failed).toBe(2);
    expect(result.rows).toEqual([
      { 'Truckstop Name': 'A', City: 'Amarillo', State: 'TX', latitude: '35.222', longitude: '-101.8313' },
    ]);
  });
});

describe('readCentroidsFile', () => {
  it('loads the bundled centroid table', async () => {
    const centroids = await readCentroidsFile(path.resolve(__dirname, '../../data/us-city-centroids.json'));
    expect(centroids.length).toBeGreaterThan(50);
    const lookup = createCentroidLookup(centroids);
    expect(lookup('Los Angeles', 'CA')).toEqual([34.0522, -118.2437]);
  });
});
