import { describe, it, expect } from 'vitest';
import { haversineMiles } from '../src/geo/distance.js';
import { SpatialIndex, searchBoxes, toStation } from '../src/stations/spatialIndex.js';
import type { Point, StationRecord } from '../src/types/station.js';

function record(id: string, lat: number, lon: number, price: number): StationRecord {
  return { id, name: `Station ${id}`, city: 'Town', state: 'CA', price, latitude: lat, longitude: lon };
}

function gridRecords(): StationRecord[] {
  const records: StationRecord[] = [];
  for (let i = 0; i < 10; i++) {
    for (let j = 0; j < 10; j++) {
      const k = i * 10 + j;
      records.push(record(`grid-${k}`, 34 + i * 0.5, -118 + j * 0.5, Math.round((3.5 + (k % 10) * 0.1) * 100) / 100));
    }
  }
  return records;
}

function linearScan(records: StationRecord[], point: Point, radiusMiles: number): string[] {
  return records
    .map((r) => ({ id: String(r.id), d: haversineMiles(point, [Number(r.latitude), Number(r.longitude)]) }))
    .filter((hit) => hit.d <= radiusMiles)
    .sort((a, b) => a.d - b.d || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .map((hit) => hit.id);
}

describe('toStation', () => {
  it('maps text fields and numeric strings', () => {
    expect(
      toStation({ id: 7, name: ' Pilot ', city: 'Barstow', state: 'CA', price: '3.459', latitude: '34.9', longitude: '-117.0' }),
    ).toEqual({ id: '7', name: 'Pilot', city: 'Barstow', state: 'CA', price: 3.459, location: [34.9, -117] });
  });

  it('fills defaults for missing descriptive fields', () => {
    expect(toStation({ price: 3, latitude: 35, longitude: -100 })).toEqual({
      id: '',
      name: 'Unknown',
      city: '',
      state: '',
      price: 3,
      location: [35, -100],
    });
  });

  it('drops rows without usable coordinates or price', () => {
    expect(toStation({ price: 3, latitude: '', longitude: -100 })).toBeNull();
    expect(toStation({ price: 3, latitude: 0, longitude: 0 })).toBeNull();
    expect(toStation({ price: 3, latitude: 91, longitude: -100 })).toBeNull();
    expect(toStation({ price: 3, latitude: 35, longitude: -181 })).toBeNull();
    expect(toStation({ price: 'n/a', latitude: 35, longitude: -100 })).toBeNull();
    expect(toStation({ price: -1, latitude: 35, longitude: -100 })).toBeNull();
  });
});

describe('SpatialIndex', () => {
  it('returns stations in a radius ordered by distance, not price', () => {
    const index = SpatialIndex.build([
      record('bakersfield', 35.37, -119.02, 3.5),
      record('slo-north', 35.63, -120.69, 3.3),
      record('slo-south', 35.28, -120.66, 3.8),
    ]);

    const matches = index.withinRadius([35.5, -120.0], 100);
    expect(matches.map((m) => m.station.id)).toEqual(['slo-north', 'slo-south', 'bakersfield']);
    expect(matches[0].distanceMiles).toBeCloseTo(39.81, 2);
    expect(matches[1].distanceMiles).toBeCloseTo(40.166, 3);
    expect(matches[2].distanceMiles).toBeCloseTo(55.899, 3);
  });

  it('matches a linear scan on a regular grid', () => {
    const records = gridRecords();
    const index = SpatialIndex.build(records);

    const origin = index.withinRadius([34, -118], 20);
    expect(origin.map((m) => m.station.id)).toEqual(['grid-0']);
    expect(origin[0].distanceMiles).toBe(0);
    expect(origin[0].station.price).toBe(3.5);

    const probes: [Point, number][] = [
      [[34, -118], 20],
      [[35.2, -116.3], 40],
      [[36.1, -115.9], 75],
      [[38.5, -113.5], 34.5],
      [[34.25, -117.75], 24.43],
    ];
    for (const [point, radius] of probes) {
      expect(index.withinRadius(point, radius).map((m) => m.station.id)).toEqual(linearScan(records, point, radius));
    }
  });

  it('includes a station exactly on the radius', () => {
    const index = SpatialIndex.build([record('edge', 35, -100, 3)]);
    const radius = haversineMiles([34, -100], [35, -100]);
    expect(index.withinRadius([34, -100], radius)).toHaveLength(1);
    expect(index.withinRadius([34, -100], radius - 1e-6)).toHaveLength(0);
  });

  it('finds stations across the anti-meridian and past the pole', () => {
    const index = SpatialIndex.build([record('east', 0.5, 179.95, 3), record('polar', 89.9, 180, 3)]);

    expect(index.withinRadius([0.5, -179.95], 10).map((m) => m.station.id)).toEqual(['east']);
    expect(index.withinRadius([89.9, 1], 20).map((m) => m.station.id)).toEqual(['polar']);
  });

  it('orders equal distances by station id', () => {
    const index = SpatialIndex.build([record('b', 35, -99.9, 3), record('a', 35, -100.1, 3)]);
    expect(index.withinRadius([35, -100], 10).map((m) => m.station.id)).toEqual(['a', 'b']);
  });

  it('returns nothing for invalid queries', () => {
    const index = SpatialIndex.build(gridRecords());
    expect(index.withinRadius([95, -118], 20)).toEqual([]);
    expect(index.withinRadius([34, -118], -1)).toEqual([]);
    expect(index.withinRadius([34, -118], Number.NaN)).toEqual([]);
    expect(index.nearest([34, -200], 3)).toEqual([]);
  });

  it('returns the n nearest stations with exact distances', () => {
    const records = gridRecords();
    const index = SpatialIndex.build(records);

    const nearest = index.nearest([36.3, -116.1], 5);
    expect(nearest).toHaveLength(5);
    const expected = linearScan(records, [36.3, -116.1], 10_000).slice(0, 5);
    expect(nearest.map((m) => m.station.id)).toEqual(expected);
    for (const match of nearest) {
      expect(match.distanceMiles).toBe(haversineMiles([36.3, -116.1], match.station.location));
    }
  });

  it('clamps nearest to the station count', () => {
    const index = SpatialIndex.build([record('a', 35, -100, 3), record('b', 36, -100, 3)]);
    expect(index.nearest([35, -100], 10).map((m) => m.station.id)).toEqual(['a', 'b']);
    expect(index.nearest([35, -100], 0)).toEqual([]);
  });

  it('skips invalid rows and reports stats', () => {
    const index = new SpatialIndex();
    expect(index.stats()).toEqual({ stationCount: 0, memoryEstimateBytes: 0, isLoaded: false });

    const kept = index.load([
      record('ok', 35, -100, 3),
      record('zero', 0, 0, 3),
      { id: 'no-price', latitude: 35, longitude: -100 },
    ]);
    expect(kept).toBe(1);
    expect(index.stations().map((s) => s.id)).toEqual(['ok']);
    expect(index.stats().stationCount).toBe(1);
    expect(index.stats().isLoaded).toBe(true);
    expect(index.stats().memoryEstimateBytes).toBeGreaterThan(0);
  });

  it('treats an empty build as loaded with no results', () => {
    const index = SpatialIndex.build([]);
    expect(index.stats()).toEqual({ stationCount: 0, memoryEstimateBytes: 0, isLoaded: true });
    expect(index.withinRadius([35, -100], 100)).toEqual([]);
    expect(index.nearest([35, -100], 3)).toEqual([]);
  });

  it('replaces the previous snapshot on reload', () => {
    const index = SpatialIndex.build([record('old', 35, -100, 3)]);
    const before = index.stations();
    index.load([record('new', 36, -100, 3)]);
    expect(before.map((s) => s.id)).toEqual(['old']);
    expect(index.stations().map((s) => s.id)).toEqual(['new']);
  });
});

describe('searchBoxes', () => {
  it('covers all longitudes when the cap contains a pole', () => {
    expect(searchBoxes([89.9, 0], 20)).toEqual([{ minLat: expect.any(Number), minLon: -180, maxLat: 90, maxLon: 180 }]);
  });

  it('splits at the anti-meridian', () => {
    const boxes = searchBoxes([0, 179.99], 10);
    expect(boxes).toHaveLength(2);
    expect(boxes.map((b) => [b.minLon, b.maxLon].some((v) => Math.abs(v) === 180))).toEqual([true, true]);
  });
});
