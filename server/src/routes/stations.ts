import { Router } from 'express';
import { isValidLatitude, isValidLongitude } from '../geo/distance.js';
import type { SpatialIndex } from '../stations/spatialIndex.js';
import type { Station, StationMatch } from '../types/station.js';
import { ensureNumber, ensureString, roundTo } from '../utils/parse.js';

const DEFAULT_NEAR_LIMIT = 20;
const MAX_NEAR_LIMIT = 200;
const MAX_NEAR_RADIUS_MILES = 500;

type StationResponse = {
  id: string;
  name: string;
  city: string;
  state: string;
  price: number;
  latitude: number;
  longitude: number;
};

function toStationResponse(station: Station): StationResponse {
  return {
    id: station.id,
    name: station.name,
    city: station.city,
    state: station.state,
    price: station.price,
    latitude: station.location[0],
    longitude: station.location[1],
  };
}

function compareByStateCity(a: Station, b: Station): number {
  if (a.state !== b.state) return a.state < b.state ? -1 : 1;
  if (a.city !== b.city) return a.city < b.city ? -1 : 1;
  return 0;
}

export function createStationsRouter(index: SpatialIndex): Router {
  const router = Router();

  // All stations, optionally filtered by ?state=XX
  router.get('/', (req, res) => {
    const state = ensureString(req.query.state)?.toUpperCase() ?? null;
    const stations = index
      .stations()
      .filter((station) => state === null || station.state.toUpperCase() === state)
      .sort(compareByStateCity);
    res.json(stations.map(toStationResponse));
  });

  router.get('/stats/count', (_req, res) => {
    res.json({ total: index.stats().stationCount });
  });

  // Stations near a point: within ?radius miles when given, otherwise the ?limit nearest
  router.get('/near/:lat/:lng', (req, res) => {
    const lat = ensureNumber(req.params.lat);
    const lng = ensureNumber(req.params.lng);
    if (lat === null || lng === null || !isValidLatitude(lat) || !isValidLongitude(lng)) {
      return res.status(400).json({ error: 'Invalid coordinates' });
    }

    const rawLimit = req.query.limit;
    const limit = rawLimit === undefined ? DEFAULT_NEAR_LIMIT : ensureNumber(rawLimit);
    if (limit === null || !Number.isInteger(limit) || limit < 1 || limit > MAX_NEAR_LIMIT) {
      return res.status(400).json({ error: `limit must be an integer between 1 and ${MAX_NEAR_LIMIT}` });
    }

    const rawRadius = req.query.radius;
    let matches: StationMatch[];
    if (rawRadius === undefined) {
      matches = index.nearest([lat, lng], limit);
    } else {
      const radius = ensureNumber(rawRadius);
      if (radius === null || radius < 0 || radius > MAX_NEAR_RADIUS_MILES) {
        return res.status(400).json({ error: `radius must be between 0 and ${MAX_NEAR_RADIUS_MILES} miles` });
      }
      matches = index.withinRadius([lat, lng], radius).slice(0, limit);
    }

    return res.json(
      matches.map((match) => ({
        ...toStationResponse(match.station),
        distance_miles: roundTo(match.distanceMiles, 2),
      })),
    );
  });

  router.get('/:id', (req, res) => {
    const station = index.stations().find((s) => s.id === req.params.id);
    if (!station) {
      return res.status(404).json({ error: 'Station not found' });
    }
    return res.json(toStationResponse(station));
  });

  return router;
}
