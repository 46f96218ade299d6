import type { Point } from '../types/station.js';

export const EARTH_RADIUS_MILES = 3959;
export const METERS_PER_MILE = 1609.344;

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function radiansToDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

export function metersToMiles(meters: number): number {
  return meters / METERS_PER_MILE;
}

// Haversine formula to compute great-circle distance between two points on Earth in miles
export function haversineMiles(a: Point, b: Point): number {
  const lat1 = degreesToRadians(a[0]);
  const lon1 = degreesToRadians(a[1]);
  const lat2 = degreesToRadians(b[0]);
  const lon2 = degreesToRadians(b[1]);
  const dLat = lat2 - lat1;
  const dLon = lon2 - lon1;
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_MILES * Math.asin(Math.sqrt(Math.min(1, h)));
}

export function isValidLatitude(lat: number): boolean {
  return Number.isFinite(lat) && lat >= -90 && lat <= 90;
}

export function isValidLongitude(lon: number): boolean {
  return Number.isFinite(lon) && lon >= -180 && lon <= 180;
}

export function isValidPoint(point: Point): boolean {
  return isValidLatitude(point[0]) && isValidLongitude(point[1]);
}
