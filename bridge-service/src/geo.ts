import type { GeoPoint, HomeState } from './types.js';

export const EARTH_RADIUS_M = 6_372_800;
export const HOME_RADIUS_M = 100;

const toRad = (deg: number) => (deg * Math.PI) / 180;

/** Great-circle distance in metres between two points in decimal degrees. */
export function haversine(a: GeoPoint, b: GeoPoint): number {
  const phi1 = toRad(a.lat);
  const phi2 = toRad(b.lat);
  const dPhi = toRad(b.lat - a.lat);
  const dLambda = toRad(b.lng - a.lng);
  const h =
    Math.sin(dPhi / 2) ** 2 +
    Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;
  return 2 * EARTH_RADIUS_M * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Geofence check. Without a configured home the vehicle is always reported as home.
 */
export function classify(home: GeoPoint | null, point: GeoPoint): HomeState {
  if (!home) return 'home';
  return haversine(home, point) > HOME_RADIUS_M ? 'not_home' : 'home';
}
