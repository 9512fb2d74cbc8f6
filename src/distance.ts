import type { LatLng } from "./types.js";

export const EARTH_RADIUS_KM = 6371;

function deg2rad(deg: number): number {
  return deg * (Math.PI / 180);
}

/**
 * Great-circle distance using the haversine formula on a spherical Earth.
 * Off by up to ~0.5% against the ellipsoid, which doesn't matter for
 * ranking zones inside one city.
 */
export function distanceKm(a: LatLng, b: LatLng): number {
  const dLat = deg2rad(b.lat - a.lat);
  const dLng = deg2rad(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(deg2rad(a.lat)) * Math.cos(deg2rad(b.lat)) * Math.sin(dLng / 2) * Math.sin(dLng / 2);
  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}
