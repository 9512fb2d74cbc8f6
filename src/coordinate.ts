import { InvalidCoordinateError } from "./errors.js";
import type { Coordinate, LatLng, PolygonBoundary } from "./types.js";

export function isValidLatitude(lat: number): boolean {
  return Number.isFinite(lat) && lat >= -90 && lat <= 90;
}

export function isValidLongitude(lng: number): boolean {
  return Number.isFinite(lng) && lng >= -180 && lng <= 180;
}

/**
 * Build a frozen coordinate, rejecting anything outside -90..90 / -180..180.
 * @throws InvalidCoordinateError
 */
export function coordinate(lat: number, lng: number): Coordinate {
  if (!isValidLatitude(lat)) throw new InvalidCoordinateError("lat", lat);
  if (!isValidLongitude(lng)) throw new InvalidCoordinateError("lng", lng);
  return Object.freeze({ lat, lng });
}

export function toCoordinate(point: LatLng): Coordinate {
  return coordinate(point.lat, point.lng);
}

export function coordinatesEqual(a: LatLng, b: LatLng, epsilon = 0): boolean {
  return Math.abs(a.lat - b.lat) <= epsilon && Math.abs(a.lng - b.lng) <= epsilon;
}

/** Vertex list with a repeated closing vertex dropped */
export function openRing<T extends LatLng>(boundary: readonly T[]): readonly T[] {
  if (boundary.length > 1 && coordinatesEqual(boundary[0], boundary[boundary.length - 1])) {
    return boundary.slice(0, -1);
  }
  return boundary;
}

/**
 * Arithmetic mean of the ring's vertices. Not the geometric centroid, but
 * good enough for ranking zones by distance.
 */
export function centroid(boundary: PolygonBoundary): Coordinate {
  const ring = openRing(boundary);
  if (ring.length === 0) {
    throw new Error("Cannot take the centroid of an empty boundary");
  }

  let sumLat = 0;
  let sumLng = 0;
  for (const { lat, lng } of ring) {
    sumLat += lat;
    sumLng += lng;
  }

  return coordinate(sumLat / ring.length, sumLng / ring.length);
}
