import { coordinatesEqual, openRing } from "./coordinate.js";
import type { BoundingBox, LatLng } from "./types.js";

function distinctVertexCount(ring: readonly LatLng[]): number {
  const seen = new Set<string>();
  for (const { lat, lng } of ring) seen.add(`${lat},${lng}`);
  return seen.size;
}

// Even-odd ray casting; the ray runs from the point towards increasing longitude.
// Edges with no latitude extent never straddle the point, so horizontal and
// duplicate-vertex edges are skipped; a collinear ring never contains anything.
// On-edge points follow the half-open rule: west/south edges inside, east/north outside.
export function contains(point: LatLng, boundary: readonly LatLng[]): boolean {
  const ring = openRing(boundary);
  if (ring.length < 3 || distinctVertexCount(ring) < 3) return false;

  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    if (coordinatesEqual(ring[i], ring[j])) continue;

    // Same endpoint order for either winding, so the crossing rounds the same way
    const [a, b] = lowerFirst(ring[i], ring[j]);
    const straddles = a.lat > point.lat !== b.lat > point.lat;
    if (straddles && point.lng < ((b.lng - a.lng) * (point.lat - a.lat)) / (b.lat - a.lat) + a.lng) {
      inside = !inside;
    }
  }
  return inside;
}

function lowerFirst(p: LatLng, q: LatLng): [LatLng, LatLng] {
  if (p.lat < q.lat || (p.lat === q.lat && p.lng <= q.lng)) return [p, q];
  return [q, p];
}

export function isPointInBoundingBox(point: LatLng, box: BoundingBox): boolean {
  return point.lat >= box.minLat && point.lat <= box.maxLat && point.lng >= box.minLng && point.lng <= box.maxLng;
}
