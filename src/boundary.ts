import { centroid, coordinate, isValidLatitude, isValidLongitude, openRing } from "./coordinate.js";
import { MalformedBoundaryError } from "./errors.js";
import { contains } from "./geo.js";
import type { BoundingBox, Coordinate, DeliveryZone, LatLng, PolygonBoundary, ValidationReport, Violation } from "./types.js";

/** Kilometres per degree used by `approximateAreaKm2` */
export const KM_PER_DEGREE = 111.32;

/** Two vertices closer than this (degrees, per axis) count as the same point when checking closure */
export const CLOSURE_EPSILON = 0.0001;

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function parseNumber(part: string): number | null {
  if (!NUMBER_PATTERN.test(part)) return null;
  const value = Number(part);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parses the `coordinates` text of a KML export: whitespace-separated
 * `longitude,latitude[,altitude]` tuples. Altitude is ignored.
 *
 * Values are not range-checked here; `validateBoundary` does that so every
 * problem can be reported at once.
 *
 * @throws MalformedBoundaryError on the first token that isn't a coordinate tuple
 */
export function parseBoundary(rawText: string): LatLng[] {
  const text = rawText.trim();
  if (!text) {
    throw new MalformedBoundaryError("", 0, "no coordinates found");
  }

  return text.split(/\s+/).map((token, i) => {
    const parts = token.split(",");
    if (parts.length < 2 || parts.length > 3) {
      throw new MalformedBoundaryError(token, i + 1, "expected longitude,latitude[,altitude]");
    }

    const [lng, lat] = parts.slice(0, 2).map(parseNumber);
    if (lng === null || lat === null) {
      throw new MalformedBoundaryError(token, i + 1, "not a number");
    }
    if (parts.length === 3 && parseNumber(parts[2]) === null) {
      throw new MalformedBoundaryError(token, i + 1, "altitude is not a number");
    }

    return { lat, lng };
  });
}

/** Inverse of `parseBoundary`, writing a zero altitude */
export function serializeBoundary(boundary: readonly LatLng[]): string {
  return boundary.map(({ lat, lng }) => `${lng},${lat},0`).join(" ");
}

export function isClosed(boundary: readonly LatLng[]): boolean {
  if (boundary.length < 2) return false;
  const first = boundary[0];
  const last = boundary[boundary.length - 1];
  return Math.abs(first.lat - last.lat) < CLOSURE_EPSILON && Math.abs(first.lng - last.lng) < CLOSURE_EPSILON;
}

export function closeBoundary<T extends LatLng>(boundary: readonly T[]): T[] {
  if (boundary.length === 0 || isClosed(boundary)) return [...boundary];
  return [...boundary, boundary[0]];
}

export function boundingBox(boundary: readonly LatLng[]): BoundingBox {
  if (boundary.length === 0) {
    return { minLat: 0, maxLat: 0, minLng: 0, maxLng: 0 };
  }

  const box = {
    minLat: boundary[0].lat,
    maxLat: boundary[0].lat,
    minLng: boundary[0].lng,
    maxLng: boundary[0].lng,
  };
  for (const { lat, lng } of boundary) {
    if (lat < box.minLat) box.minLat = lat;
    if (lat > box.maxLat) box.maxLat = lat;
    if (lng < box.minLng) box.minLng = lng;
    if (lng > box.maxLng) box.maxLng = lng;
  }
  return box;
}

/**
 * Shoelace area of the ring in degree², scaled by a fixed 111.32 km per degree
 * on both axes.
 *
 * This ignores that a degree of longitude shrinks with latitude and ignores
 * Earth's curvature altogether, so it overstates area away from the equator.
 * Use it to sanity-check the size of a zone, never for billing.
 */
export function approximateAreaKm2(boundary: readonly LatLng[]): number {
  const ring = openRing(boundary);
  if (ring.length < 3) return 0;

  let area = 0;
  for (let i = 0; i < ring.length; i++) {
    const j = (i + 1) % ring.length;
    area += ring[i].lng * ring[j].lat;
    area -= ring[j].lng * ring[i].lat;
  }

  return (Math.abs(area) / 2) * KM_PER_DEGREE * KM_PER_DEGREE;
}

function boxesIntersect(a: BoundingBox, b: BoundingBox): boolean {
  return a.minLat <= b.maxLat && b.minLat <= a.maxLat && a.minLng <= b.maxLng && b.minLng <= a.maxLng;
}

// A closing vertex within CLOSURE_EPSILON of the first doesn't count
function distinctVertexCount(points: readonly LatLng[]): number {
  const ring = isClosed(points) ? points.slice(0, -1) : points;
  return new Set(ring.map(({ lat, lng }) => `${lat},${lng}`)).size;
}

/**
 * Checks vertex count and per-vertex range, plus the allowed region when one
 * is given. Every violation is reported, not just the first; `boundary` is
 * only set on a valid report.
 */
export function validateBoundary(points: readonly LatLng[], allowedRegion?: BoundingBox): ValidationReport {
  const violations: Violation[] = [];
  const warnings: string[] = [];

  const distinct = distinctVertexCount(points);
  if (distinct < 3) {
    violations.push({
      code: "too_few_vertices",
      message: `Boundary needs at least 3 distinct vertices, got ${distinct}`,
    });
  }

  points.forEach((point, index) => {
    if (!isValidLatitude(point.lat) || !isValidLongitude(point.lng)) {
      violations.push({
        code: "invalid_coordinate",
        index,
        message: `Vertex ${index} (${point.lat}, ${point.lng}) is outside -90..90 / -180..180`,
      });
      return;
    }

    if (
      allowedRegion &&
      (point.lat < allowedRegion.minLat ||
        point.lat > allowedRegion.maxLat ||
        point.lng < allowedRegion.minLng ||
        point.lng > allowedRegion.maxLng)
    ) {
      violations.push({
        code: "outside_region",
        index,
        message: `Vertex ${index} (${point.lat}, ${point.lng}) is outside the allowed region`,
      });
    }
  });

  if (points.length >= 3 && !isClosed(points)) {
    warnings.push("Boundary is not closed; the last vertex will be joined to the first");
  }

  const report: ValidationReport = {
    valid: violations.length === 0,
    violations,
    warnings,
    vertexCount: points.length,
  };

  if (report.valid) {
    report.boundary = Object.freeze(points.map((p) => coordinate(p.lat, p.lng)));
  }

  return report;
}

/**
 * Ids of zones that share area with the boundary. Compares bounding boxes
 * first, then looks for a vertex of either ring inside the other; two rings
 * crossing like a plus sign with no vertex inside each other are missed.
 */
export function findOverlaps(boundary: PolygonBoundary, zones: readonly DeliveryZone[]): string[] {
  const box = boundingBox(boundary);
  const overlapping: string[] = [];

  for (const zone of zones) {
    if (!boxesIntersect(box, zone.bounds)) continue;

    const shared =
      boundary.some((vertex) => contains(vertex, zone.boundary)) ||
      zone.boundary.some((vertex) => contains(vertex, boundary));
    if (shared) overlapping.push(zone.id);
  }

  return overlapping;
}

export interface BoundaryDiagnostics {
  report: ValidationReport;
  bounds: BoundingBox;
  areaKm2: number;
  closed: boolean;
  center: Coordinate | null;
  overlaps: string[];
}

/** Everything an administrator wants to see about a boundary before publishing it */
export function describeBoundary(
  points: readonly LatLng[],
  allowedRegion: BoundingBox | undefined,
  zones: readonly DeliveryZone[]
): BoundaryDiagnostics {
  const report = validateBoundary(points, allowedRegion);

  return {
    report,
    bounds: boundingBox(points),
    areaKm2: approximateAreaKm2(points),
    closed: isClosed(points),
    center: report.boundary ? centroid(report.boundary) : null,
    overlaps: report.boundary ? findOverlaps(report.boundary, zones) : [],
  };
}
