import type { BoundingBox } from "../types.js";

/**
 * Parses an allowed-region string "minLat,maxLat,minLng,maxLng"
 * (e.g. "20,30,85,100").
 *
 * @returns the box, or null if the string doesn't describe a valid one
 */
export function parseRegionBounds(value: string): BoundingBox | null {
  const parts = value.split(",").map((p) => p.trim());
  if (parts.length !== 4 || parts.some((p) => p === "")) return null;

  const [minLat, maxLat, minLng, maxLng] = parts.map(Number);
  if (![minLat, maxLat, minLng, maxLng].every(Number.isFinite)) return null;
  if (minLat > maxLat || minLng > maxLng) return null;
  if (minLat < -90 || maxLat > 90 || minLng < -180 || maxLng > 180) return null;

  return { minLat, maxLat, minLng, maxLng };
}
