import type { LatLng } from "../types.js";

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string" || value.trim() === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Reads `lat` / `lng` query parameters. Only checks that both are numbers;
 * range is left to the detector so it can answer with the exact field.
 */
export function parseCoordinateQuery(lat: unknown, lng: unknown): LatLng | null {
  const la = toNumber(lat);
  const ln = toNumber(lng);
  if (la === null || ln === null) return null;
  return { lat: la, lng: ln };
}
