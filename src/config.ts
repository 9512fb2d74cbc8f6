import dotenv from "dotenv";
import { DEFAULT_NOT_FOUND_MESSAGE } from "./zoneDetector.js";
import { parseRegionBounds } from "./utils/regionBounds.js";

dotenv.config();

const allowedRegionRaw = process.env.ALLOWED_REGION ?? "20,30,85,100";
const allowedRegion = parseRegionBounds(allowedRegionRaw);
if (!allowedRegion) {
  console.warn(`Ignoring invalid ALLOWED_REGION "${allowedRegionRaw}"; boundaries won't be region-checked`);
}

export const config = {
  port: Number(process.env.PORT ?? 3000),
  dbPath: process.env.DB_PATH || "data/zones.db",
  zoneSyncMs: Number(process.env.ZONE_SYNC_MS ?? 60000),
  // Rough box around the service area; catches boundaries authored as lat,lng instead of lng,lat
  allowedRegion: allowedRegion ?? undefined,
  defaultState: process.env.DEFAULT_STATE || "Meghalaya",
  notFoundMessage: process.env.NOT_FOUND_MESSAGE || DEFAULT_NOT_FOUND_MESSAGE,
};
