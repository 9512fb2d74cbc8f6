import { zoneFromRecord, type ZoneRecord } from "../zoneRecord.js";
import type { DeliveryZone } from "../types.js";

/** Axis-aligned square record with its south-west corner at (south, west) */
export function squareRecord(
  id: string,
  zoneNumber: number,
  south: number,
  west: number,
  size = 1,
  overrides: Partial<ZoneRecord> = {}
): ZoneRecord {
  return {
    id,
    name: `Zone ${id}`,
    zone_number: zoneNumber,
    is_active: true,
    boundary_coordinates: [
      { lat: south, lng: west },
      { lat: south, lng: west + size },
      { lat: south + size, lng: west + size },
      { lat: south + size, lng: west },
    ],
    delivery_fee: 25,
    min_order_amount: 200,
    estimated_delivery_time: "30-45 mins",
    ...overrides,
  };
}

export function squareZone(
  id: string,
  zoneNumber: number,
  south: number,
  west: number,
  size = 1,
  overrides: Partial<ZoneRecord> = {}
): DeliveryZone {
  return zoneFromRecord(squareRecord(id, zoneNumber, south, west, size, overrides));
}

export const KML_SQUARE = "90.0,25.0,0 90.0,25.1,0 90.1,25.1,0 90.1,25.0,0 90.0,25.0,0";
