import { z } from "zod";
import { boundingBox, validateBoundary } from "./boundary.js";
import { centroid } from "./coordinate.js";
import { ZoneValidationError } from "./errors.js";
import type { DeliveryZone, Violation } from "./types.js";

// Range isn't checked here so that validateBoundary can report every bad vertex
export const latLngSchema = z.object({
  lat: z.number(),
  lng: z.number(),
});

/** Zone record as stored and synced (snake_case, boundary as a `{lat, lng}` list) */
export const zoneRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  zone_number: z.number().int(),
  is_active: z.boolean(),
  boundary_coordinates: z.array(latLngSchema),
  delivery_fee: z.number().nonnegative(),
  min_order_amount: z.number().nonnegative(),
  estimated_delivery_time: z.string(),
  state: z.string().nullish(),
  description: z.string().nullish(),
});

export type ZoneRecord = z.infer<typeof zoneRecordSchema>;

/**
 * Turns a wire record into a detection-ready zone, precomputing its bounding
 * box and centroid.
 * @throws ZoneValidationError listing every schema and boundary problem
 */
export function zoneFromRecord(input: unknown): DeliveryZone {
  const parsed = zoneRecordSchema.safeParse(input);
  if (!parsed.success) {
    const id = typeof input === "object" && input !== null && "id" in input ? String(input.id) : "(unknown)";
    const violations: Violation[] = parsed.error.issues.map((issue) => ({
      code: "invalid_field",
      message: `${issue.path.join(".") || "record"}: ${issue.message}`,
    }));
    throw new ZoneValidationError(id, violations);
  }

  const record = parsed.data;
  const report = validateBoundary(record.boundary_coordinates);
  if (!report.boundary) {
    throw new ZoneValidationError(record.id, report.violations);
  }

  return {
    id: record.id,
    name: record.name,
    zoneNumber: record.zone_number,
    boundary: report.boundary,
    isActive: record.is_active,
    deliveryFee: record.delivery_fee,
    minOrderAmount: record.min_order_amount,
    estimatedDeliveryTime: record.estimated_delivery_time,
    state: record.state ?? undefined,
    description: record.description ?? undefined,
    bounds: boundingBox(report.boundary),
    center: centroid(report.boundary),
  };
}

export function zoneToRecord(zone: DeliveryZone): ZoneRecord {
  return {
    id: zone.id,
    name: zone.name,
    zone_number: zone.zoneNumber,
    is_active: zone.isActive,
    boundary_coordinates: zone.boundary.map(({ lat, lng }) => ({ lat, lng })),
    delivery_fee: zone.deliveryFee,
    min_order_amount: zone.minOrderAmount,
    estimated_delivery_time: zone.estimatedDeliveryTime,
    state: zone.state ?? null,
    description: zone.description ?? null,
  };
}
