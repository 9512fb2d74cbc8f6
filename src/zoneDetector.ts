import { toCoordinate } from "./coordinate.js";
import { distanceKm } from "./distance.js";
import { contains, isPointInBoundingBox } from "./geo.js";
import type { DeliveryZone, LatLng, Town, ZoneDetectionResult } from "./types.js";
import type { ZoneStore } from "./zoneStore.js";

export const DEFAULT_NOT_FOUND_MESSAGE = "We don't deliver to this area yet, but we're expanding soon!";

export interface ZoneDetectorOptions {
  notFoundMessage?: string;
  defaultState: string; // used for towns whose zone has no state of its own
}

export interface NearestZone {
  zone: DeliveryZone;
  distanceKm: number; // to the zone's centroid
}

export function townFromZone(zone: DeliveryZone, defaultState: string): Town {
  return {
    id: zone.id,
    name: zone.name,
    state: zone.state ?? defaultState,
    deliveryFee: zone.deliveryFee,
    minOrderAmount: zone.minOrderAmount,
    estimatedDeliveryTime: zone.estimatedDeliveryTime,
    isActive: zone.isActive,
  };
}

/**
 * Answers "which zone is this point in" against whatever snapshot the store
 * holds at call time. Never mutates the store.
 */
export class ZoneDetector {
  private readonly notFoundMessage: string;
  private readonly defaultState: string;

  constructor(
    private readonly store: ZoneStore,
    options: ZoneDetectorOptions
  ) {
    this.notFoundMessage = options.notFoundMessage ?? DEFAULT_NOT_FOUND_MESSAGE;
    this.defaultState = options.defaultState;
  }

  /**
   * First active zone, in store order, whose boundary contains the point.
   * @throws InvalidCoordinateError when the point is out of range
   */
  detectZone(point: LatLng): ZoneDetectionResult {
    const coordinates = toCoordinate(point);

    for (const zone of this.store.activeZones()) {
      if (!isPointInBoundingBox(coordinates, zone.bounds)) continue;
      if (contains(coordinates, zone.boundary)) {
        return { status: "found", zone, town: townFromZone(zone, this.defaultState), coordinates };
      }
    }

    console.log(`No delivery zone at ${coordinates.lat},${coordinates.lng}`);
    return { status: "not_found", coordinates, message: this.notFoundMessage };
  }

  nearestZone(point: LatLng): NearestZone | null {
    const coordinates = toCoordinate(point);
    let nearest: NearestZone | null = null;

    for (const zone of this.store.activeZones()) {
      const d = distanceKm(coordinates, zone.center);
      // strict < keeps the earlier zone on ties
      if (!nearest || d < nearest.distanceKm) {
        nearest = { zone, distanceKm: d };
      }
    }

    return nearest;
  }

  findClosestZone(point: LatLng): DeliveryZone | null {
    return this.nearestZone(point)?.zone ?? null;
  }

  isDeliveryAvailable(point: LatLng): boolean {
    return this.detectZone(point).status === "found";
  }
}
