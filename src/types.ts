/** Unvalidated latitude/longitude pair as authored or read off the wire */
export interface LatLng {
  lat: number;
  lng: number;
}

/** Range-checked, frozen coordinate, only built through `coordinate()` */
export type Coordinate = Readonly<LatLng>;

/** Ordered ring of vertices; treated as closed whether or not the first vertex is repeated */
export type PolygonBoundary = readonly Coordinate[];

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

export interface DeliveryZone {
  id: string;
  name: string;
  zoneNumber: number; // display / ordering ordinal
  boundary: PolygonBoundary;
  isActive: boolean;
  deliveryFee: number;
  minOrderAmount: number;
  estimatedDeliveryTime: string; // free text, e.g. "30-45 mins"
  state?: string;
  description?: string;
  // derived from boundary when the zone is built
  bounds: BoundingBox;
  center: Coordinate;
}

/** Presentation projection of a matched zone */
export interface Town {
  id: string;
  name: string;
  state: string;
  deliveryFee: number;
  minOrderAmount: number;
  estimatedDeliveryTime: string;
  isActive: boolean;
}

export type ZoneDetectionResult =
  | { status: "found"; zone: DeliveryZone; town: Town; coordinates: Coordinate }
  | { status: "not_found"; coordinates: Coordinate; message: string };

export type ViolationCode = "too_few_vertices" | "invalid_coordinate" | "outside_region" | "invalid_field";

export interface Violation {
  code: ViolationCode;
  message: string;
  index?: number; // vertex index, when the violation is about one vertex
}

export interface ValidationReport {
  valid: boolean;
  violations: Violation[];
  warnings: string[];
  vertexCount: number;
  boundary?: PolygonBoundary; // only present when valid
}
