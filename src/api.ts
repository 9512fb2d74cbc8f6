import { randomUUID } from "crypto";
import { Router, Request, Response } from "express";
import { z } from "zod";

import { describeBoundary, findOverlaps, parseBoundary, validateBoundary } from "./boundary.js";
import type { Db } from "./db.js";
import { InvalidCoordinateError, MalformedBoundaryError, NotFoundError, ZoneValidationError } from "./errors.js";
import type { BoundingBox, DeliveryZone, LatLng } from "./types.js";
import { parseCoordinateQuery } from "./utils/coordinateQuery.js";
import type { ZoneDetector } from "./zoneDetector.js";
import { latLngSchema, zoneFromRecord, type ZoneRecord } from "./zoneRecord.js";
import { getZoneRecord, insertZone, updateZone, deactivateZone, type ZoneUpdate } from "./zoneRepository.js";
import type { ZoneStore } from "./zoneStore.js";
import { syncZones } from "./zoneSync.js";

export interface ApiDeps {
  db: Db;
  store: ZoneStore;
  detector: ZoneDetector;
  allowedRegion?: BoundingBox;
}

// GeoJSON positions are [lng, lat, (alt)]
const featureCollectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z
    .array(
      z.object({
        geometry: z.object({
          type: z.literal("Polygon"),
          coordinates: z.array(z.array(z.tuple([z.number(), z.number()]).rest(z.number()))).min(1),
        }),
      })
    )
    .min(1),
});

// KML coordinates text, a {lat, lng} list, or a GeoJSON FeatureCollection
const boundaryInputSchema = z.union([z.string(), z.array(latLngSchema), featureCollectionSchema]);

type BoundaryInput = z.infer<typeof boundaryInputSchema>;

const createZoneSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  zoneNumber: z.number().int(),
  boundary: boundaryInputSchema,
  isActive: z.boolean().default(true),
  deliveryFee: z.number().nonnegative().default(25),
  minOrderAmount: z.number().nonnegative().default(200),
  estimatedDeliveryTime: z.string().default("30-45 mins"),
  state: z.string().optional(),
  description: z.string().optional(),
});

const updateZoneSchema = createZoneSchema.omit({ id: true }).partial();

const describeSchema = z.object({ boundary: boundaryInputSchema });

/** @throws MalformedBoundaryError for unreadable KML text */
function toPoints(input: BoundaryInput): LatLng[] {
  if (typeof input === "string") return parseBoundary(input);
  if (Array.isArray(input)) return input;
  return input.features[0].geometry.coordinates[0].map(([lng, lat]) => ({ lat, lng }));
}

function summarize(zone: DeliveryZone) {
  return {
    id: zone.id,
    name: zone.name,
    zoneNumber: zone.zoneNumber,
    state: zone.state ?? null,
    deliveryFee: zone.deliveryFee,
    minOrderAmount: zone.minOrderAmount,
    estimatedDeliveryTime: zone.estimatedDeliveryTime,
    center: zone.center,
    bounds: zone.bounds,
    vertexCount: zone.boundary.length,
  };
}

function sendError(res: Response, err: unknown, context: string) {
  if (err instanceof InvalidCoordinateError) {
    res.status(400).json({ error: err.message, field: err.field });
  } else if (err instanceof MalformedBoundaryError) {
    res.status(400).json({ error: err.message, token: err.token, position: err.position });
  } else if (err instanceof NotFoundError) {
    res.status(404).json({ error: err.message });
  } else if (err instanceof ZoneValidationError) {
    res.status(422).json({ error: err.message, violations: err.violations });
  } else {
    console.error(`Error ${context}:`, err);
    res.status(500).json({ error: `Failed ${context}` });
  }
}

export function createApiRouter({ db, store, detector, allowedRegion }: ApiDeps): Router {
  const router = Router();

  // The write is already committed when this runs, so a bad record elsewhere
  // is reported next to the saved zone instead of failing the request
  const refreshAfterWrite = (): string | null => {
    try {
      syncZones(db, store);
      return null;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error("Zone saved but store refresh failed:", message);
      return message;
    }
  };

  const pointFromQuery = (req: Request, res: Response): LatLng | null => {
    const point = parseCoordinateQuery(req.query.lat, req.query.lng);
    if (!point) {
      res.status(400).json({ error: "lat and lng query parameters must be numbers" });
    }
    return point;
  };

  // ---------- detection ----------
  router.get("/zones", (_req: Request, res: Response) => {
    res.json(store.activeZones().map(summarize));
  });

  router.get("/zones/detect", (req: Request, res: Response) => {
    const point = pointFromQuery(req, res);
    if (!point) return;

    try {
      res.json(detector.detectZone(point));
    } catch (err) {
      sendError(res, err, "detecting zone");
    }
  });

  router.get("/zones/closest", (req: Request, res: Response) => {
    const point = pointFromQuery(req, res);
    if (!point) return;

    try {
      const nearest = detector.nearestZone(point);
      if (!nearest) {
        res.status(404).json({ error: "No active zones" });
        return;
      }
      res.json({ zone: summarize(nearest.zone), distanceKm: nearest.distanceKm });
    } catch (err) {
      sendError(res, err, "finding closest zone");
    }
  });

  router.get("/zones/available", (req: Request, res: Response) => {
    const point = pointFromQuery(req, res);
    if (!point) return;

    try {
      res.json({ available: detector.isDeliveryAvailable(point) });
    } catch (err) {
      sendError(res, err, "checking availability");
    }
  });

  router.get("/zones/:id", (req: Request, res: Response) => {
    try {
      res.json(store.zoneById(req.params.id));
    } catch (err) {
      sendError(res, err, "fetching zone");
    }
  });

  // ---------- admin ----------
  router.post("/admin/boundaries/describe", (req: Request, res: Response) => {
    const parsed = describeSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid payload", issues: parsed.error.issues });
      return;
    }

    try {
      const points = toPoints(parsed.data.boundary);
      res.json(describeBoundary(points, allowedRegion, store.activeZones()));
    } catch (err) {
      sendError(res, err, "describing boundary");
    }
  });

  router.post("/admin/zones", (req: Request, res: Response) => {
    const parsed = createZoneSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid payload", issues: parsed.error.issues });
      return;
    }
    const body = parsed.data;

    try {
      const report = validateBoundary(toPoints(body.boundary), allowedRegion);
      if (!report.boundary) {
        res.status(422).json({ error: "Boundary failed validation", report });
        return;
      }

      const id = body.id ?? randomUUID();
      if (getZoneRecord(db, id)) {
        res.status(409).json({ error: `Zone ${id} already exists` });
        return;
      }

      const record: ZoneRecord = {
        id,
        name: body.name,
        zone_number: body.zoneNumber,
        is_active: body.isActive,
        boundary_coordinates: report.boundary.map(({ lat, lng }) => ({ lat, lng })),
        delivery_fee: body.deliveryFee,
        min_order_amount: body.minOrderAmount,
        estimated_delivery_time: body.estimatedDeliveryTime,
        state: body.state ?? null,
        description: body.description ?? null,
      };
      insertZone(db, record);
      const syncError = refreshAfterWrite();

      const zone = syncError ? zoneFromRecord(record) : store.zoneById(id);
      const overlaps = findOverlaps(
        zone.boundary,
        store.activeZones().filter((z) => z.id !== id)
      );
      if (overlaps.length > 0) {
        console.warn(`Zone ${id} overlaps ${overlaps.join(", ")}; the lower zone number wins detection`);
      }

      res.status(201).json({ zone, warnings: report.warnings, overlaps, ...(syncError ? { syncError } : {}) });
    } catch (err) {
      sendError(res, err, "creating zone");
    }
  });

  router.patch("/admin/zones/:id", (req: Request, res: Response) => {
    const parsed = updateZoneSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid payload", issues: parsed.error.issues });
      return;
    }
    const body = parsed.data;
    const { id } = req.params;

    try {
      const updates: ZoneUpdate = {
        name: body.name,
        zone_number: body.zoneNumber,
        is_active: body.isActive,
        delivery_fee: body.deliveryFee,
        min_order_amount: body.minOrderAmount,
        estimated_delivery_time: body.estimatedDeliveryTime,
        state: body.state,
        description: body.description,
      };

      if (body.boundary !== undefined) {
        const report = validateBoundary(toPoints(body.boundary), allowedRegion);
        if (!report.boundary) {
          res.status(422).json({ error: "Boundary failed validation", report });
          return;
        }
        updates.boundary_coordinates = report.boundary.map(({ lat, lng }) => ({ lat, lng }));
      }

      if (!updateZone(db, id, updates)) {
        throw new NotFoundError("Zone", id);
      }
      const syncError = refreshAfterWrite();
      if (syncError) {
        res.json({ ...zoneFromRecord(getZoneRecord(db, id)), syncError });
        return;
      }
      res.json(store.zoneById(id));
    } catch (err) {
      sendError(res, err, "updating zone");
    }
  });

  router.delete("/admin/zones/:id", (req: Request, res: Response) => {
    const { id } = req.params;

    try {
      if (!deactivateZone(db, id)) {
        throw new NotFoundError("Zone", id);
      }
      refreshAfterWrite();
      res.status(204).send();
    } catch (err) {
      sendError(res, err, "deactivating zone");
    }
  });

  router.post("/admin/zones/refresh", (_req: Request, res: Response) => {
    try {
      const snapshot = syncZones(db, store);
      res.json({ version: snapshot.version, active: snapshot.active.length, total: snapshot.zones.length });
    } catch (err) {
      sendError(res, err, "refreshing zones");
    }
  });

  return router;
}
