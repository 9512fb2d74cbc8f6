import express from "express";
import bodyParser from "body-parser";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createApiRouter } from "../api.js";
import { openDatabase, type Db } from "../db.js";
import type { BoundingBox } from "../types.js";
import { DEFAULT_NOT_FOUND_MESSAGE, ZoneDetector } from "../zoneDetector.js";
import { ZoneStore } from "../zoneStore.js";
import { KML_SQUARE } from "./fixtures.js";

let db: Db;
let store: ZoneStore;

function buildApp(allowedRegion?: BoundingBox) {
  const detector = new ZoneDetector(store, { defaultState: "Meghalaya" });
  const app = express();
  app.use(bodyParser.json());
  app.use(createApiRouter({ db, store, detector, allowedRegion }));
  return app;
}

const tura = {
  id: "tura-1",
  name: "Main Bazaar",
  zoneNumber: 1,
  boundary: KML_SQUARE,
  deliveryFee: 30,
};

beforeEach(() => {
  db = openDatabase(":memory:");
  store = new ZoneStore();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  db.close();
  vi.restoreAllMocks();
});

describe("POST /admin/zones", () => {
  it("creates a zone from KML text and loads it into the store", async () => {
    const res = await request(buildApp()).post("/admin/zones").send(tura).expect(201);

    expect(res.body.zone.id).toBe("tura-1");
    expect(res.body.zone.boundary).toHaveLength(5);
    expect(res.body.zone.deliveryFee).toBe(30);
    expect(res.body.zone.minOrderAmount).toBe(200);
    expect(res.body.zone.estimatedDeliveryTime).toBe("30-45 mins");
    expect(res.body.warnings).toEqual([]);
    expect(res.body.overlaps).toEqual([]);
    expect(store.activeZones().map((z) => z.id)).toEqual(["tura-1"]);
  });

  it("accepts a {lat, lng} list and generates an id", async () => {
    const res = await request(buildApp())
      .post("/admin/zones")
      .send({
        name: "Araimile",
        zoneNumber: 2,
        boundary: [
          { lat: 25.2, lng: 90.2 },
          { lat: 25.2, lng: 90.3 },
          { lat: 25.3, lng: 90.3 },
        ],
      })
      .expect(201);

    expect(typeof res.body.zone.id).toBe("string");
    expect(res.body.zone.id.length).toBeGreaterThan(0);
    expect(res.body.warnings).toEqual(["Boundary is not closed; the last vertex will be joined to the first"]);
  });

  it("reports overlapping zones", async () => {
    const app = buildApp();
    await request(app).post("/admin/zones").send(tura).expect(201);

    const res = await request(app)
      .post("/admin/zones")
      .send({ ...tura, id: "tura-2", zoneNumber: 2, boundary: "90.05,25.05 90.05,25.15 90.15,25.15 90.15,25.05" })
      .expect(201);

    expect(res.body.overlaps).toEqual(["tura-1"]);
  });

  it("rejects a two-point boundary with the validation report", async () => {
    const res = await request(buildApp())
      .post("/admin/zones")
      .send({ ...tura, boundary: "90.0,25.0,0 90.1,25.1,0" })
      .expect(422);

    expect(res.body.report.valid).toBe(false);
    expect(res.body.report.violations[0].code).toBe("too_few_vertices");
    expect(store.activeZones()).toEqual([]);
  });

  it("rejects a boundary outside the allowed region", async () => {
    const res = await request(buildApp({ minLat: 20, maxLat: 30, minLng: 85, maxLng: 100 }))
      .post("/admin/zones")
      .send({ ...tura, boundary: "0,0 1,0 1,1" })
      .expect(422);

    expect(res.body.report.violations.map((v: { code: string }) => v.code)).toEqual([
      "outside_region",
      "outside_region",
      "outside_region",
    ]);
  });

  it("names the bad token in malformed KML", async () => {
    const res = await request(buildApp())
      .post("/admin/zones")
      .send({ ...tura, boundary: "90.0,25.0,0 oops 90.1,25.1,0" })
      .expect(400);

    expect(res.body.token).toBe("oops");
    expect(res.body.position).toBe(2);
  });

  it("rejects invalid payloads and duplicate ids", async () => {
    const app = buildApp();
    await request(app).post("/admin/zones").send({ name: "No boundary", zoneNumber: 1 }).expect(400);
    await request(app).post("/admin/zones").send(tura).expect(201);
    const res = await request(app).post("/admin/zones").send(tura).expect(409);
    expect(res.body.error).toBe("Zone tura-1 already exists");
  });
});

describe("detection routes", () => {
  let app: express.Express;

  beforeEach(async () => {
    app = buildApp();
    await request(app).post("/admin/zones").send(tura).expect(201);
  });

  it("finds the zone for a point inside it", async () => {
    const res = await request(app).get("/zones/detect").query({ lat: 25.05, lng: 90.05 }).expect(200);

    expect(res.body.status).toBe("found");
    expect(res.body.zone.id).toBe("tura-1");
    expect(res.body.town).toEqual({
      id: "tura-1",
      name: "Main Bazaar",
      state: "Meghalaya",
      deliveryFee: 30,
      minOrderAmount: 200,
      estimatedDeliveryTime: "30-45 mins",
      isActive: true,
    });
  });

  it("returns not_found outside every zone", async () => {
    const res = await request(app).get("/zones/detect?lat=25.5&lng=90.5").expect(200);
    expect(res.body).toEqual({
      status: "not_found",
      coordinates: { lat: 25.5, lng: 90.5 },
      message: DEFAULT_NOT_FOUND_MESSAGE,
    });
  });

  it("rejects missing and out-of-range coordinates", async () => {
    await request(app).get("/zones/detect?lat=abc&lng=90").expect(400);
    const res = await request(app).get("/zones/detect?lat=95&lng=90").expect(400);
    expect(res.body.field).toBe("lat");
  });

  it("answers availability", async () => {
    const inside = await request(app).get("/zones/available?lat=25.05&lng=90.05").expect(200);
    const outside = await request(app).get("/zones/available?lat=26&lng=91").expect(200);
    expect(inside.body).toEqual({ available: true });
    expect(outside.body).toEqual({ available: false });
  });

  it("suggests the closest zone", async () => {
    const res = await request(app).get("/zones/closest?lat=25.5&lng=90.5").expect(200);
    expect(res.body.zone.id).toBe("tura-1");
    expect(res.body.distanceKm).toBeGreaterThan(60);
    expect(res.body.distanceKm).toBeLessThan(70);
  });

  it("lists active zones and fetches one by id", async () => {
    const list = await request(app).get("/zones").expect(200);
    expect(list.body).toHaveLength(1);
    expect(list.body[0].id).toBe("tura-1");
    expect(list.body[0].vertexCount).toBe(5);
    expect(list.body[0].bounds).toEqual({ minLat: 25, maxLat: 25.1, minLng: 90, maxLng: 90.1 });

    await request(app).get("/zones/tura-1").expect(200);
    const missing = await request(app).get("/zones/nope").expect(404);
    expect(missing.body.error).toBe("Zone nope not found");
  });
});

describe("zone administration", () => {
  let app: express.Express;

  beforeEach(async () => {
    app = buildApp();
    await request(app).post("/admin/zones").send(tura).expect(201);
  });

  it("updates metadata", async () => {
    const res = await request(app).patch("/admin/zones/tura-1").send({ deliveryFee: 45, state: "Assam" }).expect(200);
    expect(res.body.deliveryFee).toBe(45);
    expect(res.body.state).toBe("Assam");
    expect(res.body.name).toBe("Main Bazaar");
  });

  it("replaces the boundary after validating it", async () => {
    await request(app).patch("/admin/zones/tura-1").send({ boundary: "90,25 90,25.1" }).expect(422);

    await request(app)
      .patch("/admin/zones/tura-1")
      .send({ boundary: "91,26 91,26.1 91.1,26.1 91.1,26 91,26" })
      .expect(200);

    const moved = await request(app).get("/zones/detect?lat=26.05&lng=91.05").expect(200);
    expect(moved.body.status).toBe("found");
  });

  it("deactivates a zone on delete", async () => {
    await request(app).delete("/admin/zones/tura-1").expect(204);

    const detect = await request(app).get("/zones/detect?lat=25.05&lng=90.05").expect(200);
    expect(detect.body.status).toBe("not_found");

    const retired = await request(app).get("/zones/tura-1").expect(200);
    expect(retired.body.isActive).toBe(false);

    await request(app).get("/zones/closest?lat=25.05&lng=90.05").expect(404);
  });

  it("returns 404 for unknown zones", async () => {
    await request(app).patch("/admin/zones/nope").send({ name: "x" }).expect(404);
    await request(app).delete("/admin/zones/nope").expect(404);
  });

  it("refreshes the store on demand", async () => {
    const before = store.snapshot().version;
    const res = await request(app).post("/admin/zones/refresh").expect(200);
    expect(res.body).toEqual({ version: before + 1, active: 1, total: 1 });
  });
});

describe("writes when another stored zone is broken", () => {
  const brokenMessage = "Zone broken is invalid: Boundary needs at least 3 distinct vertices, got 1";

  function insertBrokenRow() {
    db.prepare(
      `INSERT INTO zones (id, name, zone_number, boundary, created_at, updated_at)
       VALUES ('broken', 'Broken', 9, '[{"lat":1,"lng":1}]', 0, 0)`
    ).run();
  }

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("still answers 201 for a saved zone and reports the refresh failure", async () => {
    insertBrokenRow();

    const res = await request(buildApp()).post("/admin/zones").send(tura).expect(201);

    expect(res.body.zone.id).toBe("tura-1");
    expect(res.body.syncError).toBe(brokenMessage);
    expect(store.snapshot().version).toBe(0);
  });

  it("still answers 200 for a saved update and reports the refresh failure", async () => {
    const app = buildApp();
    await request(app).post("/admin/zones").send(tura).expect(201);
    insertBrokenRow();

    const res = await request(app).patch("/admin/zones/tura-1").send({ deliveryFee: 45 }).expect(200);

    expect(res.body.deliveryFee).toBe(45);
    expect(res.body.syncError).toBe(brokenMessage);
    expect(store.zoneById("tura-1").deliveryFee).toBe(30);
  });
});

describe("POST /admin/boundaries/describe", () => {
  it("describes a GeoJSON polygon", async () => {
    const res = await request(buildApp())
      .post("/admin/boundaries/describe")
      .send({
        boundary: {
          type: "FeatureCollection",
          features: [
            {
              type: "Feature",
              properties: {},
              geometry: {
                type: "Polygon",
                coordinates: [
                  [
                    [90, 25],
                    [90, 25.1],
                    [90.1, 25.1],
                    [90.1, 25],
                    [90, 25],
                  ],
                ],
              },
            },
          ],
        },
      })
      .expect(200);

    expect(res.body.report.valid).toBe(true);
    expect(res.body.closed).toBe(true);
    expect(res.body.bounds).toEqual({ minLat: 25, maxLat: 25.1, minLng: 90, maxLng: 90.1 });
    expect(res.body.overlaps).toEqual([]);
  });

  it("rejects a payload without a boundary", async () => {
    await request(buildApp()).post("/admin/boundaries/describe").send({ boundary: 42 }).expect(400);
  });
});
