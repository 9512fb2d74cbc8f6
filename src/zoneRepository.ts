import type { Db } from "./db.js";
import type { LatLng } from "./types.js";
import type { ZoneRecord } from "./zoneRecord.js";

interface ZoneRow {
  id: string;
  name: string;
  zone_number: number;
  state: string | null;
  boundary: string;
  is_active: number;
  delivery_fee: number;
  min_order_amount: number;
  estimated_delivery_time: string;
  description: string | null;
}

/** A stored record whose boundary hasn't been checked yet */
export type StoredZoneRecord = Omit<ZoneRecord, "boundary_coordinates"> & { boundary_coordinates: unknown };

export type ZoneUpdate = Partial<Omit<ZoneRecord, "id" | "boundary_coordinates">> & {
  boundary_coordinates?: LatLng[];
};

type SqlValue = string | number | null;

const COLUMNS =
  "id, name, zone_number, state, boundary, is_active, delivery_fee, min_order_amount, estimated_delivery_time, description";

function rowToRecord(row: ZoneRow): StoredZoneRecord {
  let boundary: unknown;
  try {
    boundary = JSON.parse(row.boundary);
  } catch {
    boundary = null; // rejected later by zoneFromRecord
  }

  return {
    id: row.id,
    name: row.name,
    zone_number: row.zone_number,
    is_active: row.is_active === 1,
    boundary_coordinates: boundary,
    delivery_fee: row.delivery_fee,
    min_order_amount: row.min_order_amount,
    estimated_delivery_time: row.estimated_delivery_time,
    state: row.state,
    description: row.description,
  };
}

export function getZoneRecords(db: Db): StoredZoneRecord[] {
  return db
    .prepare<[], ZoneRow>(`SELECT ${COLUMNS} FROM zones ORDER BY zone_number, id`)
    .all()
    .map(rowToRecord);
}

export function getZoneRecord(db: Db, id: string): StoredZoneRecord | undefined {
  const row = db.prepare<[string], ZoneRow>(`SELECT ${COLUMNS} FROM zones WHERE id = ?`).get(id);
  return row ? rowToRecord(row) : undefined;
}

export function insertZone(db: Db, record: ZoneRecord): void {
  const now = Date.now();
  db.prepare<Record<string, SqlValue>>(
    `INSERT INTO zones
     (id, name, zone_number, state, boundary, is_active, delivery_fee, min_order_amount, estimated_delivery_time, description, created_at, updated_at)
     VALUES (@id, @name, @zone_number, @state, @boundary, @is_active, @delivery_fee, @min_order_amount, @estimated_delivery_time, @description, @now, @now)`
  ).run({
    id: record.id,
    name: record.name,
    zone_number: record.zone_number,
    state: record.state ?? null,
    boundary: JSON.stringify(record.boundary_coordinates),
    is_active: record.is_active ? 1 : 0,
    delivery_fee: record.delivery_fee,
    min_order_amount: record.min_order_amount,
    estimated_delivery_time: record.estimated_delivery_time,
    description: record.description ?? null,
    now,
  });
}

export function updateZone(db: Db, id: string, updates: ZoneUpdate): boolean {
  const fields: string[] = [];
  const params: Record<string, SqlValue> = { id, updated_at: Date.now() };

  const set = (column: string, value: SqlValue) => {
    fields.push(`${column} = @${column}`);
    params[column] = value;
  };

  if (updates.name !== undefined) set("name", updates.name);
  if (updates.zone_number !== undefined) set("zone_number", updates.zone_number);
  if (updates.state !== undefined) set("state", updates.state);
  if (updates.boundary_coordinates !== undefined) set("boundary", JSON.stringify(updates.boundary_coordinates));
  if (updates.is_active !== undefined) set("is_active", updates.is_active ? 1 : 0);
  if (updates.delivery_fee !== undefined) set("delivery_fee", updates.delivery_fee);
  if (updates.min_order_amount !== undefined) set("min_order_amount", updates.min_order_amount);
  if (updates.estimated_delivery_time !== undefined) set("estimated_delivery_time", updates.estimated_delivery_time);
  if (updates.description !== undefined) set("description", updates.description);

  if (fields.length === 0) {
    return getZoneRecord(db, id) !== undefined;
  }

  fields.push("updated_at = @updated_at");
  const result = db.prepare<Record<string, SqlValue>>(`UPDATE zones SET ${fields.join(", ")} WHERE id = @id`).run(params);
  return result.changes > 0;
}

/** Zones are retired, never deleted */
export function deactivateZone(db: Db, id: string): boolean {
  return updateZone(db, id, { is_active: false });
}
