import type { Db } from "./db.js";
import { zoneFromRecord } from "./zoneRecord.js";
import { getZoneRecords } from "./zoneRepository.js";
import type { ZoneSnapshot, ZoneStore } from "./zoneStore.js";

/**
 * Reloads every zone from the table and swaps it into the store.
 * One bad record fails the whole sync and the store keeps its snapshot.
 * @throws ZoneValidationError
 */
export function syncZones(db: Db, store: ZoneStore): ZoneSnapshot {
  const zones = getZoneRecords(db).map(zoneFromRecord);
  const snapshot = store.refresh(zones);
  console.log(`Zone store v${snapshot.version}: ${snapshot.active.length} active of ${snapshot.zones.length} zones`);
  return snapshot;
}

/** Syncs now and then every `intervalMs`; call the returned function to stop */
export function startZoneSync(db: Db, store: ZoneStore, intervalMs: number): () => void {
  const tick = () => {
    try {
      syncZones(db, store);
    } catch (err) {
      console.error("Zone sync failed, keeping previous snapshot:", err instanceof Error ? err.message : err);
    }
  };

  tick();
  const timer = setInterval(tick, intervalMs);
  return () => clearInterval(timer);
}
