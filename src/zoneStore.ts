import { NotFoundError } from "./errors.js";
import type { DeliveryZone } from "./types.js";

export interface ZoneSnapshot {
  readonly version: number;
  readonly refreshedAt: number; // epoch ms
  readonly zones: readonly DeliveryZone[];
  readonly active: readonly DeliveryZone[]; // sorted by zoneNumber, then id
  readonly byId: ReadonlyMap<string, DeliveryZone>;
}

export function compareZones(a: DeliveryZone, b: DeliveryZone): number {
  if (a.zoneNumber !== b.zoneNumber) return a.zoneNumber - b.zoneNumber;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

function buildSnapshot(zones: readonly DeliveryZone[], version: number): ZoneSnapshot {
  const all = Object.freeze([...zones]);
  const active = Object.freeze(all.filter((z) => z.isActive).sort(compareZones));

  return Object.freeze({
    version,
    refreshedAt: Date.now(),
    zones: all,
    active,
    byId: new Map(all.map((z) => [z.id, z])),
  });
}

/**
 * Holds the zone set used for detection. `refresh` swaps in a whole new
 * frozen snapshot, so anyone holding the previous one keeps a complete view.
 */
export class ZoneStore {
  private current: ZoneSnapshot;

  constructor(zones: readonly DeliveryZone[] = []) {
    this.current = buildSnapshot(zones, 0);
  }

  snapshot(): ZoneSnapshot {
    return this.current;
  }

  activeZones(): readonly DeliveryZone[] {
    return this.current.active;
  }

  /**
   * @throws NotFoundError
   */
  zoneById(id: string): DeliveryZone {
    const zone = this.current.byId.get(id);
    if (!zone) throw new NotFoundError("Zone", id);
    return zone;
  }

  /** Empty or all-inactive lists are fine; detection then never matches */
  refresh(zones: readonly DeliveryZone[]): ZoneSnapshot {
    const next = buildSnapshot(zones, this.current.version + 1);
    this.current = next;
    return next;
  }
}
