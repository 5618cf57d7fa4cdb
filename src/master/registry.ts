import { RegistrationConflictError } from "../errors";
import type { ZoneId } from "../traffic/types";

export type WorkerStatus = "Registered" | "Reporting" | "Stale" | "Removed";

export interface WorkerRecord {
  readonly recordId: string;
  readonly zoneId: ZoneId;
  readonly workerId: string | null;
  readonly address: string;
  readonly registeredAt: number;
  lastSeen: number;
  status: WorkerStatus;
  lastStep: number | null;
  vehicleCount: number;
}

export interface RegistryOptions {
  clock?: () => number;
}

const LIVE_STATUSES: ReadonlySet<WorkerStatus> = new Set(["Registered", "Reporting"]);

export function isLive(record: WorkerRecord): boolean {
  return LIVE_STATUSES.has(record.status);
}

/**
 * WorkerRecords keyed by zone id. Every mutation is a synchronous method, so a
 * zone's record is never observed half-updated; different zones share nothing
 * but the map.
 */
export class Registry {
  private clock: () => number;
  private records: Map<ZoneId, WorkerRecord>;
  private generation: number;

  constructor(options: RegistryOptions = {}) {
    this.clock = options.clock ?? (() => Date.now());
    this.records = new Map();
    this.generation = 0;
  }

  register(zoneId: ZoneId, address: string, workerId?: string): WorkerRecord {
    const existing = this.records.get(zoneId);
    if (existing && isLive(existing)) {
      throw new RegistrationConflictError(zoneId);
    }
    if (existing) {
      existing.status = "Removed";
    }
    const now = this.clock();
    this.generation += 1;
    const record: WorkerRecord = {
      recordId: `${zoneId}#${this.generation}`,
      zoneId,
      workerId: workerId ?? null,
      address,
      registeredAt: now,
      lastSeen: now,
      status: "Registered",
      lastStep: null,
      vehicleCount: 0
    };
    this.records.set(zoneId, record);
    return record;
  }

  /** Liveness bookkeeping only; a Stale record stays Stale until re-registration. */
  touch(zoneId: ZoneId): WorkerRecord | undefined {
    const record = this.records.get(zoneId);
    if (!record) {
      return undefined;
    }
    record.lastSeen = this.clock();
    if (record.status === "Registered") {
      record.status = "Reporting";
    }
    return record;
  }

  recordReport(zoneId: ZoneId, step: number, vehicleCount: number): void {
    const record = this.records.get(zoneId);
    if (!record || !isLive(record)) {
      return;
    }
    if (record.lastStep === null || step > record.lastStep) {
      record.lastStep = step;
      record.vehicleCount = vehicleCount;
    }
  }

  sweep(now: number, timeoutMs: number): Set<ZoneId> {
    const changed = new Set<ZoneId>();
    for (const record of this.records.values()) {
      if (isLive(record) && now - record.lastSeen > timeoutMs) {
        record.status = "Stale";
        changed.add(record.zoneId);
      }
    }
    return changed;
  }

  /**
   * Marks one record Stale regardless of timestamps. With `recordId`, only that
   * registration is affected, so a zone that re-registered meanwhile stays live.
   */
  markStale(zoneId: ZoneId, recordId?: string): boolean {
    const record = this.records.get(zoneId);
    if (!record || !isLive(record) || (recordId !== undefined && record.recordId !== recordId)) {
      return false;
    }
    record.status = "Stale";
    return true;
  }

  remove(zoneId: ZoneId): WorkerRecord | undefined {
    const record = this.records.get(zoneId);
    if (!record) {
      return undefined;
    }
    record.status = "Removed";
    this.records.delete(zoneId);
    return record;
  }

  get(zoneId: ZoneId): WorkerRecord | undefined {
    return this.records.get(zoneId);
  }

  liveZones(): Set<ZoneId> {
    const zones = new Set<ZoneId>();
    for (const record of this.records.values()) {
      if (isLive(record)) {
        zones.add(record.zoneId);
      }
    }
    return zones;
  }

  list(): WorkerRecord[] {
    return Array.from(this.records.values(), (record) => ({ ...record }));
  }
}
