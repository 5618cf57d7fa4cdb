import { buildGlobalSnapshot } from "../master/coordinator";
import type { GlobalSnapshot } from "../protocol/types";
import type { VehicleState, ZoneId, ZoneSnapshot } from "../traffic/types";

export function zoneSnapshot(zoneId: ZoneId, step: number, active = 0): ZoneSnapshot {
  const vehicles: VehicleState[] = Array.from({ length: active }, (_, index): VehicleState => ({
    id: `${zoneId}-${index + 1}`,
    heading: "E",
    offset: index * 10,
    speed: 7,
    turn: null,
    turned: false,
    x: index * 10,
    y: 105
  }));
  return {
    zoneId,
    step,
    vehicles,
    lights: [{ id: `${zoneId}-center`, phase: "NS_GREEN", elapsed: 0, cycleLength: 4, x: 100, y: 100 }],
    counters: { active, spawned: 0, despawned: 0 }
  };
}

export function globalSnapshot(step: number, activeVehicles = 0): GlobalSnapshot {
  const reports = new Map<ZoneId, ZoneSnapshot>();
  if (activeVehicles > 0) {
    reports.set("North", zoneSnapshot("North", step, activeVehicles));
  }
  return buildGlobalSnapshot({ step, reports, missing: [], stale: [], settledAt: 0, durationMs: 0 });
}
