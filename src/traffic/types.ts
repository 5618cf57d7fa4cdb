export type ZoneId = string;

export type Heading = "N" | "S" | "E" | "W";

export type TurnDirection = "left" | "right" | "straight";

export type LightPhase = "NS_GREEN" | "EW_GREEN";

export type DespawnReason = "boundary" | "turn_complete";

export interface TurnWeights {
  straight: number;
  left: number;
  right: number;
}

export interface Vehicle {
  id: string;
  heading: Heading;
  offset: number;
  speed: number;
  turn?: TurnDirection;
  turned: boolean;
}

export interface TrafficLight {
  id: string;
  phase: LightPhase;
  elapsed: number;
  cycleLength: number;
}

export interface VehicleState {
  id: string;
  heading: Heading;
  offset: number;
  speed: number;
  turn: TurnDirection | null;
  turned: boolean;
  x: number;
  y: number;
}

export interface LightState {
  id: string;
  phase: LightPhase;
  elapsed: number;
  cycleLength: number;
  x: number;
  y: number;
}

export interface ZoneCounters {
  active: number;
  spawned: number;
  despawned: number;
}

export interface ZoneSnapshot {
  readonly zoneId: ZoneId;
  readonly step: number;
  readonly vehicles: readonly VehicleState[];
  readonly lights: readonly LightState[];
  readonly counters: ZoneCounters;
}

export interface ZoneSettings {
  zoneSize: number;
  roadWidth: number;
  vehicleSpeed: number;
  minGap: number;
  decisionDistance: number;
  turnExitDistance: number;
  spawnProbability: number;
  spawnIntervalSteps?: number;
  maxVehicles: number;
  initialVehicles: number;
  lightCycleSteps: number;
  initialPhase: LightPhase;
  turnWeights: TurnWeights;
  entries: Heading[];
  seed?: number;
}
