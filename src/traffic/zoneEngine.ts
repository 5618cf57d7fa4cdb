import { buildZoneGeometry, HEADINGS, headingAfterTurn, lanePosition, TURN_DIRECTIONS, type ZoneGeometry } from "./geometry";
import { createTrafficLight, isGreenFor, tickLight } from "./lights";
import { createRng, normalizeSeed, pickOne, pickWeighted, seedFromString, type Rng } from "./rng";
import type {
  DespawnReason,
  Heading,
  LightState,
  TrafficLight,
  Vehicle,
  VehicleState,
  ZoneId,
  ZoneSettings,
  ZoneSnapshot
} from "./types";

const INITIAL_PLACEMENT_ATTEMPTS = 20;

type Lanes = Record<Heading, Vehicle[]>;

/**
 * One zone's traffic: vehicles on four approaches to a single signalised
 * intersection. Single owner, advanced one discrete step at a time.
 */
export class ZoneEngine {
  readonly zoneId: ZoneId;
  readonly settings: Readonly<ZoneSettings>;
  private geometry: ZoneGeometry;
  private rng: Rng;
  private light: TrafficLight;
  private vehicles: Vehicle[];
  private nextSeq: number;
  private currentStep: number;
  private ticks: number;

  constructor(zoneId: ZoneId, settings: ZoneSettings, startStep = 0) {
    if (settings.entries.length === 0) {
      throw new Error(`Zone ${zoneId} needs at least one entry heading.`);
    }
    this.zoneId = zoneId;
    this.settings = { ...settings, entries: [...settings.entries], turnWeights: { ...settings.turnWeights } };
    this.geometry = buildZoneGeometry(settings.zoneSize, settings.roadWidth);
    this.rng = createRng(normalizeSeed(settings.seed ?? seedFromString(zoneId)));
    this.light = createTrafficLight(`${zoneId}-center`, settings.lightCycleSteps, settings.initialPhase);
    this.vehicles = [];
    this.nextSeq = 1;
    this.currentStep = startStep;
    this.ticks = 0;
    this.placeInitialVehicles(settings.initialVehicles);
  }

  get step(): number {
    return this.currentStep;
  }

  get activeVehicles(): number {
    return this.vehicles.length;
  }

  /**
   * Computes one tick and labels the snapshot with `step`, which must be ahead
   * of the last computed step. A gap is not replayed: a rejoining zone computes
   * a single tick for the step it was asked for.
   */
  advanceStep(step = this.currentStep + 1): ZoneSnapshot {
    if (!Number.isInteger(step) || step <= this.currentStep) {
      throw new Error(`Zone ${this.zoneId} cannot compute step ${step}; last computed step is ${this.currentStep}.`);
    }
    this.ticks += 1;
    this.moveVehicles();
    const spawned = this.spawn();
    const despawned = this.despawn();
    tickLight(this.light);
    this.currentStep = step;
    return this.buildSnapshot(spawned, despawned);
  }

  private moveVehicles(): void {
    const lanes: Lanes = { N: [], E: [], S: [], W: [] };
    for (const vehicle of this.vehicles) {
      lanes[vehicle.heading].push(vehicle);
    }
    const moved = new Set<Vehicle>();
    for (const heading of HEADINGS) {
      const lane = lanes[heading].sort((a, b) => b.offset - a.offset);
      let leaderOffset = Number.POSITIVE_INFINITY;
      for (const vehicle of lane) {
        if (!moved.has(vehicle)) {
          this.moveVehicle(vehicle, leaderOffset, lanes);
          moved.add(vehicle);
        }
        // a vehicle that turned away no longer leads this lane
        if (vehicle.heading === heading) {
          leaderOffset = vehicle.offset;
        }
      }
    }
  }

  private moveVehicle(vehicle: Vehicle, leaderOffset: number, lanes: Lanes): void {
    const { stopLine, intersectionExit } = this.geometry;
    const { vehicleSpeed, minGap, decisionDistance } = this.settings;
    const start = vehicle.offset;
    let target = Math.max(start, Math.min(start + vehicleSpeed, leaderOffset - minGap));

    const approaching = !vehicle.turned && start <= stopLine;
    if (approaching && target > stopLine) {
      const turn = this.ensureTurnDecision(vehicle);
      if (!isGreenFor(this.light, vehicle.heading)) {
        target = stopLine;
      } else if (turn !== "straight") {
        const nextHeading = headingAfterTurn(vehicle.heading, turn);
        if (this.isSlotClear(lanes[nextHeading], intersectionExit)) {
          vehicle.heading = nextHeading;
          vehicle.offset = intersectionExit;
          vehicle.speed = vehicleSpeed;
          vehicle.turned = true;
          lanes[nextHeading].push(vehicle);
          return;
        }
        target = stopLine;
      }
    }

    vehicle.speed = target - start;
    vehicle.offset = target;
    if (
      vehicle.turn === undefined &&
      !vehicle.turned &&
      vehicle.offset <= stopLine &&
      stopLine - vehicle.offset <= decisionDistance
    ) {
      this.ensureTurnDecision(vehicle);
    }
  }

  private ensureTurnDecision(vehicle: Vehicle) {
    if (vehicle.turn === undefined) {
      vehicle.turn = pickWeighted(this.rng, TURN_DIRECTIONS, this.settings.turnWeights);
    }
    return vehicle.turn;
  }

  private isSlotClear(lane: Vehicle[], offset: number): boolean {
    return lane.every((other) => Math.abs(other.offset - offset) >= this.settings.minGap);
  }

  private spawn(): number {
    const { spawnIntervalSteps, spawnProbability, maxVehicles, entries } = this.settings;
    const due = spawnIntervalSteps
      ? this.ticks % spawnIntervalSteps === 0
      : this.rng() < spawnProbability;
    if (!due) {
      return 0;
    }
    const heading = pickOne(this.rng, entries);
    if (this.vehicles.length >= maxVehicles) {
      return 0;
    }
    if (!this.isEntryClear(heading)) {
      return 0;
    }
    this.vehicles.push(this.createVehicle(heading, 0));
    return 1;
  }

  private isEntryClear(heading: Heading): boolean {
    return this.vehicles.every(
      (other) => other.heading !== heading || other.offset >= this.settings.minGap
    );
  }

  private despawn(): number {
    const before = this.vehicles.length;
    this.vehicles = this.vehicles.filter((vehicle) => this.despawnReason(vehicle) === null);
    return before - this.vehicles.length;
  }

  private despawnReason(vehicle: Vehicle): DespawnReason | null {
    if (vehicle.offset >= this.geometry.size) {
      return "boundary";
    }
    if (vehicle.turned && vehicle.offset >= this.geometry.intersectionExit + this.settings.turnExitDistance) {
      return "turn_complete";
    }
    return null;
  }

  private placeInitialVehicles(count: number): void {
    for (let i = 0; i < count; i += 1) {
      for (let attempt = 0; attempt < INITIAL_PLACEMENT_ATTEMPTS; attempt += 1) {
        const heading = pickOne(this.rng, this.settings.entries);
        const offset = Math.floor(this.rng() * this.geometry.stopLine);
        if (this.isSlotClear(this.vehicles.filter((other) => other.heading === heading), offset)) {
          this.vehicles.push(this.createVehicle(heading, offset));
          break;
        }
      }
    }
  }

  private createVehicle(heading: Heading, offset: number): Vehicle {
    const id = `${this.zoneId}-${this.nextSeq}`;
    this.nextSeq += 1;
    return { id, heading, offset, speed: 0, turned: false };
  }

  private buildSnapshot(spawned: number, despawned: number): ZoneSnapshot {
    const vehicles = this.vehicles.map((vehicle): VehicleState =>
      Object.freeze({
        id: vehicle.id,
        heading: vehicle.heading,
        offset: vehicle.offset,
        speed: vehicle.speed,
        turn: vehicle.turn ?? null,
        turned: vehicle.turned,
        ...lanePosition(this.geometry, vehicle.heading, vehicle.offset)
      })
    );
    const light: LightState = Object.freeze({
      id: this.light.id,
      phase: this.light.phase,
      elapsed: this.light.elapsed,
      cycleLength: this.light.cycleLength,
      x: this.geometry.center,
      y: this.geometry.center
    });
    return Object.freeze({
      zoneId: this.zoneId,
      step: this.currentStep,
      vehicles: Object.freeze(vehicles),
      lights: Object.freeze([light]),
      counters: Object.freeze({ active: vehicles.length, spawned, despawned })
    });
  }
}
