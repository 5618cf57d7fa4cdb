import { describeError, ReportTimeoutError } from "../errors";
import { createLogger, type Logger } from "../logger";
import type { GlobalSnapshot, ReportRequest, ReportStatus } from "../protocol/types";
import type { ZoneId, ZoneSnapshot } from "../traffic/types";
import type { Aggregator } from "./aggregator";
import type { Registry, WorkerRecord } from "./registry";

export type CoordinatorState = "Idle" | "Dispatching" | "AwaitingReports" | "Settling" | "Settled" | "Halted";

export interface StepDispatcher {
  /** Delivers a step command. Resolution only means delivery; reports arrive separately. */
  sendStep(record: WorkerRecord, step: number): Promise<void>;
}

export interface CoordinatorOptions {
  registry: Registry;
  aggregator: Aggregator;
  dispatcher: StepDispatcher;
  reportDeadlineMs: number;
  stepIntervalMs: number;
  carryForwardStale?: boolean;
  minWorkers?: number;
  startupWaitMs?: number;
  durationMs?: number;
  maxSteps?: number;
  startStep?: number;
  workerStaleTimeoutMs?: number;
  sweepIntervalMs?: number;
  clock?: () => number;
  logger?: Logger;
}

export interface StepStats {
  settled: number;
  partial: number;
  averageMs: number;
  maxMs: number;
}

interface StepInFlight {
  step: number;
  dispatched: Set<ZoneId>;
  recordIds: Map<ZoneId, string>;
  dispatchedAt: number;
  reports: Map<ZoneId, ZoneSnapshot>;
  rejected: Set<ZoneId>;
  finish: (() => void) | null;
}

const IDLE_POLL_MS = 250;

export interface GlobalSnapshotInput {
  step: number;
  reports: ReadonlyMap<ZoneId, ZoneSnapshot>;
  missing: readonly ZoneId[];
  stale: readonly ZoneId[];
  carried?: ReadonlyMap<ZoneId, ZoneSnapshot>;
  settledAt: number;
  durationMs: number;
}

export function buildGlobalSnapshot(input: GlobalSnapshotInput): GlobalSnapshot {
  const zones: Record<ZoneId, ZoneSnapshot> = {};
  const totals = { activeVehicles: 0, spawned: 0, despawned: 0, reportingZones: 0 };
  for (const zoneId of [...input.reports.keys()].sort()) {
    const snapshot = input.reports.get(zoneId);
    if (!snapshot) {
      continue;
    }
    zones[zoneId] = snapshot;
    totals.activeVehicles += snapshot.counters.active;
    totals.spawned += snapshot.counters.spawned;
    totals.despawned += snapshot.counters.despawned;
    totals.reportingZones += 1;
  }
  const carriedZones: ZoneId[] = [];
  for (const [zoneId, snapshot] of input.carried ?? []) {
    if (!(zoneId in zones)) {
      zones[zoneId] = snapshot;
      carriedZones.push(zoneId);
    }
  }
  return Object.freeze({
    step: input.step,
    zones: Object.freeze(zones),
    staleZones: Object.freeze([...input.stale].sort()),
    missingZones: Object.freeze([...input.missing].sort()),
    carriedZones: Object.freeze(carriedZones.sort()),
    partial: input.missing.length > 0,
    totals: Object.freeze(totals),
    settledAtIso: new Date(input.settledAt).toISOString(),
    durationMs: input.durationMs
  });
}

/**
 * Drives global steps one at a time: dispatch to every live zone, collect
 * reports until all arrived or the deadline passed, settle, hand the merged
 * snapshot to the aggregator.
 */
export class StepCoordinator {
  private registry: Registry;
  private aggregator: Aggregator;
  private dispatcher: StepDispatcher;
  private reportDeadlineMs: number;
  private stepIntervalMs: number;
  private carryForwardStale: boolean;
  private minWorkers: number;
  private startupWaitMs: number;
  private durationMs?: number;
  private maxSteps?: number;
  private workerStaleTimeoutMs?: number;
  private sweepIntervalMs: number;
  private clock: () => number;
  private logger: Logger;

  private currentState: CoordinatorState;
  private nextStep: number;
  private inFlight: StepInFlight | null;
  private lastKnown: Map<ZoneId, ZoneSnapshot>;
  private running: boolean;
  private stopRequested: boolean;
  private wake: (() => void) | null;
  private stats: { settled: number; partial: number; totalMs: number; maxMs: number };

  constructor(options: CoordinatorOptions) {
    this.registry = options.registry;
    this.aggregator = options.aggregator;
    this.dispatcher = options.dispatcher;
    this.reportDeadlineMs = options.reportDeadlineMs;
    this.stepIntervalMs = options.stepIntervalMs;
    this.carryForwardStale = options.carryForwardStale ?? false;
    this.minWorkers = options.minWorkers ?? 1;
    this.startupWaitMs = options.startupWaitMs ?? 0;
    this.durationMs = options.durationMs;
    this.maxSteps = options.maxSteps;
    this.workerStaleTimeoutMs = options.workerStaleTimeoutMs;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 1000;
    this.clock = options.clock ?? (() => Date.now());
    this.logger = options.logger ?? createLogger("coordinator");
    this.currentState = "Idle";
    this.nextStep = Math.max(1, options.startStep ?? 1);
    this.inFlight = null;
    this.lastKnown = new Map();
    this.running = false;
    this.stopRequested = false;
    this.wake = null;
    this.stats = { settled: 0, partial: 0, totalMs: 0, maxMs: 0 };
  }

  get state(): CoordinatorState {
    return this.currentState;
  }

  /** The step in flight, or the next one to be dispatched. */
  get step(): number {
    return this.inFlight?.step ?? this.nextStep;
  }

  /** A worker registering now participates from this step on. */
  get joinStep(): number {
    return this.inFlight ? this.inFlight.step + 1 : this.nextStep;
  }

  getStats(): StepStats {
    const { settled, partial, totalMs, maxMs } = this.stats;
    return { settled, partial, averageMs: settled ? totalMs / settled : 0, maxMs };
  }

  /**
   * Runs one global step. Resolves with the settled snapshot, or null when no
   * zone is live (time does not advance without participants).
   */
  async runStep(): Promise<GlobalSnapshot | null> {
    if (this.inFlight) {
      throw new Error(`Step ${this.inFlight.step} is still in flight.`);
    }
    const zones = this.registry.liveZones();
    if (zones.size === 0) {
      this.currentState = "Idle";
      return null;
    }

    const step = this.nextStep;
    const flight: StepInFlight = {
      step,
      dispatched: zones,
      recordIds: new Map(),
      dispatchedAt: this.clock(),
      reports: new Map(),
      rejected: new Set(),
      finish: null
    };
    this.inFlight = flight;
    this.currentState = "Dispatching";
    this.logger.debug(`dispatching step ${step} to ${zones.size} zone(s)`);
    for (const zoneId of zones) {
      const record = this.registry.get(zoneId);
      if (!record) {
        continue;
      }
      flight.recordIds.set(zoneId, record.recordId);
      this.dispatcher.sendStep(record, step).catch((error: unknown) => {
        this.logger.warn(`step ${step} command to zone ${zoneId} failed: ${describeError(error)}`);
      });
    }

    this.currentState = "AwaitingReports";
    await this.awaitReports(flight);

    this.currentState = "Settling";
    const snapshot = this.settle(flight);

    this.aggregator.merge(snapshot);
    this.inFlight = null;
    this.nextStep = step + 1;
    this.currentState = "Settled";
    return snapshot;
  }

  submitReport(report: ReportRequest): ReportStatus {
    const existing = this.registry.get(report.zoneId);
    if (!existing) {
      return "unknown";
    }
    if (existing.workerId && report.workerId && existing.workerId !== report.workerId) {
      return "unknown";
    }
    const record = this.registry.touch(report.zoneId);
    if (!record || record.status === "Stale") {
      return "stale";
    }

    const flight = this.inFlight;
    if (!flight) {
      return report.step >= this.nextStep ? "unexpected" : "late";
    }
    if (report.step < flight.step) {
      this.logger.debug(`late report from ${report.zoneId} for step ${report.step}`);
      return "late";
    }
    if (report.step > flight.step || !flight.dispatched.has(report.zoneId)) {
      return "unexpected";
    }
    if (!flight.reports.has(report.zoneId)) {
      flight.reports.set(report.zoneId, report.snapshot);
      flight.rejected.delete(report.zoneId);
      this.registry.recordReport(report.zoneId, report.step, report.snapshot.counters.active);
      this.checkComplete(flight);
    }
    return "accepted";
  }

  /** A malformed report still proves the worker alive but contributes nothing. */
  rejectReport(zoneId: ZoneId, step?: number): void {
    if (!this.registry.get(zoneId)) {
      return;
    }
    this.registry.touch(zoneId);
    const flight = this.inFlight;
    if (flight && (step === undefined || step === flight.step) && flight.dispatched.has(zoneId)) {
      if (!flight.reports.has(zoneId)) {
        flight.rejected.add(zoneId);
        this.checkComplete(flight);
      }
    }
  }

  async run(): Promise<void> {
    if (this.running) {
      throw new Error("Coordinator is already running.");
    }
    this.running = true;
    this.stopRequested = false;
    let sweeper: ReturnType<typeof setInterval> | null = null;
    try {
      await this.waitForWorkers();
      if (this.workerStaleTimeoutMs !== undefined) {
        const timeoutMs = this.workerStaleTimeoutMs;
        sweeper = setInterval(() => this.sweepStale(timeoutMs), this.sweepIntervalMs);
      }
      const startedAt = this.clock();
      let settledThisRun = 0;
      while (!this.stopRequested) {
        if (this.maxSteps !== undefined && settledThisRun >= this.maxSteps) {
          break;
        }
        if (this.durationMs !== undefined && this.clock() - startedAt >= this.durationMs) {
          break;
        }
        const snapshot = await this.runStep();
        if (!snapshot) {
          await this.pause(Math.max(IDLE_POLL_MS, this.stepIntervalMs));
          continue;
        }
        settledThisRun += 1;
        if (this.stepIntervalMs > 0) {
          await this.pause(this.stepIntervalMs);
        }
      }
    } finally {
      if (sweeper) {
        clearInterval(sweeper);
      }
      this.running = false;
      this.currentState = "Halted";
      this.aggregator.close();
      const stats = this.getStats();
      this.logger.info(
        `halted after ${stats.settled} step(s), ${stats.partial} partial, avg step ${stats.averageMs.toFixed(1)} ms, max ${stats.maxMs} ms`
      );
    }
  }

  stop(): void {
    this.stopRequested = true;
    this.wake?.();
    this.inFlight?.finish?.();
  }

  private sweepStale(timeoutMs: number): void {
    const stale = this.registry.sweep(this.clock(), timeoutMs);
    if (stale.size) {
      this.logger.warn(`marked stale after ${timeoutMs} ms of silence: ${[...stale].join(", ")}`);
    }
  }

  private async waitForWorkers(): Promise<void> {
    if (this.minWorkers <= 0) {
      return;
    }
    const deadline = this.clock() + this.startupWaitMs;
    while (!this.stopRequested && this.registry.liveZones().size < this.minWorkers) {
      if (this.clock() >= deadline) {
        this.logger.warn(
          `only ${this.registry.liveZones().size}/${this.minWorkers} worker(s) registered after ${this.startupWaitMs} ms; starting anyway`
        );
        return;
      }
      await this.pause(IDLE_POLL_MS);
    }
  }

  private awaitReports(flight: StepInFlight): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        flight.finish = null;
        resolve();
      }, this.reportDeadlineMs);
      flight.finish = () => {
        clearTimeout(timer);
        flight.finish = null;
        resolve();
      };
      this.checkComplete(flight);
    });
  }

  private checkComplete(flight: StepInFlight): void {
    if (flight.reports.size + flight.rejected.size >= flight.dispatched.size) {
      flight.finish?.();
    }
  }

  private settle(flight: StepInFlight): GlobalSnapshot {
    const now = this.clock();
    const missing = [...flight.dispatched].filter((zoneId) => !flight.reports.has(zoneId));
    const stale = new Set<ZoneId>();
    for (const zoneId of missing) {
      if (flight.rejected.has(zoneId)) {
        this.logger.warn(`zone ${zoneId} sent no usable report for step ${flight.step}`);
        continue;
      }
      // silent through the deadline: stale, unless it re-registered meanwhile
      this.logger.warn(new ReportTimeoutError(zoneId, flight.step).message);
      const recordId = flight.recordIds.get(zoneId);
      if (recordId === undefined) {
        continue;
      }
      const record = this.registry.get(zoneId);
      const alreadyStale = record !== undefined && record.recordId === recordId && record.status === "Stale";
      if (alreadyStale || this.registry.markStale(zoneId, recordId)) {
        stale.add(zoneId);
      }
    }

    let carried: Map<ZoneId, ZoneSnapshot> | undefined;
    if (this.carryForwardStale && stale.size) {
      carried = new Map();
      for (const zoneId of stale) {
        const previous = this.lastKnown.get(zoneId);
        if (previous) {
          carried.set(zoneId, previous);
        }
      }
    }
    for (const [zoneId, snapshot] of flight.reports) {
      this.lastKnown.set(zoneId, snapshot);
    }

    const durationMs = Math.max(0, now - flight.dispatchedAt);
    this.stats.settled += 1;
    this.stats.totalMs += durationMs;
    this.stats.maxMs = Math.max(this.stats.maxMs, durationMs);
    if (missing.length) {
      this.stats.partial += 1;
    }

    return buildGlobalSnapshot({
      step: flight.step,
      reports: flight.reports,
      missing,
      stale: [...stale],
      carried,
      settledAt: now,
      durationMs
    });
  }

  private pause(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
