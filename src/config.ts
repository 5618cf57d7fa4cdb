import { z } from "zod";
import { MalformedPayloadError } from "./errors";
import { formatIssues } from "./protocol/schema";
import type { ZoneSettings } from "./traffic/types";

export interface MasterSettings {
  host: string;
  port: number;
  stepIntervalMs: number;
  reportDeadlineMs: number;
  workerStaleTimeoutMs: number;
  sweepIntervalMs: number;
  dispatchTimeoutMs: number;
  historyDepth: number;
  observerBuffer: number;
  minWorkers: number;
  startupWaitMs: number;
  durationMs?: number;
  maxSteps?: number;
  carryForwardStale: boolean;
}

export interface WorkerSettings {
  zoneId: string;
  masterUrl: string;
  host: string;
  port: number;
  advertiseHost: string;
  registrationAttempts: number;
  retryBaseMs: number;
  requestTimeoutMs: number;
  idleReregisterMs: number;
  zone: ZoneSettings;
}

export const DEFAULT_ZONE_SETTINGS: ZoneSettings = {
  zoneSize: 200,
  roadWidth: 20,
  vehicleSpeed: 7,
  minGap: 8,
  decisionDistance: 30,
  turnExitDistance: 60,
  spawnProbability: 0.4,
  maxVehicles: 80,
  initialVehicles: 0,
  lightCycleSteps: 4,
  initialPhase: "NS_GREEN",
  turnWeights: { straight: 0.6, left: 0.2, right: 0.2 },
  entries: ["N", "E", "S", "W"]
};

export const DEFAULT_MASTER_SETTINGS: MasterSettings = {
  host: "0.0.0.0",
  port: 5000,
  stepIntervalMs: 500,
  reportDeadlineMs: 3000,
  workerStaleTimeoutMs: 10_000,
  sweepIntervalMs: 1000,
  dispatchTimeoutMs: 3000,
  historyDepth: 100,
  observerBuffer: 16,
  minWorkers: 1,
  startupWaitMs: 30_000,
  carryForwardStale: false
};

export const DEFAULT_WORKER_SETTINGS: Omit<WorkerSettings, "zoneId"> = {
  masterUrl: "http://localhost:5000",
  host: "0.0.0.0",
  port: 0,
  advertiseHost: "localhost",
  registrationAttempts: 10,
  retryBaseMs: 500,
  requestTimeoutMs: 5000,
  idleReregisterMs: 20_000,
  zone: DEFAULT_ZONE_SETTINGS
};

const positiveMs = z.number().int().min(1);

const zoneSettingsSchema = z
  .object({
    zoneSize: z.number().finite().min(40),
    roadWidth: z.number().finite().min(4),
    vehicleSpeed: z.number().finite().positive(),
    minGap: z.number().finite().positive(),
    decisionDistance: z.number().finite().min(0),
    turnExitDistance: z.number().finite().min(0),
    spawnProbability: z.number().min(0).max(1),
    spawnIntervalSteps: z.number().int().min(1).optional(),
    maxVehicles: z.number().int().min(0),
    initialVehicles: z.number().int().min(0),
    lightCycleSteps: z.number().int().min(1),
    initialPhase: z.enum(["NS_GREEN", "EW_GREEN"]),
    turnWeights: z
      .object({
        straight: z.number().min(0),
        left: z.number().min(0),
        right: z.number().min(0)
      })
      .refine((weights) => weights.straight + weights.left + weights.right > 0, {
        message: "at least one turn weight must be positive"
      }),
    entries: z.array(z.enum(["N", "S", "E", "W"])).min(1),
    seed: z.number().int().optional()
  })
  .refine((zone) => zone.roadWidth < zone.zoneSize / 2, {
    message: "roadWidth must be less than half of zoneSize",
    path: ["roadWidth"]
  });

const masterSettingsSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  stepIntervalMs: z.number().int().min(0),
  reportDeadlineMs: positiveMs,
  workerStaleTimeoutMs: positiveMs,
  sweepIntervalMs: positiveMs,
  dispatchTimeoutMs: positiveMs,
  historyDepth: z.number().int().min(1),
  observerBuffer: z.number().int().min(1),
  minWorkers: z.number().int().min(0),
  startupWaitMs: z.number().int().min(0),
  durationMs: positiveMs.optional(),
  maxSteps: z.number().int().min(1).optional(),
  carryForwardStale: z.boolean()
});

const workerSettingsSchema = z.object({
  zoneId: z.string().trim().min(1).max(64),
  masterUrl: z.string().url(),
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  advertiseHost: z.string().min(1),
  registrationAttempts: z.number().int().min(1),
  retryBaseMs: z.number().int().min(0),
  requestTimeoutMs: positiveMs,
  idleReregisterMs: positiveMs,
  zone: zoneSettingsSchema
});

export type Env = Record<string, string | undefined>;

export function resolveMasterSettings(overrides: Partial<MasterSettings> = {}, env: Env = process.env): MasterSettings {
  const fromEnv: Partial<MasterSettings> = dropUndefined({
    host: readString(env, "TRAFFIC_MASTER_HOST"),
    port: readNumber(env, "TRAFFIC_MASTER_PORT"),
    stepIntervalMs: readNumber(env, "TRAFFIC_STEP_INTERVAL_MS"),
    reportDeadlineMs: readNumber(env, "TRAFFIC_REPORT_DEADLINE_MS"),
    workerStaleTimeoutMs: readNumber(env, "TRAFFIC_WORKER_STALE_TIMEOUT_MS"),
    historyDepth: readNumber(env, "TRAFFIC_HISTORY_DEPTH"),
    minWorkers: readNumber(env, "TRAFFIC_MIN_WORKERS"),
    carryForwardStale: readBoolean(env, "TRAFFIC_CARRY_FORWARD_STALE")
  });
  const merged = { ...DEFAULT_MASTER_SETTINGS, ...fromEnv, ...dropUndefined(overrides) };
  return validate(masterSettingsSchema, "master settings", merged);
}

export function resolveWorkerSettings(
  overrides: Partial<Omit<WorkerSettings, "zone">> & { zone?: Partial<ZoneSettings> },
  env: Env = process.env
): WorkerSettings {
  const zoneFromEnv: Partial<ZoneSettings> = dropUndefined({
    spawnProbability: readNumber(env, "TRAFFIC_SPAWN_PROBABILITY"),
    lightCycleSteps: readNumber(env, "TRAFFIC_LIGHT_CYCLE_STEPS"),
    turnWeights: readTurnWeights(env, "TRAFFIC_TURN_WEIGHTS"),
    seed: readNumber(env, "TRAFFIC_SEED")
  });
  const fromEnv = dropUndefined({
    zoneId: readString(env, "TRAFFIC_ZONE"),
    masterUrl: readString(env, "TRAFFIC_MASTER_URL"),
    advertiseHost: readString(env, "TRAFFIC_ADVERTISE_HOST"),
    port: readNumber(env, "TRAFFIC_WORKER_PORT")
  });
  const { zone, ...rest } = overrides;
  const merged = {
    ...DEFAULT_WORKER_SETTINGS,
    ...fromEnv,
    ...dropUndefined(rest),
    zone: { ...DEFAULT_ZONE_SETTINGS, ...zoneFromEnv, ...dropUndefined(zone ?? {}) }
  };
  return validate(workerSettingsSchema, "worker settings", merged);
}

/** Parses "straight:left:right", e.g. "6:2:2". */
export function parseTurnWeights(value: string): ZoneSettings["turnWeights"] | undefined {
  const parts = value.split(/[:,]/).map((part) => Number.parseFloat(part.trim()));
  if (parts.length !== 3 || parts.some((part) => !Number.isFinite(part))) {
    return undefined;
  }
  const [straight, left, right] = parts;
  return { straight, left, right };
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new MalformedPayloadError(what, formatIssues(result.error));
  }
  return result.data;
}

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Env, key: string): number | undefined {
  const value = readString(env, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

function readBoolean(env: Env, key: string): boolean | undefined {
  const value = readString(env, key)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  return value === "1" || value === "true" || value === "yes";
}

function readTurnWeights(env: Env, key: string): ZoneSettings["turnWeights"] | undefined {
  const value = readString(env, key);
  return value ? parseTurnWeights(value) : undefined;
}

function dropUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value) as Array<keyof T>) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}
