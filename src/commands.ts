import { parseArgs } from "node:util";
import {
  parseTurnWeights,
  resolveMasterSettings,
  resolveWorkerSettings,
  type Env,
  type MasterSettings,
  type WorkerSettings
} from "./config";
import type { ZoneSettings } from "./traffic/types";

export const USAGE = `
Zoned traffic simulation
========================

Usage:
  zoned-traffic-sim master [options]
  zoned-traffic-sim worker --zone <name> [options]

Master options:
  --host <host>               Bind address (default 0.0.0.0)
  --port <port>               HTTP port (default 5000)
  --step-interval <ms>        Pause between settled steps (default 500)
  --report-deadline <ms>      Per-step report deadline (default 3000)
  --stale-timeout <ms>        Silence before a zone is marked stale (default 10000)
  --history <n>               Global snapshots kept for late observers (default 100)
  --min-workers <n>           Workers to wait for before stepping (default 1)
  --startup-wait <ms>         Longest wait for those workers (default 30000)
  --duration <seconds>        Stop after this long
  --max-steps <n>             Stop after this many steps
  --carry-forward             Keep a stale zone's last snapshot in the merge

Worker options:
  --zone <name>               Zone this worker simulates (required)
  --master <url>              Master base URL (default http://localhost:5000)
  --host <host>               Bind address (default 0.0.0.0)
  --port <port>               HTTP port, 0 for any free port (default 0)
  --advertise-host <host>     Host the master uses to reach this worker (default localhost)
  --spawn-probability <p>     Per-step spawn chance (default 0.4)
  --light-cycle <steps>       Steps per light phase (default 4)
  --turn-weights <s:l:r>      Straight, left and right weights (default 6:2:2)
  --seed <int>                Random seed (default derived from the zone name)
  --initial-vehicles <n>      Vehicles placed before the first step (default 0)
  --max-vehicles <n>          Vehicle cap for the zone (default 80)

Environment:
  TRAFFIC_LOG_LEVEL=debug|info|warn|error, TRAFFIC_DEBUG=1
`;

export type CliCommand =
  | { kind: "master"; settings: MasterSettings }
  | { kind: "worker"; settings: WorkerSettings }
  | { kind: "help" };

export function parseCommand(argv: string[], env: Env = process.env): CliCommand {
  const [command, ...rest] = argv;
  if (!command || command === "--help" || command === "-h" || command === "help") {
    return { kind: "help" };
  }
  if (command === "master") {
    const { values } = parseArgs({
      args: rest,
      strict: true,
      options: {
        host: { type: "string" },
        port: { type: "string" },
        "step-interval": { type: "string" },
        "report-deadline": { type: "string" },
        "stale-timeout": { type: "string" },
        history: { type: "string" },
        "min-workers": { type: "string" },
        "startup-wait": { type: "string" },
        duration: { type: "string" },
        "max-steps": { type: "string" },
        "carry-forward": { type: "boolean" }
      }
    });
    const duration = toNumber(values.duration);
    return {
      kind: "master",
      settings: resolveMasterSettings(
        {
          host: values.host,
          port: toNumber(values.port),
          stepIntervalMs: toNumber(values["step-interval"]),
          reportDeadlineMs: toNumber(values["report-deadline"]),
          workerStaleTimeoutMs: toNumber(values["stale-timeout"]),
          historyDepth: toNumber(values.history),
          minWorkers: toNumber(values["min-workers"]),
          startupWaitMs: toNumber(values["startup-wait"]),
          durationMs: duration === undefined ? undefined : Math.round(duration * 1000),
          maxSteps: toNumber(values["max-steps"]),
          carryForwardStale: values["carry-forward"]
        },
        env
      )
    };
  }
  if (command === "worker") {
    const { values } = parseArgs({
      args: rest,
      strict: true,
      options: {
        zone: { type: "string" },
        master: { type: "string" },
        host: { type: "string" },
        port: { type: "string" },
        "advertise-host": { type: "string" },
        "spawn-probability": { type: "string" },
        "light-cycle": { type: "string" },
        "turn-weights": { type: "string" },
        seed: { type: "string" },
        "initial-vehicles": { type: "string" },
        "max-vehicles": { type: "string" }
      }
    });
    const weights = values["turn-weights"];
    const zone: Partial<ZoneSettings> = {
      spawnProbability: toNumber(values["spawn-probability"]),
      lightCycleSteps: toNumber(values["light-cycle"]),
      turnWeights: weights === undefined ? undefined : parseTurnWeights(weights),
      seed: toNumber(values.seed),
      initialVehicles: toNumber(values["initial-vehicles"]),
      maxVehicles: toNumber(values["max-vehicles"])
    };
    if (weights !== undefined && zone.turnWeights === undefined) {
      throw new Error(`--turn-weights expects three numbers like 6:2:2, got "${weights}".`);
    }
    return {
      kind: "worker",
      settings: resolveWorkerSettings(
        {
          zoneId: values.zone,
          masterUrl: values.master,
          host: values.host,
          port: toNumber(values.port),
          advertiseHost: values["advertise-host"],
          zone
        },
        env
      )
    };
  }
  throw new Error(`Unknown command "${command}". Run with --help for usage.`);
}

function toNumber(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  return Number(value);
}
