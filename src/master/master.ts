import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { MasterSettings } from "../config";
import { createLogger, type Logger } from "../logger";
import { MasterApi } from "./api";
import { Aggregator } from "./aggregator";
import { StepCoordinator, type StepDispatcher } from "./coordinator";
import { HttpStepDispatcher } from "./dispatcher";
import { Registry } from "./registry";
import { createMasterServer } from "./server";

export interface MasterNodeOptions {
  dispatcher?: StepDispatcher;
  logger?: Logger;
}

export class MasterNode {
  readonly settings: MasterSettings;
  readonly registry: Registry;
  readonly aggregator: Aggregator;
  readonly coordinator: StepCoordinator;
  readonly api: MasterApi;
  private logger: Logger;
  private server: Server | null;

  constructor(settings: MasterSettings, options: MasterNodeOptions = {}) {
    this.settings = settings;
    this.logger = options.logger ?? createLogger("master");
    this.registry = new Registry();
    this.aggregator = new Aggregator({
      historyDepth: settings.historyDepth,
      observerBuffer: settings.observerBuffer,
      logger: this.logger.child("aggregator")
    });
    this.coordinator = new StepCoordinator({
      registry: this.registry,
      aggregator: this.aggregator,
      dispatcher: options.dispatcher ?? new HttpStepDispatcher(settings.dispatchTimeoutMs),
      reportDeadlineMs: settings.reportDeadlineMs,
      stepIntervalMs: settings.stepIntervalMs,
      carryForwardStale: settings.carryForwardStale,
      minWorkers: settings.minWorkers,
      startupWaitMs: settings.startupWaitMs,
      durationMs: settings.durationMs,
      maxSteps: settings.maxSteps,
      workerStaleTimeoutMs: settings.workerStaleTimeoutMs,
      sweepIntervalMs: settings.sweepIntervalMs,
      logger: this.logger.child("coordinator")
    });
    this.api = new MasterApi({
      registry: this.registry,
      coordinator: this.coordinator,
      aggregator: this.aggregator,
      logger: this.logger
    });
    this.server = null;
  }

  async listen(): Promise<AddressInfo> {
    const server = createMasterServer(this.api, this.aggregator, this.logger.child("http"));
    this.server = server;
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.settings.port, this.settings.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Master server did not bind to a TCP port.");
    }
    this.logger.info(`listening on http://${this.settings.host}:${address.port}`);
    return address;
  }

  /** Runs the simulation until it halts, then closes the HTTP server. */
  async run(): Promise<void> {
    try {
      await this.coordinator.run();
    } finally {
      await this.close();
    }
  }

  stop(): void {
    this.coordinator.stop();
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
